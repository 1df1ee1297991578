import {
  CONTENT_MAX_LENGTH,
  TITLE_MAX_LENGTH,
  ValidationError,
  type PostInput,
  type ValidationIssue
} from "./repository";

const POST_ID_PATTERN = /^[0-9]+$/;

interface PostBody {
  title?: unknown;
  content?: unknown;
  published?: unknown;
  rating?: unknown;
}

function isPostBody(value: unknown): value is PostBody {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Counts code points, so a character outside the BMP counts once.
function characterCount(value: string): number {
  return [...value].length;
}

export function parsePostId(value: string): number {
  if (POST_ID_PATTERN.test(value)) {
    const parsed = Number(value);
    if (Number.isSafeInteger(parsed) && parsed > 0) {
      return parsed;
    }
  }

  throw new ValidationError([{ field: "id", message: "id must be a positive integer" }]);
}

export function parsePostInput(body: unknown): PostInput {
  if (!isPostBody(body)) {
    throw new ValidationError([{ field: "body", message: "request body must be a JSON object" }]);
  }

  const issues: ValidationIssue[] = [];

  let title = "";
  if (typeof body.title !== "string") {
    issues.push({ field: "title", message: "title must be a string" });
  } else {
    title = body.title.trim();
    if (title.length === 0 || characterCount(title) > TITLE_MAX_LENGTH) {
      issues.push({ field: "title", message: `title must be between 1 and ${TITLE_MAX_LENGTH} characters` });
    }
  }

  let content = "";
  if (typeof body.content !== "string") {
    issues.push({ field: "content", message: "content must be a string" });
  } else if (characterCount(body.content) > CONTENT_MAX_LENGTH) {
    issues.push({ field: "content", message: `content must be at most ${CONTENT_MAX_LENGTH} characters` });
  } else {
    content = body.content;
  }

  let published = true;
  if (body.published !== undefined) {
    if (typeof body.published !== "boolean") {
      issues.push({ field: "published", message: "published must be a boolean" });
    } else {
      published = body.published;
    }
  }

  let rating: number | null = null;
  if (body.rating !== undefined && body.rating !== null) {
    if (typeof body.rating !== "number" || !Number.isSafeInteger(body.rating)) {
      issues.push({ field: "rating", message: "rating must be an integer or null" });
    } else {
      rating = body.rating;
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return { title, content, published, rating };
}
