import type { Request } from "express";

export type LogMetadata = Record<string, unknown>;
export type LogLevel = "info" | "error";

export interface Logger {
  info: (event: string, metadata?: LogMetadata) => void;
  error: (event: string, metadata?: LogMetadata) => void;
}

const REDACTED = "[REDACTED]";
const TRUNCATED = "[Truncated]";
const MAX_DEPTH = 6;

const REDACTED_HEADERS = new Set(["authorization", "proxy-authorization", "cookie", "set-cookie", "x-api-key"]);

// Post content and raw request bodies stay out of logs along with credentials.
const REDACTED_KEY_PATTERN = /(authorization|cookie|password|secret|token|session|api[_-]?key|credential|body|content)/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function redactHeaders(headers: Record<string, unknown>, depth: number): LogMetadata {
  const output: LogMetadata = {};
  for (const [name, value] of Object.entries(headers)) {
    output[name] = REDACTED_HEADERS.has(name.toLowerCase()) ? REDACTED : sanitize(value, depth + 1);
  }
  return output;
}

function redactRecord(input: Record<string, unknown>, depth: number): LogMetadata {
  const output: LogMetadata = {};
  for (const [key, value] of Object.entries(input)) {
    if (REDACTED_KEY_PATTERN.test(key)) {
      output[key] = REDACTED;
    } else if (key.toLowerCase() === "headers" && isRecord(value)) {
      output[key] = redactHeaders(value, depth);
    } else {
      output[key] = sanitize(value, depth + 1);
    }
  }
  return output;
}

function sanitize(value: unknown, depth: number): unknown {
  if (depth > MAX_DEPTH) {
    return TRUNCATED;
  }

  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
    case "undefined":
      return value;
    case "bigint":
      return value.toString();
    case "function":
    case "symbol":
      return String(value);
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitize(entry, depth + 1));
  }
  if (isRecord(value)) {
    return redactRecord(value, depth);
  }
  return String(value);
}

export function sanitizeLogMetadata(metadata: LogMetadata = {}): LogMetadata {
  return redactRecord(metadata, 0);
}

export type LoggableRequest = Pick<Request, "method" | "originalUrl" | "url" | "ip" | "headers">;

/** Request fields safe to log. The body is never included. */
export function buildSafeRequestLogMetadata(req: LoggableRequest): LogMetadata {
  return {
    method: req.method,
    path: req.originalUrl || req.url,
    ip: req.ip,
    headers: redactHeaders(req.headers, 0)
  };
}

export function formatLogLine(level: LogLevel, event: string, metadata: LogMetadata = {}, now = new Date()): string {
  return JSON.stringify({
    level,
    timestamp: now.toISOString(),
    event,
    metadata: sanitizeLogMetadata(metadata)
  });
}

export const appLogger: Logger = {
  info(event, metadata = {}) {
    console.info(formatLogLine("info", event, metadata));
  },
  error(event, metadata = {}) {
    console.error(formatLogLine("error", event, metadata));
  }
};

export const silentLogger: Logger = {
  info() {},
  error() {}
};
