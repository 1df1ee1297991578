import { SequentialIdAllocator, type IdAllocator } from "./id-allocator";

export const TITLE_MAX_LENGTH = 200;
export const CONTENT_MAX_LENGTH = 20_000;

export interface Post {
  id: number;
  title: string;
  content: string;
  published: boolean;
  rating: number | null;
}

export type PostInput = Omit<Post, "id">;

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues[0]?.message ?? "request is invalid");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  readonly id: number | null;

  constructor(id: number | null) {
    super(id === null ? "no posts have been created yet" : `post with id: ${id} was not found`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export class ConflictError extends Error {}

export interface PostRepository {
  list(): Promise<Post[]>;
  getLatest(): Promise<Post>;
  get(id: number): Promise<Post>;
  create(input: PostInput): Promise<Post>;
  update(id: number, input: PostInput): Promise<Post>;
  delete(id: number): Promise<void>;
  count(): Promise<number>;
}

export interface InMemoryPostRepositoryOptions {
  initialPosts?: Post[];
  idAllocator?: IdAllocator;
}

function copyPost(post: Post): Post {
  return { ...post };
}

function toStoredPost(id: number, input: PostInput): Post {
  return {
    id,
    title: input.title,
    content: input.content,
    published: input.published,
    rating: input.rating
  };
}

export class InMemoryPostRepository implements PostRepository {
  // Map iteration follows insertion order; set() on an existing key keeps its slot.
  private readonly posts = new Map<number, Post>();
  private readonly idAllocator: IdAllocator;

  constructor(options: InMemoryPostRepositoryOptions = {}) {
    this.idAllocator = options.idAllocator ?? new SequentialIdAllocator();

    for (const post of options.initialPosts ?? []) {
      if (this.posts.has(post.id)) {
        throw new ConflictError(`duplicate post id: ${post.id}`);
      }
      this.posts.set(post.id, copyPost(post));
    }
  }

  async list(): Promise<Post[]> {
    return [...this.posts.values()].map(copyPost);
  }

  async getLatest(): Promise<Post> {
    let latest: Post | undefined;
    for (const post of this.posts.values()) {
      latest = post;
    }

    if (!latest) {
      throw new NotFoundError(null);
    }

    return copyPost(latest);
  }

  async get(id: number): Promise<Post> {
    return copyPost(this.require(id));
  }

  async create(input: PostInput): Promise<Post> {
    const id = this.idAllocator.allocate((candidate) => this.posts.has(candidate));
    if (this.posts.has(id)) {
      throw new ConflictError(`allocated id ${id} is already in use`);
    }

    const post = toStoredPost(id, input);
    this.posts.set(id, post);
    return copyPost(post);
  }

  async update(id: number, input: PostInput): Promise<Post> {
    this.require(id);

    const post = toStoredPost(id, input);
    this.posts.set(id, post);
    return copyPost(post);
  }

  async delete(id: number): Promise<void> {
    this.require(id);
    this.posts.delete(id);
  }

  async count(): Promise<number> {
    return this.posts.size;
  }

  private require(id: number): Post {
    const post = this.posts.get(id);
    if (!post) {
      throw new NotFoundError(id);
    }
    return post;
  }
}
