import { Router, type Request, type Response } from "express";
import { appLogger, buildSafeRequestLogMetadata, type LoggableRequest, type Logger } from "../security/logger";
import { parsePostId, parsePostInput } from "./http";
import { NotFoundError, ValidationError, type PostRepository } from "./repository";

type PostIdRequest = Request<{ id: string }>;

function handlePostsError(req: LoggableRequest, res: Response, logger: Logger, error: unknown): void {
  if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }

  if (error instanceof ValidationError) {
    res.status(422).json({ error: error.message, issues: error.issues });
    return;
  }

  logger.error("posts_request_failed", { ...buildSafeRequestLogMetadata(req), error });
  res.status(500).json({ error: "Internal server error" });
}

export function createPostsRouter(repository: PostRepository, logger: Logger = appLogger): Router {
  const router = Router();

  router.get("/", async (req: Request, res: Response) => {
    try {
      const posts = await repository.list();
      res.status(200).json(posts);
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  // Registered before "/:id" so "latest" is never parsed as an id.
  router.get("/latest", async (req: Request, res: Response) => {
    try {
      const post = await repository.getLatest();
      res.status(200).json(post);
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  router.get("/:id", async (req: PostIdRequest, res: Response) => {
    try {
      const id = parsePostId(req.params.id);
      const post = await repository.get(id);
      res.status(200).json(post);
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    try {
      const input = parsePostInput(req.body);
      const post = await repository.create(input);

      logger.info("posts_created", { postId: post.id });

      res.status(201).json(post);
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  router.put("/:id", async (req: PostIdRequest, res: Response) => {
    try {
      const id = parsePostId(req.params.id);
      const input = parsePostInput(req.body);
      const post = await repository.update(id, input);

      logger.info("posts_updated", { postId: post.id });

      res.status(202).json(post);
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  router.delete("/:id", async (req: PostIdRequest, res: Response) => {
    try {
      const id = parsePostId(req.params.id);
      await repository.delete(id);

      logger.info("posts_deleted", { postId: id });

      res.status(204).end();
    } catch (error) {
      handlePostsError(req, res, logger, error);
    }
  });

  return router;
}
