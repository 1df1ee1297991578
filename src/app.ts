import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./config";
import { InMemoryPostRepository, type PostRepository } from "./posts/repository";
import { createPostsRouter } from "./posts/routes";
import { createApiSecurityHeaders } from "./security/headers";
import { appLogger, buildSafeRequestLogMetadata, type Logger } from "./security/logger";
import { createRateLimitMiddleware, InMemoryRateLimitStore, type RateLimitStore } from "./security/rate-limit";

export interface AppDependencies {
  logger?: Logger;
  postRepository?: PostRepository;
  rateLimitStore?: RateLimitStore;
  healthCheck?: () => Promise<void> | void;
}

function readBodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "type" in error && typeof error.type === "string") {
    return error.type;
  }
  return undefined;
}

export function createApp(config: AppConfig, dependencies: AppDependencies = {}): Express {
  const app = express();
  const logger = dependencies.logger ?? appLogger;
  const postRepository = dependencies.postRepository ?? new InMemoryPostRepository();
  const rateLimitStore = dependencies.rateLimitStore ?? new InMemoryRateLimitStore();
  const healthCheck =
    dependencies.healthCheck ??
    (async () => {
      await postRepository.count();
    });

  app.disable("x-powered-by");
  app.use(createApiSecurityHeaders(config.securityHeaders));
  // Limited before body parsing so malformed and oversized writes still count.
  app.use("/posts", createRateLimitMiddleware(config.rateLimit, { keyPrefix: "posts", store: rateLimitStore }));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get("/", (_req, res) => {
    res.status(200).json({ message: "welcome to the posts api" });
  });

  app.get("/healthz", async (_req, res) => {
    try {
      await healthCheck();
      res.status(200).json({ ok: true });
      return;
    } catch (error) {
      logger.info("health_check_failed", { error });
      res.status(503).json({ ok: false });
    }
  });

  app.use("/posts", createPostsRouter(postRepository, logger));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const errorType = readBodyParserErrorType(error);
    if (errorType === "entity.parse.failed") {
      res.status(422).json({ error: "request body must be valid JSON" });
      return;
    }
    if (errorType === "entity.too.large") {
      res.status(413).json({ error: "Request body too large" });
      return;
    }

    logger.error("request_failed", { ...buildSafeRequestLogMetadata(req), error });
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
