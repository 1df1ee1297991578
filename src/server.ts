import { createApp } from "./app";
import { loadConfig } from "./config";
import { createIdAllocator } from "./posts/id-allocator";
import { InMemoryPostRepository } from "./posts/repository";
import { SAMPLE_POSTS } from "./posts/sample-posts";
import { appLogger } from "./security/logger";

const config = loadConfig();
const repository = new InMemoryPostRepository({
  initialPosts: config.seedSamplePosts ? [...SAMPLE_POSTS] : [],
  idAllocator: createIdAllocator(config.idStrategy)
});
const app = createApp(config, { postRepository: repository });

const server = app.listen(config.port, () => {
  appLogger.info("server_started", {
    port: config.port,
    idStrategy: config.idStrategy,
    seededPosts: config.seedSamplePosts ? SAMPLE_POSTS.length : 0
  });
});

function shutdown(): void {
  server.close((error) => {
    if (error) {
      appLogger.error("server_shutdown_failed", { error });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
