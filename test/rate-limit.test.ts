import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { InMemoryPostRepository } from "../src/posts/repository";
import { silentLogger } from "../src/security/logger";
import { InMemoryRateLimitStore } from "../src/security/rate-limit";
import { createConfig } from "./helpers";

describe("InMemoryRateLimitStore", () => {
  it("counts within a window and resets after it", () => {
    const store = new InMemoryRateLimitStore();

    expect(store.increment("posts-read:ip:1", 1000, 0)).toEqual({ count: 1, resetAt: 1000 });
    expect(store.increment("posts-read:ip:1", 1000, 500)).toEqual({ count: 2, resetAt: 1000 });
    expect(store.increment("posts-read:ip:1", 1000, 1000)).toEqual({ count: 1, resetAt: 2000 });
  });

  it("keeps separate counters per key", () => {
    const store = new InMemoryRateLimitStore();

    store.increment("posts-read:ip:1", 1000, 0);

    expect(store.increment("posts-write:ip:1", 1000, 0)).toEqual({ count: 1, resetAt: 1000 });
  });
});

describe("posts rate limiting", () => {
  function createLimitedApp() {
    return createApp(
      createConfig({
        rateLimit: { enabled: true, readPerMinute: 2, writePerMinute: 1 }
      }),
      {
        postRepository: new InMemoryPostRepository(),
        rateLimitStore: new InMemoryRateLimitStore(),
        logger: silentLogger
      }
    );
  }

  it("rejects reads over the per-minute limit with 429", async () => {
    const app = createLimitedApp();

    const first = await request(app).get("/posts");
    const second = await request(app).get("/posts");
    const third = await request(app).get("/posts");

    expect(first.status).toBe(200);
    expect(first.headers["ratelimit-limit"]).toBe("2");
    expect(first.headers["ratelimit-remaining"]).toBe("1");
    expect(second.status).toBe(200);
    expect(third.status).toBe(429);
    expect(third.body).toEqual({ error: "Too many requests" });
    expect(third.headers["retry-after"]).toBeDefined();
  });

  it("limits writes separately from reads", async () => {
    const app = createLimitedApp();

    const created = await request(app).post("/posts").send({ title: "A", content: "B" });
    const limited = await request(app).post("/posts").send({ title: "C", content: "D" });
    const read = await request(app).get("/posts");

    expect(created.status).toBe(201);
    expect(limited.status).toBe(429);
    expect(read.status).toBe(200);
    expect(read.body).toEqual([{ id: 1, title: "A", content: "B", published: true, rating: null }]);
  });

  it("counts malformed write bodies against the write limit", async () => {
    const app = createLimitedApp();

    const malformed = await request(app).post("/posts").set("Content-Type", "application/json").send('{"title":');
    const valid = await request(app).post("/posts").send({ title: "A", content: "B" });

    expect(malformed.status).toBe(422);
    expect(malformed.headers["ratelimit-remaining"]).toBe("0");
    expect(valid.status).toBe(429);
  });

  it("does nothing when disabled", async () => {
    const app = createApp(createConfig(), {
      postRepository: new InMemoryPostRepository(),
      logger: silentLogger
    });

    for (let index = 0; index < 5; index += 1) {
      const response = await request(app).get("/posts");
      expect(response.status).toBe(200);
      expect(response.headers["ratelimit-limit"]).toBeUndefined();
    }
  });
});
