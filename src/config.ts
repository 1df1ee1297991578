import type { IdStrategy } from "./posts/id-allocator";

export interface SecurityHeadersConfig {
  isProduction: boolean;
}

export interface RateLimitConfig {
  enabled: boolean;
  readPerMinute: number;
  writePerMinute: number;
}

export interface AppConfig {
  port: number;
  idStrategy: IdStrategy;
  seedSamplePosts: boolean;
  jsonBodyLimit: string;
  rateLimit: RateLimitConfig;
  securityHeaders: SecurityHeadersConfig;
}

const DEFAULT_PORT = 8000;
const DEFAULT_JSON_BODY_LIMIT = "64kb";
const BODY_LIMIT_PATTERN = /^\d+(b|kb|mb)$/;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return defaultValue;
}

function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return defaultValue;
  }

  return parsed;
}

function parseIdStrategy(value: string | undefined, defaultValue: IdStrategy): IdStrategy {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "sequential") {
    return "sequential";
  }
  if (normalized === "random") {
    return "random";
  }

  return defaultValue;
}

function parseBodyLimit(value: string | undefined, defaultValue: string): string {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || !BODY_LIMIT_PATTERN.test(normalized)) {
    return defaultValue;
  }
  return normalized;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";

  return {
    port: parsePositiveInteger(env.PORT, DEFAULT_PORT),
    idStrategy: parseIdStrategy(env.POSTS_ID_STRATEGY, "sequential"),
    seedSamplePosts: parseBoolean(env.POSTS_SEED_SAMPLE, true),
    jsonBodyLimit: parseBodyLimit(env.POSTS_JSON_BODY_LIMIT, DEFAULT_JSON_BODY_LIMIT),
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      readPerMinute: parsePositiveInteger(env.RATE_LIMIT_READ_PER_MIN, 120),
      writePerMinute: parsePositiveInteger(env.RATE_LIMIT_WRITE_PER_MIN, 30)
    },
    securityHeaders: {
      isProduction
    }
  };
}
