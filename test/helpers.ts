import type { AppConfig } from "../src/config";
import type { LogMetadata, Logger } from "../src/security/logger";

export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 8000,
    idStrategy: "sequential",
    seedSamplePosts: false,
    jsonBodyLimit: "64kb",
    rateLimit: { enabled: false, readPerMinute: 120, writePerMinute: 30 },
    securityHeaders: { isProduction: false },
    ...overrides
  };
}

export interface RecordedLogEntry {
  level: "info" | "error";
  event: string;
  metadata?: LogMetadata;
}

export function createRecordingLogger(): Logger & { entries: RecordedLogEntry[] } {
  const entries: RecordedLogEntry[] = [];
  return {
    entries,
    info(event, metadata) {
      entries.push({ level: "info", event, metadata });
    },
    error(event, metadata) {
      entries.push({ level: "error", event, metadata });
    }
  };
}
