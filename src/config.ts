import { resolve } from "node:path";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly subjectsFile: string;
  readonly scheduler: {
    readonly tickIntervalMs: number;
  };
  readonly tasks: {
    readonly maxConcurrency: number;
    readonly retentionMs: number;
  };
  readonly media: {
    readonly ffmpegPath: string;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Env-var-style overrides for testing, consulted before
 *   `process.env`.
 * @throws ConfigError naming the offending variable.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env = (key: string): string | undefined =>
    envOverrides?.[key] ?? process.env[key];

  // ── Subjects ───────────────────────────────────────────────────────────
  const subjectsRaw = env("SUBJECTS_FILE")?.trim() || "./subjects.yaml";
  const subjectsFile = resolve(process.cwd(), subjectsRaw);

  // ── Scheduler / Tasks ──────────────────────────────────────────────────
  const tickIntervalMs = positiveInt(env, "TICK_INTERVAL_MS", 1_000);
  const maxConcurrency = positiveInt(env, "MAX_CONCURRENT_TASKS", 4);
  const retentionMs = positiveInt(env, "TASK_RETENTION_MS", 3_600_000);

  // ── Media ──────────────────────────────────────────────────────────────
  const ffmpegPath = env("FFMPEG_PATH")?.trim() || "ffmpeg";

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevelRaw = (env("LOG_LEVEL") || "info").trim();
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}. Got "${logLevelRaw}".`,
      "LOG_LEVEL",
    );
  }

  const logFormatRaw = (env("LOG_FORMAT") || "pretty").trim();
  if (!isLogFormat(logFormatRaw)) {
    throw new ConfigError(
      `LOG_FORMAT must be one of: ${LOG_FORMATS.join(", ")}. Got "${logFormatRaw}".`,
      "LOG_FORMAT",
    );
  }

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    subjectsFile,
    scheduler: Object.freeze({ tickIntervalMs }),
    tasks: Object.freeze({ maxConcurrency, retentionMs }),
    media: Object.freeze({ ffmpegPath }),
    logging: Object.freeze({ level: logLevelRaw, format: logFormatRaw }),
  });
}

// ── Helpers ────────────────────────────────────────────────────────────────

function positiveInt(
  env: (key: string) => string | undefined,
  key: string,
  fallback: number,
): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(
      `${key} must be a positive integer (>= 1), got "${raw}".`,
      key,
    );
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function isLogFormat(value: string): value is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(value);
}
