import pino from "pino";

// ── Log Level ───────────────────────────────────────────────────────────────

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// ── Log Format ──────────────────────────────────────────────────────────────

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

// ── Logger Config ───────────────────────────────────────────────────────────

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly base?: Record<string, unknown>;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: "info",
  format: "json",
};

// ── Logger Interface ────────────────────────────────────────────────────────

export type LogData = Record<string, unknown>;

export interface Logger {
  trace(msg: string, data?: LogData): void;
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  fatal(msg: string, data?: LogData): void;
  child(bindings: LogData): Logger;
}

type EmittingLevel = Exclude<LogLevel, "silent">;

// ── Log Entry (for BufferLogger) ────────────────────────────────────────────

export interface LogEntry {
  readonly level: EmittingLevel;
  readonly msg: string;
  readonly data?: LogData;
  readonly timestamp: string;
}

// ── PinoAdapter ─────────────────────────────────────────────────────────────

class PinoAdapter implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  trace(msg: string, data?: LogData): void {
    this.write("trace", msg, data);
  }

  debug(msg: string, data?: LogData): void {
    this.write("debug", msg, data);
  }

  info(msg: string, data?: LogData): void {
    this.write("info", msg, data);
  }

  warn(msg: string, data?: LogData): void {
    this.write("warn", msg, data);
  }

  error(msg: string, data?: LogData): void {
    this.write("error", msg, data);
  }

  fatal(msg: string, data?: LogData): void {
    this.write("fatal", msg, data);
  }

  child(bindings: LogData): Logger {
    return new PinoAdapter(this.instance.child(bindings));
  }

  private write(level: EmittingLevel, msg: string, data?: LogData): void {
    if (data) {
      this.instance[level](data, msg);
    } else {
      this.instance[level](msg);
    }
  }
}

// ── createLogger Factory ────────────────────────────────────────────────────

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  const merged: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  const options: pino.LoggerOptions = {
    level: merged.level,
    base: merged.base ?? undefined,
  };

  const instance =
    merged.format === "pretty"
      ? pino(options, pino.transport({ target: "pino-pretty" }))
      : pino(options);

  return new PinoAdapter(instance);
}

// ── NULL_LOGGER ─────────────────────────────────────────────────────────────

class NullLogger implements Logger {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
  child(): Logger {
    return this;
  }
}

export const NULL_LOGGER: Logger = new NullLogger();

// ── BufferLogger (for testing) ──────────────────────────────────────────────

export class BufferLogger implements Logger {
  readonly entries: LogEntry[];
  private readonly bindings: LogData;

  constructor(bindings?: LogData, entries?: LogEntry[]) {
    this.bindings = bindings ?? {};
    // Children share the parent's array so assertions see every entry
    this.entries = entries ?? [];
  }

  trace(msg: string, data?: LogData): void {
    this.log("trace", msg, data);
  }

  debug(msg: string, data?: LogData): void {
    this.log("debug", msg, data);
  }

  info(msg: string, data?: LogData): void {
    this.log("info", msg, data);
  }

  warn(msg: string, data?: LogData): void {
    this.log("warn", msg, data);
  }

  error(msg: string, data?: LogData): void {
    this.log("error", msg, data);
  }

  fatal(msg: string, data?: LogData): void {
    this.log("fatal", msg, data);
  }

  child(bindings: LogData): BufferLogger {
    return new BufferLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  clear(): void {
    this.entries.length = 0;
  }

  getByLevel(level: EmittingLevel): readonly LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  has(level: EmittingLevel, msgSubstring: string): boolean {
    return this.entries.some(
      (e) => e.level === level && e.msg.includes(msgSubstring),
    );
  }

  private log(level: EmittingLevel, msg: string, data?: LogData): void {
    const merged =
      Object.keys(this.bindings).length > 0
        ? { ...this.bindings, ...data }
        : data;

    this.entries.push({
      level,
      msg,
      data: merged,
      timestamp: new Date().toISOString(),
    });
  }
}
