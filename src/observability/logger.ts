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

type EmitLevel = Exclude<LogLevel, "silent">;

// ── Log Format ──────────────────────────────────────────────────────────────

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

// ── Logger Config ───────────────────────────────────────────────────────────

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly base?: Record<string, unknown>;
  /** JSON output target; stdout when unset. Ignored by the pretty format. */
  readonly destination?: pino.DestinationStream;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: "info",
  format: "json",
};

// ── Logger Interface ────────────────────────────────────────────────────────

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;
}

// ── PinoAdapter ─────────────────────────────────────────────────────────────

class PinoAdapter implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  private emit(level: EmitLevel, msg: string, data?: Record<string, unknown>): void {
    if (data) {
      this.instance[level](data, msg);
    } else {
      this.instance[level](msg);
    }
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.emit("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.emit("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.emit("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.emit("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.emit("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.emit("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoAdapter(this.instance.child(bindings));
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

  let instance: pino.Logger;
  if (merged.format === "pretty") {
    instance = pino(options, pino.transport({ target: "pino-pretty" }));
  } else if (merged.destination) {
    instance = pino(options, merged.destination);
  } else {
    instance = pino(options);
  }

  return new PinoAdapter(instance);
}

// ── NULL_LOGGER ─────────────────────────────────────────────────────────────

const noop = (): void => {};

export const NULL_LOGGER: Logger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  child: () => NULL_LOGGER,
};

// ── BufferLogger (for testing) ──────────────────────────────────────────────

export class BufferLogger implements Logger {
  readonly entries: LogEntry[];
  private readonly bindings: Record<string, unknown>;

  constructor(bindings?: Record<string, unknown>, entries?: LogEntry[]) {
    this.bindings = bindings ?? {};
    // Children share the parent's array so the root sees every entry
    this.entries = entries ?? [];
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
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

  trace(msg: string, data?: Record<string, unknown>): void {
    this.log("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.log("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): BufferLogger {
    return new BufferLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  clear(): void {
    this.entries.length = 0;
  }

  /** Event names in order, optionally only those at `level`. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.msg);
  }

  /** First entry logged under the event name. */
  find(msg: string): LogEntry | undefined {
    return this.entries.find((e) => e.msg === msg);
  }

  count(msg: string): number {
    return this.entries.filter((e) => e.msg === msg).length;
  }
}
