import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "json" | "text";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// Where formatted lines end up. Tests swap in an array-backed sink.
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  metadata?: Record<string, unknown>;
  sink?: LogSink;
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 999,
};

function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && (LOG_LEVELS as readonly string[]).includes(v);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly format: LogFormat;
  private readonly metadata: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    const envFormat = process.env.LOG_FORMAT?.toLowerCase();
    this.level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");
    this.format = options.format ?? (envFormat === "json" ? "json" : "text");
    this.metadata = options.metadata ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  private shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= levelPriority[this.level];
  }

  private formatMessage(level: LogLevel, message: string, metadata?: Record<string, unknown>): string {
    if (this.format === "json") {
      return JSON.stringify({
        level,
        message,
        timestamp: new Date().toISOString(),
        ...this.metadata,
        ...metadata,
      });
    }

    let prefix = "";
    if (level === "debug") prefix = chalk.gray("[DEBUG]");
    else if (level === "info") prefix = chalk.blue("[INFO]");
    else if (level === "warn") prefix = chalk.yellow("[WARN]");
    else if (level === "error") prefix = chalk.red("[ERROR]");

    const merged = { ...this.metadata, ...metadata };
    const meta = Object.keys(merged).length > 0 ? chalk.gray(` ${JSON.stringify(merged)}`) : "";
    return `${prefix} ${message}${meta}`;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) this.sink.out(this.formatMessage("debug", message, metadata));
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog("info")) this.sink.out(this.formatMessage("info", message, metadata));
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) this.sink.err(this.formatMessage("warn", message, metadata));
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    if (this.shouldLog("error")) this.sink.err(this.formatMessage("error", message, metadata));
  }

  // Report output: unprefixed, suppressed only when silent.
  raw(message: string): void {
    if (this.level !== "silent") this.sink.out(message);
  }

  child(metadata: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      metadata: { ...this.metadata, ...metadata },
      sink: this.sink,
    });
  }

  getLevel(): LogLevel {
    return this.level;
  }
}
