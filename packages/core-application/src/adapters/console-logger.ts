import type { Logger, LogLevel, LogMetadata } from "../ports/logger";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type ConsoleLoggerOptions = {
  service: string;
  level?: LogLevel;
  format?: "pretty" | "json";
  now?: () => Date;
};

/**
 * Logger port backed by `console`. One line per call, either
 * `[iso] LEVEL service: message {meta}` or a JSON object.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly format: "pretty" | "json";
  private readonly now: () => Date;

  constructor(private readonly options: ConsoleLoggerOptions) {
    this.level = options.level ?? "info";
    this.format = options.format ?? "pretty";
    this.now = options.now ?? (() => new Date());
  }

  child(module: string): ConsoleLogger {
    return new ConsoleLogger({ ...this.options, service: `${this.options.service}:${module}` });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (this.enabled("debug")) console.debug(this.formatLine("debug", message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (this.enabled("info")) console.info(this.formatLine("info", message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (this.enabled("warn")) console.warn(this.formatLine("warn", message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (this.enabled("error")) console.error(this.formatLine("error", message, metadata));
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  formatLine(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = this.now().toISOString();
    const hasMeta = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.format === "json") {
      return JSON.stringify({
        timestamp,
        level,
        service: this.options.service,
        message,
        ...metadata,
      });
    }

    const meta = hasMeta ? ` ${JSON.stringify(metadata)}` : "";
    return `[${timestamp}] ${level.toUpperCase()} ${this.options.service}: ${message}${meta}`;
  }
}
