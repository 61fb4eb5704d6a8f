export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Logger {
  info(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(level: LogLevel = "info") {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  setLevel(level: LogLevel): void {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  private formatMessage(
    level: string,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${safeStringify(context)}` : "";
    return `[${level}] ${timestamp} - ${message}${contextStr}`;
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled("info")) {
      console.log(this.formatMessage("INFO", message, context));
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.enabled("error")) {
      console.error(this.formatMessage("ERROR", message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled("warn")) {
      console.warn(this.formatMessage("WARN", message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled("debug")) {
      console.debug(this.formatMessage("DEBUG", message, context));
    }
  }
}

// JSON.stringify throws on cycles and BigInt values.
function safeStringify(context: LogContext): string {
  try {
    return JSON.stringify(context);
  } catch {
    return '"[unserializable context]"';
  }
}

const initialLevel = process.env.LOG_LEVEL ?? "info";

export const logger: Logger = new ConsoleLogger(
  isLogLevel(initialLevel) ? initialLevel : "info"
);

export default logger;
