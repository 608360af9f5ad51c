export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LoggerConfig = {
  level?: LogLevel;
  prefix?: string;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVELS;
}

/**
 * Console logger with a level threshold and an optional prefix. Library code
 * takes one as an option so callers and tests decide where output goes.
 */
export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config?: LoggerConfig) {
    this.level = config?.level ?? "info";
    this.prefix = config?.prefix ?? "";
  }

  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(this.formatMessage("DEBUG", message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(this.formatMessage("INFO", message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("WARN", message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("ERROR", message), ...args);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(label: string, message: string): string {
    const timestamp = new Date().toISOString().replace("T", " ").slice(0, 19);
    const scope = this.prefix ? ` [${this.prefix}]` : "";
    return `[${timestamp}] ${label}${scope}: ${message}`;
  }
}

export const logger = new Logger();

export const silentLogger = new Logger({ level: "silent" });
