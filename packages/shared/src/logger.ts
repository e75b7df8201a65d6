import { getEnv } from "./env.ts";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LoggerSettings {
  level: LogLevel;
  isProduction: boolean;
}

export class Logger {
  private settings: LoggerSettings | null = null;

  private resolve(): LoggerSettings {
    if (this.settings) return this.settings;
    try {
      const env = getEnv();
      this.settings = {
        level: env.LOG_LEVEL,
        isProduction: env.NODE_ENV === "production",
      };
    } catch {
      // Invalid environment: keep logging at the default level
      this.settings = { level: "info", isProduction: false };
    }
    return this.settings;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.resolve().level];
  }

  formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();

    if (this.resolve().isProduction) {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...meta,
      });
    }

    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, meta));
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, meta));
    }
  }
}

export const logger: Logger = new Logger();
