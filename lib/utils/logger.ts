/**
 * Structured logger. Pretty lines in development, one JSON object per line
 * elsewhere. In production, entries also become Sentry breadcrumbs and
 * errors are captured.
 */

import * as Sentry from "@sentry/nextjs";
import { isProd, isDev, isTest } from "@/lib/config/env";

const SERVICE_NAME = "cafes-directory";

type Level = "debug" | "info" | "warn" | "error" | "fatal";

const LEVEL_RANK: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3, fatal: 4 };

const SENTRY_LEVEL = {
  debug: "debug",
  info: "info",
  warn: "warning",
  error: "error",
  fatal: "fatal",
} as const satisfies Record<Level, string>;

export interface LogContext {
  [key: string]: unknown;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

class Logger {
  // Tests only print failures
  private readonly minRank = LEVEL_RANK[isDev ? "debug" : isTest ? "error" : "info"];

  constructor(private readonly defaultContext: LogContext = {}) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext, error?: Error): void {
    this.write("warn", message, context, error);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.write("error", message, context, error);
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.write("fatal", message, context, error);
  }

  /** Logger whose entries all carry the given fields */
  child(context: LogContext): Logger {
    return new Logger({ ...this.defaultContext, ...context });
  }

  private write(level: Level, message: string, context?: LogContext, error?: Error): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const fields = { ...this.defaultContext, ...context };
    const line = isDev ? this.pretty(level, message, fields, error) : this.json(level, message, fields, error);

    if (level === "error" || level === "fatal") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else if (level === "info") {
      console.info(line);
    } else {
      console.debug(line);
    }

    if (isProd) {
      this.report(level, message, fields, error);
    }
  }

  private pretty(level: Level, message: string, fields: LogContext, error?: Error): string {
    let line = `${new Date().toISOString().slice(11, 23)} ${level.toUpperCase().padEnd(5)} ${message}`;
    if (Object.keys(fields).length > 0) {
      line += ` ${JSON.stringify(fields)}`;
    }
    if (error) {
      line += `\n  ${error.stack ?? error.message}`;
    }
    return line;
  }

  private json(level: Level, message: string, fields: LogContext, error?: Error): string {
    return JSON.stringify({
      service: SERVICE_NAME,
      level,
      message,
      timestamp: new Date().toISOString(),
      ...fields,
      ...(error && { error: { name: error.name, message: error.message, stack: error.stack } }),
    });
  }

  private report(level: Level, message: string, fields: LogContext, error?: Error): void {
    Sentry.addBreadcrumb({ category: "log", message, level: SENTRY_LEVEL[level], data: fields });

    if (LEVEL_RANK[level] < LEVEL_RANK.error) {
      return;
    }
    const scope = { level: SENTRY_LEVEL[level], extra: { message, ...fields }, tags: { logLevel: level } };
    if (error) {
      Sentry.captureException(error, scope);
    } else {
      Sentry.captureMessage(message, scope);
    }
  }
}

export const logger = new Logger();
