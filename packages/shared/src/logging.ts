import pino from "pino";

export interface LoggerOptions {
  component: string;
  runId?: string;
}

const nodeEnv = process.env.NODE_ENV;
const isTest = nodeEnv === "test" || process.env.VITEST === "true";
const isDev = nodeEnv !== "production" && !isTest;

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production: JSON format for log aggregation
 * - Tests: silent unless LOG_LEVEL is set explicitly
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  transport: isDev
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.runId && { runId: options.runId }),
  });
}

/**
 * Create a run-scoped logger so every line of one crawl carries the same id.
 */
export function createRunLogger(runId: string): pino.Logger {
  return createLogger({ component: "crawl", runId });
}

export type { Logger } from "pino";
