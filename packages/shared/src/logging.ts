import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

// Vitest sets NODE_ENV=test; the pretty transport runs in a worker thread we
// don't want alive during test runs.
const isDev = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production: JSON format for log aggregation
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
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
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Logger for one scrape run; every line carries the run id so interleaved
 * runs against the same output can be told apart.
 */
export function createRunLogger(runId: string): pino.Logger {
  return createLogger({ component: "scrape", correlationId: runId });
}
