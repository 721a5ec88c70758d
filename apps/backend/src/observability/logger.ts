import pino, { type BaseLogger, type LoggerOptions } from "pino";

export type Logger = BaseLogger;

// Shared by the service logger and Fastify's request logger.
export function loggerOptions(level: string) {
  return {
    level,
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  } satisfies LoggerOptions;
}

export function createLogger(level: string): pino.Logger {
  return pino(loggerOptions(level));
}
