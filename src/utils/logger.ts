/**
 * Structured logging with Pino
 */

import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const level = process.env["LOG_LEVEL"] || "info";

export const logger = pino({
  level,
  transport:
    process.env["NODE_ENV"] === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  base: {
    service: "assistant-telegram-bridge",
  },
});

/**
 * Create a child logger scoped to one module
 */
export function createLogger(name: string) {
  return logger.child({ module: name });
}
