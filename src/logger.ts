/**
 * Logger configuration using pino.
 */

import pino from "pino"

/**
 * Checks if running in development mode.
 */
const isDevelopment = process.env.NODE_ENV !== "production"

/**
 * Vitest sets VITEST; test runs stay quiet unless LOG_LEVEL asks otherwise.
 */
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined

/**
 * Default log level.
 */
const DEFAULT_LOG_LEVEL = isTest ? "silent" : isDevelopment ? "debug" : "info"

/**
 * Configured logger instance.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  transport:
    isDevelopment && !isTest
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        }
      : undefined,
})
