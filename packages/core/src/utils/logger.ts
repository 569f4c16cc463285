/**
 * Structured logging
 *
 * pino is the logger behind the backend's Fastify instance as well, so core
 * and API logs share one format. Credential fields are always redacted.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export const REDACT_PATHS = [
  "apiKey",
  "*.apiKey",
  "credentials",
  "*.credentials",
  "headers.authorization",
  "req.headers.authorization",
];

export const loggerOptions: LoggerOptions = {
  name: "wiki-research",
  level: process.env.LOG_LEVEL || "info",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
};

export const rootLogger: Logger = pino(loggerOptions);

/**
 * Child logger tagged with the emitting component
 */
export function createLogger(component: string, parent: Logger = rootLogger): Logger {
  return parent.child({ component });
}
