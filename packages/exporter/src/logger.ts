import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  /** Structured JSON when true, pino-pretty otherwise */
  production: boolean;
}

/**
 * Root logger shared by Fastify and the collector.
 * Components take `logger.child({ module })` so lines can be filtered.
 */
export function createLogger(opts: LoggerOptions): Logger {
  if (opts.production) {
    return pino({ level: opts.level });
  }
  return pino({
    level: opts.level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true },
    },
  });
}
