import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// stdout belongs to the chat, so log lines go to stderr.
export function createLogger(level: LogLevel = "warn"): Logger {
  return pino({ name: "web-search-agent", level }, pino.destination(2));
}

export const silentLogger: Logger = pino({ level: "silent" });
