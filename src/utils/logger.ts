/**
 * Process-wide pino logger and per-relay child loggers.
 *
 * Relay verbosity maps onto pino levels:
 *   error → error, receive → info, send → debug, debug → trace
 */

import { pino, type Level, type Logger } from "pino";
import type { RelayLogLevel } from "../config/types.js";

export const SERVICE_NAME = "osc-mqtt-bridge";

const RELAY_LEVELS: Record<RelayLogLevel, Level> = {
  error: "error",
  receive: "info",
  send: "debug",
  debug: "trace",
};

const logger: Logger = pino({
  name: SERVICE_NAME,
  level: process.env.LOG_LEVEL ?? "info",
});

export function getLogger(): Logger {
  return logger;
}

export function pinoLevel(level: RelayLogLevel): Level {
  return RELAY_LEVELS[level];
}

/** Child logger tagged with the relay namespace, at the relay's own verbosity. */
export function relayLogger(namespace: string, level: RelayLogLevel, parent: Logger = logger): Logger {
  return parent.child({ relay: namespace }, { level: pinoLevel(level) });
}
