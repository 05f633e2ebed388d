/**
 * @tally/cli — Structured logging.
 *
 * pino, always on stderr: stdout is reserved for the account CSV.
 * Development mode pretty-prints through pino-pretty.
 */

import { pino } from "pino";
import type { AppConfig } from "./config.js";

export type Logger = pino.Logger;

const STDERR = 2;

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: pino.DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR));
}
