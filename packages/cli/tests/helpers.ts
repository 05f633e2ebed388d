/**
 * Shared test helpers: in-memory sinks for output and logs.
 */

import { Writable } from "node:stream";
import { createLogger } from "../src/logger.js";
import type { Logger } from "../src/logger.js";

export interface TextSink {
  readonly stream: Writable;
  text(): string;
}

export function textSink(): TextSink {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

export interface LogSink {
  readonly logger: Logger;
  entries(): Array<Record<string, unknown>>;
}

/** A debug-level pino logger whose JSON lines are kept in memory. */
export function logSink(): LogSink {
  const sink = textSink();
  const logger = createLogger({ LOG_LEVEL: "debug", NODE_ENV: "test" }, sink.stream);
  return {
    logger,
    entries: () =>
      sink
        .text()
        .split("\n")
        .filter((line) => line !== "")
        .map((line) => JSON.parse(line) as Record<string, unknown>),
  };
}
