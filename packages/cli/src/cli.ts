/**
 * @tally/cli — Command-line driver.
 *
 * Usage: tally <transactions.csv> > accounts.csv
 *
 * Exit codes:
 * - 0: all records processed, accounts written to stdout
 * - 1: fatal input or ledger error, nothing written
 * - 2: usage or configuration error
 */

import { createReadStream } from "node:fs";
import { access, constants } from "node:fs/promises";
import type { Writable } from "node:stream";
import { ZodError } from "zod";
import { describeConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { runLedger } from "./run.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export const USAGE = "Usage: tally <transactions.csv>";

export interface CliIo {
  readonly stdout: Writable;
  readonly stderr: Writable;
  readonly env: Record<string, string | undefined>;
  /** Override for tests; defaults to a pino logger on stderr. */
  readonly createLogger?: ((config: AppConfig) => Logger) | undefined;
}

const defaultIo: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
};

/**
 * Run the CLI with already-sliced arguments. Resolves to the exit code.
 */
export async function main(args: readonly string[], io: CliIo = defaultIo): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      io.stderr.write(`Invalid configuration:\n${describeConfigError(err)}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  if (args.length !== 1 || args[0] === undefined) {
    io.stderr.write(`${USAGE}\n`);
    return EXIT_USAGE;
  }
  const inputPath = args[0];

  const logger = (io.createLogger ?? createLogger)(config);

  try {
    await access(inputPath, constants.R_OK);
  } catch (err: unknown) {
    logger.error({ err, path: inputPath }, "Cannot read input file");
    io.stderr.write(`Cannot read input file: ${inputPath}\n`);
    return EXIT_FATAL;
  }

  logger.debug({ path: inputPath, checkClient: config.TALLY_CHECK_CLIENT }, "Starting run");

  const summary = await runLedger({
    input: createReadStream(inputPath, { encoding: "utf8" }),
    output: io.stdout,
    logger,
    checkClientMatch: config.TALLY_CHECK_CLIENT,
    sortOutput: config.TALLY_SORT_OUTPUT,
  });

  if (!summary.ok) {
    io.stderr.write(`${summary.error.code}: ${summary.error.message}\n`);
    return EXIT_FATAL;
  }
  return EXIT_OK;
}
