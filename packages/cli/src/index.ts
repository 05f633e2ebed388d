/**
 * @tally/cli — CSV front end for the ledger engine.
 *
 * Reads transaction records from a CSV file, replays them through
 * @tally/ledger and writes the final accounts as CSV on stdout.
 */

export { main, USAGE, EXIT_OK, EXIT_FATAL, EXIT_USAGE } from "./cli.js";
export type { CliIo } from "./cli.js";
export { loadConfig, describeConfigError, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { RecordParseError } from "./errors.js";
export {
  INPUT_HEADER,
  parseHeader,
  parseRecordLine,
  readRecords,
} from "./csv-reader.js";
export type { ParsedRecord } from "./csv-reader.js";
export {
  OUTPUT_HEADER,
  formatAccountRow,
  formatAccounts,
  writeAccounts,
} from "./csv-writer.js";
export type { WriteAccountsOptions } from "./csv-writer.js";
export { runLedger } from "./run.js";
export type { RunOptions, RunSummary, RunSuccess, RunFailure } from "./run.js";
