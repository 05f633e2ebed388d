/**
 * @tally/cli — Run pipeline.
 *
 * input CSV → readRecords → LedgerEngine.apply → writeAccounts
 *
 * Records are applied one at a time, in input order. The first fatal
 * condition (malformed line, duplicate transaction id, overflow) stops
 * the run; nothing is written to the output in that case.
 */

import type { Readable, Writable } from "node:stream";
import { LedgerEngine } from "@tally/ledger";
import type { LedgerError, SkippedOutcome } from "@tally/ledger";
import { readRecords } from "./csv-reader.js";
import { writeAccounts } from "./csv-writer.js";
import { RecordParseError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface RunOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly logger: Logger;
  readonly checkClientMatch?: boolean | undefined;
  readonly sortOutput?: boolean | undefined;
}

interface RunCounts {
  readonly applied: number;
  readonly skipped: number;
}

export interface RunSuccess extends RunCounts {
  readonly ok: true;
  readonly accounts: number;
}

export interface RunFailure extends RunCounts {
  readonly ok: false;
  /** 1-based input line of the offending record. */
  readonly line: number;
  readonly error: LedgerError | RecordParseError;
}

export type RunSummary = RunSuccess | RunFailure;

/**
 * Replay every record from `input` and write the final accounts to
 * `output`. Fatal conditions come back as a RunFailure; only I/O errors
 * reject.
 */
export async function runLedger(options: RunOptions): Promise<RunSummary> {
  const { input, output, logger } = options;

  const engine = new LedgerEngine({
    checkClientMatch: options.checkClientMatch,
    onSkip: (outcome: SkippedOutcome) => {
      logger.debug(
        {
          reason: outcome.reason,
          type: outcome.record.type,
          client: outcome.record.clientId,
          tx: outcome.record.txId,
        },
        "Record skipped",
      );
    },
  });

  let applied = 0;
  let skipped = 0;

  const fail = (line: number, error: LedgerError | RecordParseError): RunFailure => {
    logger.error({ code: error.code, line, applied, skipped }, error.message);
    return { ok: false, applied, skipped, line, error };
  };

  try {
    for await (const { line, record } of readRecords(input)) {
      const outcome = engine.apply(record);
      if (outcome.status === "failed") {
        return fail(line, outcome.error);
      }
      if (outcome.status === "applied") {
        applied++;
      } else {
        skipped++;
      }
    }
  } catch (err: unknown) {
    if (err instanceof RecordParseError) {
      return fail(err.line, err);
    }
    throw err;
  }

  await writeAccounts(engine.snapshot(), output, { sortByClient: options.sortOutput });

  logger.info(
    { applied, skipped, accounts: engine.accountCount, transactions: engine.transactionCount },
    "Run complete",
  );
  return { ok: true, applied, skipped, accounts: engine.accountCount };
}
