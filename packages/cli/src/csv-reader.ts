/**
 * @tally/cli — CSV transaction reader.
 *
 * Turns an input stream of CSV lines into typed transaction records.
 *
 * File format:
 *   type,client,tx,amount
 *   deposit,1,1,1.0
 *   dispute,1,1,
 *
 * - Cells may be padded with whitespace
 * - The amount cell may be empty or missing on dispute/resolve/chargeback
 *   rows, and is ignored there
 * - Blank lines are skipped
 * - Any other deviation is a RecordParseError, which aborts the run
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { z } from "zod";
import { LedgerError, parseAmount } from "@tally/ledger";
import type { TransactionRecord } from "@tally/types";
import { MAX_CLIENT_ID, MAX_TX_ID, isMoneyRecordType } from "@tally/types";
import { RecordParseError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

export const INPUT_HEADER = ["type", "client", "tx", "amount"] as const;

function unsignedInt(max: number) {
  return z
    .string()
    .regex(/^\d+$/, "must be an unsigned integer")
    .transform(Number)
    .pipe(z.number().int().max(max));
}

const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal")
  .transform((text, ctx) => {
    try {
      return parseAmount(text);
    } catch (err) {
      if (err instanceof LedgerError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
        return z.NEVER;
      }
      throw err;
    }
  });

const RowSchema = z
  .object({
    type: z.enum(["deposit", "withdrawal", "dispute", "resolve", "chargeback"]),
    client: unsignedInt(MAX_CLIENT_ID),
    tx: unsignedInt(MAX_TX_ID),
    amount: z.string().optional(),
  })
  .transform((row, ctx): TransactionRecord => {
    if (!isMoneyRecordType(row.type)) {
      return { type: row.type, clientId: row.client, txId: row.tx };
    }

    if (row.amount === undefined || row.amount === "") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: `required for ${row.type}`,
      });
      return z.NEVER;
    }

    const amount = AmountSchema.safeParse(row.amount);
    if (!amount.success) {
      for (const issue of amount.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["amount"], message: issue.message });
      }
      return z.NEVER;
    }

    return { type: row.type, clientId: row.client, txId: row.tx, amount: amount.data };
  });

// =============================================================================
// Line parsing
// =============================================================================

function cells(line: string): string[] {
  return line.split(",").map((cell) => cell.trim());
}

/**
 * Validate the header line. Throws RecordParseError on mismatch.
 */
export function parseHeader(line: string, lineNumber = 1): void {
  const header = cells(line.replace(/^\uFEFF/, ""));
  const matches =
    header.length === INPUT_HEADER.length &&
    header.every((cell, i) => cell === INPUT_HEADER[i]);

  if (!matches) {
    throw new RecordParseError(
      lineNumber,
      `expected header "${INPUT_HEADER.join(",")}", got "${line.trim()}"`,
    );
  }
}

/**
 * Parse one data line into a transaction record.
 * Throws RecordParseError describing every problem found.
 */
export function parseRecordLine(line: string, lineNumber: number): TransactionRecord {
  const row = cells(line);
  if (row.length < 3 || row.length > INPUT_HEADER.length) {
    throw new RecordParseError(
      lineNumber,
      `expected 3 or 4 columns, got ${String(row.length)}`,
    );
  }

  const [type, client, tx, amount] = row;
  const result = RowSchema.safeParse({ type, client, tx, amount });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RecordParseError(lineNumber, detail);
  }

  return result.data;
}

// =============================================================================
// Stream reading
// =============================================================================

export interface ParsedRecord {
  /** 1-based line number the record came from. */
  readonly line: number;
  readonly record: TransactionRecord;
}

/**
 * Read records from a stream, lazily and in order.
 *
 * The first non-blank line must be the header. An empty stream yields
 * nothing. Stops with RecordParseError at the first malformed line.
 */
export async function* readRecords(input: Readable): AsyncGenerator<ParsedRecord, void, undefined> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;
  let sawHeader = false;

  try {
    for await (const line of rl) {
      lineNumber++;
      if (line.trim() === "") continue;

      if (!sawHeader) {
        parseHeader(line, lineNumber);
        sawHeader = true;
        continue;
      }

      yield { line: lineNumber, record: parseRecordLine(line, lineNumber) };
    }
  } finally {
    rl.close();
  }
}
