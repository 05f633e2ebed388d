/**
 * @tally/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tally/types with engine-specific
 * structures: account state, cache entries, outcomes and errors.
 *
 * Rules:
 * - All types are readonly; state changes replace objects, never mutate them
 * - Fatal conditions throw LedgerError inside the engine and surface
 *   to callers as a "failed" outcome
 * - Recoverable conditions are "skipped" outcomes and never throw
 */

import type {
  AccountSnapshot,
  Amount,
  ClientId,
  MoneyRecordType,
  TransactionRecord,
  TxId,
} from "@tally/types";

// ─── Account State ───────────────────────────────────────────────────────

/**
 * Engine-held account state. Same shape as the public snapshot;
 * the engine hands out copies, never these objects.
 */
export type AccountState = AccountSnapshot;

// ─── Transaction Cache ───────────────────────────────────────────────────

/** Kind of a cached transaction. Only money records are cached. */
export type TransactionKind = MoneyRecordType;

/**
 * Per-transaction dispute lifecycle.
 *
 * none → disputed → resolved
 *
 * "resolved" is terminal and covers both resolve and chargeback.
 */
export type DisputeState = "none" | "disputed" | "resolved";

/**
 * A cached deposit or withdrawal.
 * Amount sign: positive for deposits, negative for withdrawals.
 */
export interface CacheEntry {
  readonly txId: TxId;
  readonly clientId: ClientId;
  readonly amount: Amount;
  readonly kind: TransactionKind;
  readonly disputeState: DisputeState;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for fatal ledger conditions. */
export type LedgerErrorCode =
  | "MALFORMED_RECORD"
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "INVALID_DISPUTE_TRANSITION"
  | "BALANCE_INVARIANT";

/**
 * Structured error from the ledger engine.
 * A LedgerError reaching the caller means the run must stop.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Outcomes ────────────────────────────────────────────────────────────

/** Why a record was skipped without effect. */
export type SkipReason =
  | "INSUFFICIENT_FUNDS"
  | "ACCOUNT_LOCKED"
  | "UNKNOWN_TRANSACTION"
  | "INVALID_DISPUTE_STATE"
  | "CLIENT_MISMATCH";

export interface AppliedOutcome {
  readonly status: "applied";
  readonly record: TransactionRecord;
}

export interface SkippedOutcome {
  readonly status: "skipped";
  readonly record: TransactionRecord;
  readonly reason: SkipReason;
}

export interface FailedOutcome {
  readonly status: "failed";
  readonly record: TransactionRecord;
  readonly error: LedgerError;
}

/**
 * Result of applying a single record.
 * Production callers only act on "failed"; tests assert on all three.
 */
export type ApplyOutcome = AppliedOutcome | SkippedOutcome | FailedOutcome;

// ─── Replay ──────────────────────────────────────────────────────────────

interface ReplayCounts {
  /** Records that changed state. */
  readonly applied: number;
  /** Records that were ignored. */
  readonly skipped: number;
}

export interface ReplaySuccess extends ReplayCounts {
  readonly ok: true;
}

export interface ReplayFailure extends ReplayCounts {
  readonly ok: false;
  /** Zero-based position of the record that aborted the run. */
  readonly failedAt: number;
  readonly record: TransactionRecord;
  readonly error: LedgerError;
}

export type ReplayResult = ReplaySuccess | ReplayFailure;

// ─── Engine Options ──────────────────────────────────────────────────────

export interface LedgerEngineOptions {
  /**
   * Skip dispute-chain records whose client differs from the client that
   * owns the referenced transaction. Default: true.
   */
  readonly checkClientMatch?: boolean | undefined;

  /** Called for every skipped record, after the outcome is decided. */
  readonly onSkip?: ((outcome: SkippedOutcome) => void) | undefined;
}
