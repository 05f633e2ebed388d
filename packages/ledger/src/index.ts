/**
 * @tally/ledger — Single-pass ledger engine.
 *
 * Replays deposits, withdrawals and dispute-chain records against client
 * accounts and keeps the invariants that matter:
 * - total == available + held for every account, after every record
 * - Held funds never go negative
 * - Dispute state only moves forward (none → disputed → resolved)
 * - All monetary arithmetic uses bigint at scale 4 (no floating point)
 * - Overflow is fatal, never a silent wrap
 *
 * Design rules:
 * - All types are readonly
 * - Fatal conditions are explicit "failed" outcomes; skips never throw
 * - Zero runtime dependencies
 */

// Core engine
export { LedgerEngine } from "./engine.js";

// Transaction cache
export { TransactionCache } from "./transaction-cache.js";

// Money arithmetic
export {
  AMOUNT_SCALE,
  UNITS_PER_WHOLE,
  AMOUNT_MAX,
  AMOUNT_MIN,
  isInRange,
  assertInRange,
  parseAmount,
  formatAmount,
  checkedAdd,
  checkedSub,
  absAmount,
  negateAmount,
} from "./money-math.js";

// Types
export type {
  AccountState,
  TransactionKind,
  DisputeState,
  CacheEntry,
  LedgerErrorCode,
  SkipReason,
  AppliedOutcome,
  SkippedOutcome,
  FailedOutcome,
  ApplyOutcome,
  ReplaySuccess,
  ReplayFailure,
  ReplayResult,
  LedgerEngineOptions,
} from "./types.js";

export { LedgerError } from "./types.js";
