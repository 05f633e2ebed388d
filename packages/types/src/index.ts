/**
 * @tally/types — Shared types for the Tally stack.
 *
 * - Transaction records consumed by the ledger engine
 * - Account snapshots produced by it
 * - Runtime guards for values crossing a boundary untyped
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are scaled bigints, never numbers
 */

// Record types
export type {
  Amount,
  ClientId,
  TxId,
  RecordType,
  MoneyRecordType,
  DisputeRecordType,
  MoneyRecord,
  DisputeRecord,
  TransactionRecord,
} from "./record.js";

// Snapshot types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  MAX_CLIENT_ID,
  MAX_TX_ID,
  isClientId,
  isTxId,
  isRecordType,
  isMoneyRecordType,
  isDisputeRecordType,
  isMoneyRecord,
  isDisputeRecord,
  isTransactionRecord,
  isAccountSnapshot,
} from "./guards.js";
