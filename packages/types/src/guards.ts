/**
 * Runtime Type Guards
 *
 * Narrowing functions for record and snapshot types.
 * Used where values cross a boundary untyped (parsed input, fixtures).
 */

import type { AccountSnapshot } from "./account.js";
import type {
  DisputeRecord,
  DisputeRecordType,
  MoneyRecord,
  MoneyRecordType,
  RecordType,
  TransactionRecord,
} from "./record.js";

// =============================================================================
// Identifier bounds
// =============================================================================

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffff_ffff;

const RECORD_TYPES = new Set<string>([
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
]);
const MONEY_RECORD_TYPES = new Set<string>(["deposit", "withdrawal"]);

function isBoundedUint(value: unknown, max: number): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= max
  );
}

export function isClientId(value: unknown): value is number {
  return isBoundedUint(value, MAX_CLIENT_ID);
}

export function isTxId(value: unknown): value is number {
  return isBoundedUint(value, MAX_TX_ID);
}

// =============================================================================
// Record guards
// =============================================================================

export function isRecordType(value: unknown): value is RecordType {
  return typeof value === "string" && RECORD_TYPES.has(value);
}

export function isMoneyRecordType(value: unknown): value is MoneyRecordType {
  return typeof value === "string" && MONEY_RECORD_TYPES.has(value);
}

export function isDisputeRecordType(value: unknown): value is DisputeRecordType {
  return isRecordType(value) && !MONEY_RECORD_TYPES.has(value);
}

export function isMoneyRecord(record: TransactionRecord): record is MoneyRecord {
  return isMoneyRecordType(record.type);
}

export function isDisputeRecord(record: TransactionRecord): record is DisputeRecord {
  return isDisputeRecordType(record.type);
}

/**
 * Structural check for an untyped value. Amounts on money records must
 * be non-negative bigints; dispute-chain records must not carry one.
 */
export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isRecordType(v.type) || !isClientId(v.clientId) || !isTxId(v.txId)) {
    return false;
  }
  if (isMoneyRecordType(v.type)) {
    return typeof v.amount === "bigint" && v.amount >= 0n;
  }
  return v.amount === undefined;
}

// =============================================================================
// Snapshot guards
// =============================================================================

export function isAccountSnapshot(value: unknown): value is AccountSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.clientId) &&
    typeof v.available === "bigint" &&
    typeof v.held === "bigint" &&
    typeof v.total === "bigint" &&
    typeof v.locked === "boolean"
  );
}
