/**
 * Runtime type guard tests for @tally/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
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
} from "../src/guards.js";
import type { TransactionRecord } from "../src/record.js";

// =============================================================================
// Identifier guards
// =============================================================================

describe("isClientId", () => {
  it("accepts the full u16 range", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(MAX_CLIENT_ID)).toBe(true);
  });

  it("rejects out-of-range and non-integer values", () => {
    expect(isClientId(-1)).toBe(false);
    expect(isClientId(MAX_CLIENT_ID + 1)).toBe(false);
    expect(isClientId(1.5)).toBe(false);
    expect(isClientId("1")).toBe(false);
  });
});

describe("isTxId", () => {
  it("accepts the full u32 range", () => {
    expect(isTxId(0)).toBe(true);
    expect(isTxId(MAX_TX_ID)).toBe(true);
  });

  it("rejects values beyond u32", () => {
    expect(isTxId(MAX_TX_ID + 1)).toBe(false);
    expect(isTxId(Number.NaN)).toBe(false);
  });
});

// =============================================================================
// Record type guards
// =============================================================================

describe("isRecordType", () => {
  it("accepts all five record kinds", () => {
    for (const t of ["deposit", "withdrawal", "dispute", "resolve", "chargeback"]) {
      expect(isRecordType(t)).toBe(true);
    }
  });

  it("rejects unknown kinds and wrong casing", () => {
    expect(isRecordType("transfer")).toBe(false);
    expect(isRecordType("Deposit")).toBe(false);
    expect(isRecordType(undefined)).toBe(false);
  });
});

describe("isMoneyRecordType / isDisputeRecordType", () => {
  it("splits record kinds into two disjoint groups", () => {
    expect(isMoneyRecordType("deposit")).toBe(true);
    expect(isMoneyRecordType("withdrawal")).toBe(true);
    expect(isMoneyRecordType("dispute")).toBe(false);

    expect(isDisputeRecordType("dispute")).toBe(true);
    expect(isDisputeRecordType("resolve")).toBe(true);
    expect(isDisputeRecordType("chargeback")).toBe(true);
    expect(isDisputeRecordType("deposit")).toBe(false);
    expect(isDisputeRecordType("bogus")).toBe(false);
  });
});

describe("isMoneyRecord / isDisputeRecord", () => {
  const deposit: TransactionRecord = { type: "deposit", clientId: 1, txId: 1, amount: 10_000n };
  const dispute: TransactionRecord = { type: "dispute", clientId: 1, txId: 1 };

  it("narrows by record type", () => {
    expect(isMoneyRecord(deposit)).toBe(true);
    expect(isDisputeRecord(deposit)).toBe(false);
    expect(isMoneyRecord(dispute)).toBe(false);
    expect(isDisputeRecord(dispute)).toBe(true);
  });
});

describe("isTransactionRecord", () => {
  it("accepts a deposit with a non-negative bigint amount", () => {
    expect(isTransactionRecord({ type: "deposit", clientId: 1, txId: 7, amount: 0n })).toBe(true);
  });

  it("accepts a dispute without amount", () => {
    expect(isTransactionRecord({ type: "chargeback", clientId: 2, txId: 7 })).toBe(true);
  });

  it("rejects a withdrawal without amount", () => {
    expect(isTransactionRecord({ type: "withdrawal", clientId: 1, txId: 7 })).toBe(false);
  });

  it("rejects a negative amount", () => {
    expect(isTransactionRecord({ type: "deposit", clientId: 1, txId: 7, amount: -1n })).toBe(false);
  });

  it("rejects a numeric amount", () => {
    expect(isTransactionRecord({ type: "deposit", clientId: 1, txId: 7, amount: 1 })).toBe(false);
  });

  it("rejects a dispute that carries an amount", () => {
    expect(isTransactionRecord({ type: "resolve", clientId: 1, txId: 7, amount: 5n })).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isTransactionRecord(null)).toBe(false);
    expect(isTransactionRecord("deposit")).toBe(false);
  });

  it("rejects out-of-range identifiers", () => {
    expect(isTransactionRecord({ type: "dispute", clientId: 70_000, txId: 7 })).toBe(false);
    expect(isTransactionRecord({ type: "dispute", clientId: 1, txId: -7 })).toBe(false);
  });
});

// =============================================================================
// Snapshot guards
// =============================================================================

describe("isAccountSnapshot", () => {
  it("accepts a well-formed snapshot", () => {
    expect(
      isAccountSnapshot({ clientId: 1, available: 10n, held: 0n, total: 10n, locked: false }),
    ).toBe(true);
  });

  it("rejects numeric balances", () => {
    expect(
      isAccountSnapshot({ clientId: 1, available: 10, held: 0n, total: 10n, locked: false }),
    ).toBe(false);
  });

  it("rejects a missing locked flag", () => {
    expect(isAccountSnapshot({ clientId: 1, available: 0n, held: 0n, total: 0n })).toBe(false);
  });
});
