/**
 * @tally/ledger — Transaction cache.
 *
 * Remembers every deposit and withdrawal the engine applied so that
 * later dispute-chain records can find them by id.
 *
 * Rules:
 * - No duplicate transaction IDs
 * - Entries are never removed or evicted
 * - Dispute state only moves forward: none → disputed → resolved
 *
 * Capacity: entries live in a plain in-process Map for the whole run,
 * O(n) memory for O(1) lookup. This is the scalability ceiling of the
 * engine. Bounded memory means putting an indexed external store behind
 * the same put/get/mark* contract.
 */

import type { Amount, ClientId, TxId } from "@tally/types";
import type { CacheEntry, DisputeState, TransactionKind } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Append-only cache of applied money transactions, keyed by txId.
 */
export class TransactionCache {
  private readonly _entries: Map<TxId, CacheEntry> = new Map();

  /**
   * Insert a new entry in state "none".
   * Throws DUPLICATE_TRANSACTION if the id was seen before and
   * INVALID_AMOUNT if the sign does not match the kind.
   */
  put(txId: TxId, clientId: ClientId, amount: Amount, kind: TransactionKind): CacheEntry {
    if (this._entries.has(txId)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction already exists: ${String(txId)}`,
      );
    }

    if ((kind === "deposit" && amount < 0n) || (kind === "withdrawal" && amount > 0n)) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `A ${kind} cannot be cached with amount ${amount.toString()}`,
      );
    }

    const entry: CacheEntry = {
      txId,
      clientId,
      amount,
      kind,
      disputeState: "none",
    };

    this._entries.set(txId, entry);
    return entry;
  }

  /**
   * Look up an entry. Returns undefined if not found; absence is a
   * normal outcome for dispute-chain records.
   */
  get(txId: TxId): CacheEntry | undefined {
    return this._entries.get(txId);
  }

  has(txId: TxId): boolean {
    return this._entries.has(txId);
  }

  /**
   * none → disputed.
   */
  markDisputed(txId: TxId): CacheEntry {
    return this._transition(txId, "none", "disputed");
  }

  /**
   * disputed → resolved. Used for both resolve and chargeback.
   */
  markResolved(txId: TxId): CacheEntry {
    return this._transition(txId, "disputed", "resolved");
  }

  /**
   * Number of cached transactions.
   */
  get size(): number {
    return this._entries.size;
  }

  private _transition(txId: TxId, from: DisputeState, to: DisputeState): CacheEntry {
    const entry = this._entries.get(txId);
    if (entry === undefined) {
      throw new LedgerError("UNKNOWN_TRANSACTION", `Unknown transaction: ${String(txId)}`);
    }
    if (entry.disputeState !== from) {
      throw new LedgerError(
        "INVALID_DISPUTE_TRANSITION",
        `Transaction ${String(txId)} cannot move from "${entry.disputeState}" to "${to}"`,
      );
    }

    const next: CacheEntry = { ...entry, disputeState: to };
    this._entries.set(txId, next);
    return next;
  }
}
