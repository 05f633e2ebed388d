/**
 * @tally/ledger — Ledger engine.
 *
 * Replays transaction records against client accounts, one record at a
 * time, in arrival order. Deposits and withdrawals move money and are
 * cached; disputes, resolves and chargebacks act on cached transactions.
 *
 * API surface:
 * - apply() — Apply one record, returning an ApplyOutcome
 * - replay() — Apply a sequence, stopping at the first fatal outcome
 * - getAccount() — Copy of one account
 * - snapshot() — Lazy iterator of account copies
 * - getTransaction() — Cached transaction lookup
 *
 * Fatal conditions (malformed record, duplicate txId, overflow) leave no
 * partial effect: new state is computed first and committed only once
 * every check has passed.
 */

import type {
  AccountSnapshot,
  ClientId,
  DisputeRecord,
  MoneyRecord,
  TransactionRecord,
  TxId,
} from "@tally/types";
import { isMoneyRecord, isTransactionRecord } from "@tally/types";
import { absAmount, assertInRange, checkedAdd, checkedSub, negateAmount } from "./money-math.js";
import { TransactionCache } from "./transaction-cache.js";
import type {
  AccountState,
  ApplyOutcome,
  CacheEntry,
  LedgerEngineOptions,
  ReplayResult,
  SkipReason,
  SkippedOutcome,
} from "./types.js";
import { LedgerError } from "./types.js";

function emptyAccount(clientId: ClientId): AccountState {
  return { clientId, available: 0n, held: 0n, total: 0n, locked: false };
}

function* copies(states: readonly AccountState[]): Generator<AccountSnapshot, void, undefined> {
  for (const state of states) {
    yield { ...state };
  }
}

/**
 * Single-writer ledger engine.
 *
 * Holds one account per client and the transaction cache. Not safe for
 * concurrent writers; records must be applied in arrival order.
 */
export class LedgerEngine {
  private readonly _accounts: Map<ClientId, AccountState> = new Map();
  private readonly _cache: TransactionCache = new TransactionCache();
  private readonly _checkClientMatch: boolean;
  private readonly _onSkip: ((outcome: SkippedOutcome) => void) | undefined;

  constructor(options?: LedgerEngineOptions) {
    this._checkClientMatch = options?.checkClientMatch ?? true;
    this._onSkip = options?.onSkip;
  }

  // ─── Write Path ──────────────────────────────────────────────────────

  /**
   * Apply a single record.
   *
   * Returns "failed" (never throws) for fatal conditions; the caller must
   * stop feeding records after one. Errors other than LedgerError are
   * programming errors and propagate.
   */
  apply(record: TransactionRecord): ApplyOutcome {
    let reason: SkipReason | undefined;
    try {
      reason = this._dispatch(record);
    } catch (err: unknown) {
      if (err instanceof LedgerError) {
        return { status: "failed", record, error: err };
      }
      throw err;
    }

    if (reason === undefined) {
      return { status: "applied", record };
    }

    const outcome: SkippedOutcome = { status: "skipped", record, reason };
    this._onSkip?.(outcome);
    return outcome;
  }

  /**
   * Apply records in order until the input ends or a record fails.
   * Records after a failure are never read.
   */
  replay(records: Iterable<TransactionRecord>): ReplayResult {
    let applied = 0;
    let skipped = 0;
    let index = 0;

    for (const record of records) {
      const outcome = this.apply(record);
      switch (outcome.status) {
        case "applied":
          applied++;
          break;
        case "skipped":
          skipped++;
          break;
        case "failed":
          return {
            ok: false,
            applied,
            skipped,
            failedAt: index,
            record,
            error: outcome.error,
          };
      }
      index++;
    }

    return { ok: true, applied, skipped };
  }

  private _dispatch(record: TransactionRecord): SkipReason | undefined {
    if (!isTransactionRecord(record)) {
      throw new LedgerError(
        "MALFORMED_RECORD",
        `Malformed transaction record: ${describeRecord(record)}`,
      );
    }

    if (isMoneyRecord(record)) {
      assertInRange(record.amount, `Amount of transaction ${String(record.txId)}`);
      return record.type === "deposit"
        ? this._deposit(record)
        : this._withdraw(record);
    }
    return this._disputeChain(record);
  }

  // ─── Money Records ───────────────────────────────────────────────────

  private _deposit(record: MoneyRecord): SkipReason | undefined {
    this._assertNewTransaction(record.txId);
    const account = this._account(record.clientId);

    if (account.locked) {
      this._store(account);
      return "ACCOUNT_LOCKED";
    }

    const next: AccountState = {
      ...account,
      available: checkedAdd(account.available, record.amount),
      total: checkedAdd(account.total, record.amount),
    };

    this._commit(next);
    this._cache.put(record.txId, record.clientId, record.amount, "deposit");
    return undefined;
  }

  private _withdraw(record: MoneyRecord): SkipReason | undefined {
    this._assertNewTransaction(record.txId);
    const account = this._account(record.clientId);

    if (account.locked) {
      this._store(account);
      return "ACCOUNT_LOCKED";
    }
    if (account.available < record.amount) {
      this._store(account);
      return "INSUFFICIENT_FUNDS";
    }

    const cached = negateAmount(record.amount);
    const next: AccountState = {
      ...account,
      available: checkedSub(account.available, record.amount),
      total: checkedSub(account.total, record.amount),
    };

    this._commit(next);
    this._cache.put(record.txId, record.clientId, cached, "withdrawal");
    return undefined;
  }

  private _assertNewTransaction(txId: TxId): void {
    if (this._cache.has(txId)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction ${String(txId)} was already applied`,
      );
    }
  }

  // ─── Dispute Chain ───────────────────────────────────────────────────

  private _disputeChain(record: DisputeRecord): SkipReason | undefined {
    // The referencing client is "seen" even if the record is skipped
    this._store(this._account(record.clientId));

    const entry = this._cache.get(record.txId);
    if (entry === undefined) {
      return "UNKNOWN_TRANSACTION";
    }
    if (this._checkClientMatch && entry.clientId !== record.clientId) {
      return "CLIENT_MISMATCH";
    }

    switch (record.type) {
      case "dispute":
        return this._dispute(entry);
      case "resolve":
        return this._resolve(entry);
      case "chargeback":
        return this._chargeback(entry);
    }
  }

  /**
   * Move |amount| from available to held. Total is unchanged.
   */
  private _dispute(entry: CacheEntry): SkipReason | undefined {
    if (entry.disputeState !== "none") {
      return "INVALID_DISPUTE_STATE";
    }

    const amount = absAmount(entry.amount);
    const account = this._account(entry.clientId);
    this._commit({
      ...account,
      available: checkedSub(account.available, amount),
      held: checkedAdd(account.held, amount),
    });
    this._cache.markDisputed(entry.txId);
    return undefined;
  }

  /**
   * Move |amount| from held back to available. Total is unchanged.
   */
  private _resolve(entry: CacheEntry): SkipReason | undefined {
    if (entry.disputeState !== "disputed") {
      return "INVALID_DISPUTE_STATE";
    }

    const amount = absAmount(entry.amount);
    const account = this._account(entry.clientId);
    this._commit({
      ...account,
      available: checkedAdd(account.available, amount),
      held: checkedSub(account.held, amount),
    });
    this._cache.markResolved(entry.txId);
    return undefined;
  }

  /**
   * Remove |amount| from held and total, then lock the account.
   */
  private _chargeback(entry: CacheEntry): SkipReason | undefined {
    if (entry.disputeState !== "disputed") {
      return "INVALID_DISPUTE_STATE";
    }

    const amount = absAmount(entry.amount);
    const account = this._account(entry.clientId);
    this._commit({
      ...account,
      held: checkedSub(account.held, amount),
      total: checkedSub(account.total, amount),
      locked: true,
    });
    this._cache.markResolved(entry.txId);
    return undefined;
  }

  // ─── Account Storage ─────────────────────────────────────────────────

  /**
   * Current state for a client, or a fresh zero account that is not yet
   * stored.
   */
  private _account(clientId: ClientId): AccountState {
    return this._accounts.get(clientId) ?? emptyAccount(clientId);
  }

  private _store(state: AccountState): void {
    this._accounts.set(state.clientId, state);
  }

  /**
   * Store a mutated account after checking total == available + held.
   */
  private _commit(state: AccountState): void {
    if (state.available + state.held !== state.total) {
      throw new LedgerError(
        "BALANCE_INVARIANT",
        `Account ${String(state.clientId)} is out of balance: available=${state.available.toString()}, held=${state.held.toString()}, total=${state.total.toString()}`,
      );
    }
    this._store(state);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Copy of one account, or undefined if the client was never seen.
   */
  getAccount(clientId: ClientId): AccountSnapshot | undefined {
    const state = this._accounts.get(clientId);
    return state === undefined ? undefined : { ...state };
  }

  /**
   * Lazy iterator over copies of every known account, in order of first
   * reference. The set of accounts and their values are fixed when
   * snapshot() is called; later writes do not show through.
   */
  snapshot(): IterableIterator<AccountSnapshot> {
    return copies([...this._accounts.values()]);
  }

  /**
   * Cached deposit/withdrawal by id.
   */
  getTransaction(txId: TxId): CacheEntry | undefined {
    const entry = this._cache.get(txId);
    return entry === undefined ? undefined : { ...entry };
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  get transactionCount(): number {
    return this._cache.size;
  }
}

function describeRecord(record: unknown): string {
  if (record === null || typeof record !== "object") {
    return String(record);
  }
  return Object.entries(record)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");
}
