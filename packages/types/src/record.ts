/**
 * Transaction Records
 *
 * The shape of one input record as the ledger engine consumes it.
 * Wire parsing happens elsewhere; by the time a record reaches the
 * engine its fields are already typed.
 *
 * Rules:
 * - Amounts are bigint counts of 1/10000 units (never floating point)
 * - Only deposits and withdrawals carry an amount
 * - Dispute-chain records reference an earlier deposit/withdrawal by txId
 */

/**
 * A fixed-point monetary amount, scaled by 10^4.
 * 1.5 is represented as 15000n.
 */
export type Amount = bigint;

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier. */
export type TxId = number;

/** The five kinds of record the engine understands. */
export type RecordType =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Record kinds that move money and create a transaction cache entry. */
export type MoneyRecordType = Extract<RecordType, "deposit" | "withdrawal">;

/** Record kinds that act on an existing transaction. */
export type DisputeRecordType = Exclude<RecordType, MoneyRecordType>;

/**
 * A deposit or withdrawal. The amount is never negative: direction
 * comes from the record type.
 */
export interface MoneyRecord {
  readonly type: MoneyRecordType;
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: Amount;
}

/**
 * A dispute, resolve or chargeback against a previous transaction.
 */
export interface DisputeRecord {
  readonly type: DisputeRecordType;
  readonly clientId: ClientId;
  readonly txId: TxId;
}

/** Any record in the input stream. */
export type TransactionRecord = MoneyRecord | DisputeRecord;
