/**
 * Account Snapshots
 *
 * The point-in-time view of a client account that the engine hands
 * back to its caller. Snapshots are plain copies; mutating one has no
 * effect on the engine.
 */

import type { Amount, ClientId } from "./record.js";

export interface AccountSnapshot {
  readonly clientId: ClientId;

  /** Funds usable for withdrawal. */
  readonly available: Amount;

  /** Funds frozen pending dispute resolution. */
  readonly held: Amount;

  /** Always equal to available + held. */
  readonly total: Amount;

  /** Set by a chargeback; blocks further deposits and withdrawals. */
  readonly locked: boolean;
}
