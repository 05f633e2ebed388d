/**
 * @tally/cli — CSV account writer.
 *
 * client,available,held,total,locked
 * 1,1.5000,0.0000,1.5000,false
 */

import type { Writable } from "node:stream";
import { formatAmount } from "@tally/ledger";
import type { AccountSnapshot } from "@tally/types";

export const OUTPUT_HEADER = "client,available,held,total,locked";

export interface WriteAccountsOptions {
  /** Order rows by ascending client id. Default: iteration order. */
  readonly sortByClient?: boolean | undefined;
}

export function formatAccountRow(account: AccountSnapshot): string {
  return [
    String(account.clientId),
    formatAmount(account.available),
    formatAmount(account.held),
    formatAmount(account.total),
    String(account.locked),
  ].join(",");
}

/**
 * Render the header and one row per account, newline-terminated.
 */
export function formatAccounts(
  accounts: Iterable<AccountSnapshot>,
  options?: WriteAccountsOptions,
): string {
  const rows = [...accounts];
  if (options?.sortByClient === true) {
    rows.sort((a, b) => a.clientId - b.clientId);
  }
  return [OUTPUT_HEADER, ...rows.map(formatAccountRow)].join("\n") + "\n";
}

/**
 * Write the account CSV and resolve once the stream has accepted it.
 */
export function writeAccounts(
  accounts: Iterable<AccountSnapshot>,
  out: Writable,
  options?: WriteAccountsOptions,
): Promise<void> {
  const text = formatAccounts(accounts, options);
  return new Promise((resolve, reject) => {
    out.write(text, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
