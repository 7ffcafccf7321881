/**
 * Token client interface: the fungible token the ledger wraps.
 *
 * The ledger and escrow only ever move funds through this interface, so the
 * in-memory token can be swapped for any standard token adapter. A `false`
 * return or a thrown error both mean the movement did not happen.
 *
 * The acting account is an explicit argument because the token runs
 * alongside the ledger rather than behind a transaction signer.
 */

import type { Identity } from "@agentledger/protocol";

export interface TokenClient {
  balanceOf(owner: Identity): Promise<number>;
  allowance(owner: Identity, spender: Identity): Promise<number>;
  /** Overwrite `spender`'s allowance over `owner`'s balance. */
  approve(owner: Identity, spender: Identity, amount: number): Promise<boolean>;
  /** Move `amount` out of `from`'s own balance. */
  transfer(from: Identity, to: Identity, amount: number): Promise<boolean>;
  /** Move `amount` from `owner` to `to` on `spender`'s allowance. */
  transferFrom(
    spender: Identity,
    owner: Identity,
    to: Identity,
    amount: number,
  ): Promise<boolean>;
}

/** Handle returned by a checkpoint. Call exactly one of the two. */
export interface Checkpoint {
  /** Undo every write made since the checkpoint. */
  rollback(): Promise<void>;
  /** Keep the writes and stop tracking them. */
  release(): Promise<void>;
}

/**
 * Optional capability: track token writes so a failed ledger operation
 * can restore every balance and allowance it touched.
 */
export interface Checkpointable {
  checkpoint(): Promise<Checkpoint>;
}

export function isCheckpointable<T extends object>(token: T): token is T & Checkpointable {
  return "checkpoint" in token && typeof token.checkpoint === "function";
}

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}
