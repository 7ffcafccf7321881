/**
 * Per-caller replay protection for signed requests.
 *
 * A request is accepted only if its nonce is strictly greater than the
 * caller's last accepted one. In-memory: a restart resets every caller
 * to 0, same as the rest of the ledger state.
 */

import type { Identity } from "@agentledger/protocol";

export class NonceStore {
  private readonly last = new Map<Identity, number>();

  /** Last accepted nonce, 0 if the caller has never been seen. */
  current(caller: Identity): number {
    return this.last.get(caller) ?? 0;
  }

  /** Record `nonce` if it advances; returns false for a stale or replayed one. */
  accept(caller: Identity, nonce: number): boolean {
    if (!Number.isSafeInteger(nonce) || nonce <= this.current(caller)) return false;
    this.last.set(caller, nonce);
    return true;
  }
}
