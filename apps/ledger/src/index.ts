/**
 * @agentledger/ledger: tips, bounty escrow and registry over one store.
 */

import { LedgerContext, type LedgerDeps } from "./ledger.js";
import { BountyEscrow } from "./views/bounty-escrow.js";
import { Registry } from "./views/registry.js";
import { TipLedger } from "./views/tip-ledger.js";

export interface Ledger {
  ctx: LedgerContext;
  tips: TipLedger;
  escrow: BountyEscrow;
  registry: Registry;
}

/** Wire the three components around one context. */
export function createLedger(deps: LedgerDeps): Ledger {
  const ctx = new LedgerContext(deps);
  const tips = new TipLedger(ctx);
  const escrow = new BountyEscrow(ctx);
  const registry = new Registry(ctx, tips, escrow);
  return { ctx, tips, escrow, registry };
}

export { LedgerContext, Transaction, type LedgerAccounts, type LedgerDeps } from "./ledger.js";
export { LedgerStore, type LedgerState } from "./store.js";
export { EventLog, computeEventId, type EventFilter, type EventListener } from "./event-log/writer.js";
export { createSerialExecutor, type SerialExecutor } from "./serial-executor.js";
export { TipLedger } from "./views/tip-ledger.js";
export { BountyEscrow, isPastDeadline } from "./views/bounty-escrow.js";
export { Registry } from "./views/registry.js";
export { NonceStore } from "./views/nonce-store.js";
export type * from "./types.js";
