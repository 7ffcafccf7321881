/**
 * Shared state handed to every route module.
 */

import type { MemoryToken } from "@agentledger/token";
import type { Ledger } from "../index.js";
import type { NonceStore } from "../views/nonce-store.js";

export interface RouteContext {
  ledger: Ledger;
  token: MemoryToken;
  nonces: NonceStore;
  faucetEnabled: boolean;
  pageLimits: { default: number; max: number };
}

/** Requested page size, defaulted and capped. */
export function pageLimit(ctx: RouteContext, requested: number | undefined): number {
  return Math.min(requested ?? ctx.pageLimits.default, ctx.pageLimits.max);
}
