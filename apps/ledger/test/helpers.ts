/**
 * Shared fixtures: fixed identities, a settable clock, a funded ledger.
 */

import { MemoryToken } from "@agentledger/token";
import { createLedger, type Ledger } from "../src/index.js";

export const POSTER = "aa".repeat(32);
export const CLAIMER = "bb".repeat(32);
export const CAROL = "cc".repeat(32);
export const DAVE = "dd".repeat(32);

export const T0 = 1_700_000_000_000;

export interface ManualClock {
  (): number;
  set(ms: number): void;
  advance(ms: number): void;
}

export function manualClock(start: number = T0): ManualClock {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    set(ms: number) {
      now = ms;
    },
    advance(ms: number) {
      now += ms;
    },
  });
}

export interface Fixture extends Ledger {
  token: MemoryToken;
  clock: ManualClock;
}

/** Ledger over a fresh token; each identity in `funded` gets `amount` and full allowances. */
export async function setup(
  funded: readonly string[] = [POSTER, CLAIMER, CAROL],
  amount: number = 10_000,
): Promise<Fixture> {
  const token = new MemoryToken();
  const clock = manualClock();
  const ledger = createLedger({ token, clock });
  for (const id of funded) {
    token.mint(id, amount);
    await token.approve(id, ledger.ctx.accounts.tips, amount);
    await token.approve(id, ledger.ctx.accounts.escrow, amount);
  }
  return { ...ledger, token, clock };
}
