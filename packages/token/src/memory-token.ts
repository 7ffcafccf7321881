/**
 * In-memory token for the service and tests.
 *
 * Standard fungible-token semantics: no fees, no rebasing, overwrite-style
 * approve, allowance consumed by transferFrom. A capped faucet stands in
 * for minting. Deterministic: no randomness, no clock.
 *
 * While a checkpoint is open each write pushes an undo entry, so a
 * rollback replays only what changed since the checkpoint.
 */

import {
  FAUCET_MAX_WHOLE_TOKENS,
  TOKEN_DECIMALS,
  TOKEN_NAME,
  TOKEN_SYMBOL,
  isParticipant,
  type Identity,
} from "@agentledger/protocol";
import type { Checkpoint, Checkpointable, TokenClient, TokenMetadata } from "./types.js";

function isAmount(amount: number): boolean {
  return Number.isSafeInteger(amount) && amount >= 0;
}

export class MemoryToken implements TokenClient, Checkpointable {
  readonly metadata: TokenMetadata;
  private readonly balances = new Map<Identity, number>();
  private readonly allowances = new Map<string, number>();
  private supply = 0;
  private failCountdown: number | null = null;
  private journal: Array<() => void> = [];
  private open = 0;

  constructor(metadata: Partial<TokenMetadata> = {}) {
    this.metadata = {
      name: metadata.name ?? TOKEN_NAME,
      symbol: metadata.symbol ?? TOKEN_SYMBOL,
      decimals: metadata.decimals ?? TOKEN_DECIMALS,
    };
  }

  async balanceOf(owner: Identity): Promise<number> {
    return this.balances.get(owner) ?? 0;
  }

  async allowance(owner: Identity, spender: Identity): Promise<number> {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0;
  }

  async approve(owner: Identity, spender: Identity, amount: number): Promise<boolean> {
    if (!isParticipant(owner) || !isParticipant(spender) || !isAmount(amount)) return false;
    this.write(this.allowances, allowanceKey(owner, spender), amount);
    return true;
  }

  async transfer(from: Identity, to: Identity, amount: number): Promise<boolean> {
    if (this.consumeFailure()) return false;
    return this.move(from, to, amount);
  }

  async transferFrom(
    spender: Identity,
    owner: Identity,
    to: Identity,
    amount: number,
  ): Promise<boolean> {
    if (this.consumeFailure()) return false;
    const key = allowanceKey(owner, spender);
    const allowed = this.allowances.get(key) ?? 0;
    if (!isAmount(amount) || allowed < amount) return false;
    if (!this.move(owner, to, amount)) return false;
    this.write(this.allowances, key, allowed - amount);
    return true;
  }

  async totalSupply(): Promise<number> {
    return this.supply;
  }

  /**
   * Mint `wholeTokens` (≤ FAUCET_MAX_WHOLE_TOKENS) to `to`.
   * Returns the minted amount in base units.
   */
  async faucet(to: Identity, wholeTokens: number): Promise<number> {
    if (!Number.isSafeInteger(wholeTokens) || wholeTokens <= 0) {
      throw new Error(`faucet: amount must be a positive integer, got ${wholeTokens}`);
    }
    if (wholeTokens > FAUCET_MAX_WHOLE_TOKENS) {
      throw new Error(
        `faucet: max ${FAUCET_MAX_WHOLE_TOKENS} ${this.metadata.symbol} per mint`,
      );
    }
    const units = wholeTokens * 10 ** this.metadata.decimals;
    this.mint(to, units);
    return units;
  }

  /** Test helper: credit base units directly. */
  mint(to: Identity, amount: number): void {
    if (!isParticipant(to) || !isAmount(amount)) {
      throw new Error(`mint: invalid recipient or amount`);
    }
    this.write(this.balances, to, (this.balances.get(to) ?? 0) + amount);
    const supply = this.supply;
    this.track(() => {
      this.supply = supply;
    });
    this.supply += amount;
  }

  /**
   * Test helper: let `skip` transfers succeed, then fail the one after.
   * Applies to transfer and transferFrom alike.
   */
  failNextTransfer(skip: number = 0): void {
    this.failCountdown = skip;
  }

  async checkpoint(): Promise<Checkpoint> {
    const mark = this.journal.length;
    this.open++;
    let done = false;
    const close = (): void => {
      if (done) throw new Error("checkpoint already closed");
      done = true;
      this.open--;
      if (this.open === 0) this.journal = [];
    };
    return {
      rollback: async () => {
        for (let i = this.journal.length - 1; i >= mark; i--) this.journal[i]?.();
        this.journal.length = mark;
        close();
      },
      release: async () => {
        close();
      },
    };
  }

  /** Number of undo entries held for open checkpoints. */
  journalSize(): number {
    return this.journal.length;
  }

  private track(undo: () => void): void {
    if (this.open > 0) this.journal.push(undo);
  }

  private write<K>(map: Map<K, number>, key: K, value: number): void {
    const prev = map.get(key);
    this.track(() => {
      if (prev === undefined) map.delete(key);
      else map.set(key, prev);
    });
    map.set(key, value);
  }

  private move(from: Identity, to: Identity, amount: number): boolean {
    if (!isAmount(amount) || !isParticipant(to)) return false;
    const fromBalance = this.balances.get(from) ?? 0;
    if (fromBalance < amount) return false;
    this.write(this.balances, from, fromBalance - amount);
    this.write(this.balances, to, (this.balances.get(to) ?? 0) + amount);
    return true;
  }

  private consumeFailure(): boolean {
    if (this.failCountdown === null) return false;
    if (this.failCountdown === 0) {
      this.failCountdown = null;
      return true;
    }
    this.failCountdown--;
    return false;
  }
}

function allowanceKey(owner: Identity, spender: Identity): string {
  return `${owner}:${spender}`;
}
