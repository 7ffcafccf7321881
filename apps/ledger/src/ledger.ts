/**
 * Ledger context: shared collaborators plus the transaction boundary.
 *
 * transact(fn) runs fn inside the serial executor with:
 *   - an open store journal,
 *   - a token checkpoint when the token supports one,
 *   - a buffer of pending events.
 * Success closes the journal and checkpoint and commits the buffered
 * events to the log. Any throw replays the store journal, rolls the token
 * back and discards the buffer.
 */

import {
  CUSTODY_TRANSFER_FAILED,
  ESCROW_CONTRACT,
  TIPS_CONTRACT,
  LedgerError,
  contractIdentity,
  isLedgerError,
  type Identity,
  type LedgerEventBody,
} from "@agentledger/protocol";
import { isCheckpointable, type TokenClient } from "@agentledger/token";
import { EventLog } from "./event-log/writer.js";
import { createSerialExecutor, type SerialExecutor } from "./serial-executor.js";
import { LedgerStore } from "./store.js";
import type { Clock, Receipt } from "./types.js";

export interface LedgerAccounts {
  /** Spender that pulls tips straight from sender to recipient. */
  tips: Identity;
  /** Custody account holding every Active bounty's amount. */
  escrow: Identity;
}

export interface LedgerDeps {
  token: TokenClient;
  store?: LedgerStore;
  events?: EventLog;
  executor?: SerialExecutor;
  clock?: Clock;
}

/** Handle passed to a transaction body. */
export class Transaction {
  readonly pending: LedgerEventBody[] = [];

  constructor(
    /** Operation time, read once when the transaction starts. */
    readonly now: number,
    /** True when a token failure mid-operation is undone by a checkpoint. */
    readonly tokenRollback: boolean,
  ) {}

  emit(body: LedgerEventBody): void {
    this.pending.push(body);
  }
}

export class LedgerContext {
  readonly token: TokenClient;
  readonly store: LedgerStore;
  readonly events: EventLog;
  readonly executor: SerialExecutor;
  readonly clock: Clock;
  readonly accounts: LedgerAccounts = {
    tips: contractIdentity(TIPS_CONTRACT),
    escrow: contractIdentity(ESCROW_CONTRACT),
  };

  constructor(deps: LedgerDeps) {
    this.token = deps.token;
    this.store = deps.store ?? new LedgerStore();
    this.events = deps.events ?? new EventLog();
    this.executor = deps.executor ?? createSerialExecutor();
    this.clock = deps.clock ?? Date.now;
  }

  /** True for the ledger's own tips and escrow accounts. */
  isLedgerAccount(identity: Identity): boolean {
    return identity === this.accounts.tips || identity === this.accounts.escrow;
  }

  transact<T>(fn: (tx: Transaction) => Promise<T>): Promise<Receipt<T>> {
    return this.executor.run(async () => {
      const checkpoint = isCheckpointable(this.token) ? await this.token.checkpoint() : null;
      const tx = new Transaction(this.clock(), checkpoint !== null);
      this.store.begin();

      let result: T;
      try {
        result = await fn(tx);
      } catch (err) {
        this.store.rollback();
        if (checkpoint) await checkpoint.rollback();
        throw err;
      }
      this.store.commit();
      if (checkpoint) await checkpoint.release();

      const events = this.events.commit(tx.now, tx.pending);
      return { result, events };
    });
  }

  /** Move tokens with `spender`'s allowance; false or a throw aborts the operation. */
  async pull(spender: Identity, owner: Identity, to: Identity, amount: number): Promise<void> {
    await this.guard(
      () => this.token.transferFrom(spender, owner, to, amount),
      `transferFrom ${owner} -> ${to} of ${amount} failed`,
    );
  }

  /** Pay out of an account the ledger itself controls. */
  async push(from: Identity, to: Identity, amount: number): Promise<void> {
    await this.guard(
      () => this.token.transfer(from, to, amount),
      `transfer ${from} -> ${to} of ${amount} failed`,
    );
  }

  /**
   * Staged-commit precheck: `owner` must hold and have approved `total`
   * toward `spender` before the first of several transfers.
   */
  async requireFunds(owner: Identity, spender: Identity, total: number): Promise<void> {
    const [balance, allowance] = await Promise.all([
      this.token.balanceOf(owner),
      this.token.allowance(owner, spender),
    ]);
    if (balance < total) {
      throw new LedgerError(CUSTODY_TRANSFER_FAILED, `insufficient balance: have ${balance}, need ${total}`);
    }
    if (allowance < total) {
      throw new LedgerError(CUSTODY_TRANSFER_FAILED, `insufficient allowance: have ${allowance}, need ${total}`);
    }
  }

  private async guard(move: () => Promise<boolean>, message: string): Promise<void> {
    let ok: boolean;
    try {
      ok = await move();
    } catch (err) {
      if (isLedgerError(err)) throw err;
      throw new LedgerError(CUSTODY_TRANSFER_FAILED, message, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    if (!ok) throw new LedgerError(CUSTODY_TRANSFER_FAILED, message);
  }
}
