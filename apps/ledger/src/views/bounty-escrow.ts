/**
 * Bounty escrow: posted rewards held in custody until released.
 *
 * Lifecycle: Active → Claimed | Expired | Cancelled. Exactly one outbound
 * transition fires per bounty; every terminal state is final.
 *
 * Invariant: the escrow account's token balance equals the sum of amounts
 * of all Active bounties. Funds leave custody only through this module.
 *
 * Expiry is lazy: nothing runs on a timer. An Active bounty past its
 * deadline stays Active until approveClaim or claimExpired observes it.
 */

import {
  BOUNTY_CANCELLED,
  BOUNTY_CLAIMED,
  BOUNTY_CREATED,
  BOUNTY_EXPIRED,
  INVALID_STATE,
  LedgerError,
  NOT_FOUND,
  NO_DEADLINE,
  PRECONDITION_FAILED,
  UNAUTHORIZED,
  ZERO_IDENTITY,
  ensure,
  isParticipant,
  type Identity,
} from "@agentledger/protocol";
import type { LedgerContext, Transaction } from "../ledger.js";
import type { Bounty, BountyStats, ClaimOutcome, Receipt } from "../types.js";

export function isPastDeadline(bounty: Bounty, now: number): boolean {
  return bounty.deadline !== NO_DEADLINE && now > bounty.deadline;
}

export class BountyEscrow {
  constructor(private readonly ctx: LedgerContext) {}

  /** Custody account. */
  get account(): Identity {
    return this.ctx.accounts.escrow;
  }

  async createBounty(
    poster: Identity,
    amount: number,
    deadline: number,
    description: string,
    externalRef: string = "",
  ): Promise<Receipt<number>> {
    ensure(isParticipant(poster), "poster must be a non-zero identity");
    ensure(Number.isSafeInteger(amount) && amount > 0, "amount must be a positive integer");
    ensure(Number.isSafeInteger(deadline) && deadline >= 0, "deadline must be a non-negative integer");
    ensure(description.length > 0, "description must not be empty");

    return this.ctx.transact(async (tx) => {
      ensure(deadline === NO_DEADLINE || deadline > tx.now, "deadline must be in the future");

      await this.ctx.pull(this.account, poster, this.account, amount);

      const id = this.ctx.store.allocateBountyId();
      this.ctx.store.insertBounty({
        id,
        poster,
        amount,
        deadline,
        description,
        externalRef,
        status: "Active",
        claimedBy: ZERO_IDENTITY,
        createdAt: tx.now,
        claimedAt: 0,
      });

      const stats = this.ctx.store.mutableBountyStats(poster);
      stats.postedCount += 1;
      stats.amountPosted += amount;

      tx.emit({
        type: BOUNTY_CREATED,
        payload: {
          bounty_id: id,
          poster,
          amount,
          deadline,
          description,
          external_ref: externalRef,
        },
      });
      return id;
    });
  }

  /**
   * Release an Active bounty to `claimer`. If the deadline has passed the
   * poster is refunded instead and the outcome is "expired"; that path
   * does not throw.
   */
  async approveClaim(
    caller: Identity,
    bountyId: number,
    claimer: Identity,
    proof: string = "",
  ): Promise<Receipt<ClaimOutcome>> {
    return this.ctx.transact(async (tx) => {
      const bounty = this.activeOwnedBy(caller, bountyId);
      ensure(isParticipant(claimer), "claimer must be a non-zero identity");
      ensure(!this.ctx.isLedgerAccount(claimer), "claimer cannot be a ledger account");
      if (claimer === caller) {
        throw new LedgerError(UNAUTHORIZED, "poster cannot claim their own bounty");
      }

      if (isPastDeadline(bounty, tx.now)) {
        await this.refund(tx, bounty, "Expired");
        return "expired";
      }

      await this.ctx.push(this.account, claimer, bounty.amount);
      bounty.status = "Claimed";
      bounty.claimedBy = claimer;
      bounty.claimedAt = tx.now;
      this.ctx.store.deactivate(bounty.id);
      this.ctx.store.recordClaim(claimer, bounty.id);

      const stats = this.ctx.store.mutableBountyStats(claimer);
      stats.claimedCount += 1;
      stats.amountEarned += bounty.amount;

      tx.emit({
        type: BOUNTY_CLAIMED,
        payload: {
          bounty_id: bounty.id,
          poster: bounty.poster,
          claimer,
          amount: bounty.amount,
          proof,
        },
      });
      return "claimed";
    });
  }

  /** Full refund of an Active bounty, deadline or not. */
  async cancelBounty(caller: Identity, bountyId: number): Promise<Receipt> {
    return this.ctx.transact(async (tx) => {
      const bounty = this.activeOwnedBy(caller, bountyId);
      await this.refund(tx, bounty, "Cancelled");
    });
  }

  /** Full refund of an Active bounty whose deadline has passed. */
  async claimExpired(caller: Identity, bountyId: number): Promise<Receipt> {
    return this.ctx.transact(async (tx) => {
      const bounty = this.activeOwnedBy(caller, bountyId);
      if (bounty.deadline === NO_DEADLINE) {
        throw new LedgerError(PRECONDITION_FAILED, `bounty ${bountyId} has no deadline`);
      }
      if (!isPastDeadline(bounty, tx.now)) {
        throw new LedgerError(PRECONDITION_FAILED, `bounty ${bountyId} has not expired yet`);
      }
      await this.refund(tx, bounty, "Expired");
    });
  }

  getBounty(bountyId: number): Bounty {
    const bounty = this.ctx.store.bounty(bountyId);
    if (!bounty) throw new LedgerError(NOT_FOUND, `bounty ${bountyId} not found`);
    return { ...bounty };
  }

  getPosterBounties(identity: Identity): number[] {
    return this.ctx.store.posterBounties(identity);
  }

  getClaimerBounties(identity: Identity): number[] {
    return this.ctx.store.claimerBounties(identity);
  }

  /**
   * Active bounties that are still claimable (no deadline, or now <=
   * deadline), ascending id. Scans only the Active index.
   */
  getActiveBounties(offset: number, limit: number): Bounty[] {
    ensure(Number.isSafeInteger(offset) && offset >= 0, "offset must be a non-negative integer");
    ensure(Number.isSafeInteger(limit) && limit >= 0, "limit must be a non-negative integer");

    const now = this.ctx.clock();
    const page: Bounty[] = [];
    let skipped = 0;
    for (const id of this.ctx.store.activeIds()) {
      if (page.length >= limit) break;
      const bounty = this.ctx.store.bounty(id);
      if (!bounty || isPastDeadline(bounty, now)) continue;
      if (skipped < offset) {
        skipped++;
        continue;
      }
      page.push({ ...bounty });
    }
    return page;
  }

  getAgentStats(identity: Identity): BountyStats {
    return this.ctx.store.bountyStats(identity);
  }

  getCustodyBalance(): Promise<number> {
    return this.ctx.token.balanceOf(this.account);
  }

  /** Sum of amounts of Active bounties, including ones past their deadline. */
  getLockedTotal(): number {
    let total = 0;
    for (const id of this.ctx.store.activeIds()) {
      total += this.ctx.store.bounty(id)?.amount ?? 0;
    }
    return total;
  }

  // ── internals ────────────────────────────────────────────────────

  /** Precondition order: exists, caller is poster, still Active. */
  private activeOwnedBy(caller: Identity, bountyId: number): Bounty {
    const bounty = this.ctx.store.mutableBounty(bountyId);
    if (!bounty) throw new LedgerError(NOT_FOUND, `bounty ${bountyId} not found`);
    if (bounty.poster !== caller) {
      throw new LedgerError(UNAUTHORIZED, `only the poster can act on bounty ${bountyId}`);
    }
    if (bounty.status !== "Active") {
      throw new LedgerError(INVALID_STATE, `bounty ${bountyId} is ${bounty.status}`);
    }
    return bounty;
  }

  private async refund(
    tx: Transaction,
    bounty: Bounty,
    status: "Expired" | "Cancelled",
  ): Promise<void> {
    await this.ctx.push(this.account, bounty.poster, bounty.amount);
    bounty.status = status;
    this.ctx.store.deactivate(bounty.id);
    const payload = {
      bounty_id: bounty.id,
      poster: bounty.poster,
      amount_returned: bounty.amount,
    };
    if (status === "Expired") tx.emit({ type: BOUNTY_EXPIRED, payload });
    else tx.emit({ type: BOUNTY_CANCELLED, payload });
  }
}
