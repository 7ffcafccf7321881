/**
 * Bounty escrow: lifecycle, lazy expiry, authorization, listing.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  BOUNTY_CANCELLED,
  BOUNTY_CLAIMED,
  BOUNTY_CREATED,
  BOUNTY_EXPIRED,
  CUSTODY_TRANSFER_FAILED,
  INVALID_ARGUMENT,
  INVALID_STATE,
  LedgerError,
  NOT_FOUND,
  PRECONDITION_FAILED,
  UNAUTHORIZED,
  ZERO_IDENTITY,
} from "@agentledger/protocol";
import { CAROL, CLAIMER, POSTER, T0, setup, type Fixture } from "./helpers.js";

let f: Fixture;

beforeEach(async () => {
  f = await setup();
});

async function codeOf(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  throw new Error("expected a LedgerError");
}

function codeOfSync(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  throw new Error("expected a LedgerError");
}

async function post(amount = 500, deadline = 0, description = "Find X"): Promise<number> {
  const { result } = await f.escrow.createBounty(POSTER, amount, deadline, description);
  return result;
}

describe("createBounty", () => {
  it("escrows the amount and stores an Active bounty", async () => {
    const { result: id, events } = await f.escrow.createBounty(POSTER, 500, 0, "Find X", "issue-7");

    expect(id).toBe(1);
    expect(await f.escrow.getCustodyBalance()).toBe(500);
    expect(await f.token.balanceOf(POSTER)).toBe(9_500);
    expect(f.escrow.getBounty(id)).toEqual({
      id: 1,
      poster: POSTER,
      amount: 500,
      deadline: 0,
      description: "Find X",
      externalRef: "issue-7",
      status: "Active",
      claimedBy: ZERO_IDENTITY,
      createdAt: T0,
      claimedAt: 0,
    });
    expect(f.escrow.getAgentStats(POSTER)).toEqual({
      postedCount: 1,
      claimedCount: 0,
      amountPosted: 500,
      amountEarned: 0,
    });
    expect(f.escrow.getPosterBounties(POSTER)).toEqual([1]);
    expect(events[0]).toMatchObject({
      type: BOUNTY_CREATED,
      payload: { bounty_id: 1, poster: POSTER, amount: 500, deadline: 0, description: "Find X", external_ref: "issue-7" },
    });
  });

  it("allocates sequential ids", async () => {
    expect(await post()).toBe(1);
    expect(await post()).toBe(2);
    expect(await post()).toBe(3);
  });

  it("rejects bad arguments", async () => {
    expect(await codeOf(f.escrow.createBounty(POSTER, 0, 0, "x"))).toBe(INVALID_ARGUMENT);
    expect(await codeOf(f.escrow.createBounty(POSTER, 10, 0, ""))).toBe(INVALID_ARGUMENT);
    expect(await codeOf(f.escrow.createBounty(POSTER, 10, T0, "x"))).toBe(INVALID_ARGUMENT);
    expect(await codeOf(f.escrow.createBounty(POSTER, 10, T0 - 1, "x"))).toBe(INVALID_ARGUMENT);
  });

  it("fails without allowance and allocates no id", async () => {
    await f.token.approve(POSTER, f.escrow.account, 100);
    expect(await codeOf(f.escrow.createBounty(POSTER, 500, 0, "x"))).toBe(CUSTODY_TRANSFER_FAILED);
    expect(f.ctx.store.lastBountyId()).toBe(0);
    expect(f.escrow.getAgentStats(POSTER).postedCount).toBe(0);
    expect(await post(50)).toBe(1);
  });
});

describe("approveClaim", () => {
  it("pays the claimer and closes the bounty", async () => {
    const id = await post();
    f.clock.advance(1_000);

    const { result, events } = await f.escrow.approveClaim(POSTER, id, CLAIMER, "ref");

    expect(result).toBe("claimed");
    expect(await f.token.balanceOf(CLAIMER)).toBe(10_500);
    expect(await f.escrow.getCustodyBalance()).toBe(0);
    const bounty = f.escrow.getBounty(id);
    expect(bounty.status).toBe("Claimed");
    expect(bounty.claimedBy).toBe(CLAIMER);
    expect(bounty.claimedAt).toBe(T0 + 1_000);
    expect(f.escrow.getAgentStats(CLAIMER)).toEqual({
      postedCount: 0,
      claimedCount: 1,
      amountPosted: 0,
      amountEarned: 500,
    });
    expect(f.escrow.getClaimerBounties(CLAIMER)).toEqual([id]);
    expect(events[0]).toMatchObject({
      type: BOUNTY_CLAIMED,
      payload: { bounty_id: id, poster: POSTER, claimer: CLAIMER, amount: 500, proof: "ref" },
    });
  });

  it("refunds the poster instead when the deadline has passed", async () => {
    const id = await post(500, T0 + 60_000);
    f.clock.advance(60_001);

    const { result, events } = await f.escrow.approveClaim(POSTER, id, CLAIMER, "ref");

    expect(result).toBe("expired");
    expect(f.escrow.getBounty(id).status).toBe("Expired");
    expect(await f.token.balanceOf(POSTER)).toBe(10_000);
    expect(await f.token.balanceOf(CLAIMER)).toBe(10_000);
    expect(f.escrow.getAgentStats(CLAIMER).claimedCount).toBe(0);
    expect(f.ctx.events.byType(BOUNTY_CLAIMED)).toHaveLength(0);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: BOUNTY_EXPIRED,
      payload: { bounty_id: id, poster: POSTER, amount_returned: 500 },
    });
  });

  it("still pays at exactly the deadline", async () => {
    const id = await post(500, T0 + 60_000);
    f.clock.set(T0 + 60_000);
    expect((await f.escrow.approveClaim(POSTER, id, CLAIMER)).result).toBe("claimed");
  });

  it("checks preconditions in order", async () => {
    const id = await post();
    expect(await codeOf(f.escrow.approveClaim(POSTER, 99, CLAIMER))).toBe(NOT_FOUND);
    expect(await codeOf(f.escrow.approveClaim(CAROL, id, CLAIMER))).toBe(UNAUTHORIZED);
    expect(await codeOf(f.escrow.approveClaim(POSTER, id, ZERO_IDENTITY))).toBe(INVALID_ARGUMENT);
    expect(await codeOf(f.escrow.approveClaim(POSTER, id, POSTER))).toBe(UNAUTHORIZED);
    expect(f.escrow.getBounty(id).status).toBe("Active");
  });

  it("rejects the ledger's own accounts as claimer", async () => {
    const id = await post();

    expect(await codeOf(f.escrow.approveClaim(POSTER, id, f.escrow.account))).toBe(INVALID_ARGUMENT);
    expect(await codeOf(f.escrow.approveClaim(POSTER, id, f.tips.account))).toBe(INVALID_ARGUMENT);

    expect(f.escrow.getBounty(id).status).toBe("Active");
    expect(await f.escrow.getCustodyBalance()).toBe(500);
    expect(f.escrow.getLockedTotal()).toBe(500);
    expect(f.escrow.getClaimerBounties(f.escrow.account)).toEqual([]);
  });

  it("leaves the bounty Active when the payout fails", async () => {
    const id = await post();
    f.token.failNextTransfer();
    expect(await codeOf(f.escrow.approveClaim(POSTER, id, CLAIMER))).toBe(CUSTODY_TRANSFER_FAILED);
    expect(f.escrow.getBounty(id).status).toBe("Active");
    expect(await f.escrow.getCustodyBalance()).toBe(500);
    expect(f.escrow.getActiveBounties(0, 10).map((b) => b.id)).toEqual([id]);
  });
});

describe("cancelBounty", () => {
  it("refunds in full, with or without a deadline", async () => {
    const id = await post(500, T0 + 1_000);
    const { events } = await f.escrow.cancelBounty(POSTER, id);

    expect(f.escrow.getBounty(id).status).toBe("Cancelled");
    expect(await f.token.balanceOf(POSTER)).toBe(10_000);
    expect(await f.escrow.getCustodyBalance()).toBe(0);
    expect(events[0]).toMatchObject({
      type: BOUNTY_CANCELLED,
      payload: { bounty_id: id, poster: POSTER, amount_returned: 500 },
    });
  });

  it("rejects a non-poster and leaves the bounty Active", async () => {
    const id = await post();
    expect(await codeOf(f.escrow.cancelBounty(CLAIMER, id))).toBe(UNAUTHORIZED);
    expect(f.escrow.getBounty(id).status).toBe("Active");
    expect(await f.escrow.getCustodyBalance()).toBe(500);
  });

  it("keeps amountPosted after a cancel", async () => {
    const id = await post();
    await f.escrow.cancelBounty(POSTER, id);
    expect(f.escrow.getAgentStats(POSTER).amountPosted).toBe(500);
  });
});

describe("claimExpired", () => {
  it("refunds once the deadline has passed", async () => {
    const id = await post(500, T0 + 10);
    f.clock.advance(11);
    await f.escrow.claimExpired(POSTER, id);
    expect(f.escrow.getBounty(id).status).toBe("Expired");
    expect(await f.token.balanceOf(POSTER)).toBe(10_000);
  });

  it("requires a deadline that has passed", async () => {
    const open = await post(100, 0);
    const pending = await post(100, T0 + 10);
    f.clock.advance(10);
    expect(await codeOf(f.escrow.claimExpired(POSTER, open))).toBe(PRECONDITION_FAILED);
    expect(await codeOf(f.escrow.claimExpired(POSTER, pending))).toBe(PRECONDITION_FAILED);
  });

  it("is poster-only", async () => {
    const id = await post(100, T0 + 10);
    f.clock.advance(11);
    expect(await codeOf(f.escrow.claimExpired(CLAIMER, id))).toBe(UNAUTHORIZED);
  });
});

describe("terminal states", () => {
  it("rejects every transition out of a terminal state with INVALID_STATE", async () => {
    const claimed = await post(100, T0 + 10);
    const cancelled = await post(100, T0 + 10);
    const expired = await post(100, T0 + 10);
    await f.escrow.approveClaim(POSTER, claimed, CLAIMER);
    await f.escrow.cancelBounty(POSTER, cancelled);
    f.clock.advance(11);
    await f.escrow.claimExpired(POSTER, expired);

    for (const id of [claimed, cancelled, expired]) {
      expect(await codeOf(f.escrow.approveClaim(POSTER, id, CLAIMER))).toBe(INVALID_STATE);
      expect(await codeOf(f.escrow.cancelBounty(POSTER, id))).toBe(INVALID_STATE);
      expect(await codeOf(f.escrow.claimExpired(POSTER, id))).toBe(INVALID_STATE);
    }
    expect(await f.escrow.getCustodyBalance()).toBe(0);
  });
});

describe("reads", () => {
  it("getBounty throws NOT_FOUND for unallocated ids", () => {
    expect(codeOfSync(() => f.escrow.getBounty(0))).toBe(NOT_FOUND);
    expect(codeOfSync(() => f.escrow.getBounty(1))).toBe(NOT_FOUND);
  });

  it("histories are empty for unknown identities", () => {
    expect(f.escrow.getPosterBounties(CAROL)).toEqual([]);
    expect(f.escrow.getClaimerBounties(CAROL)).toEqual([]);
  });
});

describe("getActiveBounties", () => {
  it("lists Active, unexpired bounties in ascending id order", async () => {
    await post(10);
    await post(20, T0 + 100);
    await post(30);
    await post(40);
    await f.escrow.cancelBounty(POSTER, 3);
    f.clock.advance(101);

    expect(f.escrow.getActiveBounties(0, 10).map((b) => b.id)).toEqual([1, 4]);
    // expired-but-Active bounty 2 still counts toward custody
    expect(f.escrow.getLockedTotal()).toBe(70);
  });

  it("pages contiguously without overlap", async () => {
    for (let i = 0; i < 7; i++) await post(10 + i);
    const all = f.escrow.getActiveBounties(0, 100).map((b) => b.id);
    const first = f.escrow.getActiveBounties(0, 3).map((b) => b.id);
    const second = f.escrow.getActiveBounties(3, 3).map((b) => b.id);
    const third = f.escrow.getActiveBounties(6, 3).map((b) => b.id);

    expect(all).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect([...first, ...second, ...third]).toEqual(all);
    expect(f.escrow.getActiveBounties(7, 3)).toEqual([]);
    expect(f.escrow.getActiveBounties(0, 0)).toEqual([]);
  });

  it("rejects negative offsets", () => {
    expect(codeOfSync(() => f.escrow.getActiveBounties(-1, 10))).toBe(INVALID_ARGUMENT);
  });
});
