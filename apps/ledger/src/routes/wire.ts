/**
 * Domain records → snake_case wire forms.
 */

import type {
  BountyStatsV1,
  BountyV1,
  FullAgentStatsV1,
  Identity,
  TipStatsV1,
} from "@agentledger/protocol";
import type { Bounty, BountyStats, FullAgentStats, TipStats } from "../types.js";

export function toBountyV1(b: Bounty): BountyV1 {
  return {
    id: b.id,
    poster: b.poster,
    amount: b.amount,
    deadline: b.deadline,
    description: b.description,
    external_ref: b.externalRef,
    status: b.status,
    claimed_by: b.claimedBy,
    created_at: b.createdAt,
    claimed_at: b.claimedAt,
  };
}

export function toTipStatsV1(s: TipStats): TipStatsV1 {
  return {
    total_received: s.totalReceived,
    total_sent: s.totalSent,
    received_count: s.receivedCount,
  };
}

export function toBountyStatsV1(s: BountyStats): BountyStatsV1 {
  return {
    posted_count: s.postedCount,
    claimed_count: s.claimedCount,
    amount_posted: s.amountPosted,
    amount_earned: s.amountEarned,
  };
}

export function toFullAgentStatsV1(agent: Identity, s: FullAgentStats): FullAgentStatsV1 {
  return {
    agent,
    name: s.name,
    profile: s.profile,
    tips_received: s.tipsReceived,
    tips_sent: s.tipsSent,
    tip_count: s.tipCount,
    bounties_posted: s.bountiesPosted,
    bounties_claimed: s.bountiesClaimed,
    bounty_amount_posted: s.bountyAmountPosted,
    bounty_amount_earned: s.bountyAmountEarned,
  };
}
