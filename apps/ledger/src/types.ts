/**
 * In-process ledger records. The wire forms (snake_case) live in
 * @agentledger/protocol; routes convert at the edge.
 */

import type { BountyStatus, Identity, LedgerEventV1 } from "@agentledger/protocol";

export type { BountyStatus };

/** Milliseconds since the Unix epoch. */
export type Clock = () => number;

export interface Bounty {
  id: number;
  poster: Identity;
  amount: number;
  deadline: number;
  description: string;
  externalRef: string;
  status: BountyStatus;
  claimedBy: Identity;
  createdAt: number;
  claimedAt: number;
}

export interface TipStats {
  totalReceived: number;
  totalSent: number;
  receivedCount: number;
}

export interface BountyStats {
  postedCount: number;
  claimedCount: number;
  amountPosted: number;
  amountEarned: number;
}

export interface AgentIdentity {
  name: string;
  profile: string;
}

export interface FullAgentStats {
  name: string;
  profile: string;
  tipsReceived: number;
  tipsSent: number;
  tipCount: number;
  bountiesPosted: number;
  bountiesClaimed: number;
  bountyAmountPosted: number;
  bountyAmountEarned: number;
}

/** What approveClaim did: paid the claimer, or found the bounty past its deadline. */
export type ClaimOutcome = "claimed" | "expired";

/** Result of a committed mutation plus the events it appended. */
export interface Receipt<T = void> {
  result: T;
  events: LedgerEventV1[];
}
