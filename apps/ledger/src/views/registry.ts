/**
 * Agent registry: display identities and the composite stats view.
 *
 * Registration overwrites wholesale and may be repeated freely; length
 * limits apply only at the HTTP edge. Stats are
 * composed from the tip ledger and the escrow on every read.
 */

import {
  AGENT_REGISTERED,
  ensure,
  isParticipant,
  type Identity,
} from "@agentledger/protocol";
import type { LedgerContext } from "../ledger.js";
import type { AgentIdentity, FullAgentStats, Receipt } from "../types.js";
import type { BountyEscrow } from "./bounty-escrow.js";
import type { TipLedger } from "./tip-ledger.js";

export class Registry {
  constructor(
    private readonly ctx: LedgerContext,
    private readonly tips: TipLedger,
    private readonly escrow: BountyEscrow,
  ) {}

  async registerAgent(caller: Identity, name: string, profile: string): Promise<Receipt> {
    ensure(isParticipant(caller), "caller must be a non-zero identity");

    return this.ctx.transact(async (tx) => {
      this.ctx.store.putAgent(caller, { name, profile });
      tx.emit({ type: AGENT_REGISTERED, payload: { agent: caller, name, profile } });
    });
  }

  getAgent(identity: Identity): AgentIdentity {
    return this.ctx.store.agent(identity) ?? { name: "", profile: "" };
  }

  getFullAgentStats(identity: Identity): FullAgentStats {
    const { name, profile } = this.getAgent(identity);
    const tips = this.tips.getAgentStats(identity);
    const bounties = this.escrow.getAgentStats(identity);
    return {
      name,
      profile,
      tipsReceived: tips.totalReceived,
      tipsSent: tips.totalSent,
      tipCount: tips.receivedCount,
      bountiesPosted: bounties.postedCount,
      bountiesClaimed: bounties.claimedCount,
      bountyAmountPosted: bounties.amountPosted,
      bountyAmountEarned: bounties.amountEarned,
    };
  }

  getBalance(identity: Identity): Promise<number> {
    return this.ctx.token.balanceOf(identity);
  }

  getTipsAllowance(identity: Identity): Promise<number> {
    return this.ctx.token.allowance(identity, this.tips.account);
  }

  getBountiesAllowance(identity: Identity): Promise<number> {
    return this.ctx.token.allowance(identity, this.escrow.account);
  }
}
