/**
 * agentledger bounty <create|list|view|award|cancel|reclaim>
 *
 * Deadlines are entered in hours from now and sent as ms timestamps;
 * omitting --hours posts a bounty that never expires.
 */

import {
  NO_DEADLINE,
  type ApproveClaimBody,
  type BountyV1,
  type CreateBountyBody,
} from "@agentledger/protocol";
import type { CliConfig } from "../lib/config.js";
import { ensureAllowance } from "../lib/allowance.js";
import type { TokenInfo } from "../lib/responses.js";
import {
  connect,
  fmt,
  parseAmount,
  parseIdentity,
  parseNonNegativeInt,
  parsePositiveInt,
  resolveIdentity,
} from "../lib/session.js";

const HOUR_MS = 3_600_000;

interface CreateOptions {
  hours?: string;
  ref?: string;
  approve?: boolean;
}

interface ListOptions {
  offset?: string;
  limit?: string;
  mine?: boolean;
  claimed?: boolean;
}

interface AwardOptions {
  proof?: string;
}

/** Hours from `now` → absolute deadline; undefined → no deadline. */
export function deadlineFromHours(hours: string | undefined, now: number): number {
  if (hours === undefined) return NO_DEADLINE;
  const h = Number(hours);
  if (!Number.isFinite(h) || h <= 0) {
    throw new Error(`Invalid --hours: must be a positive number. Got: ${hours}`);
  }
  return now + Math.round(h * HOUR_MS);
}

export function describeBounty(b: BountyV1, token: TokenInfo): string[] {
  const lines = [
    `#${b.id} ${b.status}  ${fmt(b.amount, token)}`,
    `  ${b.description}`,
    `  poster:   ${b.poster}`,
    `  deadline: ${b.deadline === NO_DEADLINE ? "none" : new Date(b.deadline).toISOString()}`,
  ];
  if (b.external_ref) lines.push(`  ref:      ${b.external_ref}`);
  if (b.status === "Claimed") {
    lines.push(`  claimed:  ${b.claimed_by} at ${new Date(b.claimed_at).toISOString()}`);
  }
  return lines;
}

export async function bountyCreateCommand(
  amountStr: string,
  description: string,
  config: CliConfig,
  opts: CreateOptions = {},
): Promise<void> {
  const client = await connect(config, { signer: true });
  const token = await client.token();
  const amount = parseAmount(amountStr, token);
  const deadline = deadlineFromHours(opts.hours, Date.now());

  if (opts.approve !== false) {
    await ensureAllowance(client, token, token.escrow_account, amount, "bounties");
  }

  const body: CreateBountyBody = { amount, deadline, description };
  if (opts.ref) body.external_ref = opts.ref;

  const result = await client.createBounty(body);
  console.log(`Posted bounty #${result.bounty_id}: ${fmt(amount, token)} held in escrow`);
  if (deadline !== NO_DEADLINE) console.log(`  deadline: ${new Date(deadline).toISOString()}`);
}

export async function bountyListCommand(config: CliConfig, opts: ListOptions = {}): Promise<void> {
  const client = await connect(config);
  const token = await client.token();

  if (opts.mine || opts.claimed) {
    const identity = await resolveIdentity(config);
    const { bounty_ids } = opts.claimed
      ? await client.claimerBounties(identity)
      : await client.posterBounties(identity);
    if (bounty_ids.length === 0) {
      console.log(opts.claimed ? "No claimed bounties." : "No posted bounties.");
      return;
    }
    for (const id of bounty_ids) {
      console.log(describeBounty(await client.bounty(id), token).join("\n"));
    }
    return;
  }

  const offset = parseNonNegativeInt(opts.offset ?? "0", "offset");
  const limit = parsePositiveInt(opts.limit ?? "10", "limit");
  const page = await client.activeBounties(offset, limit);
  if (page.bounties.length === 0) {
    console.log("No open bounties.");
    return;
  }
  for (const b of page.bounties) console.log(describeBounty(b, token).join("\n"));
}

export async function bountyViewCommand(idStr: string, config: CliConfig): Promise<void> {
  const id = parsePositiveInt(idStr, "bounty id");
  const client = await connect(config);
  const [token, bounty] = await Promise.all([client.token(), client.bounty(id)]);
  console.log(describeBounty(bounty, token).join("\n"));
}

export async function bountyAwardCommand(
  idStr: string,
  claimerArg: string,
  config: CliConfig,
  opts: AwardOptions = {},
): Promise<void> {
  const bountyId = parsePositiveInt(idStr, "bounty id");
  const claimer = parseIdentity(claimerArg);
  const client = await connect(config, { signer: true });
  const token = await client.token();

  const body: ApproveClaimBody = { bounty_id: bountyId, claimer };
  if (opts.proof) body.proof = opts.proof;

  const result = await client.approveClaim(body);
  const bounty = await client.bounty(bountyId);
  if (result.outcome === "expired") {
    console.log(`Bounty #${bountyId} had expired; ${fmt(bounty.amount, token)} refunded to you instead.`);
  } else {
    console.log(`Bounty #${bountyId} awarded: ${fmt(bounty.amount, token)} → ${claimer}`);
  }
}

export async function bountyCancelCommand(idStr: string, config: CliConfig): Promise<void> {
  const bountyId = parsePositiveInt(idStr, "bounty id");
  const client = await connect(config, { signer: true });
  const token = await client.token();
  await client.cancelBounty(bountyId);
  const bounty = await client.bounty(bountyId);
  console.log(`Bounty #${bountyId} cancelled; ${fmt(bounty.amount, token)} refunded.`);
}

export async function bountyReclaimCommand(idStr: string, config: CliConfig): Promise<void> {
  const bountyId = parsePositiveInt(idStr, "bounty id");
  const client = await connect(config, { signer: true });
  const token = await client.token();
  await client.reclaimBounty(bountyId);
  const bounty = await client.bounty(bountyId);
  console.log(`Bounty #${bountyId} reclaimed after expiry; ${fmt(bounty.amount, token)} refunded.`);
}
