/**
 * agentledger stats [identity]
 *
 * Registered name plus tip and bounty totals.
 */

import type { CliConfig } from "../lib/config.js";
import { connect, fmt, resolveIdentity } from "../lib/session.js";

export async function statsCommand(identityArg: string | undefined, config: CliConfig): Promise<void> {
  const identity = await resolveIdentity(config, identityArg);
  const client = await connect(config);
  const [token, a] = await Promise.all([client.token(), client.agent(identity)]);

  console.log(`${a.name || "(unregistered)"}  ${identity}`);
  if (a.profile) console.log(`  ${a.profile}`);
  console.log();
  console.log(`  tips received:    ${fmt(a.tips_received, token)} (${a.tip_count} tips)`);
  console.log(`  tips sent:        ${fmt(a.tips_sent, token)}`);
  console.log(`  bounties posted:  ${a.bounties_posted} (${fmt(a.bounty_amount_posted, token)})`);
  console.log(`  bounties claimed: ${a.bounties_claimed} (${fmt(a.bounty_amount_earned, token)})`);
}
