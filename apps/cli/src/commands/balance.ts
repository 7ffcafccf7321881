/**
 * agentledger balance [identity]
 *
 * Token balance plus the allowances the tips and escrow accounts hold.
 */

import type { CliConfig } from "../lib/config.js";
import { connect, fmt, resolveIdentity } from "../lib/session.js";

export async function balanceCommand(identityArg: string | undefined, config: CliConfig): Promise<void> {
  const identity = await resolveIdentity(config, identityArg);
  const client = await connect(config);
  const [token, agent] = await Promise.all([client.token(), client.agent(identity)]);

  console.log(`${identity}`);
  console.log(`  balance:             ${fmt(agent.balance, token)}`);
  console.log(`  tips allowance:      ${fmt(agent.tips_allowance, token)}`);
  console.log(`  bounties allowance:  ${fmt(agent.bounties_allowance, token)}`);
}
