/**
 * agentledger approve <tips|bounties> <amount>
 *
 * Set the allowance one of the ledger accounts may pull from you.
 * Overwrites the previous allowance; 0 revokes it.
 */

import { parseUnits, type Identity } from "@agentledger/protocol";
import type { CliConfig } from "../lib/config.js";
import type { TokenInfo } from "../lib/responses.js";
import { connect, fmt } from "../lib/session.js";

export type SpenderName = "tips" | "bounties";

export function spenderAccount(name: string, token: TokenInfo): Identity {
  switch (name) {
    case "tips":
      return token.tips_account;
    case "bounties":
      return token.escrow_account;
    default:
      throw new Error(`Unknown spender "${name}": expected tips or bounties`);
  }
}

export async function approveCommand(spenderName: string, amountStr: string, config: CliConfig): Promise<void> {
  const client = await connect(config, { signer: true });
  const token = await client.token();
  const spender = spenderAccount(spenderName, token);
  const amount = parseUnits(amountStr, token.decimals);

  const result = await client.approve(spender, amount);
  console.log(`Approved ${fmt(result.allowance, token)} for ${spenderName} (${spender})`);
}
