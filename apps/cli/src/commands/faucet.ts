/**
 * agentledger faucet [amount]
 *
 * Mint whole test tokens to the local identity. Only works against a
 * service with the faucet enabled.
 */

import type { CliConfig } from "../lib/config.js";
import { connect, fmt, parsePositiveInt } from "../lib/session.js";

export const DEFAULT_FAUCET_TOKENS = "1000";

export async function faucetCommand(amountStr: string, config: CliConfig): Promise<void> {
  const whole = parsePositiveInt(amountStr, "amount");
  const client = await connect(config, { signer: true });
  const token = await client.token();
  if (!token.faucet_enabled) {
    throw new Error(`Faucet is disabled on ${config.url}`);
  }

  const result = await client.faucet(whole);
  console.log(`Minted ${fmt(result.minted, token)} to ${client.identity}`);
  console.log(`  balance: ${fmt(result.balance, token)}`);
}
