/**
 * agentledger keygen [--force]
 *
 * New Ed25519 keypair at the configured key path. The public key is the
 * agent's identity on the ledger.
 */

import { existsSync } from "node:fs";
import type { CliConfig } from "../lib/config.js";
import { generateAndSaveKeys } from "../lib/keys.js";

export async function keygenCommand(config: CliConfig, opts: { force?: boolean }): Promise<void> {
  if (existsSync(config.keyPath) && !opts.force) {
    throw new Error(
      `Key file already exists at ${config.keyPath}\nUse --force to replace it (the old identity is lost).`,
    );
  }

  const { publicKey } = await generateAndSaveKeys(config.keyPath);
  console.log(`New identity: ${publicKey}`);
  console.log(`  key file:   ${config.keyPath}`);
  console.log();
  console.log(`Next: 'agentledger faucet' for test tokens, 'agentledger register <name>' to set a name.`);
}
