/**
 * agentledger register <name> [--profile text]
 *
 * Set the display name and profile for the local identity. Re-running
 * overwrites both.
 */

import { MAX_NAME_LENGTH, MAX_TEXT_LENGTH } from "@agentledger/protocol";
import type { CliConfig } from "../lib/config.js";
import { connect } from "../lib/session.js";

interface RegisterOptions {
  profile?: string;
}

export async function registerCommand(name: string, config: CliConfig, opts: RegisterOptions = {}): Promise<void> {
  const profile = opts.profile ?? "";
  if (name.length > MAX_NAME_LENGTH) {
    throw new Error(`Name too long: ${name.length} > ${MAX_NAME_LENGTH} characters`);
  }
  if (profile.length > MAX_TEXT_LENGTH) {
    throw new Error(`Profile too long: ${profile.length} > ${MAX_TEXT_LENGTH} characters`);
  }

  const client = await connect(config, { signer: true });
  await client.register(name, profile);
  console.log(`Registered ${client.identity} as "${name}"`);
}
