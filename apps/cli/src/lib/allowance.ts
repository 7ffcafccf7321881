/**
 * Client-side convenience: raise an allowance before an operation that
 * needs it. The service itself never approves on anyone's behalf.
 */

import type { Identity } from "@agentledger/protocol";
import type { LedgerClient } from "./http.js";
import type { TokenInfo } from "./responses.js";
import { fmt } from "./session.js";

export async function ensureAllowance(
  client: LedgerClient,
  token: TokenInfo,
  spender: Identity,
  needed: number,
  label: string,
): Promise<boolean> {
  const { allowance } = await client.allowance(client.identity, spender);
  if (allowance >= needed) return false;
  console.log(`  approving ${fmt(needed, token)} for ${label} (allowance ${fmt(allowance, token)})`);
  await client.approve(spender, needed);
  return true;
}
