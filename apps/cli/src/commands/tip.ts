/**
 * agentledger tip <identity> <amount> [--post-ref ref] [--message text]
 * agentledger batch-tip <identity:amount>...
 *
 * Raises the tips allowance first when it is short (disable with
 * --no-approve), then sends.
 */

import { MAX_BATCH_SIZE, type Identity, type TipBody } from "@agentledger/protocol";
import type { CliConfig } from "../lib/config.js";
import { ensureAllowance } from "../lib/allowance.js";
import type { TokenInfo } from "../lib/responses.js";
import { connect, fmt, parseAmount, parseIdentity } from "../lib/session.js";

interface TipOptions {
  postRef?: string;
  message?: string;
  approve?: boolean;
}

interface BatchTipOptions {
  approve?: boolean;
}

export interface BatchEntry {
  to: Identity;
  amount: number;
}

/** "hex:1.5" → { to, amount in base units } */
export function parseBatchEntry(entry: string, token: TokenInfo): BatchEntry {
  const sep = entry.lastIndexOf(":");
  if (sep <= 0) {
    throw new Error(`Invalid batch entry "${entry}": expected <identity>:<amount>`);
  }
  return {
    to: parseIdentity(entry.slice(0, sep)),
    amount: parseAmount(entry.slice(sep + 1), token),
  };
}

export async function tipCommand(
  toArg: string,
  amountStr: string,
  config: CliConfig,
  opts: TipOptions = {},
): Promise<void> {
  const to = parseIdentity(toArg);
  const client = await connect(config, { signer: true });
  const token = await client.token();
  const amount = parseAmount(amountStr, token);

  console.log(`Tipping ${fmt(amount, token)} to ${to}`);
  console.log(`  from: ${client.identity}`);

  if (opts.approve !== false) {
    await ensureAllowance(client, token, token.tips_account, amount, "tips");
  }

  const body: TipBody = { to, amount };
  if (opts.postRef) body.post_ref = opts.postRef;
  if (opts.message) body.message = opts.message;

  const result = await client.tip(body);
  const event = result.events[0];
  console.log();
  console.log(`Sent.${event ? ` event #${event.seq} ${event.id}` : ""}`);
}

export async function batchTipCommand(
  entries: string[],
  config: CliConfig,
  opts: BatchTipOptions = {},
): Promise<void> {
  if (entries.length === 0) throw new Error("batch-tip needs at least one <identity>:<amount>");
  if (entries.length > MAX_BATCH_SIZE) {
    throw new Error(`batch-tip takes at most ${MAX_BATCH_SIZE} recipients, got ${entries.length}`);
  }

  const client = await connect(config, { signer: true });
  const token = await client.token();
  const parsed = entries.map((e) => parseBatchEntry(e, token));
  const total = parsed.reduce((sum, e) => sum + e.amount, 0);

  console.log(`Tipping ${parsed.length} agents, ${fmt(total, token)} total`);
  for (const e of parsed) console.log(`  ${e.to}  ${fmt(e.amount, token)}`);

  if (opts.approve !== false) {
    await ensureAllowance(client, token, token.tips_account, total, "tips");
  }

  const result = await client.batchTip(
    parsed.map((e) => e.to),
    parsed.map((e) => e.amount),
  );
  const event = result.events[0];
  console.log();
  console.log(`Sent.${event ? ` event #${event.seq} ${event.id}` : ""}`);
}
