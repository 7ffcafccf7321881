/**
 * Per-command setup: config → (keys) → client, plus token display info.
 */

import { formatUnits, parseUnits, shortId, type Identity, type LedgerEventV1 } from "@agentledger/protocol";
import type { CliConfig } from "./config.js";
import { LedgerClient, type Fetch } from "./http.js";
import { loadKeys } from "./keys.js";
import type { TokenInfo } from "./responses.js";

/** Test seam: route requests somewhere other than the network. */
let fetchOverride: Fetch | undefined;

export function setFetch(fetchImpl: Fetch | undefined): void {
  fetchOverride = fetchImpl;
}

export async function connect(config: CliConfig, opts: { signer?: boolean } = {}): Promise<LedgerClient> {
  const keys = opts.signer ? await loadKeys(config.keyPath) : undefined;
  return new LedgerClient(config.url.replace(/\/+$/, ""), keys, fetchOverride);
}

/** Identity argument or, when omitted, the local key's identity. */
export async function resolveIdentity(config: CliConfig, identity?: string): Promise<Identity> {
  if (identity !== undefined) return parseIdentity(identity);
  return (await loadKeys(config.keyPath)).identity;
}

export function parseIdentity(value: string): Identity {
  const v = value.toLowerCase();
  if (!/^[0-9a-f]{64}$/.test(v)) {
    throw new Error(`Invalid identity: must be 64-char hex. Got: ${value}`);
  }
  return v;
}

export function parsePositiveInt(value: string, what: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new Error(`Invalid ${what}: must be a positive integer. Got: ${value}`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, what: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new Error(`Invalid ${what}: must be a non-negative integer. Got: ${value}`);
  }
  return n;
}

/** Decimal token string → positive base units. */
export function parseAmount(value: string, token: TokenInfo): number {
  const units = parseUnits(value, token.decimals);
  if (units <= 0) throw new Error(`Invalid amount: must be greater than zero. Got: ${value}`);
  return units;
}

export function fmt(amount: number, token: TokenInfo): string {
  return `${formatUnits(amount, token.decimals)} ${token.symbol}`;
}

/** One-line description of a committed event. */
export function describeEvent(e: LedgerEventV1, token: TokenInfo): string {
  const head = `#${e.seq} ${new Date(e.timestamp).toISOString()} ${e.type}`;
  switch (e.type) {
    case "TipSent":
      return `${head} ${shortId(e.payload.from)} → ${shortId(e.payload.to)} ${fmt(e.payload.amount, token)}${
        e.payload.message ? ` "${e.payload.message}"` : ""
      }`;
    case "BatchTipSent":
      return `${head} ${shortId(e.payload.from)} → ${e.payload.recipients.length} agents ${fmt(e.payload.total_amount, token)}`;
    case "BountyCreated":
      return `${head} #${e.payload.bounty_id} by ${shortId(e.payload.poster)} ${fmt(e.payload.amount, token)} "${e.payload.description}"`;
    case "BountyClaimed":
      return `${head} #${e.payload.bounty_id} → ${shortId(e.payload.claimer)} ${fmt(e.payload.amount, token)}`;
    case "BountyCancelled":
    case "BountyExpired":
      return `${head} #${e.payload.bounty_id} refunded ${fmt(e.payload.amount_returned, token)} to ${shortId(e.payload.poster)}`;
    case "AgentRegistered":
      return `${head} ${shortId(e.payload.agent)} as "${e.payload.name}"`;
  }
}
