/**
 * agentledger events [--type T] [--agent id] [--from seq] [--limit n] [--follow]
 *
 * Print the committed event log. --agent keeps only events that name the
 * identity. --follow keeps polling for new events until interrupted.
 */

import { isLedgerEventType, type Identity } from "@agentledger/protocol";
import type { CliConfig } from "../lib/config.js";
import type { EventsQuery, LedgerClient } from "../lib/http.js";
import type { TokenInfo } from "../lib/responses.js";
import { connect, describeEvent, parseIdentity, parsePositiveInt } from "../lib/session.js";

const DEFAULT_POLL_MS = 2_000;

interface EventsOptions {
  type?: string;
  agent?: string;
  from?: string;
  limit?: string;
  follow?: boolean;
  interval?: string;
  /** Stop following after this many polls (tests). */
  maxPolls?: number;
}

/** Print one page; returns the next seq to ask for. */
async function printPage(
  client: LedgerClient,
  token: TokenInfo,
  query: EventsQuery & { from: number },
): Promise<number> {
  const { events } = await client.events(query);
  let next = query.from;
  for (const e of events) {
    console.log(describeEvent(e, token));
    next = e.seq + 1;
  }
  return next;
}

export async function eventsCommand(config: CliConfig, opts: EventsOptions = {}): Promise<void> {
  if (opts.type !== undefined && !isLedgerEventType(opts.type)) {
    throw new Error(`Unknown event type: ${opts.type}`);
  }
  const agent: Identity | undefined = opts.agent !== undefined ? parseIdentity(opts.agent) : undefined;
  const limit = opts.limit !== undefined ? parsePositiveInt(opts.limit, "limit") : undefined;
  const filter = { limit, type: opts.type, agent };
  let from = opts.from !== undefined ? parsePositiveInt(opts.from, "from") : 1;

  const client = await connect(config);
  const token = await client.token();
  from = await printPage(client, token, { ...filter, from });
  if (!opts.follow) return;

  const intervalMs = opts.interval !== undefined ? parsePositiveInt(opts.interval, "interval") : DEFAULT_POLL_MS;
  for (let polls = 0; opts.maxPolls === undefined || polls < opts.maxPolls; polls++) {
    await new Promise((r) => setTimeout(r, intervalMs));
    from = await printPage(client, token, { ...filter, from });
  }
}
