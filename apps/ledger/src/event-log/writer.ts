/**
 * Event log writer: in-memory append-only store.
 *
 * Components never append directly: they stage event bodies on the
 * transaction, and ledger.ts commits them here only after the whole
 * operation succeeded. Anyone holding the log can replay it.
 */

import {
  eventInvolves,
  hashObject,
  type Identity,
  type LedgerEventBody,
  type LedgerEventType,
  type LedgerEventV1,
} from "@agentledger/protocol";

export type EventListener = (event: LedgerEventV1) => void;

export interface EventFilter {
  fromSeq?: number;
  limit?: number;
  type?: LedgerEventType;
  /** Only events naming this identity as sender, recipient, poster, claimer or registrant. */
  agent?: Identity;
}

export interface EventLogOptions {
  /** Called when a subscriber throws. Default: console.error. */
  onListenerError?: (error: unknown, event: LedgerEventV1) => void;
}

/** Event id = SHA256(canonical({ type, seq, timestamp, payload })). */
export function computeEventId(
  seq: number,
  timestamp: number,
  body: LedgerEventBody,
): string {
  return hashObject({ type: body.type, seq, timestamp, payload: body.payload });
}

export class EventLog {
  private readonly events: LedgerEventV1[] = [];
  private readonly listeners = new Set<EventListener>();
  private readonly onListenerError: (error: unknown, event: LedgerEventV1) => void;

  constructor(options: EventLogOptions = {}) {
    this.onListenerError =
      options.onListenerError ??
      ((err, event) => console.error(`[event-log] listener failed on seq ${event.seq}:`, err));
  }

  /**
   * Append a batch of bodies sharing one timestamp, then notify subscribers.
   * Returns the committed events.
   */
  commit(timestamp: number, bodies: readonly LedgerEventBody[]): LedgerEventV1[] {
    const committed: LedgerEventV1[] = [];
    for (const body of bodies) {
      const seq = this.events.length + 1;
      const event: LedgerEventV1 = {
        seq,
        id: computeEventId(seq, timestamp, body),
        timestamp,
        ...body,
      };
      this.events.push(event);
      committed.push(event);
    }
    for (const event of committed) this.notify(event);
    return committed;
  }

  /** Events with seq >= fromSeq, ascending, at most `limit`. */
  list(fromSeq: number = 1, limit?: number): LedgerEventV1[] {
    const start = Math.max(0, fromSeq - 1);
    const end = limit === undefined ? undefined : start + limit;
    return this.events.slice(start, end);
  }

  /** Events with seq >= fromSeq matching every given filter, ascending, at most `limit`. */
  query(filter: EventFilter): LedgerEventV1[] {
    const { fromSeq = 1, limit, type, agent } = filter;
    const out: LedgerEventV1[] = [];
    for (let i = Math.max(0, fromSeq - 1); i < this.events.length; i++) {
      if (limit !== undefined && out.length >= limit) break;
      const event = this.events[i];
      if (!event) break;
      if (type !== undefined && event.type !== type) continue;
      if (agent !== undefined && !eventInvolves(event, agent)) continue;
      out.push(event);
    }
    return out;
  }

  byType(type: LedgerEventType): LedgerEventV1[] {
    return this.events.filter((e) => e.type === type);
  }

  count(): number {
    return this.events.length;
  }

  /** Returns the unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(event: LedgerEventV1): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.onListenerError(err, event);
      }
    }
  }
}
