/**
 * Ledger events: the durable record for indexers.
 *
 * Messages, post refs and proofs live only here. Each committed event gets
 * a sequence number and an id = SHA256(canonical({ type, seq, timestamp, payload })).
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32, Text, Timestamp } from "./common.js";
import {
  AGENT_REGISTERED,
  BATCH_TIP_SENT,
  BOUNTY_CANCELLED,
  BOUNTY_CLAIMED,
  BOUNTY_CREATED,
  BOUNTY_EXPIRED,
  TIP_SENT,
} from "../constants.js";

const BountyId = Type.Integer({ minimum: 1 });

export const TipSentPayload = Type.Object({
  from: Hex32,
  to: Hex32,
  amount: Amount,
  post_ref: Text,
  message: Text,
});

export const BatchTipSentPayload = Type.Object({
  from: Hex32,
  recipients: Type.Array(Hex32),
  amounts: Type.Array(Amount),
  total_amount: Amount,
});

export const BountyCreatedPayload = Type.Object({
  bounty_id: BountyId,
  poster: Hex32,
  amount: Amount,
  deadline: Timestamp,
  description: Text,
  external_ref: Text,
});

export const BountyClaimedPayload = Type.Object({
  bounty_id: BountyId,
  poster: Hex32,
  claimer: Hex32,
  amount: Amount,
  proof: Text,
});

/** Shared by BountyCancelled and BountyExpired. */
export const BountyRefundPayload = Type.Object({
  bounty_id: BountyId,
  poster: Hex32,
  amount_returned: Amount,
});

export const AgentRegisteredPayload = Type.Object({
  agent: Hex32,
  name: Type.String(),
  profile: Type.String(),
});

export const LedgerEventBody = Type.Union([
  Type.Object({ type: Type.Literal(TIP_SENT), payload: TipSentPayload }),
  Type.Object({ type: Type.Literal(BATCH_TIP_SENT), payload: BatchTipSentPayload }),
  Type.Object({ type: Type.Literal(BOUNTY_CREATED), payload: BountyCreatedPayload }),
  Type.Object({ type: Type.Literal(BOUNTY_CLAIMED), payload: BountyClaimedPayload }),
  Type.Object({ type: Type.Literal(BOUNTY_CANCELLED), payload: BountyRefundPayload }),
  Type.Object({ type: Type.Literal(BOUNTY_EXPIRED), payload: BountyRefundPayload }),
  Type.Object({ type: Type.Literal(AGENT_REGISTERED), payload: AgentRegisteredPayload }),
]);

export type LedgerEventBody = Static<typeof LedgerEventBody>;
export type LedgerEventType = LedgerEventBody["type"];

export const LedgerEventV1 = Type.Intersect([
  Type.Object({
    seq: Type.Integer({ minimum: 1 }),
    id: Hex32,
    timestamp: Timestamp,
  }),
  LedgerEventBody,
]);

export type LedgerEventV1 = Static<typeof LedgerEventV1>;

export type TipSentPayload = Static<typeof TipSentPayload>;
export type BatchTipSentPayload = Static<typeof BatchTipSentPayload>;
export type BountyCreatedPayload = Static<typeof BountyCreatedPayload>;
export type BountyClaimedPayload = Static<typeof BountyClaimedPayload>;
export type BountyRefundPayload = Static<typeof BountyRefundPayload>;
export type AgentRegisteredPayload = Static<typeof AgentRegisteredPayload>;

export const LEDGER_EVENT_TYPES = [
  TIP_SENT,
  BATCH_TIP_SENT,
  BOUNTY_CREATED,
  BOUNTY_CLAIMED,
  BOUNTY_CANCELLED,
  BOUNTY_EXPIRED,
  AGENT_REGISTERED,
] as const satisfies readonly LedgerEventType[];

export function isLedgerEventType(value: string): value is LedgerEventType {
  return LEDGER_EVENT_TYPES.some((t) => t === value);
}

/** Identities named by an event: senders, recipients, posters, claimers, registrants. */
export function eventParticipants(body: LedgerEventBody): string[] {
  switch (body.type) {
    case TIP_SENT:
      return [body.payload.from, body.payload.to];
    case BATCH_TIP_SENT:
      return [body.payload.from, ...body.payload.recipients];
    case BOUNTY_CREATED:
    case BOUNTY_CANCELLED:
    case BOUNTY_EXPIRED:
      return [body.payload.poster];
    case BOUNTY_CLAIMED:
      return [body.payload.poster, body.payload.claimer];
    case AGENT_REGISTERED:
      return [body.payload.agent];
  }
}

export function eventInvolves(body: LedgerEventBody, identity: string): boolean {
  return eventParticipants(body).includes(identity);
}
