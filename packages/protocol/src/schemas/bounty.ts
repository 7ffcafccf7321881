/**
 * BountyV1: escrowed reward, released by the poster.
 *
 * Lifecycle: Active → Claimed | Expired | Cancelled (all terminal).
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32, Text, Timestamp } from "./common.js";

export const BountyStatus = Type.Union([
  Type.Literal("Active"),
  Type.Literal("Claimed"),
  Type.Literal("Expired"),
  Type.Literal("Cancelled"),
]);

export type BountyStatus = Static<typeof BountyStatus>;

export const BountyV1 = Type.Object(
  {
    id: Type.Integer({ minimum: 1 }),
    poster: Hex32,
    amount: Amount,
    deadline: Timestamp, // 0 = no deadline
    description: Text,
    external_ref: Text,
    status: BountyStatus,
    claimed_by: Hex32, // zero identity until Claimed
    created_at: Timestamp,
    claimed_at: Timestamp, // 0 until Claimed
  },
  { additionalProperties: false },
);

export type BountyV1 = Static<typeof BountyV1>;

export const BountyStatsV1 = Type.Object(
  {
    posted_count: Type.Integer({ minimum: 0 }),
    claimed_count: Type.Integer({ minimum: 0 }),
    amount_posted: Amount,
    amount_earned: Amount,
  },
  { additionalProperties: false },
);

export type BountyStatsV1 = Static<typeof BountyStatsV1>;
