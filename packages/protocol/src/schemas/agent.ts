/**
 * Agent identity (display name + profile reference) and the composite
 * stats view the registry serves.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount, Hex32 } from "./common.js";
import { MAX_NAME_LENGTH, MAX_TEXT_LENGTH } from "../constants.js";

export const AgentProfileV1 = Type.Object(
  {
    name: Type.String({ maxLength: MAX_NAME_LENGTH }),
    profile: Type.String({ maxLength: MAX_TEXT_LENGTH }),
  },
  { additionalProperties: false },
);

export type AgentProfileV1 = Static<typeof AgentProfileV1>;

export const FullAgentStatsV1 = Type.Object(
  {
    agent: Hex32,
    name: Type.String(),
    profile: Type.String(),
    tips_received: Amount,
    tips_sent: Amount,
    tip_count: Type.Integer({ minimum: 0 }),
    bounties_posted: Type.Integer({ minimum: 0 }),
    bounties_claimed: Type.Integer({ minimum: 0 }),
    bounty_amount_posted: Amount,
    bounty_amount_earned: Amount,
  },
  { additionalProperties: false },
);

export type FullAgentStatsV1 = Static<typeof FullAgentStatsV1>;
