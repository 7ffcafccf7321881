/**
 * Tip stats: per-identity running totals kept by the tips ledger.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Amount } from "./common.js";

export const TipStatsV1 = Type.Object(
  {
    total_received: Amount,
    total_sent: Amount,
    received_count: Type.Integer({ minimum: 0 }),
  },
  { additionalProperties: false },
);

export type TipStatsV1 = Static<typeof TipStatsV1>;
