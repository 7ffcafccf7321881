/**
 * Tip routes.
 *
 * POST /tips: tip one agent (signed)
 * POST /tips/batch: tip up to MAX_BATCH_SIZE agents at once (signed)
 * GET  /tips/stats/:identity: running totals
 */

import type { FastifyInstance } from "fastify";
import {
  ACTION_BATCH_TIP,
  ACTION_TIP,
  IdentityParams,
  SignedBatchTip,
  SignedTip,
} from "@agentledger/protocol";
import { authorize } from "./auth.js";
import type { RouteContext } from "./context.js";
import { toTipStatsV1 } from "./wire.js";

export function tipRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { tips } = ctx.ledger;

  app.post<{ Body: SignedTip }>(
    "/tips",
    { schema: { body: SignedTip } },
    async (request, reply) => {
      const body = request.body;
      await authorize(ctx, ACTION_TIP, body);

      const { events } = await tips.tip(
        body.caller,
        body.to,
        body.amount,
        body.post_ref ?? "",
        body.message ?? "",
      );
      return reply.status(201).send({ ok: true, events });
    },
  );

  app.post<{ Body: SignedBatchTip }>(
    "/tips/batch",
    { schema: { body: SignedBatchTip } },
    async (request, reply) => {
      const body = request.body;
      await authorize(ctx, ACTION_BATCH_TIP, body);

      const { events } = await tips.batchTip(body.caller, body.recipients, body.amounts);
      return reply.status(201).send({ ok: true, events });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/tips/stats/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, ...toTipStatsV1(tips.getAgentStats(identity)) });
    },
  );
}
