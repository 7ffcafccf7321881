/**
 * GET /events: committed ledger events, ascending seq.
 *   ?from=<seq>   first seq to return (default 1)
 *   ?limit=<n>    page size (capped)
 *   ?type=<Type>  only events of one type
 *   ?agent=<id>   only events naming this identity
 */

import type { FastifyInstance } from "fastify";
import { EventQuery, ensure, isLedgerEventType } from "@agentledger/protocol";
import { pageLimit, type RouteContext } from "./context.js";

export function eventRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const log = ctx.ledger.ctx.events;

  app.get<{ Querystring: EventQuery }>(
    "/events",
    { schema: { querystring: EventQuery } },
    async (request, reply) => {
      const from = request.query.from ?? 1;
      const limit = pageLimit(ctx, request.query.limit ?? ctx.pageLimits.max);
      const { type, agent } = request.query;
      if (type !== undefined) ensure(isLedgerEventType(type), `unknown event type: ${type}`);

      const events = log.query({ fromSeq: from, limit, type, agent });

      return reply.send({ events, count: log.count() });
    },
  );
}
