/**
 * GET /health: liveness plus a few counters.
 */

import type { FastifyInstance } from "fastify";
import type { RouteContext } from "./context.js";

export function healthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  app.get("/health", async (_request, reply) => {
    const { ctx: ledger } = ctx.ledger;
    return reply.send({
      status: "ok",
      timestamp: ledger.clock(),
      events: ledger.events.count(),
      bounties: ledger.store.lastBountyId(),
      agents: ledger.store.agentCount(),
    });
  });
}
