/**
 * Agent routes.
 *
 * POST /agents/register: set display name + profile (signed)
 * GET  /agents/:identity: composite stats, balance and allowances
 * GET  /agents/:identity/nonce: last accepted request nonce
 */

import type { FastifyInstance } from "fastify";
import { ACTION_REGISTER_AGENT, IdentityParams, SignedRegisterAgent } from "@agentledger/protocol";
import { authorize } from "./auth.js";
import type { RouteContext } from "./context.js";
import { toFullAgentStatsV1 } from "./wire.js";

export function agentRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { registry } = ctx.ledger;

  app.post<{ Body: SignedRegisterAgent }>(
    "/agents/register",
    { schema: { body: SignedRegisterAgent } },
    async (request, reply) => {
      const body = request.body;
      await authorize(ctx, ACTION_REGISTER_AGENT, body);

      const { events } = await registry.registerAgent(body.caller, body.name, body.profile);
      return reply.send({ ok: true, events });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/agents/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      const [balance, tipsAllowance, bountiesAllowance] = await Promise.all([
        registry.getBalance(identity),
        registry.getTipsAllowance(identity),
        registry.getBountiesAllowance(identity),
      ]);
      return reply.send({
        ...toFullAgentStatsV1(identity, registry.getFullAgentStats(identity)),
        balance,
        tips_allowance: tipsAllowance,
        bounties_allowance: bountiesAllowance,
      });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/agents/:identity/nonce",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, nonce: ctx.nonces.current(identity) });
    },
  );
}
