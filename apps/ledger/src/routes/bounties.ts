/**
 * Bounty routes.
 *
 * POST /bounties: post a bounty, escrowing its amount (signed)
 * GET  /bounties/active: claimable bounties, ascending id (?offset&limit)
 * GET  /bounties/:id: one bounty
 * POST /bounties/:id/approve: release to a claimer (signed, poster only)
 * POST /bounties/:id/cancel: refund an Active bounty (signed, poster only)
 * POST /bounties/:id/reclaim: refund an expired bounty (signed, poster only)
 * GET  /bounties/poster/:identity: ids posted by identity
 * GET  /bounties/claimer/:identity: ids claimed by identity
 * GET  /bounties/stats/:identity: per-identity bounty stats
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  ACTION_APPROVE_CLAIM,
  ACTION_CANCEL_BOUNTY,
  ACTION_CREATE_BOUNTY,
  ACTION_RECLAIM_BOUNTY,
  IdentityParams,
  PageQuery,
  SignedApproveClaim,
  SignedBountyAction,
  SignedCreateBounty,
  ensure,
} from "@agentledger/protocol";
import { authorize } from "./auth.js";
import { pageLimit, type RouteContext } from "./context.js";
import { toBountyStatsV1, toBountyV1 } from "./wire.js";

const BountyParams = Type.Object({ id: Type.Integer({ minimum: 0 }) });
type BountyParams = Static<typeof BountyParams>;

/** The signed body names the bounty too; both must agree. */
function matchPath(params: BountyParams, bountyId: number): void {
  ensure(params.id === bountyId, `bounty_id ${bountyId} does not match path id ${params.id}`);
}

export function bountyRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { escrow } = ctx.ledger;

  app.post<{ Body: SignedCreateBounty }>(
    "/bounties",
    { schema: { body: SignedCreateBounty } },
    async (request, reply) => {
      const body = request.body;
      await authorize(ctx, ACTION_CREATE_BOUNTY, body);

      const { result: bountyId, events } = await escrow.createBounty(
        body.caller,
        body.amount,
        body.deadline,
        body.description,
        body.external_ref ?? "",
      );
      return reply.status(201).send({ ok: true, bounty_id: bountyId, events });
    },
  );

  app.get<{ Querystring: PageQuery }>(
    "/bounties/active",
    { schema: { querystring: PageQuery } },
    async (request, reply) => {
      const offset = request.query.offset ?? 0;
      const limit = pageLimit(ctx, request.query.limit);
      const bounties = escrow.getActiveBounties(offset, limit).map(toBountyV1);
      return reply.send({ offset, limit, bounties });
    },
  );

  app.get<{ Params: BountyParams }>(
    "/bounties/:id",
    { schema: { params: BountyParams } },
    async (request, reply) => {
      return reply.send(toBountyV1(escrow.getBounty(request.params.id)));
    },
  );

  app.post<{ Params: BountyParams; Body: SignedApproveClaim }>(
    "/bounties/:id/approve",
    { schema: { params: BountyParams, body: SignedApproveClaim } },
    async (request, reply) => {
      const body = request.body;
      matchPath(request.params, body.bounty_id);
      await authorize(ctx, ACTION_APPROVE_CLAIM, body);

      const { result: outcome, events } = await escrow.approveClaim(
        body.caller,
        body.bounty_id,
        body.claimer,
        body.proof ?? "",
      );
      return reply.send({ ok: true, outcome, events });
    },
  );

  app.post<{ Params: BountyParams; Body: SignedBountyAction }>(
    "/bounties/:id/cancel",
    { schema: { params: BountyParams, body: SignedBountyAction } },
    async (request, reply) => {
      const body = request.body;
      matchPath(request.params, body.bounty_id);
      await authorize(ctx, ACTION_CANCEL_BOUNTY, body);

      const { events } = await escrow.cancelBounty(body.caller, body.bounty_id);
      return reply.send({ ok: true, events });
    },
  );

  app.post<{ Params: BountyParams; Body: SignedBountyAction }>(
    "/bounties/:id/reclaim",
    { schema: { params: BountyParams, body: SignedBountyAction } },
    async (request, reply) => {
      const body = request.body;
      matchPath(request.params, body.bounty_id);
      await authorize(ctx, ACTION_RECLAIM_BOUNTY, body);

      const { events } = await escrow.claimExpired(body.caller, body.bounty_id);
      return reply.send({ ok: true, events });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/bounties/poster/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, bounty_ids: escrow.getPosterBounties(identity) });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/bounties/claimer/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, bounty_ids: escrow.getClaimerBounties(identity) });
    },
  );

  app.get<{ Params: IdentityParams }>(
    "/bounties/stats/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, ...toBountyStatsV1(escrow.getAgentStats(identity)) });
    },
  );
}
