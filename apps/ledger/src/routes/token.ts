/**
 * Token routes: reads, approvals and the test faucet.
 *
 * GET  /token: metadata + contract accounts
 * GET  /token/balance/:identity: balanceOf
 * GET  /token/allowance/:owner/:spender: allowance
 * POST /token/approve: approve (signed)
 * POST /token/faucet: mint whole tokens to the caller (signed, config-gated)
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  ACTION_APPROVE,
  ACTION_FAUCET,
  FAUCET_MAX_WHOLE_TOKENS,
  Hex32,
  IdentityParams,
  LedgerError,
  INVALID_ARGUMENT,
  SignedApprove,
  SignedFaucet,
  ensure,
} from "@agentledger/protocol";
import { authorize, RequestRejected } from "./auth.js";
import type { RouteContext } from "./context.js";

const AllowanceParams = Type.Object({ owner: Hex32, spender: Hex32 });
type AllowanceParams = Static<typeof AllowanceParams>;

export function tokenRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { token } = ctx;
  const { executor, accounts } = ctx.ledger.ctx;

  app.get("/token", async (_request, reply) => {
    return reply.send({
      name: token.metadata.name,
      symbol: token.metadata.symbol,
      decimals: token.metadata.decimals,
      total_supply: await token.totalSupply(),
      tips_account: accounts.tips,
      escrow_account: accounts.escrow,
      faucet_enabled: ctx.faucetEnabled,
    });
  });

  app.get<{ Params: IdentityParams }>(
    "/token/balance/:identity",
    { schema: { params: IdentityParams } },
    async (request, reply) => {
      const { identity } = request.params;
      return reply.send({ identity, balance: await token.balanceOf(identity) });
    },
  );

  app.get<{ Params: AllowanceParams }>(
    "/token/allowance/:owner/:spender",
    { schema: { params: AllowanceParams } },
    async (request, reply) => {
      const { owner, spender } = request.params;
      return reply.send({ owner, spender, allowance: await token.allowance(owner, spender) });
    },
  );

  app.post<{ Body: SignedApprove }>(
    "/token/approve",
    { schema: { body: SignedApprove } },
    async (request, reply) => {
      const body = request.body;
      await authorize(ctx, ACTION_APPROVE, body);

      const ok = await executor.run(() => token.approve(body.caller, body.spender, body.amount));
      if (!ok) {
        throw new LedgerError(INVALID_ARGUMENT, "approve rejected: spender and amount must be valid");
      }
      request.log.info({ owner: body.caller, spender: body.spender, amount: body.amount }, "allowance set");
      return reply.send({ ok: true, owner: body.caller, spender: body.spender, allowance: body.amount });
    },
  );

  app.post<{ Body: SignedFaucet }>(
    "/token/faucet",
    { schema: { body: SignedFaucet } },
    async (request, reply) => {
      if (!ctx.faucetEnabled) {
        throw new RequestRejected(403, "faucet_disabled", "faucet is disabled on this ledger");
      }
      const body = request.body;
      ensure(
        body.amount <= FAUCET_MAX_WHOLE_TOKENS,
        `faucet: max ${FAUCET_MAX_WHOLE_TOKENS} ${token.metadata.symbol} per mint`,
      );
      await authorize(ctx, ACTION_FAUCET, body);

      const minted = await executor.run(() => token.faucet(body.caller, body.amount));
      request.log.info({ to: body.caller, minted }, "faucet mint");
      return reply.send({
        ok: true,
        minted,
        balance: await token.balanceOf(body.caller),
      });
    },
  );
}
