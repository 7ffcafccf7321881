/**
 * Ledger server: HTTP surface over the tips ledger, bounty escrow and
 * agent registry, all sharing one in-memory store and token.
 *
 * Routes:
 *   GET  /health: liveness + counters
 *   GET  /token: token metadata + contract accounts
 *   GET  /token/balance/:identity: balanceOf
 *   GET  /token/allowance/:owner/:spender
 *   POST /token/approve: set an allowance (signed)
 *   POST /token/faucet: mint test tokens (signed, config-gated)
 *   POST /tips, /tips/batch: tip (signed)
 *   GET  /tips/stats/:identity
 *   POST /bounties: create (signed)
 *   GET  /bounties/active, /bounties/:id
 *   POST /bounties/:id/{approve,cancel,reclaim} (signed, poster only)
 *   GET  /bounties/{poster,claimer,stats}/:identity
 *   POST /agents/register (signed)
 *   GET  /agents/:identity, /agents/:identity/nonce
 *   GET  /events: committed event log
 *
 * Errors: { error, detail }. Ledger error codes map to fixed statuses.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError } from "fastify";
import {
  CUSTODY_TRANSFER_FAILED,
  INVALID_ARGUMENT,
  INVALID_STATE,
  NOT_FOUND,
  PRECONDITION_FAILED,
  UNAUTHORIZED,
  isLedgerError,
  type LedgerErrorCode,
} from "@agentledger/protocol";
import { MemoryToken } from "@agentledger/token";
import { config } from "./config.js";
import { createLedger } from "./index.js";
import { EventLog } from "./event-log/writer.js";
import type { LedgerStore } from "./store.js";
import type { Clock } from "./types.js";
import { NonceStore } from "./views/nonce-store.js";
import { RequestRejected } from "./routes/auth.js";
import type { RouteContext } from "./routes/context.js";
import { healthRoutes } from "./routes/health.js";
import { tokenRoutes } from "./routes/token.js";
import { tipRoutes } from "./routes/tips.js";
import { bountyRoutes } from "./routes/bounties.js";
import { agentRoutes } from "./routes/agents.js";
import { eventRoutes } from "./routes/events.js";

export const ERROR_STATUS: Record<LedgerErrorCode, number> = {
  [INVALID_ARGUMENT]: 422,
  [NOT_FOUND]: 404,
  [UNAUTHORIZED]: 403,
  [INVALID_STATE]: 409,
  [PRECONDITION_FAILED]: 412,
  [CUSTODY_TRANSFER_FAILED]: 402,
};

export interface LedgerServerDeps {
  token?: MemoryToken;
  store?: LedgerStore;
  clock?: Clock;
  nonces?: NonceStore;
  faucetEnabled?: boolean;
  /** pino level; "silent" in tests. */
  logLevel?: string;
}

export async function buildApp(deps?: LedgerServerDeps) {
  const app = Fastify({ logger: { level: deps?.logLevel ?? config.logLevel } });

  const token = deps?.token ?? new MemoryToken();
  const events = new EventLog({
    onListenerError: (err, event) => app.log.error({ err, seq: event.seq }, "event listener failed"),
  });
  const ledger = createLedger({ token, store: deps?.store, clock: deps?.clock, events });

  const ctx: RouteContext = {
    ledger,
    token,
    nonces: deps?.nonces ?? new NonceStore(),
    faucetEnabled: deps?.faucetEnabled ?? config.faucetEnabled,
    pageLimits: { default: config.defaultPageLimit, max: config.maxPageLimit },
  };

  const unsubscribe = ledger.ctx.events.subscribe((event) => {
    app.log.info({ seq: event.seq, type: event.type, id: event.id }, "ledger event");
  });
  app.addHook("onClose", async () => {
    unsubscribe();
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (isLedgerError(err)) {
      return reply
        .status(ERROR_STATUS[err.code])
        .send({ error: err.code.toLowerCase(), detail: err.message });
    }
    if (err instanceof RequestRejected) {
      return reply.status(err.statusCode).send({ error: err.error, detail: err.message });
    }
    if (err.validation) {
      return reply.status(400).send({ error: "invalid_request", detail: err.message });
    }
    request.log.error({ err }, "unhandled error");
    const status = err.statusCode ?? 500;
    return reply
      .status(status)
      .send({ error: status >= 500 ? "internal_error" : "bad_request", detail: err.message });
  });

  healthRoutes(app, ctx);
  tokenRoutes(app, ctx);
  tipRoutes(app, ctx);
  bountyRoutes(app, ctx);
  agentRoutes(app, ctx);
  eventRoutes(app, ctx);

  app.log.info(
    { tips: ledger.ctx.accounts.tips, escrow: ledger.ctx.accounts.escrow, faucet: ctx.faucetEnabled },
    "ledger ready",
  );

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── ledger config ───");
  console.log(`  listen:         ${config.host}:${config.port}`);
  console.log(`  log_level:      ${config.logLevel}`);
  console.log(`  faucet:         ${config.faucetEnabled ? "enabled" : "disabled"}`);
  console.log(`  page_limit:     ${config.defaultPageLimit} (max ${config.maxPageLimit})`);
  console.log("─────────────────────");

  const app = await buildApp();

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
