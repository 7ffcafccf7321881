/**
 * Ledger service configuration.
 */

import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from "@agentledger/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("LEDGER_PORT", "3200"), 10),
  host: env("LEDGER_HOST", "0.0.0.0"),
  /** pino level for the Fastify logger. */
  logLevel: env("LEDGER_LOG_LEVEL", "info"),
  /** Expose POST /token/faucet. Default: true (the token is a test token). */
  faucetEnabled: env("FAUCET_ENABLED", "true") === "true",
  /** Page size when a list query omits `limit`. */
  defaultPageLimit: parseInt(env("DEFAULT_PAGE_LIMIT", String(DEFAULT_PAGE_LIMIT)), 10),
  /** Upper bound on `limit` for list queries. */
  maxPageLimit: parseInt(env("MAX_PAGE_LIMIT", String(MAX_PAGE_LIMIT)), 10),
} as const;
