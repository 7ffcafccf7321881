/**
 * Test fixtures: a ledger app served through app.inject, exposed to the
 * CLI as a fetch implementation. No sockets.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildApp } from "@agentledger/ledger/server";
import { MemoryToken } from "@agentledger/token";
import type { Fetch } from "../src/lib/http.js";

export const LEDGER_URL = "http://ledger.test";

export type LedgerApp = Awaited<ReturnType<typeof buildApp>>;

export function injectFetch(app: LedgerApp): Fetch {
  return async (url, init) => {
    const { pathname, search } = new URL(url);
    const payload = typeof init?.body === "string" ? init.body : undefined;
    const res = await app.inject({
      method: init?.method === "POST" ? "POST" : "GET",
      url: pathname + search,
      headers: payload !== undefined ? { "content-type": "application/json" } : {},
      payload,
    });
    return new Response(res.body, {
      status: res.statusCode,
      headers: { "content-type": "application/json" },
    });
  };
}

export async function startLedger(opts: { faucetEnabled?: boolean } = {}) {
  const token = new MemoryToken();
  const app = await buildApp({ token, logLevel: "silent", faucetEnabled: opts.faucetEnabled ?? true });
  return { app, token, fetch: injectFetch(app) };
}

/** Point the CLI's config dir at a fresh temp dir; returns cleanup. */
export async function isolatedHome(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "agentledger-cli-"));
  const previous = {
    home: process.env["AGENTLEDGER_HOME"],
    url: process.env["AGENTLEDGER_URL"],
    key: process.env["AGENTLEDGER_KEY_PATH"],
  };
  process.env["AGENTLEDGER_HOME"] = dir;
  process.env["AGENTLEDGER_URL"] = LEDGER_URL;
  delete process.env["AGENTLEDGER_KEY_PATH"];

  return {
    dir,
    cleanup: async () => {
      restore("AGENTLEDGER_HOME", previous.home);
      restore("AGENTLEDGER_URL", previous.url);
      restore("AGENTLEDGER_KEY_PATH", previous.key);
      await rm(dir, { recursive: true, force: true });
    },
  };
}

function restore(key: string, value: string | undefined): void {
  if (value === undefined) delete process.env[key];
  else process.env[key] = value;
}
