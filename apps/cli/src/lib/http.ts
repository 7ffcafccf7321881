/**
 * HTTP client for the ledger service.
 *
 * Thin wrapper around fetch: JSON in, schema-checked JSON out. Non-2xx
 * responses become LedgerHttpError carrying the service's error code.
 * Mutations are signed here; the nonce is read from the service first.
 */

import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  ACTION_APPROVE,
  ACTION_APPROVE_CLAIM,
  ACTION_BATCH_TIP,
  ACTION_CANCEL_BOUNTY,
  ACTION_CREATE_BOUNTY,
  ACTION_FAUCET,
  ACTION_RECLAIM_BOUNTY,
  ACTION_REGISTER_AGENT,
  ACTION_TIP,
  BountyV1,
  signRequest,
  type ApproveClaimBody,
  type CreateBountyBody,
  type Identity,
  type TipBody,
} from "@agentledger/protocol";
import type { AgentKeys } from "./keys.js";
import {
  ActiveBountiesResponse,
  AgentResponse,
  AllowanceResponse,
  ApproveClaimResponse,
  ApproveResponse,
  BalanceResponse,
  BountyIdsResponse,
  BountyStatsResponse,
  CreateBountyResponse,
  ErrorResponse,
  EventsResponse,
  FaucetResponse,
  MutationResponse,
  NonceResponse,
  TipStatsResponse,
  TokenInfo,
  expectShape,
} from "./responses.js";

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

export type Fetch = (url: string, init?: RequestInit) => Promise<Response>;

export class LedgerHttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    detail: string,
  ) {
    super(`${detail} (${code}, HTTP ${status})`);
    this.name = "LedgerHttpError";
  }
}

export interface EventsQuery {
  from?: number;
  limit?: number;
  type?: string;
  /** Only events naming this identity. */
  agent?: Identity;
}

export class LedgerClient {
  private readonly fetchImpl: Fetch;

  constructor(
    private readonly baseUrl: string,
    private readonly keys?: AgentKeys,
    fetchImpl?: Fetch,
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  get identity(): Identity {
    return this.requireKeys().identity;
  }

  // ── reads ────────────────────────────────────────────────────────

  token() {
    return this.get(TokenInfo, "/token");
  }

  balance(identity: Identity) {
    return this.get(BalanceResponse, `/token/balance/${identity}`);
  }

  allowance(owner: Identity, spender: Identity) {
    return this.get(AllowanceResponse, `/token/allowance/${owner}/${spender}`);
  }

  nonce(identity: Identity) {
    return this.get(NonceResponse, `/agents/${identity}/nonce`);
  }

  agent(identity: Identity) {
    return this.get(AgentResponse, `/agents/${identity}`);
  }

  tipStats(identity: Identity) {
    return this.get(TipStatsResponse, `/tips/stats/${identity}`);
  }

  bountyStats(identity: Identity) {
    return this.get(BountyStatsResponse, `/bounties/stats/${identity}`);
  }

  bounty(id: number) {
    return this.get(BountyV1, `/bounties/${id}`);
  }

  activeBounties(offset: number, limit: number) {
    return this.get(ActiveBountiesResponse, `/bounties/active?offset=${offset}&limit=${limit}`);
  }

  posterBounties(identity: Identity) {
    return this.get(BountyIdsResponse, `/bounties/poster/${identity}`);
  }

  claimerBounties(identity: Identity) {
    return this.get(BountyIdsResponse, `/bounties/claimer/${identity}`);
  }

  events(query: EventsQuery = {}) {
    const params = new URLSearchParams();
    if (query.from !== undefined) params.set("from", String(query.from));
    if (query.limit !== undefined) params.set("limit", String(query.limit));
    if (query.type !== undefined) params.set("type", query.type);
    if (query.agent !== undefined) params.set("agent", query.agent);
    const qs = params.toString();
    return this.get(EventsResponse, qs ? `/events?${qs}` : "/events");
  }

  // ── signed mutations ─────────────────────────────────────────────

  approve(spender: Identity, amount: number) {
    return this.send(ApproveResponse, "/token/approve", ACTION_APPROVE, { spender, amount });
  }

  faucet(wholeTokens: number) {
    return this.send(FaucetResponse, "/token/faucet", ACTION_FAUCET, { amount: wholeTokens });
  }

  tip(body: TipBody) {
    return this.send(MutationResponse, "/tips", ACTION_TIP, body);
  }

  batchTip(recipients: Identity[], amounts: number[]) {
    return this.send(MutationResponse, "/tips/batch", ACTION_BATCH_TIP, { recipients, amounts });
  }

  createBounty(body: CreateBountyBody) {
    return this.send(CreateBountyResponse, "/bounties", ACTION_CREATE_BOUNTY, body);
  }

  approveClaim(body: ApproveClaimBody) {
    return this.send(
      ApproveClaimResponse,
      `/bounties/${body.bounty_id}/approve`,
      ACTION_APPROVE_CLAIM,
      body,
    );
  }

  cancelBounty(bountyId: number) {
    return this.send(MutationResponse, `/bounties/${bountyId}/cancel`, ACTION_CANCEL_BOUNTY, {
      bounty_id: bountyId,
    });
  }

  reclaimBounty(bountyId: number) {
    return this.send(MutationResponse, `/bounties/${bountyId}/reclaim`, ACTION_RECLAIM_BOUNTY, {
      bounty_id: bountyId,
    });
  }

  register(name: string, profile: string) {
    return this.send(MutationResponse, "/agents/register", ACTION_REGISTER_AGENT, { name, profile });
  }

  // ── transport ────────────────────────────────────────────────────

  private requireKeys(): AgentKeys {
    if (!this.keys) throw new Error("This command needs a key. Run 'agentledger keygen' first.");
    return this.keys;
  }

  private async send<T extends TSchema>(
    schema: T,
    path: string,
    action: string,
    fields: object,
  ): Promise<Static<T>> {
    const keys = this.requireKeys();
    const { nonce } = await this.nonce(keys.identity);
    const body = await signRequest(keys.privateKey, action, {
      ...fields,
      caller: keys.identity,
      nonce: nonce + 1,
    });
    return this.request(schema, path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  private get<T extends TSchema>(schema: T, path: string): Promise<Static<T>> {
    return this.request(schema, path, { method: "GET" });
  }

  private async request<T extends TSchema>(
    schema: T,
    path: string,
    init: RequestInit,
  ): Promise<Static<T>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }

    const text = await res.text();
    let data: unknown = undefined;
    if (text.length > 0) {
      try {
        data = JSON.parse(text);
      } catch {
        throw new Error(`${init.method ?? "GET"} ${path} → ${res.status}: ${text}`);
      }
    }

    if (!res.ok) {
      if (Value.Check(ErrorResponse, data)) {
        throw new LedgerHttpError(res.status, data.error, data.detail ?? data.error);
      }
      throw new Error(`${init.method ?? "GET"} ${path} → ${res.status}: ${text}`);
    }
    return expectShape(schema, data, `${init.method ?? "GET"} ${path}`);
  }
}
