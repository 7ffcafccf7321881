/**
 * Response shapes of the ledger service, checked on arrival.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  Amount,
  BountyStatsV1,
  BountyV1,
  FullAgentStatsV1,
  Hex32,
  LedgerEventV1,
  TipStatsV1,
} from "@agentledger/protocol";

export const ErrorResponse = Type.Object({ error: Type.String(), detail: Type.Optional(Type.String()) });

export const TokenInfo = Type.Object({
  name: Type.String(),
  symbol: Type.String(),
  decimals: Type.Integer({ minimum: 0 }),
  total_supply: Amount,
  tips_account: Hex32,
  escrow_account: Hex32,
  faucet_enabled: Type.Boolean(),
});
export type TokenInfo = Static<typeof TokenInfo>;

export const BalanceResponse = Type.Object({ identity: Hex32, balance: Amount });
export const AllowanceResponse = Type.Object({ owner: Hex32, spender: Hex32, allowance: Amount });
export const NonceResponse = Type.Object({ identity: Hex32, nonce: Type.Integer({ minimum: 0 }) });

export const MutationResponse = Type.Object({
  ok: Type.Boolean(),
  events: Type.Array(LedgerEventV1),
});
export type MutationResponse = Static<typeof MutationResponse>;

export const CreateBountyResponse = Type.Intersect([
  MutationResponse,
  Type.Object({ bounty_id: Type.Integer({ minimum: 1 }) }),
]);

export const ApproveClaimResponse = Type.Intersect([
  MutationResponse,
  Type.Object({ outcome: Type.Union([Type.Literal("claimed"), Type.Literal("expired")]) }),
]);

export const ApproveResponse = Type.Object({
  ok: Type.Boolean(),
  owner: Hex32,
  spender: Hex32,
  allowance: Amount,
});

export const FaucetResponse = Type.Object({ ok: Type.Boolean(), minted: Amount, balance: Amount });

export const ActiveBountiesResponse = Type.Object({
  offset: Type.Integer({ minimum: 0 }),
  limit: Type.Integer({ minimum: 0 }),
  bounties: Type.Array(BountyV1),
});

export const BountyIdsResponse = Type.Object({
  identity: Hex32,
  bounty_ids: Type.Array(Type.Integer({ minimum: 1 })),
});

// Composite, not Intersect: the V1 schemas forbid additional properties.
export const TipStatsResponse = Type.Composite([Type.Object({ identity: Hex32 }), TipStatsV1]);
export const BountyStatsResponse = Type.Composite([Type.Object({ identity: Hex32 }), BountyStatsV1]);

export const AgentResponse = Type.Composite([
  FullAgentStatsV1,
  Type.Object({ balance: Amount, tips_allowance: Amount, bounties_allowance: Amount }),
]);
export type AgentResponse = Static<typeof AgentResponse>;

export const EventsResponse = Type.Object({
  events: Type.Array(LedgerEventV1),
  count: Type.Integer({ minimum: 0 }),
});

/** Narrow an untrusted body to `schema` or throw. */
export function expectShape<T extends TSchema>(schema: T, data: unknown, what: string): Static<T> {
  if (!Value.Check(schema, data)) {
    const first = Value.Errors(schema, data).First();
    throw new Error(`Unexpected ${what} response${first ? `: ${first.path} ${first.message}` : ""}`);
  }
  return data;
}
