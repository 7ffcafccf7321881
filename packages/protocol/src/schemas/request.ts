/**
 * HTTP request bodies. Mutating requests are signed (see request-signature.ts);
 * the Signed* schemas add caller, nonce and sig to the operation fields.
 */

import { Type, type Static, type TObject, type TProperties } from "@sinclair/typebox";
import { Amount, Hex32, Text, Timestamp } from "./common.js";
import { MAX_BATCH_SIZE, MAX_NAME_LENGTH, MAX_TEXT_LENGTH } from "../constants.js";

function signed<T extends TProperties>(fields: T) {
  return Type.Object(
    {
      ...fields,
      caller: Hex32,
      nonce: Type.Integer({ minimum: 1 }),
      sig: Type.String({ minLength: 1 }),
    },
    { additionalProperties: false },
  );
}

export const ApproveFields = {
  spender: Hex32,
  amount: Amount,
};

export const FaucetFields = {
  amount: Type.Integer({ minimum: 1 }), // whole tokens
};

export const TipFields = {
  to: Hex32,
  amount: Amount,
  post_ref: Type.Optional(Text),
  message: Type.Optional(Text),
};

export const BatchTipFields = {
  // length bounds are enforced by the ledger so the error code stays INVALID_ARGUMENT
  recipients: Type.Array(Hex32, { maxItems: MAX_BATCH_SIZE * 4 }),
  amounts: Type.Array(Amount, { maxItems: MAX_BATCH_SIZE * 4 }),
};

export const CreateBountyFields = {
  amount: Amount,
  deadline: Timestamp,
  description: Text,
  external_ref: Type.Optional(Text),
};

export const ApproveClaimFields = {
  bounty_id: Type.Integer({ minimum: 0 }),
  claimer: Hex32,
  proof: Type.Optional(Text),
};

export const BountyActionFields = {
  bounty_id: Type.Integer({ minimum: 0 }),
};

export const RegisterAgentFields = {
  name: Type.String({ maxLength: MAX_NAME_LENGTH }),
  profile: Type.String({ maxLength: MAX_TEXT_LENGTH }),
};

export const SignedApprove = signed(ApproveFields);
export const SignedFaucet = signed(FaucetFields);
export const SignedTip = signed(TipFields);
export const SignedBatchTip = signed(BatchTipFields);
export const SignedCreateBounty = signed(CreateBountyFields);
export const SignedApproveClaim = signed(ApproveClaimFields);
export const SignedBountyAction = signed(BountyActionFields);
export const SignedRegisterAgent = signed(RegisterAgentFields);

export type SignedApprove = Static<typeof SignedApprove>;
export type SignedFaucet = Static<typeof SignedFaucet>;
export type SignedTip = Static<typeof SignedTip>;
export type SignedBatchTip = Static<typeof SignedBatchTip>;
export type SignedCreateBounty = Static<typeof SignedCreateBounty>;
export type SignedApproveClaim = Static<typeof SignedApproveClaim>;
export type SignedBountyAction = Static<typeof SignedBountyAction>;
export type SignedRegisterAgent = Static<typeof SignedRegisterAgent>;

/** Unsigned operation fields, as the CLI builds them before signing. */
export type ApproveBody = Static<TObject<typeof ApproveFields>>;
export type FaucetBody = Static<TObject<typeof FaucetFields>>;
export type TipBody = Static<TObject<typeof TipFields>>;
export type BatchTipBody = Static<TObject<typeof BatchTipFields>>;
export type CreateBountyBody = Static<TObject<typeof CreateBountyFields>>;
export type ApproveClaimBody = Static<TObject<typeof ApproveClaimFields>>;
export type BountyActionBody = Static<TObject<typeof BountyActionFields>>;
export type RegisterAgentBody = Static<TObject<typeof RegisterAgentFields>>;

export const PageQuery = Type.Object({
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
  limit: Type.Optional(Type.Integer({ minimum: 0 })),
});

export type PageQuery = Static<typeof PageQuery>;

export const EventQuery = Type.Object({
  from: Type.Optional(Type.Integer({ minimum: 1 })),
  limit: Type.Optional(Type.Integer({ minimum: 1 })),
  type: Type.Optional(Type.String()),
  agent: Type.Optional(Hex32),
});

export type EventQuery = Static<typeof EventQuery>;

export const IdentityParams = Type.Object({ identity: Hex32 });
export type IdentityParams = Static<typeof IdentityParams>;
