/**
 * Schema barrel export.
 */

export { Hex32, Amount, Timestamp, Text } from "./common.js";
export { TipStatsV1 } from "./tip.js";
export { BountyV1, BountyStatus, BountyStatsV1 } from "./bounty.js";
export { AgentProfileV1, FullAgentStatsV1 } from "./agent.js";
export {
  LedgerEventV1,
  LedgerEventBody,
  TipSentPayload,
  BatchTipSentPayload,
  BountyCreatedPayload,
  BountyClaimedPayload,
  BountyRefundPayload,
  AgentRegisteredPayload,
  LEDGER_EVENT_TYPES,
  isLedgerEventType,
  eventParticipants,
  eventInvolves,
  type LedgerEventType,
} from "./event.js";
export {
  SignedApprove,
  SignedFaucet,
  SignedTip,
  SignedBatchTip,
  SignedCreateBounty,
  SignedApproveClaim,
  SignedBountyAction,
  SignedRegisterAgent,
  PageQuery,
  EventQuery,
  IdentityParams,
  type ApproveBody,
  type FaucetBody,
  type TipBody,
  type BatchTipBody,
  type CreateBountyBody,
  type ApproveClaimBody,
  type BountyActionBody,
  type RegisterAgentBody,
} from "./request.js";
