/**
 * Ledger constants.
 *
 * FROZEN values change the meaning of stored state or signatures.
 * TUNABLE values only bound request sizes and can move between releases.
 */

// ── Frozen ─────────────────────────────────────────────────────────
/** All-zero identity. Never a valid sender, recipient, poster or claimer. */
export const ZERO_IDENTITY = "0".repeat(64);

/** Contract account labels; identities derive from these (see contractIdentity). */
export const TIPS_CONTRACT = "tips.v1";
export const ESCROW_CONTRACT = "escrow.v1";

export const TOKEN_DECIMALS = 6;
export const TOKEN_SYMBOL = "tUSD";
export const TOKEN_NAME = "Test USD";

/** "No deadline" sentinel for bounties. */
export const NO_DEADLINE = 0;

// ── Tunable ────────────────────────────────────────────────────────
/** Upper bound on recipients in one batch tip. */
export const MAX_BATCH_SIZE = 50;

/** Faucet mints at most this many whole tokens per call. */
export const FAUCET_MAX_WHOLE_TOKENS = 10_000;

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 100;

/** Max length for free-form text fields (messages, descriptions, proofs, refs). */
export const MAX_TEXT_LENGTH = 4_096;
export const MAX_NAME_LENGTH = 64;

// ── Event types ────────────────────────────────────────────────────
export const TIP_SENT = "TipSent" as const;
export const BATCH_TIP_SENT = "BatchTipSent" as const;
export const BOUNTY_CREATED = "BountyCreated" as const;
export const BOUNTY_CLAIMED = "BountyClaimed" as const;
export const BOUNTY_CANCELLED = "BountyCancelled" as const;
export const BOUNTY_EXPIRED = "BountyExpired" as const;
export const AGENT_REGISTERED = "AgentRegistered" as const;

// ── Signed request actions ─────────────────────────────────────────
export const ACTION_APPROVE = "token.approve" as const;
export const ACTION_FAUCET = "token.faucet" as const;
export const ACTION_TIP = "tip" as const;
export const ACTION_BATCH_TIP = "tip.batch" as const;
export const ACTION_CREATE_BOUNTY = "bounty.create" as const;
export const ACTION_APPROVE_CLAIM = "bounty.approve" as const;
export const ACTION_CANCEL_BOUNTY = "bounty.cancel" as const;
export const ACTION_RECLAIM_BOUNTY = "bounty.reclaim" as const;
export const ACTION_REGISTER_AGENT = "agent.register" as const;
