/**
 * @agentledger/protocol: frozen primitives shared by the ledger, the
 * service and the CLI.
 *
 * No state, no I/O. Everything else in the monorepo imports from here,
 * never the reverse.
 */

export { canonicalEncode, canonicalDecode } from "./canonical.js";
export {
  isIdentity,
  isParticipant,
  hashObject,
  contractIdentity,
  fromHex,
  toHex,
  shortId,
  type Identity,
} from "./identity.js";
export {
  generateKeypair,
  publicKeyFromSeed,
  ed25519Sign,
  ed25519Verify,
  type Keypair,
} from "./ed25519.js";
export {
  requestSigningPayload,
  signRequest,
  verifyRequest,
  type SignedFields,
  type SignedRequest,
} from "./request-signature.js";
export {
  LedgerError,
  isLedgerError,
  ensure,
  INVALID_ARGUMENT,
  NOT_FOUND,
  UNAUTHORIZED,
  INVALID_STATE,
  PRECONDITION_FAILED,
  CUSTODY_TRANSFER_FAILED,
  type LedgerErrorCode,
} from "./errors.js";
export { formatUnits, parseUnits } from "./units.js";

export * from "./schemas/index.js";
export * from "./constants.js";
