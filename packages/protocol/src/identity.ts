/**
 * Identities and hashing.
 *
 * identity      = 64-char lowercase hex (Ed25519 public key for agents)
 * contract id   = SHA256(canonical({ contract: label }))
 * object hash   = SHA256(canonical(obj))
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";
import { ZERO_IDENTITY } from "./constants.js";

/** 32-byte hex-encoded account reference. */
export type Identity = string;

const HEX32 = /^[0-9a-f]{64}$/;

/** Well-formed 64-char lowercase hex. Says nothing about zero-ness. */
export function isIdentity(value: unknown): value is Identity {
  return typeof value === "string" && HEX32.test(value);
}

/** Well-formed and not the zero identity. */
export function isParticipant(value: unknown): value is Identity {
  return isIdentity(value) && value !== ZERO_IDENTITY;
}

/** SHA256 of a canonically-encoded object → hex. */
export function hashObject(obj: unknown): string {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

/** Deterministic identity for a contract account (tips ledger, escrow). */
export function contractIdentity(label: string): Identity {
  return hashObject({ contract: label });
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/** First 8 and last 4 hex chars, for logs and CLI output. */
export function shortId(identity: Identity): string {
  return `${identity.slice(0, 8)}..${identity.slice(-4)}`;
}
