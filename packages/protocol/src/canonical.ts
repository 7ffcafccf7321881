/**
 * Canonical serialization: deterministic CBOR encoding.
 *
 * Used for everything that gets hashed or signed: event ids, contract
 * account identities, signed request payloads.
 *
 * Rules:
 *   1. Keys sorted lexicographically at every depth
 *   2. Integers only (amounts and timestamps are safe integers)
 *   3. Same object → identical bytes
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of entries) {
      // undefined fields are dropped so optional keys sign the same either way
      if (inner === undefined) continue;
      sorted[key] = sortKeys(inner);
    }
    return sorted;
  }
  return value;
}

/** Sort keys, then CBOR encode. The only encoding used for hashing and signing. */
export function canonicalEncode(value: unknown): Uint8Array {
  return encoder.encode(sortKeys(value));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
