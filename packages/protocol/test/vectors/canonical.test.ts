/**
 * Canonical encoding + hashing vectors.
 */

import { describe, it, expect } from "vitest";
import { canonicalEncode, canonicalDecode } from "../../src/canonical.js";
import { contractIdentity, hashObject, isIdentity, isParticipant, shortId } from "../../src/identity.js";
import { ESCROW_CONTRACT, TIPS_CONTRACT, ZERO_IDENTITY } from "../../src/constants.js";

describe("canonicalEncode", () => {
  it("key order does not change the bytes", () => {
    const a = canonicalEncode({ b: 2, a: 1, nested: { y: "y", x: "x" } });
    const b = canonicalEncode({ nested: { x: "x", y: "y" }, a: 1, b: 2 });
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(true);
  });

  it("undefined fields encode like absent fields", () => {
    const withUndefined = canonicalEncode({ a: 1, b: undefined });
    const without = canonicalEncode({ a: 1 });
    expect(Buffer.from(withUndefined).equals(Buffer.from(without))).toBe(true);
  });

  it("decodes back with sorted keys", () => {
    const decoded = canonicalDecode(canonicalEncode({ z: 1, a: [3, 2] }));
    expect(decoded).toEqual({ a: [3, 2], z: 1 });
    expect(typeof decoded === "object" && decoded !== null ? Object.keys(decoded) : []).toEqual(["a", "z"]);
  });
});

describe("identities", () => {
  it("hashObject is 64-char hex and key-order independent", () => {
    const h = hashObject({ x: 1, y: 2 });
    expect(h).toMatch(/^[0-9a-f]{64}$/);
    expect(hashObject({ y: 2, x: 1 })).toBe(h);
  });

  it("contract identities are distinct valid participants", () => {
    const tips = contractIdentity(TIPS_CONTRACT);
    const escrow = contractIdentity(ESCROW_CONTRACT);
    expect(tips).not.toBe(escrow);
    expect(isParticipant(tips)).toBe(true);
    expect(isParticipant(escrow)).toBe(true);
    expect(contractIdentity(TIPS_CONTRACT)).toBe(tips);
  });

  it("zero identity is well-formed but not a participant", () => {
    expect(isIdentity(ZERO_IDENTITY)).toBe(true);
    expect(isParticipant(ZERO_IDENTITY)).toBe(false);
  });

  it("rejects uppercase, short and non-string identities", () => {
    expect(isIdentity("AA".repeat(32))).toBe(false);
    expect(isIdentity("aa".repeat(31))).toBe(false);
    expect(isIdentity(42)).toBe(false);
  });

  it("shortId keeps head and tail", () => {
    expect(shortId("ab".repeat(32))).toBe("abababab..abab");
  });
});
