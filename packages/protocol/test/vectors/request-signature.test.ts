/**
 * Signed request vectors: sign + verify, action binding, tampering.
 */

import { describe, it, expect } from "vitest";
import { generateKeypair, toHex, signRequest, verifyRequest } from "../../src/index.js";

describe("signRequest + verifyRequest", () => {
  it("round-trip: sign then verify succeeds", async () => {
    const kp = await generateKeypair();
    const caller = toHex(kp.publicKey);
    const signed = await signRequest(kp.privateKey, "tip", {
      to: "bb".repeat(32),
      amount: 100,
      caller,
      nonce: 1,
    });

    expect(signed.sig.length).toBeGreaterThan(0);
    expect(await verifyRequest("tip", signed)).toBe(true);
  });

  it("signature is bound to the action", async () => {
    const kp = await generateKeypair();
    const signed = await signRequest(kp.privateKey, "bounty.cancel", {
      bounty_id: 1,
      caller: toHex(kp.publicKey),
      nonce: 1,
    });
    expect(await verifyRequest("bounty.reclaim", signed)).toBe(false);
  });

  it("tampered field → verification fails", async () => {
    const kp = await generateKeypair();
    const signed = await signRequest(kp.privateKey, "tip", {
      to: "bb".repeat(32),
      amount: 100,
      caller: toHex(kp.publicKey),
      nonce: 1,
    });
    expect(await verifyRequest("tip", { ...signed, amount: 1_000 })).toBe(false);
    expect(await verifyRequest("tip", { ...signed, nonce: 2 })).toBe(false);
  });

  it("caller that did not sign → verification fails", async () => {
    const signer = await generateKeypair();
    const other = await generateKeypair();
    const signed = await signRequest(signer.privateKey, "agent.register", {
      name: "a",
      profile: "",
      caller: toHex(other.publicKey),
      nonce: 7,
    });
    expect(await verifyRequest("agent.register", signed)).toBe(false);
  });

  it("empty or short sig → verification fails", async () => {
    const kp = await generateKeypair();
    const body = { caller: toHex(kp.publicKey), nonce: 1 };
    expect(await verifyRequest("tip", { ...body, sig: "" })).toBe(false);
    expect(await verifyRequest("tip", { ...body, sig: "AAAA" })).toBe(false);
  });
});
