/**
 * Signed requests: every mutating call carries the caller's signature.
 *
 *   sig = Ed25519_sign(sk, canonical({ action, ...body }))   (base64)
 *
 * `body` holds the operation fields plus `caller` (the signer's public key)
 * and `nonce` (strictly increasing per caller, enforced by the service).
 * `action` binds the signature to one operation so a signed tip can never
 * be replayed as, say, a bounty cancellation.
 */

import { canonicalEncode } from "./canonical.js";
import { ed25519Sign, ed25519Verify } from "./ed25519.js";
import { fromHex, isIdentity, type Identity } from "./identity.js";

export interface SignedFields {
  caller: Identity;
  nonce: number;
}

export type SignedRequest<T extends object> = T & SignedFields & { sig: string };

export function requestSigningPayload(action: string, body: object): Uint8Array {
  return canonicalEncode({ ...body, action });
}

export async function signRequest<T extends object>(
  privateKey: Uint8Array,
  action: string,
  body: T & SignedFields,
): Promise<SignedRequest<T>> {
  const sig = await ed25519Sign(privateKey, requestSigningPayload(action, body));
  return { ...body, sig: Buffer.from(sig).toString("base64") };
}

/**
 * Verify a signed request. The `sig` field is stripped before re-encoding.
 */
export async function verifyRequest<T extends object>(
  action: string,
  request: SignedRequest<T>,
): Promise<boolean> {
  const { sig, ...body } = request;
  if (!sig || !isIdentity(request.caller)) return false;

  const sigBytes = Buffer.from(sig, "base64");
  if (sigBytes.length !== 64) return false;

  return ed25519Verify(
    fromHex(request.caller),
    new Uint8Array(sigBytes),
    requestSigningPayload(action, body),
  );
}
