/**
 * Ed25519 keys, signing and verification (@noble/ed25519, async API).
 *
 * Private keys are 32-byte seeds; public keys double as agent identities.
 */

import { getPublicKeyAsync, signAsync, utils, verifyAsync } from "@noble/ed25519";

export interface Keypair {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

export async function generateKeypair(): Promise<Keypair> {
  const privateKey = utils.randomPrivateKey();
  const publicKey = await getPublicKeyAsync(privateKey);
  return { publicKey, privateKey };
}

export async function publicKeyFromSeed(privateKey: Uint8Array): Promise<Uint8Array> {
  return getPublicKeyAsync(privateKey);
}

export async function ed25519Sign(
  privateKey: Uint8Array,
  message: Uint8Array,
): Promise<Uint8Array> {
  return signAsync(message, privateKey);
}

/** false on any malformed input instead of throwing. */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  try {
    return await verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}
