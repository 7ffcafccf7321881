/**
 * Agent key file: the Ed25519 seed and the public key that serves as the
 * agent's ledger identity.
 *
 *   { "publicKey": "<hex64 identity>", "privateKey": "<hex64 seed>" }
 *
 * On load the public key is re-derived from the seed; a mismatch means the
 * file was edited by hand and every signature would be rejected.
 */

import { readFile, writeFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  Hex32,
  fromHex,
  generateKeypair,
  publicKeyFromSeed,
  toHex,
  type Identity,
} from "@agentledger/protocol";
import { ensureConfigDir } from "./config.js";

const KeyFile = Type.Object({ publicKey: Hex32, privateKey: Hex32 });
export type KeyFile = Static<typeof KeyFile>;

export interface AgentKeys {
  publicKey: Uint8Array;
  privateKey: Uint8Array;
  identity: Identity;
}

export async function loadKeys(keyPath: string): Promise<AgentKeys> {
  let raw: string;
  try {
    raw = await readFile(keyPath, "utf-8");
  } catch {
    throw new Error(`No key file at ${keyPath}\nRun 'agentledger keygen' to generate one.`);
  }

  const data: unknown = JSON.parse(raw);
  if (!Value.Check(KeyFile, data)) {
    throw new Error(`Invalid key file at ${keyPath}: publicKey and privateKey must be 64-char hex`);
  }

  const privateKey = fromHex(data.privateKey);
  const derived = toHex(await publicKeyFromSeed(privateKey));
  if (derived !== data.publicKey) {
    throw new Error(`Invalid key file at ${keyPath}: publicKey does not match privateKey`);
  }

  return { publicKey: fromHex(derived), privateKey, identity: derived };
}

/** Writes owner-readable only. */
export async function generateAndSaveKeys(keyPath: string): Promise<KeyFile> {
  await ensureConfigDir();
  const { publicKey, privateKey } = await generateKeypair();
  const keyFile: KeyFile = { publicKey: toHex(publicKey), privateKey: toHex(privateKey) };
  await writeFile(keyPath, `${JSON.stringify(keyFile, null, 2)}\n`, { encoding: "utf-8", mode: 0o600 });
  return keyFile;
}
