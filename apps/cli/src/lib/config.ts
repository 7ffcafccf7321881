/**
 * CLI configuration: loads from ~/.agentledger/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 * AGENTLEDGER_HOME moves the whole config directory (tests, multiple agents).
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Ledger service base URL. */
  url: string;
  keyPath: string;
}

const FileConfig = Type.Partial(
  Type.Object({
    url: Type.String(),
    keyPath: Type.String(),
  }),
);

export const DEFAULT_URL = "http://localhost:3200";

export function getConfigDir(): string {
  return process.env["AGENTLEDGER_HOME"] ?? join(homedir(), ".agentledger");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

export function getDefaultKeyPath(): string {
  return join(getConfigDir(), "key.json");
}

export async function ensureConfigDir(): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
}

async function readFileConfig(): Promise<{ url?: string; keyPath?: string }> {
  let raw: string;
  try {
    raw = await readFile(getConfigPath(), "utf-8");
  } catch {
    return {}; // no config file yet
  }
  const data: unknown = JSON.parse(raw);
  if (!Value.Check(FileConfig, data)) {
    throw new Error(`Invalid config file at ${getConfigPath()}`);
  }
  return data;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  const file = await readFileConfig();
  return {
    url: process.env["AGENTLEDGER_URL"] ?? file.url ?? DEFAULT_URL,
    keyPath: process.env["AGENTLEDGER_KEY_PATH"] ?? file.keyPath ?? getDefaultKeyPath(),
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await ensureConfigDir();
  await writeFile(getConfigPath(), JSON.stringify(config, null, 2) + "\n", "utf-8");
}
