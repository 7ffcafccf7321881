import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { DEFAULT_URL, getConfigPath, loadConfig } from "../src/lib/config.js";
import { generateAndSaveKeys, loadKeys } from "../src/lib/keys.js";
import { configCommand } from "../src/commands/config-cmd.js";
import { isolatedHome } from "./helpers.js";

let dir: string;
let cleanup: () => Promise<void>;

beforeEach(async () => {
  ({ dir, cleanup } = await isolatedHome());
  delete process.env["AGENTLEDGER_URL"];
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await cleanup();
});

describe("config", () => {
  it("falls back to defaults without a config file", async () => {
    const config = await loadConfig();
    expect(config.url).toBe(DEFAULT_URL);
    expect(config.keyPath).toBe(join(dir, "key.json"));
  });

  it("persists --url without its trailing slash", async () => {
    await configCommand({ url: "http://other.test/" });
    expect(getConfigPath()).toBe(join(dir, "config.json"));
    expect((await loadConfig()).url).toBe("http://other.test");
  });

  it("lets the environment override the file", async () => {
    await configCommand({ url: "http://other.test" });
    process.env["AGENTLEDGER_URL"] = "http://env.test";
    expect((await loadConfig()).url).toBe("http://env.test");
  });

  it("rejects a config file of the wrong shape", async () => {
    await writeFile(getConfigPath(), JSON.stringify({ url: 42 }));
    await expect(loadConfig()).rejects.toThrow(`Invalid config file at ${getConfigPath()}`);
  });
});

describe("keys", () => {
  it("round-trips a generated key file", async () => {
    const keyPath = join(dir, "key.json");
    const saved = await generateAndSaveKeys(keyPath);
    const keys = await loadKeys(keyPath);
    expect(keys.identity).toBe(saved.publicKey);
    expect(keys.privateKey).toHaveLength(32);
  });

  it("rejects a key file whose public key does not match its seed", async () => {
    const keyPath = join(dir, "key.json");
    const saved = await generateAndSaveKeys(keyPath);
    await writeFile(keyPath, JSON.stringify({ ...saved, publicKey: "ab".repeat(32) }));
    await expect(loadKeys(keyPath)).rejects.toThrow(
      `Invalid key file at ${keyPath}: publicKey does not match privateKey`,
    );
  });

  it("explains how to create a missing key", async () => {
    const keyPath = join(dir, "missing.json");
    await expect(loadKeys(keyPath)).rejects.toThrow(
      `No key file at ${keyPath}\nRun 'agentledger keygen' to generate one.`,
    );
  });
});
