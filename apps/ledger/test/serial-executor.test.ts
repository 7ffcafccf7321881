/**
 * Serial executor: ordering and failure isolation.
 */

import { describe, it, expect } from "vitest";
import { createSerialExecutor } from "../src/serial-executor.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("createSerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = createSerialExecutor();
    const log: string[] = [];

    const task = (name: string, ms: number) => async () => {
      log.push(`start ${name}`);
      await delay(ms);
      log.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      executor.run(task("a", 20)),
      executor.run(task("b", 1)),
      executor.run(task("c", 5)),
    ]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(log).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
  });

  it("rejects only the failing task's caller", async () => {
    const executor = createSerialExecutor();
    const first = executor.run(async () => {
      throw new Error("boom");
    });
    const second = executor.run(async () => 2);

    await expect(first).rejects.toThrow("boom");
    await expect(second).resolves.toBe(2);
  });

  it("tracks pending tasks and drains", async () => {
    const executor = createSerialExecutor();
    void executor.run(() => delay(5));
    void executor.run(() => delay(5));
    expect(executor.pending()).toBe(2);
    await executor.idle();
    expect(executor.pending()).toBe(0);
  });
});
