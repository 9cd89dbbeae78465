import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { withFileLock } from "../../src/utils/file-lock.js";
import { makeTempDir } from "../helpers/fixtures.js";

describe("withFileLock", () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(() => {
    tempDir = makeTempDir("toolgate-lock-");
    filePath = join(tempDir, "memories.log");
    writeFileSync(filePath, "");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns the function result", async () => {
    expect(await withFileLock(filePath, () => 42)).toBe(42);
  });

  it("awaits async functions", async () => {
    const result = await withFileLock(filePath, async () => {
      await new Promise((r) => setTimeout(r, 10));
      return "hello";
    });
    expect(result).toBe("hello");
  });

  it("removes the lockfile once done", async () => {
    await withFileLock(filePath, () => {
      expect(existsSync(`${filePath}.lock`)).toBe(true);
    });
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });

  it("releases the lock when the function throws", async () => {
    await expect(
      withFileLock(filePath, () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await withFileLock(filePath, () => "after-error")).toBe("after-error");
  });

  it("serializes writers in the same process", async () => {
    const order: string[] = [];

    const slow = withFileLock(filePath, async () => {
      await new Promise((r) => setTimeout(r, 50));
      order.push("slow");
    });
    const fast = withFileLock(filePath, async () => {
      order.push("fast");
    });
    const third = withFileLock(filePath, () => {
      order.push("third");
    });

    await Promise.all([slow, fast, third]);
    expect(order).toEqual(["slow", "fast", "third"]);
  });

  it("keeps the queue moving after a failed writer", async () => {
    const failing = withFileLock(filePath, () => {
      throw new Error("first failed");
    });
    const next = withFileLock(filePath, () => "second ran");

    await expect(failing).rejects.toThrow("first failed");
    expect(await next).toBe("second ran");
  });

  it("does not make different files wait on each other", async () => {
    const other = join(tempDir, "approvals.json");
    writeFileSync(other, "[]");
    const order: string[] = [];

    const slow = withFileLock(filePath, async () => {
      await new Promise((r) => setTimeout(r, 50));
      order.push("memories");
    });
    const fast = withFileLock(other, () => {
      order.push("approvals");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["approvals", "memories"]);
  });
});
