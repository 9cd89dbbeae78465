import { describe, it, expect, afterEach } from "vitest";
import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";
import { makeTempDir } from "../helpers/fixtures.js";

describe("createLogger", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("creates a logger with default level", () => {
    const logger = createLogger();
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    expect(createLogger({ level: "debug", json: true }).level).toBe("debug");
    expect(createLogger({ level: "warn", json: true }).level).toBe("warn");
  });

  it("creates a child logger with the parent level", () => {
    const logger = createLogger({ level: "error", json: true });
    const child = logger.child({ component: "dispatcher" });
    expect(child.level).toBe("error");
  });

  it("writes JSON lines to a file", async () => {
    dir = makeTempDir("toolgate-log-");
    const file = join(dir, "toolgate.log");
    const logger = createLogger({ level: "info", file });
    logger.info({ tool: "add_memory" }, "Tool call completed");
    await new Promise<void>((resolve) => logger.flush(() => resolve()));

    const line: unknown = JSON.parse(readFileSync(file, "utf-8").trim());
    expect(line).toMatchObject({ level: 30, tool: "add_memory", msg: "Tool call completed" });
  });
});

describe("createSilentLogger", () => {
  it("discards everything", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
