import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadConfig, loadToolRegistry, substituteEnv } from "../../src/config/loader.js";
import { parseConfig } from "../../src/config/schema.js";
import { ConfigurationError } from "../../src/errors.js";
import { makeTempDir } from "../helpers/fixtures.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_TOKEN"] = "test-secret";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_TOKEN"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("key: ${env:TEST_TOKEN}")).toBe("key: test-secret");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_TOKEN}:${env:TEST_PORT}")).toBe("test-secret:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow("Missing environment variable: MISSING_VAR");
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("fills defaults", () => {
    const config = parseConfig({});
    expect(config.execution).toEqual({
      mode: "single_pass",
      taggedCalls: true,
      maxToolRounds: 5,
      defaultTimeoutSeconds: 30,
      timeoutCeilingSeconds: 300,
    });
    expect(config.inference.turnAttempts).toBe(1);
    expect(config.server).toEqual({ port: 19890, hostname: "127.0.0.1" });
    expect(config.tools).toEqual({});
    expect(config.audit.enabled).toBe(true);
  });

  it("fills registry entry defaults", () => {
    const config = parseConfig({ tools: { command_exec: { enabled: true } } });
    expect(config.tools["command_exec"]).toEqual({ enabled: true, requiresApproval: false, whitelist: [] });
  });

  it("rejects an unknown execution mode with the offending path", () => {
    expect(() => parseConfig({ execution: { mode: "triple_pass" } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ execution: { mode: "triple_pass" } })).toThrow(/execution\.mode/);
  });

  it("rejects a memory instance without a directory", () => {
    expect(() => parseConfig({ memories: { main: { enabled: true } } })).toThrow(/memories\.main\.directory/);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("toolgate-config-");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env["TOOLGATE_TEST_KEY"];
  });

  it("uses defaults when the file does not exist", () => {
    expect(loadConfig(join(dir, "missing.json")).execution.mode).toBe("single_pass");
  });

  it("substitutes env vars before parsing", () => {
    process.env["TOOLGATE_TEST_KEY"] = "test-secret";
    const path = join(dir, "toolgate.config.json");
    writeFileSync(path, JSON.stringify({ inference: { apiKey: "${env:TOOLGATE_TEST_KEY}" } }));
    expect(loadConfig(path).inference.apiKey).toBe("test-secret");
  });

  it("reports malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ nope");
    expect(() => loadConfig(path)).toThrow(`Malformed JSON in ${path}`);
  });

  it("merges registry files named relative to the config file", () => {
    writeFileSync(
      join(dir, "tools.json"),
      JSON.stringify({ tools: [{ name: "command_exec", enabled: true, whitelist: ["echo"] }] }),
    );
    writeFileSync(
      join(dir, "memories.json"),
      JSON.stringify({ memories: [{ name: "main", enabled: true, directory: "./mem" }] }),
    );
    const path = join(dir, "toolgate.config.json");
    writeFileSync(
      path,
      JSON.stringify({
        tools: { command_exec: { enabled: false }, file_access: { enabled: true, whitelist: ["docs/"] } },
        registries: { tools: "tools.json", memories: "memories.json" },
      }),
    );

    const config = loadConfig(path);
    expect(config.tools["command_exec"]).toMatchObject({ enabled: true, whitelist: ["echo"] });
    expect(config.tools["file_access"]).toMatchObject({ enabled: true });
    expect(config.memories["main"]).toEqual({ enabled: true, directory: "./mem", maxEntries: 10_000 });
  });

  it("reports a missing registry file", () => {
    const path = join(dir, "toolgate.config.json");
    writeFileSync(path, JSON.stringify({ registries: { tools: "absent.json" } }));
    expect(() => loadConfig(path)).toThrow(`Missing tool registry file: ${join(dir, "absent.json")}`);
  });
});

describe("loadToolRegistry", () => {
  it("reports invalid entries", () => {
    const dir = makeTempDir("toolgate-registry-file-");
    try {
      const path = join(dir, "tools.json");
      writeFileSync(path, JSON.stringify({ tools: [{ name: "command_exec", whitelist: "echo" }] }));
      expect(() => loadToolRegistry(path)).toThrow(/^Invalid tool registry .*tools\.0\.whitelist/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
