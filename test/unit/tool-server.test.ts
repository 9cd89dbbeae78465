import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync } from "node:fs";
import { createSilentLogger } from "../../src/logging/logger.js";
import { createRuntime, type Runtime } from "../../src/runtime/bootstrap.js";
import { ToolServer } from "../../src/server/tool-server.js";
import { makeConfig, makeMemoryConfig, makeTempDir } from "../helpers/fixtures.js";
import { ScriptedInference } from "../helpers/mock-inference.js";

function jsonBody(value: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(value),
  };
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== "object" || body === null) throw new Error("response is not an object");
  return Object.fromEntries(Object.entries(body));
}

describe("ToolServer", () => {
  let dir: string;
  let runtime: Runtime;
  let server: ToolServer;

  const request = (path: string, init?: RequestInit) => server.fetchApp.request(path, init);

  beforeEach(() => {
    dir = makeTempDir("toolgate-server-");
    runtime = createRuntime({
      config: makeMemoryConfig(
        dir,
        {},
        {
          tools: {
            command_exec: { enabled: true, whitelist: ["echo", "chmod"], rootDirectory: dir },
          },
        },
      ),
      stateDir: dir,
      logger: createSilentLogger(),
      inference: new ScriptedInference({}),
    });
    server = new ToolServer({ runtime });
  });

  afterEach(async () => {
    await runtime.close();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("GET /health", () => {
    it("reports mode, tools and the memory instance", async () => {
      const res = await request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        mode: "single_pass",
        tools: [
          "add_memory",
          "search_memories",
          "get_memory",
          "update_memory",
          "delete_memory",
          "get_memory_stats",
          "command_exec",
        ],
        memory: "main",
      });
    });
  });

  describe("POST /classify", () => {
    it("labels a message", async () => {
      const res = await request("/classify", jsonBody({ message: "Remember that my name is Matt" }));
      expect(await res.json()).toEqual({ operationType: "WRITE" });
    });

    it("rejects a body without a message", async () => {
      const res = await request("/classify", jsonBody({ text: "hello" }));
      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({ error: "Invalid request" });
    });

    it("rejects a body that is not JSON", async () => {
      const res = await request("/classify", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });
      expect(res.status).toBe(400);
    });
  });

  describe("POST /plan", () => {
    it("plans a write in dual_pass_write_only", async () => {
      const res = await request("/plan", jsonBody({ message: "Remember that my name is Matt", mode: "dual_pass_write_only" }));
      expect(await res.json()).toEqual({
        operationType: "WRITE",
        mode: "dual_pass_write_only",
        passCount: 2,
        streamFirstPass: true,
        toolsEnabledInPass: [false, true],
      });
    });

    it("uses the configured mode and tools by default", async () => {
      const res = await request("/plan", jsonBody({ operationType: "READ" }));
      expect(await readJson(res)).toMatchObject({ mode: "single_pass", passCount: 1, toolsEnabledInPass: [true] });
    });

    it("reports an unknown mode as a client error", async () => {
      const res = await request("/plan", jsonBody({ operationType: "GENERAL", mode: "triple_pass" }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Invalid execution mode "triple_pass": expected one of single_pass, dual_pass_write_only, dual_pass_all',
      });
    });
  });

  describe("POST /normalize", () => {
    it("extracts tagged calls from content", async () => {
      const res = await request(
        "/normalize",
        jsonBody({ content: "<function=get_memory><parameter=memory_id>abc</parameter></function>" }),
      );
      const body = await readJson(res);
      expect(body["format"]).toBe("tagged");
      expect(body["requests"]).toEqual([
        {
          callId: "tagged-1-1-0",
          toolName: "get_memory",
          arguments: { memory_id: "abc" },
          origin: { pass: 1, round: 1, format: "tagged" },
        },
      ]);
    });

    it("reports native calls with broken arguments", async () => {
      const res = await request(
        "/normalize",
        jsonBody({ content: null, nativeCalls: [{ id: "c1", name: "get_memory", arguments: "[1]" }] }),
      );
      expect(await readJson(res)).toMatchObject({
        format: "native",
        requests: [],
        invalid: [{ callId: "c1", toolName: "get_memory", error: "Arguments must be a JSON object" }],
      });
    });
  });

  describe("POST /authorize", () => {
    it("allows a whitelisted command", async () => {
      const res = await request("/authorize", jsonBody({ toolName: "command_exec", arguments: { command: "echo" } }));
      expect(await readJson(res)).toMatchObject({
        allowed: true,
        reason: "whitelisted",
        effectiveTimeoutSeconds: 30,
      });
    });

    it("denies a command outside the whitelist", async () => {
      const res = await request("/authorize", jsonBody({ toolName: "command_exec", arguments: { command: "ls" } }));
      expect(await readJson(res)).toMatchObject({ allowed: false, reason: "not-whitelisted" });
    });

    it("denies a tool that is not enabled", async () => {
      const res = await request("/authorize", jsonBody({ toolName: "file_access", arguments: {} }));
      expect(await readJson(res)).toMatchObject({ allowed: false, reason: "tool-unavailable" });
    });
  });

  describe("POST /dispatch", () => {
    it("runs an allowed call", async () => {
      const res = await request(
        "/dispatch",
        jsonBody({ toolName: "command_exec", arguments: { command: "echo", arguments: ["hello"] } }),
      );
      expect(res.status).toBe(200);
      const body = await readJson(res);
      expect(body["outcome"]).toMatchObject({
        callId: "http-1",
        success: true,
        status: "success",
        result: { exitCode: 0, stdout: "hello\n" },
      });
    });

    it("holds a dangerous call until it is approved, then consumes the approval", async () => {
      const call = { toolName: "command_exec", arguments: { command: "chmod", arguments: ["600", "missing.txt"] } };

      const denied = await request("/dispatch", jsonBody(call));
      expect(denied.status).toBe(403);
      const deniedBody = await readJson(denied);
      expect(deniedBody["decision"]).toMatchObject({ allowed: false, reason: "dangerous-requires-approval" });

      const pending = await readJson(await request("/approvals?status=pending"));
      expect(pending["approvals"]).toHaveLength(1);
      const [record] = await runtime.approvals.list("pending");
      const fingerprint = record?.fingerprint ?? "";

      const granted = await request(`/approvals/${fingerprint.slice(0, 12)}/grant`, jsonBody({ grantedBy: "ops" }));
      expect(await readJson(granted)).toMatchObject({ status: "granted", grantedBy: "ops" });

      const allowed = await request("/dispatch", jsonBody(call));
      expect(allowed.status).toBe(200);
      expect((await readJson(allowed))["decision"]).toMatchObject({ allowed: true, reason: "approved" });
      expect(await runtime.approvals.list()).toEqual([]);

      const again = await request("/dispatch", jsonBody(call));
      expect(again.status).toBe(403);
      expect((await readJson(again))["decision"]).toMatchObject({ allowed: false, reason: "dangerous-requires-approval" });
    });

    it("lets only one of two concurrent calls spend a single approval", async () => {
      const call = { toolName: "command_exec", arguments: { command: "chmod", arguments: ["600", "missing.txt"] } };
      await request("/dispatch", jsonBody(call));
      const [record] = await runtime.approvals.list("pending");
      await runtime.approvals.grant(record?.fingerprint ?? "");

      const responses = await Promise.all([request("/dispatch", jsonBody(call)), request("/dispatch", jsonBody(call))]);
      expect(responses.map((res) => res.status).sort()).toEqual([200, 403]);
    });

    it("validates the call body", async () => {
      const res = await request("/dispatch", jsonBody({ arguments: {} }));
      expect(res.status).toBe(400);
    });
  });

  describe("memories", () => {
    it("supports the full lifecycle", async () => {
      const created = await request(
        "/memories",
        jsonBody({ content: "Likes green tea", kind: "preference", tags: ["drink"] }),
      );
      expect(created.status).toBe(201);
      const entry = await readJson(created);
      const id = String(entry["id"]);
      expect(entry).toMatchObject({ kind: "preference", source: "user", tags: ["drink"] });

      const found = await request("/memories?tags=drink,food&query=tea");
      expect(await found.json()).toHaveLength(1);

      const patched = await request(`/memories/${id}`, {
        method: "PATCH",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ importance: 0.9 }),
      });
      expect(await readJson(patched)).toMatchObject({ id, importance: 0.9 });

      const stats = await readJson(await request("/memories/stats"));
      expect(stats).toMatchObject({ total: 1, maxEntries: 100 });

      const deleted = await request(`/memories/${id}`, { method: "DELETE" });
      expect(await deleted.json()).toEqual({ id });

      const missing = await request(`/memories/${id}`);
      expect(missing.status).toBe(404);
      expect(await readJson(missing)).toMatchObject({ code: "not-found" });
    });

    it("maps store validation failures to 400", async () => {
      const res = await request("/memories", jsonBody({ content: "   " }));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "content must not be empty", code: "invalid" });
    });

    it("rejects an unknown kind", async () => {
      const res = await request("/memories", jsonBody({ content: "x", kind: "secret" }));
      expect(res.status).toBe(400);
      expect(await readJson(res)).toMatchObject({ error: "Invalid request" });
    });
  });

  describe("approvals", () => {
    it("404s on an unknown fingerprint", async () => {
      const grant = await request("/approvals/ffff/grant", { method: "POST" });
      expect(grant.status).toBe(404);
      const revoke = await request("/approvals/ffff", { method: "DELETE" });
      expect(revoke.status).toBe(404);
    });
  });
});

describe("ToolServer without memory", () => {
  it("answers 503 on memory routes", async () => {
    const dir = makeTempDir("toolgate-server-nomem-");
    const runtime = createRuntime({
      config: makeConfig(),
      stateDir: dir,
      logger: createSilentLogger(),
      inference: new ScriptedInference({}),
    });
    try {
      const server = new ToolServer({ runtime });
      const res = await server.fetchApp.request("/memories");
      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ error: "No memory instance is enabled" });

      const health = await readJson(await server.fetchApp.request("/health"));
      expect(health).toMatchObject({ tools: [], memory: null });
    } finally {
      await runtime.close();
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
