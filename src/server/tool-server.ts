import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import { classify } from "../classifier/operation.js";
import { ConfigurationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { MEMORY_KINDS, type StoreErrorCode, type StoreResult } from "../memory/types.js";
import { approvalSpent, PolicyEngine } from "../policy/engine.js";
import { createRequest, normalize } from "../protocol/normalizer.js";
import type { Runtime } from "../runtime/bootstrap.js";
import { plan } from "../strategy/planner.js";

const classifySchema = z.object({
  message: z.string(),
});

const planSchema = z.object({
  message: z.string().optional(),
  operationType: z.enum(["READ", "WRITE", "GENERAL"]).optional(),
  mode: z.string().optional(),
  toolsEnabled: z.boolean().optional(),
});

const normalizeSchema = z.object({
  content: z.string().nullable(),
  nativeCalls: z
    .array(z.object({ id: z.string(), name: z.string(), arguments: z.string() }))
    .default([]),
});

const callSchema = z.object({
  toolName: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()).default({}),
  callId: z.string().optional(),
});

const addMemorySchema = z.object({
  content: z.string(),
  kind: z.enum(MEMORY_KINDS).optional(),
  tags: z.array(z.string()).optional(),
  importance: z.number().optional(),
  source: z.enum(["user", "llm", "system"]).default("user"),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const updateMemorySchema = z.object({
  content: z.string().optional(),
  tags: z.array(z.string()).optional(),
  importance: z.number().optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

const searchQuerySchema = z.object({
  query: z.string().optional(),
  tags: z.string().optional(),
  kind: z.enum(MEMORY_KINDS).optional(),
  minImportance: z.coerce.number().optional(),
  limit: z.coerce.number().int().min(0).optional(),
});

const grantSchema = z.object({
  grantedBy: z.string().optional(),
});

export interface ToolServerDeps {
  readonly runtime: Runtime;
  readonly port?: number;
  readonly hostname?: string;
}

function storeStatus(error: StoreErrorCode): 400 | 404 | 409 | 500 {
  switch (error) {
    case "not-found":
      return 404;
    case "invalid":
      return 400;
    case "capacity-exceeded":
      return 409;
    case "storage-failure":
      return 500;
  }
}

async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export class ToolServer {
  private readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly runtime: Runtime;
  private readonly logger: Logger;
  private readonly port: number;
  private readonly hostname: string;
  private callCounter = 0;

  constructor(deps: ToolServerDeps) {
    this.runtime = deps.runtime;
    this.logger = deps.runtime.logger.child({ component: "tool-server" });
    this.port = deps.port ?? deps.runtime.config.server.port;
    this.hostname = deps.hostname ?? deps.runtime.config.server.hostname;
    this.app = new Hono();
    this.setupRoutes();
  }

  /** The Hono app, for in-process requests. */
  get fetchApp(): Hono {
    return this.app;
  }

  private respond<T>(c: Context, result: StoreResult<T>, status: 200 | 201 = 200): Response {
    if (!result.ok) return c.json({ error: result.message, code: result.error }, storeStatus(result.error));
    return c.json(result.value, status);
  }

  private setupRoutes(): void {
    this.app.get("/health", async (c) => {
      const snapshot = await this.runtime.snapshot();
      return c.json({
        status: "ok",
        mode: snapshot.execution.mode,
        tools: [...snapshot.tools.keys()],
        memory: snapshot.memory?.name ?? null,
      });
    });

    this.app.post("/classify", async (c) => {
      const parsed = classifySchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      return c.json({ operationType: classify(parsed.data.message) });
    });

    this.app.post("/plan", async (c) => {
      const parsed = planSchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const body = parsed.data;
      const operationType = body.operationType ?? classify(body.message ?? "");
      const toolsEnabled = body.toolsEnabled ?? (await this.runtime.snapshot()).tools.size > 0;
      try {
        return c.json(plan(operationType, body.mode ?? this.runtime.config.execution.mode, toolsEnabled));
      } catch (err) {
        if (err instanceof ConfigurationError) return c.json({ error: err.message }, 400);
        throw err;
      }
    });

    this.app.post("/normalize", async (c) => {
      const parsed = normalizeSchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const snapshot = await this.runtime.snapshot();
      const result = normalize(parsed.data, {
        knownTools: new Set(snapshot.tools.keys()),
        taggedCalls: snapshot.execution.taggedCalls,
        pass: 1,
        round: 1,
      });
      return c.json(result);
    });

    this.app.post("/authorize", async (c) => {
      const parsed = callSchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const snapshot = await this.runtime.snapshot();
      const request = this.toRequest(parsed.data);
      const decision = new PolicyEngine(snapshot).authorize(request);
      this.runtime.audit?.recordDecision(request, decision, "http");
      return c.json(decision);
    });

    this.app.post("/dispatch", async (c) => {
      const parsed = callSchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const snapshot = await this.runtime.snapshot();
      const request = this.toRequest(parsed.data);
      let decision = new PolicyEngine(snapshot).authorize(request);
      if (decision.reason === "approved" && !(await this.runtime.approvals.consume(decision.fingerprint))) {
        decision = approvalSpent(decision);
      }
      this.runtime.audit?.recordDecision(request, decision, "http");

      if (!decision.allowed) {
        this.logger.warn({ tool: request.toolName, reason: decision.reason }, "HTTP tool call denied");
        if (decision.reason === "dangerous-requires-approval") {
          await this.runtime.approvals.request(request, decision);
        }
        return c.json({ decision }, 403);
      }

      const outcome = await this.runtime.dispatcher.dispatch(request, decision, snapshot);
      this.runtime.audit?.recordOutcome(request, outcome, "http");
      return c.json({ decision, outcome });
    });

    this.app.post("/memories", async (c) => {
      const parsed = addMemorySchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      return this.respond(c, await store.add(parsed.data), 201);
    });

    this.app.get("/memories", async (c) => {
      const parsed = searchQuerySchema.safeParse(c.req.query());
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      const { tags, ...rest } = parsed.data;
      return this.respond(
        c,
        await store.search({ ...rest, tags: tags ? tags.split(",") : undefined }),
      );
    });

    this.app.get("/memories/stats", async (c) => {
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      return c.json(await store.stats());
    });

    this.app.get("/memories/:id", async (c) => {
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      return this.respond(c, await store.get(c.req.param("id")));
    });

    this.app.patch("/memories/:id", async (c) => {
      const parsed = updateMemorySchema.safeParse(await readBody(c));
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      return this.respond(c, await store.update(c.req.param("id"), parsed.data));
    });

    this.app.delete("/memories/:id", async (c) => {
      const store = await this.runtime.memories.open();
      if (!store) return c.json({ error: "No memory instance is enabled" }, 503);
      return this.respond(c, await store.delete(c.req.param("id")));
    });

    this.app.get("/approvals", async (c) => {
      const status = c.req.query("status");
      const records = await this.runtime.approvals.list(
        status === "pending" || status === "granted" ? status : undefined,
      );
      return c.json({ approvals: records });
    });

    this.app.post("/approvals/:fingerprint/grant", async (c) => {
      const parsed = grantSchema.safeParse((await readBody(c)) ?? {});
      if (!parsed.success) {
        return c.json({ error: "Invalid request", details: parsed.error.flatten() }, 400);
      }
      const record = await this.runtime.approvals.grant(c.req.param("fingerprint"), parsed.data.grantedBy);
      if (!record) return c.json({ error: "Approval not found" }, 404);
      this.logger.info({ fingerprint: record.fingerprint, tool: record.toolName }, "Approval granted");
      return c.json(record);
    });

    this.app.delete("/approvals/:fingerprint", async (c) => {
      const removed = await this.runtime.approvals.revoke(c.req.param("fingerprint"));
      if (!removed) return c.json({ error: "Approval not found" }, 404);
      return c.json({ ok: true });
    });

    this.app.onError((err, c) => {
      this.logger.error({ err, path: c.req.path }, "Tool server request failed");
      return c.json({ error: "Internal error" }, 500);
    });
  }

  private toRequest(body: z.infer<typeof callSchema>) {
    const callId = body.callId ?? `http-${++this.callCounter}`;
    return createRequest(callId, body.toolName, body.arguments, { pass: 1, round: 1, format: "native" });
  }

  async start(): Promise<void> {
    this.server = serve({ fetch: this.app.fetch, port: this.port, hostname: this.hostname });
    this.logger.info({ port: this.port, hostname: this.hostname }, "Tool server started");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info("Tool server stopped");
    }
  }
}
