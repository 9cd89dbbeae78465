import { ToolError } from "../../errors.js";
import type { MemoryRegistry } from "../../memory/registry.js";
import type { MemoryStore } from "../../memory/store.js";
import { isMemoryKind, type MemoryEntry, type MemoryKind, type StoreResult } from "../../memory/types.js";
import { listArg, numberArg, stringArg, type HandlerContext, type ToolHandler } from "./types.js";

type MemoryToolName =
  | "add_memory"
  | "search_memories"
  | "get_memory"
  | "update_memory"
  | "delete_memory"
  | "get_memory_stats";

/** What the model sees for a memory; bookkeeping fields are left out. */
export function presentMemory(entry: MemoryEntry): Record<string, unknown> {
  return {
    id: entry.id,
    kind: entry.kind,
    content: entry.content,
    tags: entry.tags,
    importance: entry.importance,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}

function unwrap<T>(result: StoreResult<T>): T {
  if (!result.ok) throw new ToolError(result.message);
  return result.value;
}

function kindArg(ctx: HandlerContext): MemoryKind | undefined {
  const kind = stringArg(ctx.args, "kind");
  return kind !== undefined && isMemoryKind(kind) ? kind : undefined;
}

function requiredId(ctx: HandlerContext): string {
  const id = stringArg(ctx.args, "memory_id");
  if (!id) throw new ToolError("memory_id is required");
  return id;
}

/** Checked right before a write, so a call past its deadline changes nothing. */
function ensureNotAborted(ctx: HandlerContext): void {
  if (ctx.signal.aborted) throw new ToolError(`${ctx.request.toolName} cancelled before it changed anything`);
}

export function createMemoryHandlers(
  registry: MemoryRegistry,
): Record<MemoryToolName, ToolHandler> {
  async function storeFor(ctx: HandlerContext): Promise<MemoryStore> {
    const store = await registry.open(ctx.snapshot.memory?.name);
    if (!store) throw new ToolError("No memory instance is enabled");
    return store;
  }

  return {
    async add_memory(ctx) {
      const store = await storeFor(ctx);
      ensureNotAborted(ctx);
      const entry = unwrap(
        await store.add({
          content: stringArg(ctx.args, "content") ?? "",
          kind: kindArg(ctx),
          tags: listArg(ctx.args, "tags"),
          importance: numberArg(ctx.args, "importance"),
          source: "llm",
          metadata: { callId: ctx.request.callId, pass: ctx.request.origin.pass },
        }),
      );
      return { memory_id: entry.id, message: "Memory stored" };
    },

    async search_memories(ctx) {
      const store = await storeFor(ctx);
      const found = unwrap(
        await store.search({
          query: stringArg(ctx.args, "query"),
          tags: listArg(ctx.args, "tags"),
          kind: kindArg(ctx),
          minImportance: numberArg(ctx.args, "min_importance"),
          limit: numberArg(ctx.args, "limit"),
        }),
      );
      return { count: found.length, memories: found.map(presentMemory) };
    },

    async get_memory(ctx) {
      const store = await storeFor(ctx);
      return presentMemory(unwrap(await store.get(requiredId(ctx))));
    },

    async update_memory(ctx) {
      const store = await storeFor(ctx);
      ensureNotAborted(ctx);
      const updated = unwrap(
        await store.update(requiredId(ctx), {
          content: stringArg(ctx.args, "content"),
          tags: listArg(ctx.args, "tags"),
          importance: numberArg(ctx.args, "importance"),
        }),
      );
      return presentMemory(updated);
    },

    async delete_memory(ctx) {
      const store = await storeFor(ctx);
      ensureNotAborted(ctx);
      const { id } = unwrap(await store.delete(requiredId(ctx)));
      return { memory_id: id, message: "Memory deleted" };
    },

    async get_memory_stats(ctx) {
      const store = await storeFor(ctx);
      return store.stats();
    },
  };
}
