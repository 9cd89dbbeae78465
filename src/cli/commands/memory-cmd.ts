import { Command, Option } from "clipanion";
import { isMemoryKind, type MemoryKind } from "../../memory/types.js";
import {
  formatMemory,
  openMemory,
  parseNumber,
  parseTags,
  unwrapResult,
  type Output,
} from "../shared.js";

function parseKind(out: Output, raw: string | undefined): MemoryKind | undefined | null {
  if (raw === undefined) return undefined;
  if (isMemoryKind(raw)) return raw;
  out.write(`Unknown memory kind: ${raw}\n`);
  process.exitCode = 1;
  return null;
}

abstract class MemoryCommand extends Command {
  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  memory = Option.String("--memory,-m", {
    description: "Memory instance name (defaults to the first enabled one)",
    required: false,
  });
}

export class MemoryAddCommand extends MemoryCommand {
  static override paths = [["memory", "add"]];

  static override usage = Command.Usage({
    description: "Store a memory",
    examples: [["Store a fact", 'toolgate memory add "Prefers tea over coffee" --kind preference --tags drinks']],
  });

  content = Option.String({ name: "content", required: true });
  kind = Option.String("--kind", { required: false });
  tags = Option.String("--tags", { description: "Comma-separated tags", required: false });
  importance = Option.String("--importance", { description: "Between 0 and 1", required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const kind = parseKind(out, this.kind);
    const importance = parseNumber(out, "--importance", this.importance);
    if (kind === null || importance === null) return;

    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const entry = unwrapResult(
      out,
      await store.add({ content: this.content, kind, tags: parseTags(this.tags), importance, source: "user" }),
    );
    if (entry) out.write(`Stored ${entry.id}\n`);
  }
}

export class MemoryGetCommand extends MemoryCommand {
  static override paths = [["memory", "get"]];

  static override usage = Command.Usage({
    description: "Show one memory",
    examples: [["Show a memory", "toolgate memory get mem_0a1b2c3d4e5f"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const entry = unwrapResult(out, await store.get(this.id));
    if (entry) out.write(JSON.stringify(entry, null, 2) + "\n");
  }
}

export class MemorySearchCommand extends MemoryCommand {
  static override paths = [["memory", "search"]];

  static override usage = Command.Usage({
    description: "Search memories by text, tags, kind and importance",
    examples: [
      ["Search by text", 'toolgate memory search "coffee"'],
      ["Important facts only", "toolgate memory search --kind fact --min-importance 0.7"],
    ],
  });

  query = Option.String({ name: "query", required: false });
  kind = Option.String("--kind", { required: false });
  tags = Option.String("--tags", { description: "Comma-separated tags", required: false });
  minImportance = Option.String("--min-importance", { required: false });
  limit = Option.String("--limit", { required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const kind = parseKind(out, this.kind);
    const minImportance = parseNumber(out, "--min-importance", this.minImportance);
    const limit = parseNumber(out, "--limit", this.limit);
    if (kind === null || minImportance === null || limit === null) return;

    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const entries = unwrapResult(
      out,
      await store.search({ query: this.query, kind, tags: parseTags(this.tags), minImportance, limit }),
    );
    if (!entries) return;

    if (entries.length === 0) {
      out.write("No memories found.\n");
      return;
    }
    out.write(`Memories (${entries.length}):\n`);
    for (const entry of entries) out.write(formatMemory(entry));
  }
}

export class MemoryUpdateCommand extends MemoryCommand {
  static override paths = [["memory", "update"]];

  static override usage = Command.Usage({
    description: "Change the content, tags or importance of a memory",
    examples: [["Raise importance", "toolgate memory update mem_0a1b2c3d4e5f --importance 0.9"]],
  });

  id = Option.String({ name: "id", required: true });
  content = Option.String("--content", { required: false });
  tags = Option.String("--tags", { description: "Comma-separated tags", required: false });
  importance = Option.String("--importance", { required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const importance = parseNumber(out, "--importance", this.importance);
    if (importance === null) return;

    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const entry = unwrapResult(
      out,
      await store.update(this.id, { content: this.content, tags: parseTags(this.tags), importance }),
    );
    if (entry) out.write(`Updated ${entry.id}\n`);
  }
}

export class MemoryDeleteCommand extends MemoryCommand {
  static override paths = [["memory", "delete"]];

  static override usage = Command.Usage({
    description: "Delete a memory",
    examples: [["Delete a memory", "toolgate memory delete mem_0a1b2c3d4e5f"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const deleted = unwrapResult(out, await store.delete(this.id));
    if (deleted) out.write(`Deleted ${deleted.id}\n`);
  }
}

export class MemoryStatsCommand extends MemoryCommand {
  static override paths = [["memory", "stats"]];

  static override usage = Command.Usage({
    description: "Show memory store statistics",
    examples: [["Show statistics", "toolgate memory stats"]],
  });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    out.write(JSON.stringify(await store.stats(), null, 2) + "\n");
  }
}

export class MemoryCompactCommand extends MemoryCommand {
  static override paths = [["memory", "compact"]];

  static override usage = Command.Usage({
    description: "Rewrite the memory log without superseded records",
    examples: [["Compact the log", "toolgate memory compact"]],
  });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const store = await openMemory(out, this.config, this.memory);
    if (!store) return;

    const result = unwrapResult(out, await store.compact());
    if (result) out.write(`Compacted log: ${result.before} -> ${result.after} bytes\n`);
  }
}
