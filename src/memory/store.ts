import { randomBytes } from "node:crypto";
import { mkdirSync } from "node:fs";
import { appendFile, open, readFile, rename, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { withFileLock } from "../utils/file-lock.js";
import {
  MEMORY_KINDS,
  type LogRecord,
  type MemoryEntry,
  type MemoryKind,
  type MemoryPatch,
  type MemoryQuery,
  type MemoryStats,
  type NewMemory,
  type StoreErrorCode,
  type StoreResult,
} from "./types.js";

export const LOG_FILE = "memory.jsonl";
export const DEFAULT_SEARCH_LIMIT = 10;
const DEFAULT_IMPORTANCE = 0.5;

const entrySchema = z.object({
  id: z.string().min(1),
  kind: z.enum(MEMORY_KINDS),
  content: z.string(),
  tags: z.array(z.string()),
  importance: z.number(),
  source: z.enum(["user", "llm", "system"]).default("llm"),
  metadata: z.record(z.string(), z.unknown()).default({}),
  createdAt: z.string(),
  updatedAt: z.string(),
  lastAccessed: z.string(),
  accessCount: z.number().int().nonnegative().default(0),
});

const recordSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("put"), entry: entrySchema }),
  z.object({ op: z.literal("delete"), id: z.string().min(1), at: z.string() }),
]);

interface IndexEntry {
  readonly offset: number;
  readonly length: number;
  readonly kind: MemoryKind;
  readonly tags: readonly string[];
  readonly importance: number;
  readonly createdAt: string;
  readonly updatedAt: string;
}

interface AccessOverlay {
  count: number;
  lastAccessed: string;
}

export interface MemoryStoreOptions {
  readonly directory: string;
  readonly maxEntries: number;
  readonly logger?: Logger;
}

function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

/** Callers get their own arrays and objects, never the ones the index holds. */
function detached(entry: MemoryEntry): MemoryEntry {
  return { ...entry, tags: [...entry.tags], metadata: { ...entry.metadata } };
}

function fail<T>(error: StoreErrorCode, message: string): StoreResult<T> {
  return { ok: false, error, message };
}

function normalizeTags(tags: readonly string[] | undefined): string[] {
  if (!tags) return [];
  return [...new Set(tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))];
}

function validateContent(content: string | undefined): string | undefined {
  if (content !== undefined && content.trim() === "") return "content must not be empty";
  return undefined;
}

function validateImportance(importance: number | undefined): string | undefined {
  if (importance === undefined) return undefined;
  if (!Number.isFinite(importance) || importance < 0 || importance > 1) {
    return "importance must be between 0 and 1";
  }
  return undefined;
}

/**
 * Long-term memory kept as an append-only JSONL log. `add` and `update` append
 * a full record, `delete` appends a tombstone. The in-memory index holds the
 * byte range of each id's latest record and is rebuilt by replaying the log.
 */
export class MemoryStore {
  readonly logPath: string;
  private readonly maxEntries: number;
  private readonly logger: Logger;
  private index = new Map<string, IndexEntry>();
  /** Deleted ids; never handed out again. */
  private retired = new Set<string>();
  private readonly access = new Map<string, AccessOverlay>();
  private knownSize = 0;

  private constructor(options: MemoryStoreOptions) {
    mkdirSync(options.directory, { recursive: true });
    this.logPath = join(options.directory, LOG_FILE);
    this.maxEntries = options.maxEntries;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "memory-store" });
  }

  static async open(options: MemoryStoreOptions): Promise<MemoryStore> {
    const store = new MemoryStore(options);
    await store.reload();
    return store;
  }

  get size(): number {
    return this.index.size;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /** Rebuilds the index from the log. Unparseable lines are skipped. */
  async reload(): Promise<void> {
    const buffer = await this.readLog();
    const index = new Map<string, IndexEntry>();
    const retired = new Set<string>();

    let offset = 0;
    let lineNo = 0;
    while (offset < buffer.length) {
      let end = buffer.indexOf(0x0a, offset);
      if (end === -1) end = buffer.length;
      lineNo++;
      const length = end - offset;
      const record = length > 0 ? this.parseRecord(buffer.subarray(offset, end), lineNo) : undefined;

      if (record?.op === "put") {
        const { entry } = record;
        retired.delete(entry.id);
        index.set(entry.id, {
          offset,
          length,
          kind: entry.kind,
          tags: [...entry.tags],
          importance: entry.importance,
          createdAt: entry.createdAt,
          updatedAt: entry.updatedAt,
        });
      } else if (record?.op === "delete") {
        index.delete(record.id);
        retired.add(record.id);
      }
      offset = end + 1;
    }

    this.index = index;
    this.retired = retired;
    this.knownSize = buffer.length;
    this.logger.debug({ entries: index.size, tombstones: retired.size }, "Memory index rebuilt");
  }

  async add(input: NewMemory): Promise<StoreResult<MemoryEntry>> {
    const invalid = validateContent(input.content) ?? validateImportance(input.importance);
    if (invalid) return fail("invalid", invalid);

    return this.write(async () => {
      if (this.index.size >= this.maxEntries) {
        return fail<MemoryEntry>(
          "capacity-exceeded",
          `Memory store is full (${this.maxEntries} entries)`,
        );
      }

      const now = new Date().toISOString();
      const entry: MemoryEntry = {
        id: this.newId(),
        kind: input.kind ?? "note",
        content: input.content.trim(),
        tags: normalizeTags(input.tags),
        importance: input.importance ?? DEFAULT_IMPORTANCE,
        source: input.source ?? "llm",
        metadata: { ...input.metadata },
        createdAt: now,
        updatedAt: now,
        lastAccessed: now,
        accessCount: 0,
      };
      await this.append({ op: "put", entry });
      this.logger.info({ id: entry.id, kind: entry.kind }, "Memory added");
      return ok(detached(entry));
    });
  }

  async get(id: string): Promise<StoreResult<MemoryEntry>> {
    const located = this.index.get(id);
    if (!located) return fail("not-found", `Memory ${id} not found`);

    const entry = await this.readEntry(id, located);
    if (!entry) return fail("storage-failure", `Memory ${id} could not be read`);

    const overlay = this.access.get(id) ?? { count: entry.accessCount, lastAccessed: entry.lastAccessed };
    overlay.count++;
    overlay.lastAccessed = new Date().toISOString();
    this.access.set(id, overlay);

    return ok({ ...entry, accessCount: overlay.count, lastAccessed: overlay.lastAccessed });
  }

  async update(id: string, patch: MemoryPatch): Promise<StoreResult<MemoryEntry>> {
    const invalid = validateContent(patch.content) ?? validateImportance(patch.importance);
    if (invalid) return fail("invalid", invalid);

    return this.write(async () => {
      const located = this.index.get(id);
      if (!located) return fail<MemoryEntry>("not-found", `Memory ${id} not found`);

      const current = await this.readEntry(id, located);
      if (!current) return fail<MemoryEntry>("storage-failure", `Memory ${id} could not be read`);

      const overlay = this.access.get(id);
      const updated: MemoryEntry = {
        ...current,
        content: patch.content?.trim() ?? current.content,
        tags: patch.tags ? normalizeTags(patch.tags) : current.tags,
        importance: patch.importance ?? current.importance,
        metadata: patch.metadata ? { ...current.metadata, ...patch.metadata } : current.metadata,
        updatedAt: new Date().toISOString(),
        accessCount: overlay?.count ?? current.accessCount,
        lastAccessed: overlay?.lastAccessed ?? current.lastAccessed,
      };
      await this.append({ op: "put", entry: updated });
      this.access.delete(id);
      this.logger.info({ id }, "Memory updated");
      return ok(detached(updated));
    });
  }

  async delete(id: string): Promise<StoreResult<{ id: string }>> {
    return this.write(async () => {
      if (!this.index.has(id)) return fail<{ id: string }>("not-found", `Memory ${id} not found`);
      await this.append({ op: "delete", id, at: new Date().toISOString() });
      this.access.delete(id);
      this.logger.info({ id }, "Memory deleted");
      return ok({ id });
    });
  }

  async search(query: MemoryQuery = {}): Promise<StoreResult<MemoryEntry[]>> {
    const invalid = validateImportance(query.minImportance);
    if (invalid) return fail("invalid", invalid.replace("importance", "minImportance"));

    const limit = Math.max(0, Math.floor(query.limit ?? DEFAULT_SEARCH_LIMIT));
    const wantedTags = normalizeTags(query.tags);
    const needle = query.query?.trim().toLowerCase() ?? "";

    // Summary filters first; only survivors are decoded from the log.
    const candidates = [...this.index.entries()].filter(([, item]) => {
      if (query.kind && item.kind !== query.kind) return false;
      if (query.minImportance !== undefined && item.importance < query.minImportance) return false;
      if (wantedTags.length > 0 && !wantedTags.some((tag) => item.tags.includes(tag))) return false;
      return true;
    });
    if (candidates.length === 0 || limit === 0) return ok([]);

    let buffer: Buffer;
    try {
      buffer = await this.readLog();
    } catch (err) {
      return fail("storage-failure", `Memory log unreadable: ${errorMessage(err)}`);
    }

    const matches: MemoryEntry[] = [];
    for (const [id, item] of candidates) {
      const entry = this.decodeAt(buffer, id, item);
      if (!entry) continue;
      if (needle && !entry.content.toLowerCase().includes(needle)) continue;
      matches.push(this.withAccess(entry));
    }

    matches.sort(
      (a, b) =>
        b.importance - a.importance ||
        b.updatedAt.localeCompare(a.updatedAt) ||
        b.createdAt.localeCompare(a.createdAt),
    );
    return ok(matches.slice(0, limit));
  }

  async stats(): Promise<MemoryStats> {
    const byKind: Record<MemoryKind, number> = { note: 0, fact: 0, preference: 0, task: 0, context: 0 };
    let importanceSum = 0;
    let oldest: string | undefined;
    let newest: string | undefined;

    for (const item of this.index.values()) {
      byKind[item.kind]++;
      importanceSum += item.importance;
      if (!oldest || item.createdAt < oldest) oldest = item.createdAt;
      if (!newest || item.createdAt > newest) newest = item.createdAt;
    }

    let logBytes = 0;
    try {
      logBytes = (await stat(this.logPath)).size;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }

    return {
      total: this.index.size,
      maxEntries: this.maxEntries,
      byKind,
      tombstones: this.retired.size,
      logBytes,
      averageImportance: this.index.size > 0 ? importanceSum / this.index.size : 0,
      oldest,
      newest,
    };
  }

  /**
   * Rewrites the log with one record per live entry. Deleted ids survive as
   * tombstones so they stay retired.
   */
  async compact(): Promise<StoreResult<{ before: number; after: number }>> {
    return this.write(async () => {
      const buffer = await this.readLog();
      const lines: string[] = [];
      for (const id of this.retired) {
        lines.push(JSON.stringify({ op: "delete", id, at: new Date().toISOString() } satisfies LogRecord));
      }
      for (const [id, item] of this.index) {
        const entry = this.decodeAt(buffer, id, item);
        if (!entry) return fail<{ before: number; after: number }>("storage-failure", `Memory ${id} could not be read`);
        lines.push(JSON.stringify({ op: "put", entry: this.withAccess(entry) } satisfies LogRecord));
      }

      const body = lines.length > 0 ? `${lines.join("\n")}\n` : "";
      const tmpPath = `${this.logPath}.compact`;
      await writeFile(tmpPath, body);
      await rename(tmpPath, this.logPath);
      this.access.clear();
      await this.reload();
      this.logger.info({ before: buffer.length, after: this.knownSize }, "Memory log compacted");
      return ok({ before: buffer.length, after: this.knownSize });
    });
  }

  private newId(): string {
    for (;;) {
      const id = `mem_${randomBytes(6).toString("hex")}`;
      if (!this.index.has(id) && !this.retired.has(id)) return id;
    }
  }

  private withAccess(entry: MemoryEntry): MemoryEntry {
    const overlay = this.access.get(entry.id);
    return overlay ? { ...entry, accessCount: overlay.count, lastAccessed: overlay.lastAccessed } : entry;
  }

  /** Serializes writers in and across processes; IO faults become results. */
  private async write<T>(fn: () => Promise<StoreResult<T>>): Promise<StoreResult<T>> {
    try {
      return await withFileLock(this.logPath, async () => {
        const size = await this.currentSize();
        if (size !== this.knownSize) {
          this.logger.debug({ size, knownSize: this.knownSize }, "Memory log changed on disk, replaying");
          await this.reload();
        }
        return fn();
      });
    } catch (err) {
      this.logger.error({ err }, "Memory store write failed");
      return fail("storage-failure", `Memory store write failed: ${errorMessage(err)}`);
    }
  }

  private async append(record: LogRecord): Promise<void> {
    const line = JSON.stringify(record);
    const offset = this.knownSize;
    const length = Buffer.byteLength(line);
    await appendFile(this.logPath, `${line}\n`);
    this.knownSize = offset + length + 1;

    if (record.op === "put") {
      const { entry } = record;
      this.index.set(entry.id, {
        offset,
        length,
        kind: entry.kind,
        tags: [...entry.tags],
        importance: entry.importance,
        createdAt: entry.createdAt,
        updatedAt: entry.updatedAt,
      });
    } else {
      this.index.delete(record.id);
      this.retired.add(record.id);
    }
  }

  private async currentSize(): Promise<number> {
    try {
      return (await stat(this.logPath)).size;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return 0;
      throw err;
    }
  }

  private async readLog(): Promise<Buffer> {
    try {
      return await readFile(this.logPath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return Buffer.alloc(0);
      throw err;
    }
  }

  /** Reads just the byte range the index points at. */
  private async readEntry(id: string, item: IndexEntry): Promise<MemoryEntry | undefined> {
    try {
      const handle = await open(this.logPath, "r");
      try {
        const bytes = Buffer.alloc(item.length);
        await handle.read(bytes, 0, item.length, item.offset);
        return this.decodeAt(bytes, id, { ...item, offset: 0 });
      } finally {
        await handle.close();
      }
    } catch (err) {
      this.logger.error({ err, id }, "Memory log unreadable");
      return undefined;
    }
  }

  private decodeAt(buffer: Buffer, id: string, item: IndexEntry): MemoryEntry | undefined {
    const record = this.parseRecord(buffer.subarray(item.offset, item.offset + item.length), 0);
    if (record?.op !== "put" || record.entry.id !== id) {
      this.logger.warn({ id, offset: item.offset }, "Memory index points at a stale record");
      return undefined;
    }
    return record.entry;
  }

  private parseRecord(bytes: Buffer, lineNo: number): LogRecord | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(bytes.toString("utf-8"));
    } catch (err) {
      this.logger.warn({ lineNo, err: errorMessage(err) }, "Skipping malformed memory log line");
      return undefined;
    }
    const parsed = recordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ lineNo }, "Skipping memory log line with unexpected shape");
      return undefined;
    }
    return parsed.data;
  }
}
