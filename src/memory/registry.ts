import { resolve } from "node:path";
import type { MemoryRegistryEntry } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { expandHome } from "../policy/patterns.js";
import { MemoryStore } from "./store.js";

/** Opens each configured memory instance once and hands out the shared store. */
export class MemoryRegistry {
  private readonly stores = new Map<string, Promise<MemoryStore>>();

  constructor(
    private readonly memories: Readonly<Record<string, MemoryRegistryEntry>>,
    private readonly logger: Logger,
    private readonly baseDir: string = process.cwd(),
  ) {}

  enabledNames(): string[] {
    return Object.entries(this.memories)
      .filter(([, entry]) => entry.enabled)
      .map(([name]) => name);
  }

  /** The store for `name`, or the first enabled instance when omitted. */
  async open(name?: string): Promise<MemoryStore | undefined> {
    const target = name ?? this.enabledNames()[0];
    if (target === undefined) return undefined;

    const entry: MemoryRegistryEntry | undefined = this.memories[target];
    if (!entry?.enabled) return undefined;

    let store = this.stores.get(target);
    if (!store) {
      store = MemoryStore.open({
        directory: resolve(this.baseDir, expandHome(entry.directory)),
        maxEntries: entry.maxEntries,
        logger: this.logger.child({ memory: target }),
      });
      // A failed open is not cached so the next call retries it.
      void store.catch(() => this.stores.delete(target));
      this.stores.set(target, store);
    }
    return store;
  }
}
