import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { ToolgateConfig } from "../config/types.js";
import { errorMessage } from "../errors.js";
import { createSilentLogger } from "../logging/logger.js";
import { MemoryRegistry } from "../memory/registry.js";
import type { MemoryStore } from "../memory/store.js";
import type { MemoryEntry, StoreResult } from "../memory/types.js";

export type Output = { write(chunk: string): unknown };

/** Loads configuration, reporting failures on `out` instead of throwing. */
export function tryLoadConfig(out: Output, configPath?: string): ToolgateConfig | null {
  try {
    return loadConfig(configPath);
  } catch (err) {
    out.write(`Failed to load config: ${errorMessage(err)}\n`);
    process.exitCode = 1;
    return null;
  }
}

/** Opens the named memory instance, or the first enabled one. */
export async function openMemory(
  out: Output,
  configPath?: string,
  name?: string,
): Promise<MemoryStore | null> {
  const config = tryLoadConfig(out, configPath);
  if (!config) return null;

  const registry = new MemoryRegistry(config.memories, createSilentLogger(), ensureDir(getStateDir()));
  const store = await registry.open(name);
  if (!store) {
    out.write(name ? `Memory instance not enabled: ${name}\n` : "No memory instance is enabled.\n");
    process.exitCode = 1;
    return null;
  }
  return store;
}

/** Writes the failure of a store result and returns null, or returns its value. */
export function unwrapResult<T>(out: Output, result: StoreResult<T>): T | null {
  if (result.ok) return result.value;
  out.write(`Error (${result.error}): ${result.message}\n`);
  process.exitCode = 1;
  return null;
}

export function formatMemory(entry: MemoryEntry): string {
  const tags = entry.tags.length > 0 ? `  tags=${entry.tags.join(",")}` : "";
  return `  ${entry.id}  [${entry.kind}] importance=${entry.importance}${tags}\n    ${entry.content}\n`;
}

export function parseTags(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function parseNumber(out: Output, flag: string, raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    out.write(`${flag} must be a number, got "${raw}"\n`);
    process.exitCode = 1;
    return null;
  }
  return value;
}
