import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { MemoryRegistryEntry, ToolRegistryEntry, ToolgateConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import {
  formatIssues,
  memoryRegistryEntrySchema,
  parseConfig,
  toolRegistryEntrySchema,
} from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

const toolRegistryFileSchema = z.object({
  tools: z.array(toolRegistryEntrySchema.extend({ name: z.string().min(1) })).default([]),
});

const memoryRegistryFileSchema = z.object({
  memories: z.array(memoryRegistryEntrySchema.extend({ name: z.string().min(1) })).default([]),
});

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigurationError(
        `Missing environment variable: ${varName} (referenced as ${match})`,
      );
    }
    return value;
  });
}

function readJson(path: string): unknown {
  const substituted = substituteEnv(readFileSync(path, "utf-8"));
  try {
    return JSON.parse(substituted) as unknown;
  } catch (err) {
    throw new ConfigurationError(`Malformed JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

function readRegistryFile(path: string, kind: string): unknown {
  try {
    return readJson(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigurationError(`Missing ${kind} registry file: ${path}`, { cause: err });
    }
    throw err;
  }
}

export function loadToolRegistry(path: string): Record<string, ToolRegistryEntry> {
  const parsed = toolRegistryFileSchema.safeParse(readRegistryFile(path, "tool"));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid tool registry ${path}: ${formatIssues(parsed.error)}`);
  }
  const entries: Record<string, ToolRegistryEntry> = {};
  for (const { name, ...entry } of parsed.data.tools) {
    entries[name] = entry;
  }
  return entries;
}

export function loadMemoryRegistry(path: string): Record<string, MemoryRegistryEntry> {
  const parsed = memoryRegistryFileSchema.safeParse(readRegistryFile(path, "memory"));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid memory registry ${path}: ${formatIssues(parsed.error)}`);
  }
  const entries: Record<string, MemoryRegistryEntry> = {};
  for (const { name, ...entry } of parsed.data.memories) {
    entries[name] = entry;
  }
  return entries;
}

/** Registry files are resolved against the config file's directory and override inline entries. */
export function mergeRegistries(config: ToolgateConfig, baseDir: string): ToolgateConfig {
  const files = config.registries;
  if (!files) return config;

  const tools = files.tools
    ? { ...config.tools, ...loadToolRegistry(resolve(baseDir, files.tools)) }
    : config.tools;
  const memories = files.memories
    ? { ...config.memories, ...loadMemoryRegistry(resolve(baseDir, files.memories)) }
    : config.memories;

  return { ...config, tools, memories };
}

export function loadConfig(path?: string): ToolgateConfig {
  const configPath = resolve(path ?? getConfigPath());

  let raw: unknown;
  try {
    raw = readJson(configPath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  return mergeRegistries(parseConfig(raw), dirname(configPath));
}
