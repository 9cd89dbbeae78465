import type {
  ExecutionConfig,
  MemoryRegistryEntry,
  ToolRegistryEntry,
  ToolgateConfig,
} from "../config/types.js";
import { TOOL_CATALOG, TOOL_NAMES, toOpenAiTool, type OpenAiTool, type ToolDescriptor } from "./descriptors.js";

export interface EnabledTool {
  readonly descriptor: ToolDescriptor;
  readonly entry: Readonly<ToolRegistryEntry>;
}

export interface ActiveMemory {
  readonly name: string;
  readonly entry: Readonly<MemoryRegistryEntry>;
}

/**
 * Read-only view of the configuration taken at the start of a turn.
 * Registry edits made while the turn runs are not observed by it.
 */
export interface TurnSnapshot {
  readonly execution: Readonly<ExecutionConfig>;
  readonly tools: ReadonlyMap<string, EnabledTool>;
  readonly memory?: ActiveMemory;
  /** Fingerprints of granted approvals. */
  readonly approvals: ReadonlySet<string>;
}

const IMPLICIT_MEMORY_TOOL_ENTRY: ToolRegistryEntry = {
  enabled: true,
  requiresApproval: false,
  whitelist: [],
};

function freezeEntry<T extends object>(entry: T): Readonly<T> {
  return Object.freeze({ ...entry });
}

export function activeMemory(config: ToolgateConfig): ActiveMemory | undefined {
  const found = Object.entries(config.memories).find(([, entry]) => entry.enabled);
  if (!found) return undefined;
  const [name, entry] = found;
  return { name, entry: freezeEntry(entry) };
}

export function createTurnSnapshot(
  config: ToolgateConfig,
  approvals: Iterable<string> = [],
): TurnSnapshot {
  const memory = activeMemory(config);
  const tools = new Map<string, EnabledTool>();

  for (const name of TOOL_NAMES) {
    const descriptor = TOOL_CATALOG[name];
    const configured: ToolRegistryEntry | undefined = config.tools[name];

    let entry: ToolRegistryEntry | undefined;
    if (descriptor.handler === "memory") {
      if (!memory) continue;
      entry = configured ?? IMPLICIT_MEMORY_TOOL_ENTRY;
    } else {
      entry = configured;
    }
    if (!entry?.enabled) continue;

    tools.set(name, {
      descriptor,
      entry: freezeEntry({ ...entry, whitelist: [...entry.whitelist] }),
    });
  }

  return Object.freeze({
    execution: freezeEntry(config.execution),
    tools,
    memory,
    approvals: new Set(approvals),
  });
}

/** Tools offered to the model in a pass. Streamed passes only carry streamable tools. */
export function toolsForPass(snapshot: TurnSnapshot, streamed: boolean): OpenAiTool[] {
  return [...snapshot.tools.values()]
    .filter((tool) => !streamed || tool.descriptor.streamable)
    .map((tool) => toOpenAiTool(tool.descriptor));
}
