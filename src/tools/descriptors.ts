import { MEMORY_KINDS } from "../memory/types.js";

export type ParamType = "string" | "number" | "integer" | "boolean" | "string[]";

export interface ParamSpec {
  readonly type: ParamType;
  readonly description: string;
  readonly required?: boolean;
  readonly enum?: readonly string[];
  readonly min?: number;
  readonly max?: number;
  /** Alternative argument names accepted from the model. */
  readonly aliases?: readonly string[];
}

export type ToolCategory = "read-only" | "side-effecting";
export type HandlerKind = "memory" | "file" | "command";

export interface ToolTarget {
  readonly kind: "path" | "command";
  /** Argument carrying the path or command string. */
  readonly param: string;
}

export interface ToolDescriptor {
  readonly name: ToolName;
  readonly description: string;
  readonly params: Readonly<Record<string, ParamSpec>>;
  readonly category: ToolCategory;
  readonly handler: HandlerKind;
  readonly requiresApproval: boolean;
  /** Whether the tool may be offered inside a streamed pass. */
  readonly streamable: boolean;
  readonly target?: ToolTarget;
}

export const TOOL_NAMES = [
  "add_memory",
  "search_memories",
  "get_memory",
  "update_memory",
  "delete_memory",
  "get_memory_stats",
  "file_access",
  "command_exec",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

const memoryId: ParamSpec = {
  type: "string",
  description: "Identifier returned by add_memory or search_memories",
  required: true,
  aliases: ["id"],
};

const importance: ParamSpec = {
  type: "number",
  description: "How important the memory is, from 0 to 1",
  min: 0,
  max: 1,
};

const tags: ParamSpec = {
  type: "string[]",
  description: "Labels used to group and find memories",
};

export const TOOL_CATALOG: Readonly<Record<ToolName, ToolDescriptor>> = {
  add_memory: {
    name: "add_memory",
    description: "Store a new long-term memory about the user or conversation.",
    params: {
      content: { type: "string", description: "What to remember", required: true },
      kind: {
        type: "string",
        description: "Kind of memory",
        enum: MEMORY_KINDS,
        aliases: ["memory_type", "type"],
      },
      tags,
      importance,
    },
    category: "side-effecting",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  search_memories: {
    name: "search_memories",
    description: "Search stored memories by text, tags, kind or importance.",
    params: {
      query: { type: "string", description: "Case-insensitive text to look for" },
      tags: { ...tags, description: "Match memories carrying any of these tags" },
      kind: {
        type: "string",
        description: "Only return memories of this kind",
        enum: MEMORY_KINDS,
        aliases: ["memory_type", "type"],
      },
      min_importance: { ...importance, description: "Minimum importance, from 0 to 1" },
      limit: { type: "integer", description: "Maximum results", min: 1, max: 100 },
    },
    category: "read-only",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  get_memory: {
    name: "get_memory",
    description: "Fetch one memory by id.",
    params: { memory_id: memoryId },
    category: "read-only",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  update_memory: {
    name: "update_memory",
    description: "Change the content, tags or importance of a memory.",
    params: {
      memory_id: memoryId,
      content: { type: "string", description: "Replacement content" },
      tags: { ...tags, description: "Replacement tags" },
      importance,
    },
    category: "side-effecting",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  delete_memory: {
    name: "delete_memory",
    description: "Forget a memory.",
    params: { memory_id: memoryId },
    category: "side-effecting",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  get_memory_stats: {
    name: "get_memory_stats",
    description: "Summarize what is stored in memory.",
    params: {},
    category: "read-only",
    handler: "memory",
    requiresApproval: false,
    streamable: false,
  },
  file_access: {
    name: "file_access",
    description: "Read, write or list files inside the allowed directories.",
    params: {
      operation: {
        type: "string",
        description: "What to do with the path",
        enum: ["read", "write", "list"],
        required: true,
      },
      path: { type: "string", description: "File or directory path", required: true },
      content: { type: "string", description: "Text to write (write only)" },
    },
    category: "side-effecting",
    handler: "file",
    requiresApproval: false,
    streamable: false,
    target: { kind: "path", param: "path" },
  },
  command_exec: {
    name: "command_exec",
    description: "Run an allowed command without a shell and return its output.",
    params: {
      command: { type: "string", description: "Executable name or path", required: true },
      arguments: { type: "string[]", description: "Arguments passed to the command", aliases: ["args"] },
      timeout: { type: "number", description: "Timeout in seconds", min: 1, max: 300 },
    },
    category: "side-effecting",
    handler: "command",
    requiresApproval: false,
    streamable: false,
    target: { kind: "command", param: "command" },
  },
};

export interface OpenAiTool {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: {
      readonly type: "object";
      readonly properties: Record<string, Record<string, unknown>>;
      readonly required: string[];
    };
  };
}

function jsonSchemaFor(spec: ParamSpec): Record<string, unknown> {
  const schema: Record<string, unknown> =
    spec.type === "string[]"
      ? { type: "array", items: { type: "string" } }
      : { type: spec.type };
  schema["description"] = spec.description;
  if (spec.enum) schema["enum"] = [...spec.enum];
  if (spec.min !== undefined) schema["minimum"] = spec.min;
  if (spec.max !== undefined) schema["maximum"] = spec.max;
  return schema;
}

export function toOpenAiTool(descriptor: ToolDescriptor): OpenAiTool {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];
  for (const [name, spec] of Object.entries(descriptor.params)) {
    properties[name] = jsonSchemaFor(spec);
    if (spec.required) required.push(name);
  }
  return {
    type: "function",
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: { type: "object", properties, required },
    },
  };
}
