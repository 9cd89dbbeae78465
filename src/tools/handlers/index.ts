import type { MemoryRegistry } from "../../memory/registry.js";
import type { ToolHandlers } from "../dispatcher.js";
import { commandExecHandler } from "./command-exec.js";
import { fileAccessHandler } from "./file-access.js";
import { createMemoryHandlers } from "./memory.js";

export function createToolHandlers(memories: MemoryRegistry): ToolHandlers {
  return {
    ...createMemoryHandlers(memories),
    file_access: fileAccessHandler,
    command_exec: commandExecHandler,
  };
}
