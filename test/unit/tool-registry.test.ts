import { describe, it, expect } from "vitest";
import { createTurnSnapshot, toolsForPass } from "../../src/tools/registry.js";
import { toOpenAiTool, TOOL_CATALOG } from "../../src/tools/descriptors.js";
import { makeConfig } from "../helpers/fixtures.js";

describe("createTurnSnapshot", () => {
  it("enables memory tools only when a memory instance is enabled", () => {
    const without = createTurnSnapshot(makeConfig());
    expect(without.tools.size).toBe(0);
    expect(without.memory).toBeUndefined();

    const withMemory = createTurnSnapshot(
      makeConfig({ memories: { main: { enabled: true, directory: "/tmp/m" } } }),
    );
    expect([...withMemory.tools.keys()]).toEqual([
      "add_memory",
      "search_memories",
      "get_memory",
      "update_memory",
      "delete_memory",
      "get_memory_stats",
    ]);
    expect(withMemory.memory?.name).toBe("main");
  });

  it("honors a configured memory tool entry", () => {
    const snapshot = createTurnSnapshot(
      makeConfig({
        memories: { main: { enabled: true, directory: "/tmp/m" } },
        tools: { delete_memory: { enabled: false } },
      }),
    );
    expect(snapshot.tools.has("delete_memory")).toBe(false);
    expect(snapshot.tools.has("add_memory")).toBe(true);
  });

  it("enables other tools from their registry entry", () => {
    const snapshot = createTurnSnapshot(
      makeConfig({ tools: { command_exec: { enabled: true, whitelist: ["echo"] }, file_access: { enabled: false } } }),
    );
    expect([...snapshot.tools.keys()]).toEqual(["command_exec"]);
  });

  it("is isolated from later configuration changes", () => {
    const whitelist = ["echo"];
    const snapshot = createTurnSnapshot(makeConfig({ tools: { command_exec: { enabled: true, whitelist } } }));
    whitelist.push("rm");

    const entry = snapshot.tools.get("command_exec")?.entry;
    expect(entry?.whitelist).toEqual(["echo"]);
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it("records granted approvals", () => {
    const snapshot = createTurnSnapshot(makeConfig(), ["abc"]);
    expect(snapshot.approvals.has("abc")).toBe(true);
  });
});

describe("toolsForPass", () => {
  const snapshot = createTurnSnapshot(makeConfig({ memories: { main: { enabled: true, directory: "/tmp/m" } } }));

  it("offers every enabled tool to unstreamed passes", () => {
    expect(toolsForPass(snapshot, false)).toHaveLength(6);
  });

  it("offers no tools to streamed passes since none stream", () => {
    expect(toolsForPass(snapshot, true)).toEqual([]);
  });
});

describe("toOpenAiTool", () => {
  it("describes parameters as JSON schema", () => {
    const tool = toOpenAiTool(TOOL_CATALOG.command_exec);
    expect(tool.function.name).toBe("command_exec");
    expect(tool.function.parameters.required).toEqual(["command"]);
    expect(tool.function.parameters.properties["arguments"]).toEqual({
      type: "array",
      items: { type: "string" },
      description: "Arguments passed to the command",
    });
    expect(tool.function.parameters.properties["timeout"]).toMatchObject({ minimum: 1, maximum: 300 });
  });
});
