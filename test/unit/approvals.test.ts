import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, rmSync, writeFileSync } from "node:fs";
import { ApprovalStore } from "../../src/policy/approvals.js";
import { PolicyEngine } from "../../src/policy/engine.js";
import { createTurnSnapshot } from "../../src/tools/registry.js";
import { makeConfig, makeRequest, makeTempDir } from "../helpers/fixtures.js";

const config = makeConfig({
  tools: { command_exec: { enabled: true, whitelist: ["rm"], rootDirectory: "/work" } },
});

function heldCall(target: string) {
  const request = makeRequest("command_exec", { command: "rm", arguments: ["-rf", target] });
  return { request, decision: new PolicyEngine(createTurnSnapshot(config)).authorize(request) };
}

describe("ApprovalStore", () => {
  let dir: string;
  let store: ApprovalStore;

  beforeEach(() => {
    dir = makeTempDir("toolgate-approvals-");
    store = new ApprovalStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty", async () => {
    expect(await store.list()).toEqual([]);
  });

  it("records a pending request once per fingerprint", async () => {
    const { request, decision } = heldCall("build");
    const first = await store.request(request, decision);
    const again = await store.request(request, decision);

    expect(again).toEqual(first);
    expect(first).toMatchObject({
      fingerprint: decision.fingerprint,
      toolName: "command_exec",
      arguments: { command: "rm", arguments: ["-rf", "build"] },
      target: "rm",
      status: "pending",
    });
    expect(await store.list("pending")).toHaveLength(1);
  });

  it("grants by unique prefix and reports granted fingerprints", async () => {
    const { request, decision } = heldCall("build");
    await store.request(request, decision);

    const granted = await store.grant(decision.fingerprint.slice(0, 12), "operator");

    expect(granted).toMatchObject({ status: "granted", grantedBy: "operator" });
    expect(await store.grantedFingerprints()).toEqual(new Set([decision.fingerprint]));
    expect(await store.list("pending")).toEqual([]);
  });

  it("ignores prefixes shorter than eight characters", async () => {
    const { request, decision } = heldCall("build");
    await store.request(request, decision);
    expect(await store.grant(decision.fingerprint.slice(0, 6))).toBeNull();
  });

  it("lets a granted call through the policy engine", async () => {
    const { request, decision } = heldCall("build");
    await store.request(request, decision);
    await store.grant(decision.fingerprint);

    const snapshot = createTurnSnapshot(config, await store.grantedFingerprints());
    expect(new PolicyEngine(snapshot).authorize(request).reason).toBe("approved");
  });

  it("consumes only granted approvals", async () => {
    const { request, decision } = heldCall("build");
    await store.request(request, decision);

    expect(await store.consume(decision.fingerprint)).toBe(false);
    await store.grant(decision.fingerprint);
    expect(await store.consume(decision.fingerprint)).toBe(true);
    expect(await store.list()).toEqual([]);
  });

  it("revokes records", async () => {
    const { request, decision } = heldCall("dist");
    await store.request(request, decision);

    expect(await store.revoke(decision.fingerprint)).toBe(true);
    expect(await store.revoke(decision.fingerprint)).toBe(false);
  });

  it("persists to approvals.json", async () => {
    const { request, decision } = heldCall("build");
    await store.request(request, decision);

    const onDisk: unknown = JSON.parse(readFileSync(store.filePath, "utf-8"));
    expect(onDisk).toEqual([expect.objectContaining({ fingerprint: decision.fingerprint })]);
    expect(await new ApprovalStore(dir).list()).toHaveLength(1);
  });

  it("drops malformed records", async () => {
    writeFileSync(store.filePath, JSON.stringify([{ fingerprint: 3 }, "junk"]));
    expect(await store.list()).toEqual([]);
  });
});
