import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseConfig } from "../../src/config/schema.js";
import type { ToolgateConfig } from "../../src/config/types.js";
import { createRequest, type ToolInvocationRequest } from "../../src/protocol/normalizer.js";

export function makeTempDir(prefix = "toolgate-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Builds a validated config; audit is off unless the raw input turns it on. */
export function makeConfig(raw: Record<string, unknown> = {}): ToolgateConfig {
  return parseConfig({ audit: { enabled: false }, ...raw });
}

/** Config with one enabled memory instance under `dir`. */
export function makeMemoryConfig(
  dir: string,
  execution: Record<string, unknown> = {},
  extra: Record<string, unknown> = {},
): ToolgateConfig {
  return makeConfig({
    execution,
    memories: { main: { enabled: true, directory: join(dir, "memory"), maxEntries: 100 } },
    ...extra,
  });
}

export function makeRequest(
  toolName: string,
  args: Record<string, unknown> = {},
  callId = "call-1",
): ToolInvocationRequest {
  return createRequest(callId, toolName, args, { pass: 1, round: 1, format: "native" });
}
