import type { Logger } from "../../logging/logger.js";
import type { SecurityDecision } from "../../policy/engine.js";
import type { ToolInvocationRequest } from "../../protocol/normalizer.js";
import type { EnabledTool, TurnSnapshot } from "../registry.js";

export interface HandlerContext {
  readonly request: ToolInvocationRequest;
  readonly decision: SecurityDecision;
  /** Arguments after coercion to the descriptor's declared types. */
  readonly args: Readonly<Record<string, unknown>>;
  readonly tool: EnabledTool;
  readonly snapshot: TurnSnapshot;
  /** Aborted when the call's deadline passes. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

export type ToolHandler = (ctx: HandlerContext) => Promise<unknown>;

export function stringArg(args: Readonly<Record<string, unknown>>, name: string): string | undefined {
  const value = args[name];
  return typeof value === "string" ? value : undefined;
}

export function numberArg(args: Readonly<Record<string, unknown>>, name: string): number | undefined {
  const value = args[name];
  return typeof value === "number" ? value : undefined;
}

export function listArg(args: Readonly<Record<string, unknown>>, name: string): string[] | undefined {
  const value = args[name];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}
