import { createHash } from "node:crypto";
import type { ToolInvocationRequest } from "../protocol/normalizer.js";
import type { EnabledTool, TurnSnapshot } from "../tools/registry.js";
import { dangerousCommandRule, dangerousPathRule } from "./dangerous.js";
import {
  findWhitelistMatch,
  isRelativeTarget,
  isWithinRoot,
  resolveTarget,
} from "./patterns.js";

export type AllowReason = "whitelisted" | "unrestricted" | "approved";
export type DenyReason =
  | "tool-unavailable"
  | "not-whitelisted"
  | "outside-root"
  | "operation-not-permitted"
  | "dangerous-requires-approval"
  | "timeout-exceeded";

export interface SecurityDecision {
  readonly allowed: boolean;
  readonly reason: AllowReason | DenyReason;
  readonly toolName: string;
  readonly fingerprint: string;
  readonly requiresApproval: boolean;
  /** Seconds the dispatcher must enforce; 0 on denials. */
  readonly effectiveTimeoutSeconds: number;
  /** Resolved path or command the call acts on. */
  readonly target?: string;
  readonly message: string;
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** Identifies one exact call; approvals are recorded against it. */
export function fingerprintRequest(toolName: string, args: Readonly<Record<string, unknown>>): string {
  return createHash("sha256")
    .update(canonicalJson({ tool: toolName, arguments: args }))
    .digest("hex");
}

/**
 * The denial an approved decision becomes when its approval can no longer be
 * redeemed. Each grant admits exactly one dispatch.
 */
export function approvalSpent(decision: SecurityDecision): SecurityDecision {
  const denied: SecurityDecision = {
    ...decision,
    allowed: false,
    reason: "dangerous-requires-approval",
    requiresApproval: true,
    effectiveTimeoutSeconds: 0,
    message: `Approval ${decision.fingerprint.slice(0, 12)} for ${decision.toolName} was already used; approve it again to allow another call`,
  };
  return Object.freeze(denied);
}

function textArg(args: Readonly<Record<string, unknown>>, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = args[name];
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return undefined;
}

function listArg(args: Readonly<Record<string, unknown>>, ...names: string[]): string[] {
  for (const name of names) {
    const value = args[name];
    if (Array.isArray(value)) return value.map((item) => String(item));
    if (typeof value === "string" && value.trim() !== "") {
      const trimmed = value.trim();
      if (trimmed.startsWith("[")) {
        try {
          const parsed: unknown = JSON.parse(trimmed);
          if (Array.isArray(parsed)) return parsed.map((item) => String(item));
        } catch {
          // not JSON; fall through to comma splitting
        }
      }
      return trimmed.split(",").map((part) => part.trim()).filter((part) => part.length > 0);
    }
  }
  return [];
}

interface TargetCheck {
  readonly target?: string;
  readonly denial?: { reason: DenyReason; message: string };
  readonly dangerous?: string;
}

/**
 * Layered authorization for one tool call against a turn snapshot.
 * Holds no state of its own: the same request under the same snapshot always
 * yields an equal decision.
 */
export class PolicyEngine {
  constructor(private readonly snapshot: TurnSnapshot) {}

  authorize(request: ToolInvocationRequest): SecurityDecision {
    const fingerprint = fingerprintRequest(request.toolName, request.arguments);
    const base = { toolName: request.toolName, fingerprint };

    const tool = this.snapshot.tools.get(request.toolName);
    if (!tool) {
      return this.deny(base, "tool-unavailable", `Tool ${request.toolName} is not available`, false);
    }

    const check = this.checkTarget(tool, request.arguments);
    if (check.denial) {
      return this.deny(
        { ...base, target: check.target },
        check.denial.reason,
        check.denial.message,
        tool.entry.requiresApproval,
      );
    }

    const requiresApproval =
      tool.entry.requiresApproval || tool.descriptor.requiresApproval || check.dangerous !== undefined;
    const approved = requiresApproval && this.snapshot.approvals.has(fingerprint);

    if (requiresApproval && !approved) {
      const why = check.dangerous
        ? `targets a dangerous location (${check.dangerous})`
        : "requires operator approval";
      return this.deny(
        { ...base, target: check.target },
        "dangerous-requires-approval",
        `${request.toolName} ${why}; approve fingerprint ${fingerprint.slice(0, 12)} to allow it`,
        true,
      );
    }

    const { execution } = this.snapshot;
    const requested = "timeout" in tool.descriptor.params ? this.requestedTimeout(request.arguments) : undefined;
    if (requested !== undefined && requested > execution.timeoutCeilingSeconds) {
      return this.deny(
        { ...base, target: check.target },
        "timeout-exceeded",
        `Requested timeout ${requested}s exceeds the ${execution.timeoutCeilingSeconds}s ceiling`,
        requiresApproval,
      );
    }

    const effectiveTimeoutSeconds = Math.min(
      requested ?? tool.entry.timeoutSeconds ?? execution.defaultTimeoutSeconds,
      execution.timeoutCeilingSeconds,
    );

    const reason: AllowReason = approved
      ? "approved"
      : tool.descriptor.target
        ? "whitelisted"
        : "unrestricted";

    return Object.freeze({
      ...base,
      allowed: true,
      reason,
      requiresApproval,
      effectiveTimeoutSeconds,
      target: check.target,
      message: `${request.toolName} allowed (${reason})`,
    });
  }

  private deny(
    base: { toolName: string; fingerprint: string; target?: string },
    reason: DenyReason,
    message: string,
    requiresApproval: boolean,
  ): SecurityDecision {
    return Object.freeze({
      ...base,
      allowed: false,
      reason,
      requiresApproval,
      effectiveTimeoutSeconds: 0,
      message,
    });
  }

  private requestedTimeout(args: Readonly<Record<string, unknown>>): number | undefined {
    const raw = textArg(args, "timeout");
    if (raw === undefined || raw.trim() === "") return undefined;
    const value = Number(raw);
    return Number.isFinite(value) && value > 0 ? value : undefined;
  }

  private checkTarget(tool: EnabledTool, args: Readonly<Record<string, unknown>>): TargetCheck {
    const spec = tool.descriptor.target;
    if (!spec) return {};

    const raw = textArg(args, spec.param)?.trim();
    if (!raw) {
      return { denial: { reason: "not-whitelisted", message: `No ${spec.kind} given to ${tool.descriptor.name}` } };
    }

    const root = resolveTarget(tool.entry.rootDirectory ?? process.cwd(), "/");
    // Bare command names are looked up on PATH and never resolved against the root.
    const bareCommand = spec.kind === "command" && !raw.includes("/");
    const target = bareCommand ? raw : resolveTarget(raw, root);

    if (tool.entry.whitelist.length === 0) {
      return {
        target,
        denial: { reason: "not-whitelisted", message: `${tool.descriptor.name} has no whitelist entries` },
      };
    }
    if (!findWhitelistMatch(target, tool.entry.whitelist, root)) {
      return { target, denial: { reason: "not-whitelisted", message: `${raw} matches no whitelist entry` } };
    }

    if (!bareCommand && isRelativeTarget(raw) && !isWithinRoot(target, root)) {
      return { target, denial: { reason: "outside-root", message: `${raw} resolves outside ${root}` } };
    }

    if (tool.descriptor.name === "file_access" && textArg(args, "operation") === "write" && tool.entry.mode !== "rw") {
      return {
        target,
        denial: { reason: "operation-not-permitted", message: "file_access is read-only" },
      };
    }

    const dangerous =
      spec.kind === "path"
        ? dangerousPathRule(target)
        : dangerousCommandRule(raw, listArg(args, "arguments", "args"), root);

    return { target, dangerous };
  }
}
