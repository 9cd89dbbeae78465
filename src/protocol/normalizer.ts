import { scanTaggedCalls } from "./tagged-calls.js";

export interface NativeToolCall {
  readonly id: string;
  readonly name: string;
  /** JSON-encoded argument object, as sent by chat-completion endpoints. */
  readonly arguments: string;
}

export interface ModelResponse {
  readonly content: string | null;
  readonly nativeCalls: readonly NativeToolCall[];
}

export type CallFormat = "native" | "tagged";

export interface CallOrigin {
  readonly pass: 1 | 2;
  readonly round: number;
  readonly format: CallFormat;
}

export interface ToolInvocationRequest {
  readonly callId: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly origin: CallOrigin;
}

/** A native call whose arguments could not be decoded. */
export interface InvalidCall {
  readonly callId: string;
  readonly toolName: string;
  readonly error: string;
}

export interface NormalizeResult {
  readonly text: string;
  readonly requests: readonly ToolInvocationRequest[];
  readonly invalid: readonly InvalidCall[];
  readonly format: CallFormat | "none";
}

export interface NormalizeContext {
  readonly knownTools: ReadonlySet<string>;
  readonly taggedCalls: boolean;
  readonly pass: 1 | 2;
  readonly round: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createRequest(
  callId: string,
  toolName: string,
  args: Readonly<Record<string, unknown>>,
  origin: CallOrigin,
): ToolInvocationRequest {
  return Object.freeze({
    callId,
    toolName,
    arguments: Object.freeze({ ...args }),
    origin: Object.freeze({ ...origin }),
  });
}

function decodeArguments(raw: string): Record<string, unknown> | string {
  if (raw.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return `Arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}`;
  }
  return isPlainObject(parsed) ? parsed : "Arguments must be a JSON object";
}

export function normalize(response: ModelResponse, ctx: NormalizeContext): NormalizeResult {
  const content = response.content ?? "";

  // Native calls win outright; tagged text in the same response is left as prose.
  if (response.nativeCalls.length > 0) {
    const requests: ToolInvocationRequest[] = [];
    const invalid: InvalidCall[] = [];
    for (const call of response.nativeCalls) {
      const args = decodeArguments(call.arguments);
      if (typeof args === "string") {
        invalid.push({ callId: call.id, toolName: call.name, error: args });
        continue;
      }
      requests.push(
        createRequest(call.id, call.name, args, { pass: ctx.pass, round: ctx.round, format: "native" }),
      );
    }
    return { text: content.trim(), requests, invalid, format: "native" };
  }

  if (!ctx.taggedCalls || !content.includes("<function=")) {
    return { text: content.trim(), requests: [], invalid: [], format: "none" };
  }

  const scan = scanTaggedCalls(content, ctx.knownTools);
  if (scan.calls.length === 0) {
    return { text: content.trim(), requests: [], invalid: [], format: "none" };
  }

  const requests = scan.calls.map((call, index) =>
    createRequest(`tagged-${ctx.pass}-${ctx.round}-${index}`, call.name, call.arguments, {
      pass: ctx.pass,
      round: ctx.round,
      format: "tagged",
    }),
  );
  return { text: scan.text, requests, invalid: [], format: "tagged" };
}
