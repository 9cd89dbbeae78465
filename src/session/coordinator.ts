import { classify, type OperationType } from "../classifier/operation.js";
import type { ToolgateConfig } from "../config/types.js";
import { errorMessage, InferenceError } from "../errors.js";
import type { InferenceClient, ChatMessage } from "../inference/types.js";
import type { Logger } from "../logging/logger.js";
import type { AuditLog } from "../audit/log.js";
import type { ApprovalStore } from "../policy/approvals.js";
import { approvalSpent, PolicyEngine, type SecurityDecision } from "../policy/engine.js";
import { normalize, type InvalidCall, type ModelResponse, type ToolInvocationRequest } from "../protocol/normalizer.js";
import { plan, type ExecutionPlan } from "../strategy/planner.js";
import type { DispatchOutcome, ToolDispatcher } from "../tools/dispatcher.js";
import { createTurnSnapshot, toolsForPass, type TurnSnapshot } from "../tools/registry.js";
import { retry } from "../utils/retry.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { BackgroundTasks, type TaskHandle, type TaskSettlement } from "./background.js";

export interface ToolCallRecord {
  readonly pass: 1 | 2;
  readonly round: number;
  readonly request: ToolInvocationRequest;
  readonly decision: SecurityDecision;
  /** Absent when the policy engine denied the call. */
  readonly outcome?: DispatchOutcome;
}

export interface PassResult {
  readonly pass: 1 | 2;
  readonly text: string;
  readonly rounds: number;
  readonly toolCalls: readonly ToolCallRecord[];
  /** Messages the pass added after the user message. */
  readonly transcript: readonly ChatMessage[];
  /** True when the pass stopped at the tool round limit. */
  readonly exhausted: boolean;
}

export interface TurnResult {
  readonly turnId: string;
  readonly operationType: OperationType;
  readonly plan: ExecutionPlan;
  /** The answer shown to the user (pass 1). */
  readonly answer: string;
  readonly streamed: boolean;
  readonly toolCalls: readonly ToolCallRecord[];
  /** Pass 1 stopped at the tool round limit without a final answer. */
  readonly exhausted: boolean;
  /** Fingerprints recorded for operator approval during pass 1. */
  readonly pendingApprovals: readonly string[];
  /** Pass 2 of a dual-pass turn; not awaited by `send`. */
  readonly background?: TaskHandle<PassResult>;
}

export type BackgroundEvent = TaskSettlement<PassResult> & { readonly turnId: string };

export interface ChatSessionEvents {
  token: (token: string) => void;
  tool: (record: ToolCallRecord) => void;
  background: (event: BackgroundEvent) => void;
}

export interface ChatSessionOptions {
  readonly config: ToolgateConfig;
  readonly inference: InferenceClient;
  readonly dispatcher: ToolDispatcher;
  readonly logger: Logger;
  readonly approvals?: ApprovalStore;
  readonly audit?: AuditLog;
  readonly systemPrompt?: string;
  readonly sessionId?: string;
  /** Base delay between whole-turn retries. */
  readonly retryDelayMs?: number;
}

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant with a long-term memory. Use the memory tools to store facts the " +
  "user shares and to look them up before answering questions about the user. Only call tools " +
  "when they are offered to you.";

interface AttemptState {
  emitted: boolean;
  dispatched: boolean;
}

interface PassSpec {
  readonly pass: 1 | 2;
  readonly snapshot: TurnSnapshot;
  readonly messages: readonly ChatMessage[];
  readonly toolsEnabled: boolean;
  readonly stream: boolean;
  readonly pendingApprovals: string[];
}

function toolPayload(record: ToolCallRecord): string {
  const { decision, outcome } = record;
  if (!outcome) {
    return JSON.stringify({
      success: false,
      status: "refused",
      reason: decision.reason,
      error: decision.message,
    });
  }
  if (outcome.success) return JSON.stringify({ success: true, result: outcome.result ?? null });
  return JSON.stringify({
    success: false,
    status: outcome.status,
    error: outcome.error,
    ...(outcome.timeoutSeconds !== undefined ? { timeoutSeconds: outcome.timeoutSeconds } : {}),
  });
}

/**
 * Runs conversational turns: classify, plan, call the model, normalize its
 * calls, authorize, dispatch and feed results back until it answers.
 */
export class ChatSession extends TypedEventEmitter<ChatSessionEvents> {
  private readonly opts: ChatSessionOptions;
  private readonly logger: Logger;
  private readonly background: BackgroundTasks;
  private readonly messages: ChatMessage[] = [];
  private turnCounter = 0;

  constructor(opts: ChatSessionOptions) {
    super();
    this.opts = opts;
    this.logger = opts.logger.child({ component: "chat-session", sessionId: opts.sessionId });
    this.background = new BackgroundTasks(this.logger);
    this.onListenerError((err, event) => this.logger.error({ err, event }, "Session listener threw"));
    this.messages.push({ role: "system", content: opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT });
  }

  get history(): readonly ChatMessage[] {
    return [...this.messages];
  }

  get pendingBackground(): number {
    return this.background.size;
  }

  /** Clears the conversation, keeping the system prompt. */
  reset(): void {
    this.messages.splice(1);
  }

  /** Waits for every background pass started so far. */
  drain(): Promise<void> {
    return this.background.drain();
  }

  async send(text: string): Promise<TurnResult> {
    const turnId = `turn-${++this.turnCounter}`;
    const granted = this.opts.approvals ? await this.opts.approvals.grantedFingerprints() : [];
    const snapshot = createTurnSnapshot(this.opts.config, granted);

    const operationType = classify(text);
    const turnPlan = plan(operationType, snapshot.execution.mode, snapshot.tools.size > 0);
    this.logger.info(
      { turnId, operationType, passCount: turnPlan.passCount, streamed: turnPlan.streamFirstPass },
      "Turn planned",
    );
    if (turnPlan.hazard) {
      this.logger.warn(
        { turnId, mode: turnPlan.mode, hazard: turnPlan.hazard },
        "Visible answer to this lookup is produced without tool access and may be wrong",
      );
    }

    this.messages.push({ role: "user", content: text });
    const upToUser = [...this.messages];
    const pendingApprovals: string[] = [];

    let first: PassResult;
    try {
      first = await this.runPassWithRetry({
        pass: 1,
        snapshot,
        messages: upToUser,
        toolsEnabled: turnPlan.toolsEnabledInPass[0] ?? false,
        stream: turnPlan.streamFirstPass,
        pendingApprovals,
      });
    } catch (err) {
      // The turn never happened as far as the history is concerned.
      this.messages.pop();
      throw err;
    }
    this.messages.push(...first.transcript);

    let background: TaskHandle<PassResult> | undefined;
    if (turnPlan.passCount === 2) {
      const spec: PassSpec = {
        pass: 2,
        snapshot,
        messages: upToUser,
        toolsEnabled: turnPlan.toolsEnabledInPass[1] ?? true,
        stream: false,
        pendingApprovals: [],
      };
      background = this.background.spawn(
        `${turnId}:pass-2`,
        () => this.runPassWithRetry(spec),
        (settlement) => this.emit("background", { ...settlement, turnId }),
      );
    }

    return {
      turnId,
      operationType,
      plan: turnPlan,
      answer: first.text,
      streamed: turnPlan.streamFirstPass,
      toolCalls: first.toolCalls,
      exhausted: first.exhausted,
      pendingApprovals,
      background,
    };
  }

  /**
   * A failed inference call retries the whole pass, but only while nothing
   * observable has happened: no token shown, no tool run.
   */
  private async runPassWithRetry(spec: PassSpec): Promise<PassResult> {
    let state: AttemptState = { emitted: false, dispatched: false };
    return retry(
      () => {
        state = { emitted: false, dispatched: false };
        return this.runPass(spec, state);
      },
      {
        maxAttempts: this.opts.config.inference.turnAttempts,
        baseDelayMs: this.opts.retryDelayMs ?? 500,
        shouldRetry: (err) => err instanceof InferenceError && !state.emitted && !state.dispatched,
        onRetry: (err, attempt) =>
          this.logger.warn({ pass: spec.pass, attempt: attempt + 1, err: errorMessage(err) }, "Retrying pass"),
      },
    );
  }

  private async runPass(spec: PassSpec, state: AttemptState): Promise<PassResult> {
    const { snapshot, pass } = spec;
    const conversation: ChatMessage[] = [...spec.messages];
    const transcript: ChatMessage[] = [];
    const toolCalls: ToolCallRecord[] = [];
    const tools = spec.toolsEnabled ? toolsForPass(snapshot, spec.stream) : [];
    const knownTools = new Set(snapshot.tools.keys());
    const maxRounds = snapshot.execution.maxToolRounds;

    const append = (message: ChatMessage): void => {
      conversation.push(message);
      transcript.push(message);
    };

    let lastText = "";
    for (let round = 1; round <= maxRounds; round++) {
      const response = await this.callModel(conversation, tools, spec.stream, state);

      if (tools.length === 0) {
        const text = (response.content ?? "").trim();
        append({ role: "assistant", content: text });
        return { pass, text, rounds: round, toolCalls, transcript, exhausted: false };
      }

      const normalized = normalize(response, {
        knownTools,
        taggedCalls: snapshot.execution.taggedCalls,
        pass,
        round,
      });
      lastText = normalized.text;

      if (normalized.requests.length === 0 && normalized.invalid.length === 0) {
        append({ role: "assistant", content: normalized.text });
        return { pass, text: normalized.text, rounds: round, toolCalls, transcript, exhausted: false };
      }

      append({
        role: "assistant",
        content: normalized.text || null,
        toolCalls: [
          ...normalized.requests.map((request) => ({
            id: request.callId,
            name: request.toolName,
            arguments: JSON.stringify(request.arguments),
          })),
          ...normalized.invalid.map((call) => ({ id: call.callId, name: call.toolName, arguments: "{}" })),
        ],
      });

      for (const call of normalized.invalid) {
        append(this.invalidCallMessage(call));
      }
      for (const request of normalized.requests) {
        const record = await this.execute(request, snapshot, state, spec.pendingApprovals, round);
        toolCalls.push(record);
        this.emit("tool", record);
        append({ role: "tool", toolCallId: request.callId, name: request.toolName, content: toolPayload(record) });
      }
    }

    this.logger.warn({ pass, maxRounds }, "Tool round limit reached before a final answer");
    return { pass, text: lastText, rounds: maxRounds, toolCalls, transcript, exhausted: true };
  }

  private async callModel(
    messages: readonly ChatMessage[],
    tools: ReturnType<typeof toolsForPass>,
    stream: boolean,
    state: AttemptState,
  ): Promise<ModelResponse> {
    const request = { messages: [...messages], tools };
    if (!stream) return this.opts.inference.complete(request);
    return this.opts.inference.stream(request, (token) => {
      state.emitted = true;
      this.emit("token", token);
    });
  }

  private invalidCallMessage(call: InvalidCall): ChatMessage {
    return {
      role: "tool",
      toolCallId: call.callId,
      name: call.toolName,
      content: JSON.stringify({ success: false, status: "invalid-arguments", error: call.error }),
    };
  }

  private async execute(
    request: ToolInvocationRequest,
    snapshot: TurnSnapshot,
    state: AttemptState,
    pendingApprovals: string[],
    round: number,
  ): Promise<ToolCallRecord> {
    const pass = request.origin.pass;
    let decision = new PolicyEngine(snapshot).authorize(request);
    if (decision.reason === "approved") decision = await this.redeem(decision);
    this.audit((log) => log.recordDecision(request, decision, this.opts.sessionId));

    if (!decision.allowed) {
      this.logger.warn(
        { tool: request.toolName, reason: decision.reason, target: decision.target, pass },
        "Tool call denied",
      );
      if (decision.reason === "dangerous-requires-approval" && this.opts.approvals) {
        try {
          await this.opts.approvals.request(request, decision);
          pendingApprovals.push(decision.fingerprint);
        } catch (err) {
          this.logger.error({ err, fingerprint: decision.fingerprint }, "Could not record pending approval");
        }
      }
      return { pass, round, request, decision };
    }

    state.dispatched = true;
    const outcome = await this.opts.dispatcher.dispatch(request, decision, snapshot);
    this.audit((log) => log.recordOutcome(request, outcome, this.opts.sessionId));
    return { pass, round, request, decision, outcome };
  }

  /** Consumes the grant before dispatch; a grant already used by an earlier call denies this one. */
  private async redeem(decision: SecurityDecision): Promise<SecurityDecision> {
    if (!this.opts.approvals) return approvalSpent(decision);
    try {
      if (await this.opts.approvals.consume(decision.fingerprint)) return decision;
    } catch (err) {
      this.logger.error({ err, fingerprint: decision.fingerprint }, "Could not consume approval");
    }
    return approvalSpent(decision);
  }

  private audit(write: (log: AuditLog) => void): void {
    if (!this.opts.audit) return;
    try {
      write(this.opts.audit);
    } catch (err) {
      this.logger.error({ err }, "Audit write failed");
    }
  }
}
