import { errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { fingerprintRequest, type SecurityDecision } from "../policy/engine.js";
import type { ToolInvocationRequest } from "../protocol/normalizer.js";
import { coerceArguments } from "./coerce.js";
import { isToolName, type ToolName } from "./descriptors.js";
import type { ToolHandler } from "./handlers/types.js";
import type { TurnSnapshot } from "./registry.js";

export type DispatchStatus = "success" | "refused" | "invalid-arguments" | "failed" | "timed-out";

export interface DispatchOutcome {
  readonly callId: string;
  readonly toolName: string;
  readonly success: boolean;
  readonly status: DispatchStatus;
  readonly result?: unknown;
  readonly error?: string;
  /** The limit that was exceeded, on `timed-out`. */
  readonly timeoutSeconds?: number;
  readonly durationMs: number;
}

export type ToolHandlers = Readonly<Record<ToolName, ToolHandler>>;

export interface ToolDispatcherOptions {
  readonly handlers: ToolHandlers;
  readonly logger: Logger;
  /** Called after every dispatch, including refusals. */
  readonly onOutcome?: (request: ToolInvocationRequest, outcome: DispatchOutcome) => void;
}

class DeadlineExceeded extends Error {
  constructor(readonly timeoutSeconds: number) {
    super(`Timed out after ${timeoutSeconds}s`);
    this.name = "DeadlineExceeded";
  }
}

/**
 * Runs calls the policy engine already approved. It never re-evaluates
 * policy, but refuses any call whose decision is not a pass for that exact
 * request.
 */
export class ToolDispatcher {
  private readonly handlers: ToolHandlers;
  private readonly logger: Logger;
  private readonly onOutcome?: ToolDispatcherOptions["onOutcome"];

  constructor(opts: ToolDispatcherOptions) {
    this.handlers = opts.handlers;
    this.logger = opts.logger.child({ component: "dispatcher" });
    this.onOutcome = opts.onOutcome;
  }

  async dispatch(
    request: ToolInvocationRequest,
    decision: SecurityDecision,
    snapshot: TurnSnapshot,
  ): Promise<DispatchOutcome> {
    const started = Date.now();
    const finish = (fields: Omit<DispatchOutcome, "callId" | "toolName" | "durationMs">): DispatchOutcome => {
      const outcome: DispatchOutcome = {
        callId: request.callId,
        toolName: request.toolName,
        durationMs: Date.now() - started,
        ...fields,
      };
      this.report(request, outcome);
      return outcome;
    };

    const refusal = this.refusalReason(request, decision);
    const tool = snapshot.tools.get(request.toolName);
    if (refusal || !tool || !isToolName(request.toolName)) {
      return finish({
        success: false,
        status: "refused",
        error: refusal ?? `Tool ${request.toolName} is not available`,
      });
    }

    const coerced = coerceArguments(tool.descriptor, request.arguments);
    if (!coerced.ok) {
      return finish({ success: false, status: "invalid-arguments", error: coerced.error });
    }

    const handler = this.handlers[request.toolName];
    const timeoutSeconds = decision.effectiveTimeoutSeconds;
    const controller = new AbortController();

    try {
      const result = await this.withDeadline(
        controller,
        timeoutSeconds,
        handler({
          request,
          decision,
          args: coerced.args,
          tool,
          snapshot,
          signal: controller.signal,
          logger: this.logger,
        }),
      );
      return finish({ success: true, status: "success", result });
    } catch (err) {
      if (err instanceof DeadlineExceeded) {
        return finish({
          success: false,
          status: "timed-out",
          error: `${request.toolName} did not finish within ${timeoutSeconds}s`,
          timeoutSeconds,
        });
      }
      return finish({ success: false, status: "failed", error: errorMessage(err) });
    }
  }

  private refusalReason(request: ToolInvocationRequest, decision: SecurityDecision): string | undefined {
    if (!decision.allowed) return `Not authorized: ${decision.message}`;
    if (
      decision.toolName !== request.toolName ||
      decision.fingerprint !== fingerprintRequest(request.toolName, request.arguments)
    ) {
      return "Authorization was issued for a different call";
    }
    if (decision.effectiveTimeoutSeconds <= 0) return "Authorization carries no timeout";
    return undefined;
  }

  /** Aborts the handler's signal at the deadline so it stops its own work. */
  private withDeadline<T>(
    controller: AbortController,
    timeoutSeconds: number,
    work: Promise<T>,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort(new DeadlineExceeded(timeoutSeconds));
        reject(new DeadlineExceeded(timeoutSeconds));
      }, timeoutSeconds * 1000);

      void work.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(controller.signal.aborted ? new DeadlineExceeded(timeoutSeconds) : err);
        },
      );
    });
  }

  private report(request: ToolInvocationRequest, outcome: DispatchOutcome): void {
    const fields = {
      callId: outcome.callId,
      tool: outcome.toolName,
      status: outcome.status,
      durationMs: outcome.durationMs,
    };
    if (outcome.status === "success") {
      this.logger.info(fields, "Tool call completed");
    } else if (outcome.status === "failed") {
      this.logger.error({ ...fields, error: outcome.error }, "Tool call failed");
    } else {
      this.logger.warn({ ...fields, error: outcome.error }, "Tool call not completed");
    }

    try {
      this.onOutcome?.(request, outcome);
    } catch (err) {
      this.logger.error({ err, callId: outcome.callId }, "Outcome observer threw");
    }
  }
}
