import type { OperationType } from "../classifier/operation.js";
import { EXECUTION_MODES, type ExecutionMode } from "../config/types.js";
import { ConfigurationError } from "../errors.js";

/**
 * Set on plans where the visible answer is produced without tool access
 * but the user asked for stored information. The answer may be fabricated.
 */
export type PlanHazard = "unverified-read-answer";

export interface ExecutionPlan {
  readonly operationType: OperationType;
  readonly mode: ExecutionMode;
  readonly passCount: 1 | 2;
  readonly streamFirstPass: boolean;
  readonly toolsEnabledInPass: readonly boolean[];
  readonly hazard?: PlanHazard;
}

export function isExecutionMode(value: string): value is ExecutionMode {
  return EXECUTION_MODES.some((mode) => mode === value);
}

export function parseExecutionMode(value: string): ExecutionMode {
  if (!isExecutionMode(value)) {
    throw new ConfigurationError(
      `Invalid execution mode "${value}": expected one of ${EXECUTION_MODES.join(", ")}`,
    );
  }
  return value;
}

function singlePass(
  operationType: OperationType,
  mode: ExecutionMode,
  tools: boolean,
): ExecutionPlan {
  return {
    operationType,
    mode,
    passCount: 1,
    streamFirstPass: !tools,
    toolsEnabledInPass: [tools],
  };
}

function dualPass(operationType: OperationType, mode: ExecutionMode): ExecutionPlan {
  return {
    operationType,
    mode,
    passCount: 2,
    streamFirstPass: true,
    toolsEnabledInPass: [false, true],
  };
}

export function plan(
  operationType: OperationType,
  mode: string,
  toolsEnabled: boolean,
): ExecutionPlan {
  const execMode = parseExecutionMode(mode);

  if (!toolsEnabled) return singlePass(operationType, execMode, false);

  switch (execMode) {
    case "single_pass":
      return singlePass(operationType, execMode, true);

    case "dual_pass_write_only":
      if (operationType === "READ") return singlePass(operationType, execMode, true);
      if (operationType === "WRITE") return dualPass(operationType, execMode);
      return singlePass(operationType, execMode, false);

    case "dual_pass_all": {
      const shape = dualPass(operationType, execMode);
      return operationType === "READ" ? { ...shape, hazard: "unverified-read-answer" } : shape;
    }
  }
}
