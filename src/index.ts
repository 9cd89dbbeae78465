export { classify, type OperationType } from "./classifier/operation.js";
export { plan, parseExecutionMode, isExecutionMode, type ExecutionPlan, type PlanHazard } from "./strategy/planner.js";
export { scanTaggedCalls, type TaggedCall } from "./protocol/tagged-calls.js";
export {
  normalize,
  createRequest,
  type ModelResponse,
  type NativeToolCall,
  type NormalizeResult,
  type ToolInvocationRequest,
  type InvalidCall,
} from "./protocol/normalizer.js";
export { PolicyEngine, fingerprintRequest, type SecurityDecision } from "./policy/engine.js";
export { ApprovalStore, type ApprovalRecord } from "./policy/approvals.js";
export { MemoryStore } from "./memory/store.js";
export { MemoryRegistry } from "./memory/registry.js";
export type { MemoryEntry, MemoryKind, MemoryQuery, MemoryStats, StoreResult } from "./memory/types.js";
export { TOOL_CATALOG, TOOL_NAMES, type ToolDescriptor, type ToolName } from "./tools/descriptors.js";
export { createTurnSnapshot, type TurnSnapshot } from "./tools/registry.js";
export { ToolDispatcher, type DispatchOutcome } from "./tools/dispatcher.js";
export { createToolHandlers } from "./tools/handlers/index.js";
export { ChatSession, type TurnResult, type PassResult } from "./session/coordinator.js";
export { HttpInferenceClient } from "./inference/client.js";
export type { InferenceClient, ChatMessage } from "./inference/types.js";
export { createRuntime, type Runtime } from "./runtime/bootstrap.js";
export { ToolServer } from "./server/tool-server.js";
export { loadConfig } from "./config/loader.js";
export type { ToolgateConfig, ExecutionMode } from "./config/types.js";
export { ToolgateError, ConfigurationError, InferenceError, ToolError } from "./errors.js";
