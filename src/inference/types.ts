import type { ModelResponse, NativeToolCall } from "../protocol/normalizer.js";
import type { OpenAiTool } from "../tools/descriptors.js";

export type ChatRole = "system" | "user" | "assistant" | "tool";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string | null;
  /** Calls the assistant made in this message. */
  readonly toolCalls?: readonly NativeToolCall[];
  /** On `tool` messages, the call being answered. */
  readonly toolCallId?: string;
  readonly name?: string;
}

export interface CompletionRequest {
  readonly messages: readonly ChatMessage[];
  readonly tools?: readonly OpenAiTool[];
  readonly signal?: AbortSignal;
}

/**
 * The chat-completion endpoint. Each method is one fallible call; retries are
 * the caller's decision.
 */
export interface InferenceClient {
  complete(request: CompletionRequest): Promise<ModelResponse>;
  /** Streams content tokens as they arrive and resolves with the whole response. */
  stream(request: CompletionRequest, onToken: (token: string) => void): Promise<ModelResponse>;
}
