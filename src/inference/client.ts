import { z } from "zod";
import type { InferenceConfig } from "../config/types.js";
import { errorMessage, InferenceError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { ModelResponse, NativeToolCall } from "../protocol/normalizer.js";
import type { ChatMessage, CompletionRequest, InferenceClient } from "./types.js";

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(null),
          tool_calls: z.array(toolCallSchema).nullable().optional(),
        }),
      }),
    )
    .min(1),
});

const chunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                index: z.number().int(),
                id: z.string().optional(),
                function: z
                  .object({ name: z.string().optional(), arguments: z.string().optional() })
                  .optional(),
              }),
            )
            .nullable()
            .optional(),
        })
        .default({}),
    }),
  ),
});

interface PartialCall {
  id: string;
  name: string;
  arguments: string;
}

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  const wire: Record<string, unknown> = { role: message.role, content: message.content };
  if (message.toolCalls && message.toolCalls.length > 0) {
    wire["tool_calls"] = message.toolCalls.map((call) => ({
      id: call.id,
      type: "function",
      function: { name: call.name, arguments: call.arguments },
    }));
  }
  if (message.toolCallId) wire["tool_call_id"] = message.toolCallId;
  if (message.name) wire["name"] = message.name;
  return wire;
}

/** OpenAI-compatible `/chat/completions` client over fetch. */
export class HttpInferenceClient implements InferenceClient {
  private readonly logger: Logger;

  constructor(
    private readonly config: InferenceConfig,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "inference" });
  }

  async complete(request: CompletionRequest): Promise<ModelResponse> {
    const response = await this.post(request, false);
    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new InferenceError(`Inference response is not JSON: ${errorMessage(err)}`, response.status, { cause: err });
    }

    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new InferenceError("Inference response has an unexpected shape", response.status);
    }

    const message = parsed.data.choices[0]?.message;
    const nativeCalls: NativeToolCall[] = (message?.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
    return { content: message?.content ?? null, nativeCalls };
  }

  async stream(request: CompletionRequest, onToken: (token: string) => void): Promise<ModelResponse> {
    const response = await this.post(request, true);
    if (!response.body) throw new InferenceError("Inference stream has no body", response.status);

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    const calls = new Map<number, PartialCall>();
    let content = "";
    let buffered = "";
    let done = false;

    const handleLine = (line: string): void => {
      const trimmed = line.trim();
      if (!trimmed.startsWith("data:")) return;
      const payload = trimmed.slice(5).trim();
      if (payload === "[DONE]") {
        done = true;
        return;
      }

      let json: unknown;
      try {
        json = JSON.parse(payload);
      } catch {
        this.logger.warn({ payload: payload.slice(0, 200) }, "Skipping malformed stream chunk");
        return;
      }
      const chunk = chunkSchema.safeParse(json);
      if (!chunk.success) return;

      for (const choice of chunk.data.choices) {
        const token = choice.delta.content;
        if (token) {
          content += token;
          onToken(token);
        }
        for (const delta of choice.delta.tool_calls ?? []) {
          const call = calls.get(delta.index) ?? { id: "", name: "", arguments: "" };
          if (delta.id) call.id = delta.id;
          if (delta.function?.name) call.name += delta.function.name;
          if (delta.function?.arguments) call.arguments += delta.function.arguments;
          calls.set(delta.index, call);
        }
      }
    };

    try {
      while (!done) {
        const { value, done: finished } = await reader.read();
        if (finished) break;
        buffered += decoder.decode(value, { stream: true });
        const lines = buffered.split("\n");
        buffered = lines.pop() ?? "";
        for (const line of lines) handleLine(line);
      }
      if (!done && buffered) handleLine(buffered);
    } catch (err) {
      throw new InferenceError(`Inference stream failed: ${errorMessage(err)}`, undefined, { cause: err });
    } finally {
      reader.releaseLock();
    }

    const nativeCalls = [...calls.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, call]) => ({ id: call.id || `call_${index}`, name: call.name, arguments: call.arguments }));
    return { content, nativeCalls };
  }

  private async post(request: CompletionRequest, stream: boolean): Promise<Response> {
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    const body: Record<string, unknown> = {
      model: this.config.model,
      messages: request.messages.map(toWireMessage),
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      stream,
    };
    if (request.tools && request.tools.length > 0) {
      body["tools"] = request.tools;
      body["tool_choice"] = "auto";
    }

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.apiKey) headers["Authorization"] = `Bearer ${this.config.apiKey}`;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });

    this.logger.debug({ url, stream, messages: request.messages.length }, "Calling inference endpoint");

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      throw new InferenceError(`Inference endpoint unreachable: ${errorMessage(err)}`, undefined, { cause: err });
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new InferenceError(
        `Inference endpoint returned ${response.status}${detail ? `: ${detail.slice(0, 500)}` : ""}`,
        response.status,
      );
    }
    return response;
  }
}
