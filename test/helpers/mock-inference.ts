import type { CompletionRequest, InferenceClient } from "../../src/inference/types.js";
import type { ModelResponse, NativeToolCall } from "../../src/protocol/normalizer.js";

export type ScriptStep =
  | ModelResponse
  | Error
  | ((request: CompletionRequest) => ModelResponse | Promise<ModelResponse>);

export interface RecordedCall {
  readonly request: CompletionRequest;
  readonly streamed: boolean;
}

export function text(content: string): ModelResponse {
  return { content, nativeCalls: [] };
}

export function toolCall(name: string, args: Record<string, unknown>, id = "call-1"): ModelResponse {
  const call: NativeToolCall = { id, name, arguments: JSON.stringify(args) };
  return { content: null, nativeCalls: [call] };
}

/**
 * Inference stand-in that replays scripted responses. Requests offering tools
 * take from the `withTools` script, others from `plain`, so concurrent passes
 * stay deterministic.
 */
export class ScriptedInference implements InferenceClient {
  readonly calls: RecordedCall[] = [];
  private readonly plain: ScriptStep[];
  private readonly withTools: ScriptStep[];

  constructor(script: { plain?: ScriptStep[]; withTools?: ScriptStep[] }) {
    this.plain = [...(script.plain ?? [])];
    this.withTools = [...(script.withTools ?? [])];
  }

  complete(request: CompletionRequest): Promise<ModelResponse> {
    return this.next(request, false);
  }

  async stream(request: CompletionRequest, onToken: (token: string) => void): Promise<ModelResponse> {
    const response = await this.next(request, true);
    if (response.content) {
      for (const token of response.content.split(/(?<= )/)) onToken(token);
    }
    return response;
  }

  get remaining(): number {
    return this.plain.length + this.withTools.length;
  }

  private async next(request: CompletionRequest, streamed: boolean): Promise<ModelResponse> {
    this.calls.push({ request, streamed });
    const queue = request.tools && request.tools.length > 0 ? this.withTools : this.plain;
    const step = queue.shift();
    if (step === undefined) throw new Error("Inference script exhausted");
    if (step instanceof Error) throw step;
    return typeof step === "function" ? step(request) : step;
  }
}
