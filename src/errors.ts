export class ToolgateError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ToolgateError";
  }
}

/** Invalid or missing configuration. Fatal at startup, never retried. */
export class ConfigurationError extends ToolgateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIGURATION_ERROR", options);
    this.name = "ConfigurationError";
  }
}

/** A call to the chat-completion endpoint failed. */
export class InferenceError extends ToolgateError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, "INFERENCE_ERROR", options);
    this.name = "InferenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Raised by a tool handler; the dispatcher turns it into a failed outcome. */
export class ToolError extends ToolgateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TOOL_ERROR", options);
    this.name = "ToolError";
  }
}
