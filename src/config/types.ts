export type ExecutionMode = "single_pass" | "dual_pass_write_only" | "dual_pass_all";

export const EXECUTION_MODES: readonly ExecutionMode[] = [
  "single_pass",
  "dual_pass_write_only",
  "dual_pass_all",
];

export interface ToolgateConfig {
  readonly inference: InferenceConfig;
  readonly execution: ExecutionConfig;
  readonly tools: Record<string, ToolRegistryEntry>;
  readonly memories: Record<string, MemoryRegistryEntry>;
  readonly registries?: RegistryFilesConfig;
  readonly server: ServerConfig;
  readonly audit: AuditConfig;
  readonly logging?: LoggingConfig;
}

export interface InferenceConfig {
  readonly baseUrl: string;
  readonly model: string;
  readonly apiKey?: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly requestTimeoutMs: number;
  /** Attempts per turn, including the first. 1 disables turn retries. */
  readonly turnAttempts: number;
}

export interface ExecutionConfig {
  readonly mode: ExecutionMode;
  /** Detect `<function=...>` calls embedded in plain model text. */
  readonly taggedCalls: boolean;
  readonly maxToolRounds: number;
  readonly defaultTimeoutSeconds: number;
  readonly timeoutCeilingSeconds: number;
}

export interface ToolRegistryEntry {
  readonly enabled: boolean;
  readonly requiresApproval: boolean;
  readonly whitelist: string[];
  readonly rootDirectory?: string;
  readonly timeoutSeconds?: number;
  /** file_access only: `rw` permits writes. */
  readonly mode?: "ro" | "rw";
}

export interface MemoryRegistryEntry {
  readonly enabled: boolean;
  readonly maxEntries: number;
  readonly directory: string;
}

export interface RegistryFilesConfig {
  readonly tools?: string;
  readonly memories?: string;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface AuditConfig {
  readonly enabled: boolean;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
