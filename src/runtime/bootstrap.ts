import { AuditDB } from "../audit/db.js";
import { AuditLog } from "../audit/log.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { ToolgateConfig } from "../config/types.js";
import { HttpInferenceClient } from "../inference/client.js";
import type { InferenceClient } from "../inference/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MemoryRegistry } from "../memory/registry.js";
import { ApprovalStore } from "../policy/approvals.js";
import { ChatSession, type ChatSessionOptions } from "../session/coordinator.js";
import { ToolDispatcher } from "../tools/dispatcher.js";
import { createToolHandlers } from "../tools/handlers/index.js";
import { createTurnSnapshot, type TurnSnapshot } from "../tools/registry.js";

export interface RuntimeOptions {
  readonly configPath?: string;
  /** Use this configuration instead of loading one. */
  readonly config?: ToolgateConfig;
  readonly stateDir?: string;
  readonly logger?: Logger;
  readonly inference?: InferenceClient;
}

export interface Runtime {
  readonly config: ToolgateConfig;
  readonly logger: Logger;
  readonly stateDir: string;
  readonly memories: MemoryRegistry;
  readonly approvals: ApprovalStore;
  readonly audit: AuditLog | null;
  readonly dispatcher: ToolDispatcher;
  readonly inference: InferenceClient;
  /** Configuration snapshot with currently granted approvals. */
  snapshot(): Promise<TurnSnapshot>;
  createSession(overrides?: Partial<Pick<ChatSessionOptions, "systemPrompt" | "sessionId">>): ChatSession;
  close(): Promise<void>;
}

/**
 * Wires the components from configuration. Configuration problems throw
 * ConfigurationError here, before anything runs.
 */
export function createRuntime(opts: RuntimeOptions = {}): Runtime {
  const config = opts.config ?? loadConfig(opts.configPath);
  const logger = opts.logger ?? createLogger(config.logging);
  const stateDir = ensureDir(opts.stateDir ?? getStateDir());

  const memories = new MemoryRegistry(config.memories, logger, stateDir);
  const approvals = new ApprovalStore(stateDir);
  const auditDb = config.audit.enabled ? new AuditDB(stateDir) : null;
  const audit = auditDb ? new AuditLog(auditDb) : null;
  const dispatcher = new ToolDispatcher({ handlers: createToolHandlers(memories), logger });
  const inference = opts.inference ?? new HttpInferenceClient(config.inference, logger);
  const sessions: ChatSession[] = [];

  logger.info(
    {
      mode: config.execution.mode,
      tools: Object.keys(config.tools).filter((name) => config.tools[name]?.enabled),
      memories: memories.enabledNames(),
      audit: auditDb !== null,
    },
    "Runtime ready",
  );

  return {
    config,
    logger,
    stateDir,
    memories,
    approvals,
    audit,
    dispatcher,
    inference,

    async snapshot() {
      return createTurnSnapshot(config, await approvals.grantedFingerprints());
    },

    createSession(overrides) {
      const session = new ChatSession({
        config,
        inference,
        dispatcher,
        logger,
        approvals,
        audit: audit ?? undefined,
        systemPrompt: overrides?.systemPrompt,
        sessionId: overrides?.sessionId ?? `session-${Date.now().toString(36)}`,
      });
      sessions.push(session);
      return session;
    },

    async close() {
      await Promise.all(sessions.map((session) => session.drain()));
      auditDb?.close();
      logger.info("Runtime closed");
    },
  };
}
