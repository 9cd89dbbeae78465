import type Database from "better-sqlite3";
import type { SecurityDecision } from "../policy/engine.js";
import type { ToolInvocationRequest } from "../protocol/normalizer.js";
import type { DispatchOutcome, DispatchStatus } from "../tools/dispatcher.js";
import type { AuditDB } from "./db.js";

export interface PolicyLogEntry {
  readonly id: number;
  readonly timestamp: number;
  readonly sessionId: string | null;
  readonly callId: string | null;
  readonly tool: string;
  readonly fingerprint: string;
  readonly allowed: boolean;
  readonly reason: string;
  readonly target: string | null;
  readonly message: string | null;
}

export interface ToolAuditEntry {
  readonly id: number;
  readonly timestamp: number;
  readonly sessionId: string | null;
  readonly callId: string;
  readonly tool: string;
  readonly pass: number | null;
  readonly args: string | null;
  readonly status: DispatchStatus;
  readonly result: string | null;
  readonly durationMs: number | null;
}

interface PolicyRow {
  id: number;
  timestamp: number;
  session_id: string | null;
  call_id: string | null;
  tool: string;
  fingerprint: string;
  allowed: number;
  reason: string;
  target: string | null;
  message: string | null;
}

interface ToolRow {
  id: number;
  timestamp: number;
  session_id: string | null;
  call_id: string;
  tool: string;
  pass: number | null;
  args: string | null;
  status: DispatchStatus;
  result: string | null;
  duration_ms: number | null;
}

/** Longest result text kept per row. */
const MAX_RESULT_CHARS = 4_000;

function truncate(text: string): string {
  return text.length > MAX_RESULT_CHARS ? `${text.slice(0, MAX_RESULT_CHARS)}…` : text;
}

export class AuditLog {
  private readonly db: Database.Database;

  constructor(auditDb: AuditDB) {
    this.db = auditDb.raw();
  }

  recordDecision(
    request: ToolInvocationRequest,
    decision: SecurityDecision,
    sessionId?: string,
  ): void {
    this.db
      .prepare(
        `INSERT INTO policy_log (timestamp, session_id, call_id, tool, fingerprint, allowed, reason, target, message)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        Date.now(),
        sessionId ?? null,
        request.callId,
        decision.toolName,
        decision.fingerprint,
        decision.allowed ? 1 : 0,
        decision.reason,
        decision.target ?? null,
        decision.message,
      );
  }

  recordOutcome(
    request: ToolInvocationRequest,
    outcome: DispatchOutcome,
    sessionId?: string,
  ): void {
    const result = outcome.success ? JSON.stringify(outcome.result ?? null) : outcome.error ?? null;
    this.db
      .prepare(
        `INSERT INTO tool_audit (timestamp, session_id, call_id, tool, pass, args, status, result, duration_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        Date.now(),
        sessionId ?? null,
        outcome.callId,
        outcome.toolName,
        request.origin.pass,
        JSON.stringify(request.arguments),
        outcome.status,
        result === null ? null : truncate(result),
        outcome.durationMs,
      );
  }

  listDecisions(params: { limit?: number } = {}): PolicyLogEntry[] {
    return this.db
      .prepare<[number], PolicyRow>("SELECT * FROM policy_log ORDER BY id DESC LIMIT ?")
      .all(params.limit ?? 50)
      .map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        sessionId: row.session_id,
        callId: row.call_id,
        tool: row.tool,
        fingerprint: row.fingerprint,
        allowed: row.allowed === 1,
        reason: row.reason,
        target: row.target,
        message: row.message,
      }));
  }

  listOutcomes(params: { limit?: number } = {}): ToolAuditEntry[] {
    return this.db
      .prepare<[number], ToolRow>("SELECT * FROM tool_audit ORDER BY id DESC LIMIT ?")
      .all(params.limit ?? 50)
      .map((row) => ({
        id: row.id,
        timestamp: row.timestamp,
        sessionId: row.session_id,
        callId: row.call_id,
        tool: row.tool,
        pass: row.pass,
        args: row.args,
        status: row.status,
        result: row.result,
        durationMs: row.duration_ms,
      }));
  }
}
