import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { withFileLock } from "../utils/file-lock.js";
import type { ToolInvocationRequest } from "../protocol/normalizer.js";
import type { SecurityDecision } from "./engine.js";

export type ApprovalStatus = "pending" | "granted";

export interface ApprovalRecord {
  readonly fingerprint: string;
  readonly toolName: string;
  readonly arguments: Record<string, unknown>;
  readonly target?: string;
  readonly message: string;
  readonly status: ApprovalStatus;
  readonly requestedAt: number;
  readonly grantedAt?: number;
  readonly grantedBy?: string;
}

/**
 * Ledger of human approvals for calls the policy engine held back.
 * Fingerprints may be abbreviated to any unique prefix.
 */
export class ApprovalStore {
  readonly filePath: string;

  constructor(dataDir: string) {
    mkdirSync(dataDir, { recursive: true });
    this.filePath = join(dataDir, "approvals.json");
  }

  /** Records a pending approval; an existing record is returned unchanged. */
  async request(request: ToolInvocationRequest, decision: SecurityDecision): Promise<ApprovalRecord> {
    return withFileLock(this.filePath, async () => {
      const records = await this.readRecords();
      const existing = records.find((r) => r.fingerprint === decision.fingerprint);
      if (existing) return existing;

      const record: ApprovalRecord = {
        fingerprint: decision.fingerprint,
        toolName: request.toolName,
        arguments: { ...request.arguments },
        target: decision.target,
        message: decision.message,
        status: "pending",
        requestedAt: Date.now(),
      };
      records.push(record);
      await this.writeRecords(records);
      return record;
    });
  }

  async grant(fingerprint: string, grantedBy?: string): Promise<ApprovalRecord | null> {
    return withFileLock(this.filePath, async () => {
      const records = await this.readRecords();
      const index = this.findIndex(records, fingerprint);
      if (index === -1) return null;

      const current = records[index];
      if (!current) return null;
      const updated: ApprovalRecord = { ...current, status: "granted", grantedAt: Date.now(), grantedBy };
      records[index] = updated;
      await this.writeRecords(records);
      return updated;
    });
  }

  async revoke(fingerprint: string): Promise<boolean> {
    return withFileLock(this.filePath, async () => {
      const records = await this.readRecords();
      const index = this.findIndex(records, fingerprint);
      if (index === -1) return false;
      records.splice(index, 1);
      await this.writeRecords(records);
      return true;
    });
  }

  /** Removes a granted approval once its call has been dispatched. */
  async consume(fingerprint: string): Promise<boolean> {
    return withFileLock(this.filePath, async () => {
      const records = await this.readRecords();
      const filtered = records.filter((r) => !(r.fingerprint === fingerprint && r.status === "granted"));
      if (filtered.length === records.length) return false;
      await this.writeRecords(filtered);
      return true;
    });
  }

  async list(status?: ApprovalStatus): Promise<ApprovalRecord[]> {
    const records = await this.readRecords();
    return status ? records.filter((r) => r.status === status) : records;
  }

  async grantedFingerprints(): Promise<Set<string>> {
    const granted = await this.list("granted");
    return new Set(granted.map((r) => r.fingerprint));
  }

  private findIndex(records: ApprovalRecord[], fingerprint: string): number {
    const exact = records.findIndex((r) => r.fingerprint === fingerprint);
    if (exact !== -1 || fingerprint.length < 8) return exact;
    const matches = records.filter((r) => r.fingerprint.startsWith(fingerprint));
    if (matches.length !== 1) return -1;
    return records.findIndex((r) => r.fingerprint.startsWith(fingerprint));
  }

  private async readRecords(): Promise<ApprovalRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isApprovalRecord) : [];
  }

  private async writeRecords(records: ApprovalRecord[]): Promise<void> {
    await writeFile(this.filePath, JSON.stringify(records, null, 2));
  }
}

function isApprovalRecord(value: unknown): value is ApprovalRecord {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record["fingerprint"] === "string" &&
    typeof record["toolName"] === "string" &&
    (record["status"] === "pending" || record["status"] === "granted")
  );
}
