import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS policy_log (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp   INTEGER NOT NULL,
  session_id  TEXT,
  call_id     TEXT,
  tool        TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  allowed     INTEGER NOT NULL CHECK(allowed IN (0, 1)),
  reason      TEXT NOT NULL,
  target      TEXT,
  message     TEXT
);
CREATE INDEX IF NOT EXISTS idx_policy_log_timestamp ON policy_log(timestamp);

CREATE TABLE IF NOT EXISTS tool_audit (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp   INTEGER NOT NULL,
  session_id  TEXT,
  call_id     TEXT NOT NULL,
  tool        TEXT NOT NULL,
  pass        INTEGER,
  args        TEXT,
  status      TEXT NOT NULL CHECK(status IN ('success','refused','invalid-arguments','failed','timed-out')),
  result      TEXT,
  duration_ms INTEGER
);
CREATE INDEX IF NOT EXISTS idx_tool_audit_timestamp ON tool_audit(timestamp);
`;

export class AuditDB {
  private db: Database.Database;

  /** Pass ":memory:" as the directory for a throwaway database. */
  constructor(stateDir: string) {
    this.db = new Database(stateDir === ":memory:" ? ":memory:" : join(stateDir, "audit.db"));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
