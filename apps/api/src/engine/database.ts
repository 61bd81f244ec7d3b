// ── SQLite database ─────────────────────────────────────────────────────────
//
// One authoritative SQLite file holds users, tenants, role requests,
// notifications and the audit log, so a role-request transition and its side
// effects commit or roll back together.
//
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { Result, WorkflowError } from "./result.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS partners (
    partner_id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    country TEXT,
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS centers (
    id TEXT PRIMARY KEY,
    partner_id TEXT NOT NULL REFERENCES partners(partner_id),
    name TEXT NOT NULL,
    location TEXT,
    created_at TEXT NOT NULL,
    UNIQUE(partner_id, name)
  );
  CREATE INDEX IF NOT EXISTS idx_centers_partner ON centers(partner_id);

  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'UNASSIGNED'
      CHECK(role IN ('UNASSIGNED','FACILITATOR','ME_OFFICER','DONOR','ADMIN')),
    partner_id TEXT REFERENCES partners(partner_id),
    center_id TEXT REFERENCES centers(id),
    active INTEGER NOT NULL DEFAULT 1,
    verified INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_users_role_partner ON users(role, partner_id);

  CREATE TABLE IF NOT EXISTS role_requests (
    id TEXT PRIMARY KEY,
    requester_id TEXT NOT NULL REFERENCES users(id),
    partner_id TEXT NOT NULL REFERENCES partners(partner_id),
    center_id TEXT REFERENCES centers(id),
    requested_role TEXT NOT NULL CHECK(requested_role IN ('FACILITATOR','ME_OFFICER','DONOR')),
    status TEXT NOT NULL DEFAULT 'PENDING' CHECK(status IN ('PENDING','APPROVED','REJECTED')),
    requested_at TEXT NOT NULL,
    approver_id TEXT REFERENCES users(id),
    resolved_at TEXT,
    comment TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_role_requests_requester ON role_requests(requester_id);
  CREATE INDEX IF NOT EXISTS idx_role_requests_status ON role_requests(status);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_role_requests_one_pending
    ON role_requests(requester_id, requested_role, partner_id, IFNULL(center_id, ''))
    WHERE status = 'PENDING';

  CREATE TABLE IF NOT EXISTS notifications (
    id TEXT PRIMARY KEY,
    recipient_id TEXT NOT NULL REFERENCES users(id),
    type TEXT NOT NULL CHECK(type IN ('ALERT','REMINDER','APPROVAL_REQUEST','INFO')),
    title TEXT NOT NULL,
    message TEXT NOT NULL,
    is_read INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL CHECK(priority IN ('LOW','MEDIUM','HIGH')),
    role_request_id TEXT REFERENCES role_requests(id),
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_notifications_recipient ON notifications(recipient_id, is_read);
  CREATE INDEX IF NOT EXISTS idx_notifications_role_request ON notifications(role_request_id);

  CREATE TABLE IF NOT EXISTS audit_logs (
    id TEXT PRIMARY KEY,
    actor_id TEXT NOT NULL REFERENCES users(id),
    actor_role TEXT NOT NULL,
    action TEXT NOT NULL,
    entity_type TEXT NOT NULL,
    entity_id TEXT,
    description TEXT NOT NULL,
    correlation_id TEXT,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_audit_logs_actor ON audit_logs(actor_id);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_action ON audit_logs(action);
  CREATE INDEX IF NOT EXISTS idx_audit_logs_created ON audit_logs(created_at);

  CREATE TRIGGER IF NOT EXISTS audit_logs_no_update BEFORE UPDATE ON audit_logs
  BEGIN
    SELECT RAISE(ABORT, 'audit_logs is append-only');
  END;
  CREATE TRIGGER IF NOT EXISTS audit_logs_no_delete BEFORE DELETE ON audit_logs
  BEGIN
    SELECT RAISE(ABORT, 'audit_logs is append-only');
  END;
`;

export function openDatabase(dbPath: string): Database.Database {
  const resolved = path.resolve(dbPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  db.exec(SCHEMA);
  return db;
}

export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError
    && (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY");
}

class TransactionAborted extends Error {
  readonly failure: WorkflowError;
  constructor(failure: WorkflowError) {
    super(failure.message);
    this.name = "TransactionAborted";
    this.failure = failure;
  }
}

/**
 * Runs `work` inside a `BEGIN IMMEDIATE` transaction.
 *
 * A failure result rolls back every write `work` made before returning it,
 * so callers may check preconditions between writes. Thrown errors roll back
 * and propagate unchanged.
 */
export function runInTransaction<T>(db: Database.Database, work: () => Result<T>): Result<T> {
  const txn = db.transaction((): Result<T> => {
    const outcome = work();
    if (!outcome.ok) throw new TransactionAborted(outcome.error);
    return outcome;
  });
  try {
    return txn.immediate();
  } catch (error) {
    if (error instanceof TransactionAborted) return { ok: false, error: error.failure };
    throw error;
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}
