// ── Audit trail ─────────────────────────────────────────────────────────────
//
// Append-only compliance log. There is no update or delete path here, and
// triggers in the schema reject both at the storage level. A failed write
// throws, which aborts whatever transaction the caller is running.
//
import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { nowIso } from "./database.js";
import { isRole, type Actor, type AuditLogEntry } from "./types.js";

export const AUDIT_ACTIONS = {
  REQUEST_ROLE: "REQUEST_ROLE",
  APPROVE_ROLE_REQUEST: "APPROVE_ROLE_REQUEST",
  REJECT_ROLE_REQUEST: "REJECT_ROLE_REQUEST",
  REGISTER_USER: "REGISTER_USER",
  BOOTSTRAP_ADMIN: "BOOTSTRAP_ADMIN",
  CREATE_PARTNER: "CREATE_PARTNER",
  CREATE_CENTER: "CREATE_CENTER",
  ACTIVATE_USER: "ACTIVATE_USER",
  DEACTIVATE_USER: "DEACTIVATE_USER",
} as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];

type AuditLogRow = {
  id: string;
  actor_id: string;
  actor_role: string;
  action: string;
  entity_type: string;
  entity_id: string | null;
  description: string;
  correlation_id: string | null;
  created_at: string;
};

export type AuditQueryOptions = {
  actorId?: string;
  action?: string;
  entityType?: string;
  /** ISO timestamp, inclusive. */
  from?: string;
  /** ISO timestamp, inclusive. */
  to?: string;
  /** Only entries whose actor is currently affiliated with this partner. */
  partnerId?: string;
  limit?: number;
  offset?: number;
};

/** The slice of the audit trail the workflow depends on. */
export interface AuditRecorder {
  record(
    actor: Pick<Actor, "userId" | "role">,
    action: AuditAction,
    entityType: string,
    entityId: string | null,
    description: string,
    correlationId?: string | null,
  ): AuditLogEntry;
}

function toEntry(row: AuditLogRow): AuditLogEntry {
  if (!isRole(row.actor_role)) throw new Error(`Unknown actor role "${row.actor_role}" on audit entry ${row.id}`);
  return {
    id: row.id,
    actorId: row.actor_id,
    actorRole: row.actor_role,
    action: row.action,
    entityType: row.entity_type,
    entityId: row.entity_id,
    description: row.description,
    correlationId: row.correlation_id,
    createdAt: row.created_at,
  };
}

export class AuditTrail implements AuditRecorder {
  constructor(private readonly db: Database.Database) {}

  record(
    actor: Pick<Actor, "userId" | "role">,
    action: AuditAction,
    entityType: string,
    entityId: string | null,
    description: string,
    correlationId: string | null = null,
  ): AuditLogEntry {
    const id = crypto.randomUUID();
    this.db.prepare(`
      INSERT INTO audit_logs (id, actor_id, actor_role, action, entity_type, entity_id, description, correlation_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(id, actor.userId, actor.role, action, entityType, entityId, description, correlationId, nowIso());
    const row = this.db.prepare("SELECT * FROM audit_logs WHERE id = ?").get(id) as AuditLogRow | undefined;
    if (!row) throw new Error(`Audit entry ${id} was not persisted`);
    return toEntry(row);
  }

  query(opts: AuditQueryOptions = {}): AuditLogEntry[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (opts.actorId) {
      conditions.push("a.actor_id = ?");
      params.push(opts.actorId);
    }
    if (opts.action) {
      conditions.push("a.action = ?");
      params.push(opts.action.toUpperCase());
    }
    if (opts.entityType) {
      conditions.push("a.entity_type = ?");
      params.push(opts.entityType);
    }
    if (opts.from) {
      conditions.push("a.created_at >= ?");
      params.push(opts.from);
    }
    if (opts.to) {
      conditions.push("a.created_at <= ?");
      params.push(opts.to);
    }
    if (opts.partnerId) {
      conditions.push("u.partner_id = ?");
      params.push(opts.partnerId);
    }

    const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = Math.min(opts.limit ?? 50, 500);
    const offset = opts.offset ?? 0;

    const rows = this.db
      .prepare(`
        SELECT a.* FROM audit_logs a
        JOIN users u ON u.id = a.actor_id
        ${where}
        ORDER BY a.created_at DESC, a.rowid DESC
        LIMIT ? OFFSET ?
      `)
      .all(...params, limit, offset) as AuditLogRow[];
    return rows.map(toEntry);
  }
}
