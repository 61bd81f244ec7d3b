// ── Role request store ──────────────────────────────────────────────────────
//
// Persistence for role requests.
//
// Lifecycle:  PENDING → APPROVED
//                     → REJECTED
//
// Both resolutions are terminal. The status write is a compare-and-set on
// status = 'PENDING'; a partial unique index keeps at most one PENDING row
// per (requester, role, partner, center).
//
import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { nowIso } from "./database.js";
import {
  isRequestableRole,
  isRequestStatus,
  type RequestableRole,
  type RequestStatus,
  type RoleRequest,
} from "./types.js";

type RoleRequestRow = {
  id: string;
  requester_id: string;
  partner_id: string;
  center_id: string | null;
  requested_role: string;
  status: string;
  requested_at: string;
  approver_id: string | null;
  resolved_at: string | null;
  comment: string | null;
};

export type RoleRequestScope = {
  requesterId: string;
  requestedRole: RequestableRole;
  partnerId: string;
  centerId: string | null;
};

export type Resolution = {
  requestId: string;
  approverId: string;
  status: Exclude<RequestStatus, "PENDING">;
  comment?: string | null;
};

export type RoleRequestQueryOptions = {
  status?: RequestStatus;
  requesterId?: string;
  /** Requests whose APPROVAL_REQUEST notification went to this user. */
  addressedTo?: string;
  limit?: number;
  offset?: number;
};

function toRoleRequest(row: RoleRequestRow): RoleRequest {
  if (!isRequestableRole(row.requested_role) || !isRequestStatus(row.status)) {
    throw new Error(`Malformed role request row ${row.id}`);
  }
  return {
    id: row.id,
    requesterId: row.requester_id,
    partnerId: row.partner_id,
    centerId: row.center_id,
    requestedRole: row.requested_role,
    status: row.status,
    requestedAt: row.requested_at,
    approverId: row.approver_id,
    resolvedAt: row.resolved_at,
    comment: row.comment,
  };
}

export class RoleRequestStore {
  constructor(private readonly db: Database.Database) {}

  /** Throws a SQLITE_CONSTRAINT_UNIQUE error when a PENDING row already exists for the scope. */
  insertPending(scope: RoleRequestScope): RoleRequest {
    const id = crypto.randomUUID();
    this.db.prepare(`
      INSERT INTO role_requests (id, requester_id, partner_id, center_id, requested_role, status, requested_at)
      VALUES (?, ?, ?, ?, ?, 'PENDING', ?)
    `).run(id, scope.requesterId, scope.partnerId, scope.centerId, scope.requestedRole, nowIso());
    const created = this.findById(id);
    if (!created) throw new Error(`Role request ${id} vanished after insert`);
    return created;
  }

  findById(id: string): RoleRequest | null {
    const row = this.db.prepare("SELECT * FROM role_requests WHERE id = ?").get(id) as RoleRequestRow | undefined;
    return row ? toRoleRequest(row) : null;
  }

  findPending(scope: RoleRequestScope): RoleRequest | null {
    const row = this.db
      .prepare(`
        SELECT * FROM role_requests
        WHERE requester_id = ? AND requested_role = ? AND partner_id = ?
          AND IFNULL(center_id, '') = IFNULL(?, '') AND status = 'PENDING'
      `)
      .get(scope.requesterId, scope.requestedRole, scope.partnerId, scope.centerId) as RoleRequestRow | undefined;
    return row ? toRoleRequest(row) : null;
  }

  /**
   * Atomic compare-and-set: PENDING → APPROVED | REJECTED.
   * Returns the updated row, or null when the request was not PENDING (or does not exist).
   */
  resolve(resolution: Resolution): RoleRequest | null {
    const result = this.db
      .prepare(`
        UPDATE role_requests
        SET status = ?, approver_id = ?, resolved_at = ?, comment = ?
        WHERE id = ? AND status = 'PENDING'
      `)
      .run(
        resolution.status,
        resolution.approverId,
        nowIso(),
        resolution.status === "REJECTED" ? resolution.comment ?? null : null,
        resolution.requestId,
      );
    if (result.changes === 0) return null;
    return this.findById(resolution.requestId);
  }

  query(opts: RoleRequestQueryOptions = {}): RoleRequest[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (opts.status) {
      conditions.push("r.status = ?");
      params.push(opts.status);
    }
    if (opts.requesterId) {
      conditions.push("r.requester_id = ?");
      params.push(opts.requesterId);
    }
    if (opts.addressedTo) {
      conditions.push(`EXISTS (
        SELECT 1 FROM notifications n
        WHERE n.role_request_id = r.id AND n.recipient_id = ? AND n.type = 'APPROVAL_REQUEST'
      )`);
      params.push(opts.addressedTo);
    }

    const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = Math.min(opts.limit ?? 50, 200);
    const offset = opts.offset ?? 0;

    const rows = this.db
      .prepare(`SELECT r.* FROM role_requests r ${where} ORDER BY r.requested_at DESC, r.rowid DESC LIMIT ? OFFSET ?`)
      .all(...params, limit, offset) as RoleRequestRow[];
    return rows.map(toRoleRequest);
  }
}
