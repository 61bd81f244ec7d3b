// ── User store ──────────────────────────────────────────────────────────────
//
// Account records. Role, partner and center are written only by the
// role-request approval transition and the ADMIN bootstrap; account
// management may flip the active flag.
//
import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { nowIso } from "./database.js";
import { isRole, type Role, type User } from "./types.js";

type UserRow = {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  role: string;
  partner_id: string | null;
  center_id: string | null;
  active: number;
  verified: number;
  created_at: string;
  updated_at: string;
};

export type CreateUserInput = {
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role?: Role;
  partnerId?: string | null;
  centerId?: string | null;
  active?: boolean;
  verified?: boolean;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toUser(row: UserRow): User {
  if (!isRole(row.role)) throw new Error(`Unknown role "${row.role}" on user ${row.id}`);
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    role: row.role,
    partnerId: row.partner_id,
    centerId: row.center_id,
    active: row.active === 1,
    verified: row.verified === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class UserStore {
  constructor(private readonly db: Database.Database) {}

  create(input: CreateUserInput): User {
    const id = crypto.randomUUID();
    const now = nowIso();
    this.db.prepare(`
      INSERT INTO users (
        id, email, first_name, last_name, password_hash,
        role, partner_id, center_id, active, verified, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      normalizeEmail(input.email),
      input.firstName.trim(),
      input.lastName.trim(),
      input.passwordHash,
      input.role ?? "UNASSIGNED",
      input.partnerId ?? null,
      input.centerId ?? null,
      input.active === false ? 0 : 1,
      input.verified ? 1 : 0,
      now,
      now,
    );
    const created = this.findById(id);
    if (!created) throw new Error(`User ${id} vanished after insert`);
    return created;
  }

  findById(id: string): User | null {
    const row = this.db.prepare("SELECT * FROM users WHERE id = ?").get(id) as UserRow | undefined;
    return row ? toUser(row) : null;
  }

  findByEmail(email: string): User | null {
    const row = this.db
      .prepare("SELECT * FROM users WHERE email = ?")
      .get(normalizeEmail(email)) as UserRow | undefined;
    return row ? toUser(row) : null;
  }

  /** Login lookup; the password hash never leaves this store otherwise. */
  findCredentials(email: string): UserCredentials | null {
    const row = this.db
      .prepare("SELECT * FROM users WHERE email = ?")
      .get(normalizeEmail(email)) as UserRow | undefined;
    return row ? { user: toUser(row), passwordHash: row.password_hash } : null;
  }

  /**
   * Active users holding one of `roles`, optionally restricted to a partner,
   * in `roles` order and then by creation order.
   */
  findActiveByRoles(roles: readonly Role[], partnerId: string | null = null): User[] {
    if (roles.length === 0) return [];
    const placeholders = roles.map(() => "?").join(", ");
    const rank = roles.map((_, index) => `WHEN ? THEN ${index}`).join(" ");
    const params: unknown[] = [...roles];
    let sql = `SELECT * FROM users WHERE active = 1 AND role IN (${placeholders})`;
    if (partnerId !== null) {
      sql += " AND partner_id = ?";
      params.push(partnerId);
    }
    sql += ` ORDER BY CASE role ${rank} END, created_at ASC, rowid ASC`;
    params.push(...roles);
    const rows = this.db.prepare(sql).all(...params) as UserRow[];
    return rows.map(toUser);
  }

  countByRole(role: Role): number {
    const row = this.db.prepare("SELECT COUNT(*) AS cnt FROM users WHERE role = ?").get(role) as { cnt: number };
    return row.cnt;
  }

  /** Applies an approved role request. Returns false when the user row is gone. */
  assignRole(id: string, role: Role, partnerId: string | null, centerId: string | null): boolean {
    const result = this.db
      .prepare("UPDATE users SET role = ?, partner_id = ?, center_id = ?, updated_at = ? WHERE id = ?")
      .run(role, partnerId, centerId, nowIso(), id);
    return result.changes > 0;
  }

  setActive(id: string, active: boolean): boolean {
    const result = this.db
      .prepare("UPDATE users SET active = ?, updated_at = ? WHERE id = ?")
      .run(active ? 1 : 0, nowIso(), id);
    return result.changes > 0;
  }
}
