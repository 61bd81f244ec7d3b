// ── Notification dispatch ───────────────────────────────────────────────────
//
// In-app notifications. Creation validates only that the recipient exists and
// is active; everything else about who gets notified is the caller's business.
// Rows are never deleted and only the read flag ever changes.
//
import crypto from "node:crypto";
import type Database from "better-sqlite3";
import { nowIso } from "./database.js";
import { fail, ok, type Result } from "./result.js";
import {
  isNotificationType,
  isPriority,
  type Notification,
  type NotificationType,
  type Priority,
} from "./types.js";

type NotificationRow = {
  id: string;
  recipient_id: string;
  type: string;
  title: string;
  message: string;
  is_read: number;
  priority: string;
  role_request_id: string | null;
  created_at: string;
};

export type NotifyInput = {
  recipientId: string;
  type: NotificationType;
  title: string;
  message: string;
  priority: Priority;
  roleRequestId?: string | null;
};

export type NotificationListOptions = {
  unreadOnly?: boolean;
  type?: NotificationType;
  priority?: Priority;
  limit?: number;
  offset?: number;
};

export type NotificationPage = {
  notifications: Notification[];
  total: number;
  unreadCount: number;
};

function toNotification(row: NotificationRow): Notification {
  if (!isNotificationType(row.type) || !isPriority(row.priority)) {
    throw new Error(`Malformed notification row ${row.id}`);
  }
  return {
    id: row.id,
    recipientId: row.recipient_id,
    type: row.type,
    title: row.title,
    message: row.message,
    read: row.is_read === 1,
    priority: row.priority,
    roleRequestId: row.role_request_id,
    createdAt: row.created_at,
  };
}

export class NotificationDispatch {
  constructor(private readonly db: Database.Database) {}

  notify(input: NotifyInput): Result<Notification> {
    const recipient = this.db
      .prepare("SELECT active FROM users WHERE id = ?")
      .get(input.recipientId) as { active: number } | undefined;
    if (!recipient) return fail("NOT_FOUND", "Notification recipient not found");
    if (recipient.active !== 1) return fail("ACCOUNT_INACTIVE", "Notification recipient is not active");

    const id = crypto.randomUUID();
    this.db.prepare(`
      INSERT INTO notifications (id, recipient_id, type, title, message, is_read, priority, role_request_id, created_at)
      VALUES (?, ?, ?, ?, ?, 0, ?, ?, ?)
    `).run(
      id,
      input.recipientId,
      input.type,
      input.title,
      input.message,
      input.priority,
      input.roleRequestId ?? null,
      nowIso(),
    );
    const created = this.findById(id);
    if (!created) throw new Error(`Notification ${id} vanished after insert`);
    return ok(created);
  }

  findById(id: string): Notification | null {
    const row = this.db.prepare("SELECT * FROM notifications WHERE id = ?").get(id) as NotificationRow | undefined;
    return row ? toNotification(row) : null;
  }

  /** The APPROVAL_REQUEST notification that delegated `roleRequestId` to `recipientId`, if any. */
  findApprovalRequest(roleRequestId: string, recipientId: string): Notification | null {
    const row = this.db
      .prepare(`
        SELECT * FROM notifications
        WHERE role_request_id = ? AND recipient_id = ? AND type = 'APPROVAL_REQUEST'
        ORDER BY created_at ASC, rowid ASC
        LIMIT 1
      `)
      .get(roleRequestId, recipientId) as NotificationRow | undefined;
    return row ? toNotification(row) : null;
  }

  listForRoleRequest(roleRequestId: string): Notification[] {
    const rows = this.db
      .prepare("SELECT * FROM notifications WHERE role_request_id = ? ORDER BY created_at ASC, rowid ASC")
      .all(roleRequestId) as NotificationRow[];
    return rows.map(toNotification);
  }

  listForRecipient(recipientId: string, opts: NotificationListOptions = {}): NotificationPage {
    const conditions = ["recipient_id = ?"];
    const params: unknown[] = [recipientId];

    if (opts.unreadOnly ?? true) conditions.push("is_read = 0");
    if (opts.type) {
      conditions.push("type = ?");
      params.push(opts.type);
    }
    if (opts.priority) {
      conditions.push("priority = ?");
      params.push(opts.priority);
    }

    const where = `WHERE ${conditions.join(" AND ")}`;
    const limit = Math.min(opts.limit ?? 50, 200);
    const offset = opts.offset ?? 0;

    const rows = this.db
      .prepare(`SELECT * FROM notifications ${where} ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`)
      .all(...params, limit, offset) as NotificationRow[];
    const total = this.db
      .prepare(`SELECT COUNT(*) AS cnt FROM notifications ${where}`)
      .get(...params) as { cnt: number };

    return {
      notifications: rows.map(toNotification),
      total: total.cnt,
      unreadCount: this.countUnread(recipientId),
    };
  }

  countUnread(recipientId: string): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS cnt FROM notifications WHERE recipient_id = ? AND is_read = 0")
      .get(recipientId) as { cnt: number };
    return row.cnt;
  }

  /** Idempotent: returns true when the notification exists, read or not. */
  markRead(id: string): boolean {
    if (!this.findById(id)) return false;
    this.db.prepare("UPDATE notifications SET is_read = 1 WHERE id = ? AND is_read = 0").run(id);
    return true;
  }

  /** Like markRead, but a notification addressed to someone else counts as missing. */
  markReadForRecipient(id: string, recipientId: string): boolean {
    const notification = this.findById(id);
    if (!notification || notification.recipientId !== recipientId) return false;
    return this.markRead(id);
  }

  /** Returns how many notifications flipped from unread to read. */
  markAllReadForRecipient(recipientId: string): number {
    const result = this.db
      .prepare("UPDATE notifications SET is_read = 1 WHERE recipient_id = ? AND is_read = 0")
      .run(recipientId);
    return result.changes;
  }

  markReadForRoleRequest(roleRequestId: string): number {
    const result = this.db
      .prepare("UPDATE notifications SET is_read = 1 WHERE role_request_id = ? AND is_read = 0")
      .run(roleRequestId);
    return result.changes;
  }
}
