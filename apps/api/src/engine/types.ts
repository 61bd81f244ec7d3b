// ── Domain vocabulary ───────────────────────────────────────────────────────

export const ROLES = ["UNASSIGNED", "FACILITATOR", "ME_OFFICER", "DONOR", "ADMIN"] as const;
export type Role = (typeof ROLES)[number];

/** Roles an UNASSIGNED user may ask for. ADMIN is bootstrap-only. */
export const REQUESTABLE_ROLES = ["FACILITATOR", "ME_OFFICER", "DONOR"] as const;
export type RequestableRole = (typeof REQUESTABLE_ROLES)[number];

export const REQUEST_STATUSES = ["PENDING", "APPROVED", "REJECTED"] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const NOTIFICATION_TYPES = ["ALERT", "REMINDER", "APPROVAL_REQUEST", "INFO"] as const;
export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export const PRIORITIES = ["LOW", "MEDIUM", "HIGH"] as const;
export type Priority = (typeof PRIORITIES)[number];

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
}

export function isRequestableRole(value: unknown): value is RequestableRole {
  return typeof value === "string" && (REQUESTABLE_ROLES as readonly string[]).includes(value);
}

export function isRequestStatus(value: unknown): value is RequestStatus {
  return typeof value === "string" && (REQUEST_STATUSES as readonly string[]).includes(value);
}

export function isNotificationType(value: unknown): value is NotificationType {
  return typeof value === "string" && (NOTIFICATION_TYPES as readonly string[]).includes(value);
}

export function isPriority(value: unknown): value is Priority {
  return typeof value === "string" && (PRIORITIES as readonly string[]).includes(value);
}

// ── Entities ────────────────────────────────────────────────────────────────

export type User = {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: Role;
  partnerId: string | null;
  centerId: string | null;
  active: boolean;
  verified: boolean;
  createdAt: string;
  updatedAt: string;
};

/**
 * The authenticated identity performing an operation. Resolved once per
 * inbound call and passed explicitly to the guard and the workflow.
 */
export type Actor = {
  userId: string;
  email: string;
  role: Role;
  partnerId: string | null;
  centerId: string | null;
  active: boolean;
  verified: boolean;
};

export type Partner = {
  partnerId: string;
  name: string;
  country: string | null;
  active: boolean;
  createdAt: string;
};

export type Center = {
  id: string;
  partnerId: string;
  name: string;
  location: string | null;
  createdAt: string;
};

export type RoleRequest = {
  id: string;
  requesterId: string;
  partnerId: string;
  centerId: string | null;
  requestedRole: RequestableRole;
  status: RequestStatus;
  requestedAt: string;
  approverId: string | null;
  resolvedAt: string | null;
  comment: string | null;
};

export type Notification = {
  id: string;
  recipientId: string;
  type: NotificationType;
  title: string;
  message: string;
  read: boolean;
  priority: Priority;
  roleRequestId: string | null;
  createdAt: string;
};

export type AuditLogEntry = {
  id: string;
  actorId: string;
  actorRole: Role;
  action: string;
  entityType: string;
  entityId: string | null;
  description: string;
  correlationId: string | null;
  createdAt: string;
};

export function toActor(user: User): Actor {
  return {
    userId: user.id,
    email: user.email,
    role: user.role,
    partnerId: user.partnerId,
    centerId: user.centerId,
    active: user.active,
    verified: user.verified,
  };
}
