// ── Role request workflow ───────────────────────────────────────────────────
//
// The only state machine in the platform. An UNASSIGNED user asks for a role
// scoped to a partner (and optionally a center); the one approver addressed
// at creation time approves or rejects it.
//
// Every transition runs in a single IMMEDIATE transaction together with its
// notifications and audit entry. A failure result or a thrown error rolls
// all of it back, so no reader sees a request without its notification or a
// changed role without a resolved request.
//
import type Database from "better-sqlite3";
import type { AuditRecorder } from "./auditTrail.js";
import { AUDIT_ACTIONS } from "./auditTrail.js";
import { isUniqueViolation, runInTransaction } from "./database.js";
import type { NotificationDispatch } from "./notificationDispatch.js";
import { fail, forward, ok, type Result } from "./result.js";
import type { RoleRequestQueryOptions, RoleRequestStore } from "./roleRequestStore.js";
import type { TenantStore } from "./tenantStore.js";
import { APPROVER_ROLES, isEligibleApproverRole, type TenantScopeGuard } from "./tenantScopeGuard.js";
import { isRequestableRole, toActor, type Actor, type Center, type RoleRequest } from "./types.js";
import type { UserStore } from "./userStore.js";

export const ROLE_REQUEST_ENTITY = "RoleRequest";

export type RoleRequestWorkflowDeps = {
  db: Database.Database;
  users: UserStore;
  tenants: TenantStore;
  requests: RoleRequestStore;
  notifications: NotificationDispatch;
  audit: AuditRecorder;
  guard: TenantScopeGuard;
};

export type CreateRoleRequestInput = {
  partnerId: string;
  centerId?: string | null;
  requestedRole: string;
};

export type TransitionContext = {
  correlationId?: string | null;
};

type Decision =
  | { status: "APPROVED" }
  | { status: "REJECTED"; comment: string };

const NOT_ALLOWED_TO_RESOLVE = "You are not allowed to approve or reject this request";

function describeScope(partnerName: string, center: Center | null): string {
  if (!center) return `partner organization ${partnerName}`;
  const location = center.location ? ` (${center.location})` : "";
  return `partner organization ${partnerName} at center ${center.name}${location}`;
}

export class RoleRequestWorkflow {
  constructor(private readonly deps: RoleRequestWorkflowDeps) {}

  // ── Create ──────────────────────────────────────────────────────────────

  createRequest(actor: Actor, input: CreateRoleRequestInput, context: TransitionContext = {}): Result<RoleRequest> {
    const requestedRole = input.requestedRole.trim().toUpperCase();
    if (!isRequestableRole(requestedRole)) {
      return fail("INVALID_INPUT", `Role "${input.requestedRole}" cannot be requested`);
    }
    const partnerId = input.partnerId.trim();
    if (!partnerId) return fail("INVALID_INPUT", "partnerId is required");
    const centerId = input.centerId?.trim() || null;

    const { users, tenants, requests, notifications, audit, guard } = this.deps;

    return runInTransaction<RoleRequest>(this.deps.db, () => {
      const requester = users.findById(actor.userId);
      if (!requester) return fail("NOT_FOUND", "User not found");
      if (!requester.active) return fail("ACCOUNT_INACTIVE", "Your account is not active");
      if (requester.role !== "UNASSIGNED") return fail("PERMISSION_DENIED", "You already have an approved role");

      const partner = tenants.findPartner(partnerId);
      if (!partner) return fail("NOT_FOUND", "Partner does not exist");
      const center = centerId ? tenants.findCenterOfPartner(partnerId, centerId) : null;
      if (centerId && !center) return fail("NOT_FOUND", `This center does not belong to ${partner.name}`);

      const scope = { requesterId: requester.id, requestedRole, partnerId, centerId };
      if (requests.findPending(scope)) return fail("ALREADY_EXISTS", "This request already exists");

      const approver = guard.selectApprover(partnerId, centerId, requestedRole);
      if (!approver.ok) return forward(approver);

      let request: RoleRequest;
      try {
        request = requests.insertPending(scope);
      } catch (error) {
        if (isUniqueViolation(error)) return fail("ALREADY_EXISTS", "This request already exists");
        throw error;
      }

      const where = describeScope(partner.name, center);
      const notified = notifications.notify({
        recipientId: approver.value.id,
        type: "APPROVAL_REQUEST",
        title: "Approval Request",
        message: `User with email '${requester.email}' wants approval for the role ${requestedRole} within ${where}.`,
        priority: "HIGH",
        roleRequestId: request.id,
      });
      if (!notified.ok) return forward(notified);

      audit.record(
        toActor(requester),
        AUDIT_ACTIONS.REQUEST_ROLE,
        ROLE_REQUEST_ENTITY,
        request.id,
        `Requested ${requestedRole} within ${where}`,
        context.correlationId,
      );
      return ok(request);
    });
  }

  // ── Resolve ─────────────────────────────────────────────────────────────

  approve(actor: Actor, requestId: string, context: TransitionContext = {}): Result<RoleRequest> {
    return this.resolve(actor, requestId, { status: "APPROVED" }, context);
  }

  reject(actor: Actor, requestId: string, comment: string, context: TransitionContext = {}): Result<RoleRequest> {
    const reason = comment.trim();
    if (!reason) return fail("INVALID_INPUT", "A rejection comment is required");
    return this.resolve(actor, requestId, { status: "REJECTED", comment: reason }, context);
  }

  private resolve(actor: Actor, requestId: string, decision: Decision, context: TransitionContext): Result<RoleRequest> {
    const { users, requests, notifications, audit, guard } = this.deps;

    return runInTransaction<RoleRequest>(this.deps.db, () => {
      // Re-read the approver: role and scope may have changed since the token was resolved.
      const approverRow = users.findById(actor.userId);
      if (!approverRow) return fail("NOT_FOUND", "User not found");
      const approver = toActor(approverRow);
      if (!approver.active) return fail("ACCOUNT_INACTIVE", "Your account is not active");
      if (!isEligibleApproverRole(approver.role)) return fail("PERMISSION_DENIED", NOT_ALLOWED_TO_RESOLVE);

      const request = requests.findById(requestId);
      if (!request) return fail("NOT_FOUND", "Request not found");

      if (!guard.authorize(approver, APPROVER_ROLES, request.partnerId).allowed) {
        return fail("PERMISSION_DENIED", "Forbidden");
      }
      if (!notifications.findApprovalRequest(request.id, approver.userId)) {
        return fail("PERMISSION_DENIED", NOT_ALLOWED_TO_RESOLVE);
      }

      const resolved = requests.resolve({
        requestId: request.id,
        approverId: approver.userId,
        status: decision.status,
        comment: decision.status === "REJECTED" ? decision.comment : null,
      });
      if (!resolved) return fail("INVALID_STATE", "Request already processed");

      if (decision.status === "APPROVED") {
        const assigned = users.assignRole(request.requesterId, request.requestedRole, request.partnerId, request.centerId);
        if (!assigned) return fail("NOT_FOUND", "Requester not found");
      }

      notifications.markReadForRoleRequest(request.id);

      if (decision.status === "APPROVED") {
        const notified = notifications.notify({
          recipientId: request.requesterId,
          type: "INFO",
          title: "Role Request Approved",
          message: `Your request for role '${request.requestedRole}' has been approved.`,
          priority: "LOW",
          roleRequestId: request.id,
        });
        if (!notified.ok) return forward(notified);
      } else if (users.findById(request.requesterId)?.active) {
        // A deactivated requester gets no notice; the rejection still stands.
        const notified = notifications.notify({
          recipientId: request.requesterId,
          type: "INFO",
          title: "Role Request Rejected",
          message: `Your request for role '${request.requestedRole}' has been rejected. Reason: ${decision.comment}`,
          priority: "HIGH",
          roleRequestId: request.id,
        });
        if (!notified.ok) return forward(notified);
      }

      const action = decision.status === "APPROVED"
        ? AUDIT_ACTIONS.APPROVE_ROLE_REQUEST
        : AUDIT_ACTIONS.REJECT_ROLE_REQUEST;
      const description = decision.status === "APPROVED"
        ? `Approved ${request.requestedRole} for user ${request.requesterId} within partner ${request.partnerId}`
        : `Rejected ${request.requestedRole} for user ${request.requesterId} within partner ${request.partnerId}: ${decision.comment}`;
      audit.record(approver, action, ROLE_REQUEST_ENTITY, request.id, description, context.correlationId);

      return ok(resolved);
    });
  }

  // ── Read ────────────────────────────────────────────────────────────────

  /**
   * Visible to the requester, the addressed approver, and approver roles
   * whose scope covers the request's partner.
   */
  findById(actor: Actor, requestId: string): Result<RoleRequest> {
    if (!actor.active) return fail("ACCOUNT_INACTIVE", "Your account is not active");
    const { requests, notifications, guard } = this.deps;
    const request = requests.findById(requestId);
    if (!request) return fail("NOT_FOUND", "Request not found");
    if (request.requesterId === actor.userId) return ok(request);
    if (notifications.findApprovalRequest(request.id, actor.userId)) return ok(request);
    if (guard.authorize(actor, APPROVER_ROLES, request.partnerId).allowed) return ok(request);
    return fail("PERMISSION_DENIED", "Forbidden");
  }

  listOwn(actor: Actor, opts: Omit<RoleRequestQueryOptions, "requesterId" | "addressedTo"> = {}): RoleRequest[] {
    return this.deps.requests.query({ ...opts, requesterId: actor.userId });
  }

  /** Requests delegated to `actor`; PENDING only unless another status is asked for. */
  listAddressed(
    actor: Actor,
    opts: Omit<RoleRequestQueryOptions, "requesterId" | "addressedTo"> = {},
  ): Result<RoleRequest[]> {
    if (!actor.active) return fail("ACCOUNT_INACTIVE", "Your account is not active");
    if (!isEligibleApproverRole(actor.role)) return fail("PERMISSION_DENIED", "Forbidden");
    return ok(this.deps.requests.query({ status: "PENDING", ...opts, addressedTo: actor.userId }));
  }
}
