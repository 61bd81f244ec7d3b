// ── Tenant scope guard ──────────────────────────────────────────────────────
//
// Decides whether an actor may touch a resource owned by a partner (and, for
// facilitators, a center). Every tenant-scoped route goes through
// `authorize`; the role-request workflow also uses `selectApprover` to pick
// the single addressed approver for a new request.
//
//   ADMIN        no scope checks
//   DONOR        portfolio-wide, role-gated only
//   ME_OFFICER   partner must match
//   FACILITATOR  partner must match, and center when the resource has one
//   UNASSIGNED   no scope at all
//
import type { UserStore } from "./userStore.js";
import { fail, ok, type Result } from "./result.js";
import type { Actor, RequestableRole, Role, User } from "./types.js";

export type DenyReason = "account inactive" | "role not permitted" | "cross-tenant access";

export type ScopeDecision =
  | { allowed: true }
  | { allowed: false; reason: DenyReason };

const ALLOW: ScopeDecision = { allowed: true };

/** Roles that may never resolve a role request, whatever their scope. */
const NON_APPROVER_ROLES: ReadonlySet<Role> = new Set<Role>(["UNASSIGNED", "FACILITATOR"]);

export const APPROVER_ROLES: readonly Role[] = ["ME_OFFICER", "DONOR", "ADMIN"];

export function isEligibleApproverRole(role: Role): boolean {
  return !NON_APPROVER_ROLES.has(role);
}

/** Approver roles for a requested role, in order of preference. */
export function approverRolesFor(requestedRole: RequestableRole): readonly Role[] {
  return requestedRole === "FACILITATOR" ? ["ME_OFFICER", "DONOR"] : ["ADMIN"];
}

export class TenantScopeGuard {
  constructor(private readonly users: UserStore) {}

  /**
   * `resourcePartnerId = null` marks an unscoped resource: only the role gate
   * applies. A denial never carries the resource's owning partner.
   */
  authorize(
    actor: Actor,
    requiredRoles: readonly Role[],
    resourcePartnerId: string | null,
    resourceCenterId: string | null = null,
  ): ScopeDecision {
    if (!actor.active) return { allowed: false, reason: "account inactive" };
    if (!requiredRoles.includes(actor.role)) return { allowed: false, reason: "role not permitted" };
    if (resourcePartnerId === null) return ALLOW;

    switch (actor.role) {
      case "ADMIN":
      case "DONOR":
        return ALLOW;
      case "ME_OFFICER":
        return actor.partnerId === resourcePartnerId
          ? ALLOW
          : { allowed: false, reason: "cross-tenant access" };
      case "FACILITATOR":
        if (actor.partnerId !== resourcePartnerId) return { allowed: false, reason: "cross-tenant access" };
        if (resourceCenterId !== null && actor.centerId !== resourceCenterId) {
          return { allowed: false, reason: "cross-tenant access" };
        }
        return ALLOW;
      case "UNASSIGNED":
        return { allowed: false, reason: "cross-tenant access" };
    }
  }

  /**
   * Picks the one user a new request is addressed to.
   *
   * FACILITATOR requests go to an ME_OFFICER of the partner, falling back to
   * a DONOR of the partner. Center scoping rides on the request but does not
   * narrow the choice. ME_OFFICER and DONOR requests go to an ADMIN. Ties
   * break on creation order.
   */
  selectApprover(partnerId: string, centerId: string | null, requestedRole: RequestableRole): Result<User> {
    const roles = approverRolesFor(requestedRole);
    const scope = requestedRole === "FACILITATOR" ? partnerId : null;
    const [approver] = this.users.findActiveByRoles(roles, scope);
    if (!approver) {
      const where = centerId ? "this partner and center" : "this partner";
      return fail(
        "NO_ELIGIBLE_APPROVER",
        `No eligible approver is configured for ${requestedRole} requests at ${where}`,
      );
    }
    return ok(approver);
  }
}
