// ── Typed results ───────────────────────────────────────────────────────────
//
// Expected, caller-recoverable outcomes travel as values. Exceptions are
// reserved for storage failures and other unexpected conditions.

export type WorkflowErrorKind =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_STATE"
  | "PERMISSION_DENIED"
  | "INVALID_INPUT"
  | "ACCOUNT_INACTIVE"
  | "NO_ELIGIBLE_APPROVER";

export type WorkflowError = {
  kind: WorkflowErrorKind;
  message: string;
};

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: WorkflowError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: WorkflowErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

/** Re-types a failure so it can be returned from an operation with a different success type. */
export function forward<T>(failure: { ok: false; error: WorkflowError }): Result<T> {
  return { ok: false, error: failure.error };
}
