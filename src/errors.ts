import { ChangeSetStatus } from "./types.js";

export type ChangeSetErrorCode =
  | "SCOPE_CONFLICT"
  | "INVALID_TRANSITION"
  | "DIFF_COMPUTATION"
  | "BACKEND_READ"
  | "BACKEND_WRITE"
  | "RESTORE_FAILURE"
  | "NOT_FOUND"
  | "INVALID_PROPOSAL"
  | "AUDIT_LOG"
  | "CONFIG";

export class ChangeSetError extends Error {
  readonly code: ChangeSetErrorCode;

  constructor(code: ChangeSetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ScopeConflictError extends ChangeSetError {
  constructor(readonly scopeKey: string, readonly activeChangeSetId: string) {
    super("SCOPE_CONFLICT", `Scope ${scopeKey} already has an active change set (${activeChangeSetId}).`);
  }
}

export class InvalidTransitionError extends ChangeSetError {
  constructor(
    readonly changeSetId: string,
    readonly from: ChangeSetStatus,
    readonly attempted: string
  ) {
    super("INVALID_TRANSITION", `Cannot ${attempted} change set ${changeSetId} while it is ${from}.`);
  }
}

export class DiffComputationError extends ChangeSetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DIFF_COMPUTATION", message, options);
  }
}

export class BackendReadError extends ChangeSetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_READ", message, options);
  }
}

export class BackendWriteError extends ChangeSetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BACKEND_WRITE", message, options);
  }
}

export class RestoreFailureError extends ChangeSetError {
  constructor(readonly changeSetId: string, options?: { cause?: unknown }) {
    super(
      "RESTORE_FAILURE",
      `Restoring the snapshot of change set ${changeSetId} failed; the document scope is in an undefined state.`,
      options
    );
  }
}

export class ChangeSetNotFoundError extends ChangeSetError {
  constructor(readonly changeSetId: string) {
    super("NOT_FOUND", `Change set ${changeSetId} not found.`);
  }
}

export class InvalidProposalError extends ChangeSetError {
  constructor(readonly issues: string[]) {
    super("INVALID_PROPOSAL", `Invalid proposal: ${issues.join("; ")}`);
  }
}

export class AuditLogError extends ChangeSetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUDIT_LOG", message, options);
  }
}

export class ConfigError extends ChangeSetError {
  constructor(readonly issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
