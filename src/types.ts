export type ChangeSetKind = "text" | "table" | "document";

export type ChangeSetStatus = "draft" | "previewed" | "approved" | "applied" | "rejected" | "failed";

export type Scope = {
  documentId: string;
  locator: string;
};

export type TableCell = {
  row: number;
  col: number;
  value: string;
};

export type TextPayload = {
  kind: "text" | "document";
  before: string;
  after: string;
};

export type TablePayload = {
  kind: "table";
  before: TableCell[];
  after: TableCell[];
};

export type ChangePayload = TextPayload | TablePayload;

export type SpanTag = "equal" | "insert" | "delete";

export type TextSpan = {
  tag: SpanTag;
  text: string;
};

export type CellChange = {
  row: number;
  col: number;
  old: string | null;
  new: string | null;
};

export type TextDiff = {
  kind: "text";
  spans: TextSpan[];
};

export type TableDiff = {
  kind: "table";
  cells: CellChange[];
};

export type DiffResult = TextDiff | TableDiff;

type ChangeSetMeta = {
  id: string;
  scope: Scope;
  prompt: string;
  model: string;
  status: ChangeSetStatus;
  diff: DiffResult | null;
  snapshotId: string | null;
  confirmationRequired: boolean;
  error?: string;
  createdAt: string;
  updatedAt: string;
};

export type ChangeSet = ChangeSetMeta & ChangePayload;

export type ProposalInput = ChangePayload & {
  scope: Scope;
  prompt: string;
  model: string;
};

export type ChangeSetFilter = {
  status?: ChangeSetStatus | ChangeSetStatus[];
  scope?: Scope;
  documentId?: string;
};

export type ScopeContent =
  | { kind: "text"; text: string }
  | { kind: "table"; cells: TableCell[] };

export type CellPatch = {
  row: number;
  col: number;
  value: string | null;
};

export type WritePayload =
  | { kind: "text"; text: string }
  | { kind: "cells"; patches: CellPatch[] };

export type DocumentBackend = {
  read(scope: Scope): Promise<ScopeContent>;
  write(scope: Scope, payload: WritePayload): Promise<void>;
  backup?(documentId: string): Promise<string>;
  /** Whether two scopes address intersecting content. Exact scope equality when absent. */
  overlaps?(left: Scope, right: Scope): boolean;
};

export type SnapshotHandle = {
  id: string;
  changeSetId: string;
  scope: Scope;
  capturedAt: string;
};

export type RestoreOutcome = "not_required" | "restored" | "failed";

export type RejectReasonCode = "rejected_after_preview" | "rejected_after_approval";

export type AuditEntry = {
  id: string;
  changeSetId: string;
  timestamp: string;
  actor: string;
  fromStatus: ChangeSetStatus | null;
  toStatus: ChangeSetStatus;
  reason?: string;
  reasonCode?: RejectReasonCode;
  error?: string;
  restore?: RestoreOutcome;
};

export type BackendCallOptions = {
  timeoutMs?: number;
};

export function scopeKey(scope: Scope): string {
  return `${scope.documentId}::${scope.locator}`;
}

export function cellKey(row: number, col: number): string {
  return `${row}:${col}`;
}
