import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { EngineConfig } from "../config.js";
import { KeyedMutex, TimeoutError, withTimeout } from "../concurrency.js";
import {
  BackendWriteError,
  ChangeSetNotFoundError,
  DiffComputationError,
  InvalidProposalError,
  InvalidTransitionError,
  RestoreFailureError,
  ScopeConflictError,
  errorMessage
} from "../errors.js";
import { Logger } from "../logger.js";
import { SessionStore } from "../sessionStore.js";
import {
  AuditEntry,
  BackendCallOptions,
  ChangePayload,
  ChangeSet,
  ChangeSetFilter,
  ChangeSetStatus,
  DiffResult,
  DocumentBackend,
  ProposalInput,
  RestoreOutcome,
  ScopeContent,
  SnapshotHandle,
  WritePayload,
  cellKey,
  scopeKey
} from "../types.js";
import { AuditLog } from "./auditLogService.js";
import { computeDiff, summarizeDiff } from "./diffService.js";
import { SnapshotStore } from "./snapshotService.js";

const scopeSchema = z.object({
  documentId: z.string().min(1),
  locator: z.string().min(1)
});

const cellListSchema = z
  .array(
    z.object({
      row: z.number().int().min(0),
      col: z.number().int().min(0),
      value: z.string()
    })
  )
  .superRefine((cells, ctx) => {
    const seen = new Set<string>();
    for (const cell of cells) {
      const key = cellKey(cell.row, cell.col);
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate cell (${cell.row}, ${cell.col})`
        });
      }
      seen.add(key);
    }
  });

const provenanceShape = {
  scope: scopeSchema,
  prompt: z.string(),
  model: z.string()
};

const proposalSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), ...provenanceShape, before: z.string(), after: z.string() }),
  z.object({ kind: z.literal("document"), ...provenanceShape, before: z.string(), after: z.string() }),
  z.object({ kind: z.literal("table"), ...provenanceShape, before: cellListSchema, after: cellListSchema })
]);

type PreviewOutcome = { ok: true; diff: DiffResult } | { ok: false; error: DiffComputationError };

type RollbackResult = {
  restore: RestoreOutcome;
  error?: unknown;
};

export type ChangeSetEngineDeps = {
  backend: DocumentBackend;
  store: SessionStore;
  snapshots: SnapshotStore;
  auditLog: AuditLog;
  config: EngineConfig;
  logger: Logger;
  now?: () => Date;
};

function assertAligned(changeSet: ChangeSet, content: ScopeContent, diff: DiffResult): void {
  const locator = changeSet.scope.locator;

  if (changeSet.kind !== "table") {
    if (content.kind !== "text") {
      throw new DiffComputationError(`Scope ${locator} holds table content, not text.`);
    }
    if (content.text !== changeSet.before) {
      throw new DiffComputationError(`Scope ${locator} no longer matches the proposal's before text.`);
    }
    return;
  }

  if (content.kind !== "table") {
    throw new DiffComputationError(`Scope ${locator} holds text content, not a table.`);
  }

  // Absent and empty cells are treated as the same value.
  const current = new Map(content.cells.map((cell) => [cellKey(cell.row, cell.col), cell.value]));
  const expected = [
    ...changeSet.before.map((cell) => ({ row: cell.row, col: cell.col, value: cell.value })),
    ...(diff.kind === "table" ? diff.cells.map((cell) => ({ row: cell.row, col: cell.col, value: cell.old ?? "" })) : [])
  ];
  for (const cell of expected) {
    if ((current.get(cellKey(cell.row, cell.col)) ?? "") !== cell.value) {
      throw new DiffComputationError(
        `Cell (${cell.row}, ${cell.col}) of scope ${locator} no longer matches the proposal's before value.`
      );
    }
  }
}

function payloadOf(proposal: ChangePayload): ChangePayload {
  if (proposal.kind === "table") {
    return { kind: "table", before: proposal.before, after: proposal.after };
  }
  return { kind: proposal.kind, before: proposal.before, after: proposal.after };
}

export class ChangeSetEngine {
  private readonly backend: DocumentBackend;
  private readonly store: SessionStore;
  private readonly snapshots: SnapshotStore;
  private readonly auditLog: AuditLog;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idLocks = new KeyedMutex();
  private readonly createLocks = new KeyedMutex();
  private readonly documentLocks = new KeyedMutex();

  constructor(deps: ChangeSetEngineDeps) {
    this.backend = deps.backend;
    this.store = deps.store;
    this.snapshots = deps.snapshots;
    this.auditLog = deps.auditLog;
    this.config = deps.config;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async create(input: ProposalInput, actor = "system"): Promise<ChangeSet> {
    const parsed = proposalSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidProposalError(
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "proposal"}: ${issue.message}`)
      );
    }

    const proposal = parsed.data;
    const key = scopeKey(proposal.scope);
    // Scopes of one document may overlap, so creation is serialized per document.
    return this.createLocks.runExclusive(proposal.scope.documentId, async () => {
      const active = this.store.findActive(proposal.scope);
      if (active) {
        throw new ScopeConflictError(key, active.id);
      }

      const timestamp = this.now().toISOString();
      const changeSet: ChangeSet = {
        id: uuidv4(),
        scope: { ...proposal.scope },
        prompt: proposal.prompt,
        model: proposal.model,
        status: "draft",
        diff: null,
        snapshotId: null,
        confirmationRequired: false,
        createdAt: timestamp,
        updatedAt: timestamp,
        ...payloadOf(proposal)
      };

      await this.audit({ changeSetId: changeSet.id, actor, fromStatus: null, toStatus: "draft" });
      const stored = this.store.insert(changeSet);
      this.logger.info("change set created", { id: stored.id, kind: stored.kind, scope: key });
      return stored;
    });
  }

  async preview(id: string, options: BackendCallOptions = {}): Promise<DiffResult> {
    return this.idLocks.runExclusive(id, async () => {
      const changeSet = this.require(id);
      this.assertStatus(changeSet, ["draft"], "preview");

      const handle = await this.documentLocks.runExclusive(changeSet.scope.documentId, () =>
        this.snapshots.capture(id, changeSet.scope, this.timeoutFor(options))
      );
      const snapshot = this.requireSnapshot(id);
      const outcome = this.computePreview(changeSet, snapshot.content);

      if (outcome.ok) {
        const confirmationRequired =
          outcome.diff.kind === "table" && outcome.diff.cells.length > this.config.tableChangeThreshold;
        try {
          await this.audit({ changeSetId: id, actor: "system", fromStatus: "draft", toStatus: "previewed" });
        } catch (error) {
          this.snapshots.release(id);
          throw error;
        }
        this.store.transition(id, "draft", "previewed", {
          diff: outcome.diff,
          snapshotId: handle.id,
          confirmationRequired
        });
        this.logger.info("change set previewed", { id, summary: summarizeDiff(outcome.diff) });
        return structuredClone(outcome.diff);
      }

      const message = outcome.error.message;
      try {
        await this.auditAll([
          { changeSetId: id, actor: "system", fromStatus: "draft", toStatus: "previewed" },
          {
            changeSetId: id,
            actor: "system",
            fromStatus: "previewed",
            toStatus: "failed",
            error: message,
            restore: "not_required"
          }
        ]);
      } catch (error) {
        this.snapshots.release(id);
        throw error;
      }
      this.store.transition(id, "draft", "previewed", { snapshotId: handle.id });
      this.store.transition(id, "previewed", "failed", { error: message });
      this.logger.warn("change set preview failed", { id, error: message });
      throw outcome.error;
    });
  }

  async approve(id: string, actor: string, reason?: string): Promise<ChangeSet> {
    return this.idLocks.runExclusive(id, async () => {
      const changeSet = this.require(id);
      this.assertStatus(changeSet, ["previewed"], "approve");

      await this.audit({ changeSetId: id, actor, fromStatus: "previewed", toStatus: "approved", reason });
      const approved = this.store.transition(id, "previewed", "approved");
      this.logger.info("change set approved", { id, actor });
      return approved;
    });
  }

  async reject(id: string, actor: string, reason?: string, options: BackendCallOptions = {}): Promise<ChangeSet> {
    return this.idLocks.runExclusive(id, async () => {
      const changeSet = this.require(id);
      this.assertStatus(changeSet, ["previewed", "approved"], "reject");

      if (changeSet.status === "previewed") {
        await this.audit({
          changeSetId: id,
          actor,
          fromStatus: "previewed",
          toStatus: "rejected",
          reason,
          reasonCode: "rejected_after_preview",
          restore: "not_required"
        });
        const rejected = this.store.transition(id, "previewed", "rejected");
        this.logger.info("change set rejected", { id, actor, after: "preview" });
        return rejected;
      }

      const { handle } = this.requireSnapshot(id);
      try {
        await this.documentLocks.runExclusive(changeSet.scope.documentId, () =>
          this.snapshots.restore(handle, this.timeoutFor(options))
        );
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error("snapshot restore failed during reject", { id, error: message });
        await this.audit({
          changeSetId: id,
          actor,
          fromStatus: "approved",
          toStatus: "failed",
          reason,
          error: message,
          restore: "failed"
        });
        this.store.transition(id, "approved", "failed", { error: message });
        throw new RestoreFailureError(id, { cause: error });
      }

      await this.audit({
        changeSetId: id,
        actor,
        fromStatus: "approved",
        toStatus: "rejected",
        reason,
        reasonCode: "rejected_after_approval",
        restore: "restored"
      });
      const rejected = this.store.transition(id, "approved", "rejected");
      this.logger.info("change set rejected", { id, actor, after: "approval" });
      return rejected;
    });
  }

  async apply(id: string, actor = "system", options: BackendCallOptions = {}): Promise<ChangeSet> {
    return this.idLocks.runExclusive(id, async () => {
      const changeSet = this.require(id);
      this.assertStatus(changeSet, ["approved"], "apply");

      const diff = changeSet.diff;
      if (!diff) {
        throw new Error(`Approved change set ${id} has no diff.`);
      }
      const { handle } = this.requireSnapshot(id);
      const timeoutMs = this.timeoutFor(options);

      return this.documentLocks.runExclusive(changeSet.scope.documentId, async () => {
        let pendingWrite: Promise<void> | undefined;
        try {
          if (this.config.backupBeforeApply) {
            await this.backupDocument(changeSet.scope.documentId, timeoutMs);
          }
          pendingWrite = this.backend.write(changeSet.scope, this.applyPayload(changeSet, diff));
          await withTimeout(pendingWrite, timeoutMs, "Apply");
        } catch (error) {
          if (error instanceof TimeoutError && pendingWrite && !(await this.settles(pendingWrite, timeoutMs))) {
            return this.failApply(changeSet, handle, diff, actor, error, timeoutMs, {
              restore: "failed",
              error: new Error(`Write to ${changeSet.scope.locator} still pending after ${2 * timeoutMs}ms.`)
            });
          }
          return this.failApply(changeSet, handle, diff, actor, error, timeoutMs);
        }

        try {
          await this.audit({ changeSetId: id, actor, fromStatus: "approved", toStatus: "applied" });
        } catch (error) {
          const rollback = await this.rollback(changeSet, handle, diff, timeoutMs);
          this.logger.error("audit write failed after apply; document rolled back", {
            id,
            restore: rollback.restore
          });
          throw error;
        }

        const applied = this.store.transition(id, "approved", "applied");
        this.logger.info("change set applied", { id, actor });
        return applied;
      });
    });
  }

  get(id: string): ChangeSet | undefined {
    return this.store.get(id);
  }

  list(filter: ChangeSetFilter = {}): ChangeSet[] {
    return this.store.list(filter);
  }

  history(id: string): Promise<AuditEntry[]> {
    return this.auditLog.query(id);
  }

  gc(terminalTtlMs: number = this.config.terminalTtlMs): string[] {
    const removed = this.store.gc(terminalTtlMs);
    this.auditLog.evict(removed);
    if (removed.length > 0) {
      this.logger.debug("terminal change sets reclaimed", { count: removed.length });
    }
    return removed;
  }

  private computePreview(changeSet: ChangeSet, content: ScopeContent): PreviewOutcome {
    try {
      const diff = computeDiff(changeSet);
      assertAligned(changeSet, content, diff);
      return { ok: true, diff };
    } catch (error) {
      if (error instanceof DiffComputationError) {
        return { ok: false, error };
      }
      return {
        ok: false,
        error: new DiffComputationError(`Could not compute the diff for ${changeSet.id}: ${errorMessage(error)}`, {
          cause: error
        })
      };
    }
  }

  private applyPayload(changeSet: ChangeSet, diff: DiffResult): WritePayload {
    if (changeSet.kind !== "table") {
      return { kind: "text", text: changeSet.after };
    }
    if (diff.kind !== "table") {
      throw new Error(`Table change set ${changeSet.id} carries a text diff.`);
    }
    return {
      kind: "cells",
      patches: diff.cells.map((cell) => ({ row: cell.row, col: cell.col, value: cell.new }))
    };
  }

  private async backupDocument(documentId: string, timeoutMs: number): Promise<void> {
    if (!this.backend.backup) {
      throw new Error("Document backend does not support whole-document backups.");
    }
    const backupId = await withTimeout(this.backend.backup(documentId), timeoutMs, "Backup");
    this.logger.info("document backed up before apply", { documentId, backupId });
  }

  private async rollback(
    changeSet: ChangeSet,
    handle: SnapshotHandle,
    diff: DiffResult,
    timeoutMs: number
  ): Promise<RollbackResult> {
    try {
      if (diff.kind === "table") {
        await this.snapshots.restoreCells(handle, diff.cells, timeoutMs);
      } else {
        await this.snapshots.restore(handle, timeoutMs);
      }
      return { restore: "restored" };
    } catch (error) {
      this.logger.error("snapshot restore failed", { id: changeSet.id, error: errorMessage(error) });
      return { restore: "failed", error };
    }
  }

  // A timed-out write keeps running in the backend; rolling back before it settles would be overwritten.
  private async settles(task: Promise<void>, timeoutMs: number): Promise<boolean> {
    try {
      await withTimeout(
        task.then(
          () => undefined,
          () => undefined
        ),
        timeoutMs,
        "Pending write"
      );
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  private async failApply(
    changeSet: ChangeSet,
    handle: SnapshotHandle,
    diff: DiffResult,
    actor: string,
    cause: unknown,
    timeoutMs: number,
    unrestored?: RollbackResult
  ): Promise<never> {
    const message = errorMessage(cause);
    this.logger.warn("apply failed; restoring snapshot", { id: changeSet.id, error: message });

    const rollback = unrestored ?? (await this.rollback(changeSet, handle, diff, timeoutMs));
    await this.audit({
      changeSetId: changeSet.id,
      actor,
      fromStatus: "approved",
      toStatus: "failed",
      error: message,
      restore: rollback.restore
    });
    this.store.transition(changeSet.id, "approved", "failed", { error: message });

    if (rollback.restore === "failed") {
      throw new RestoreFailureError(changeSet.id, { cause: rollback.error });
    }
    throw new BackendWriteError(`Applying change set ${changeSet.id} failed: ${message}`, { cause });
  }

  private audit(entry: Omit<AuditEntry, "id" | "timestamp">): Promise<AuditEntry> {
    return this.auditLog.append({ id: uuidv4(), timestamp: this.now().toISOString(), ...entry });
  }

  private auditAll(entries: Array<Omit<AuditEntry, "id" | "timestamp">>): Promise<AuditEntry[]> {
    const timestamp = this.now().toISOString();
    return this.auditLog.appendAll(entries.map((entry) => ({ id: uuidv4(), timestamp, ...entry })));
  }

  private require(id: string): ChangeSet {
    const changeSet = this.store.get(id);
    if (!changeSet) {
      throw new ChangeSetNotFoundError(id);
    }
    return changeSet;
  }

  private requireSnapshot(id: string): { handle: SnapshotHandle; content: ScopeContent } {
    const snapshot = this.snapshots.get(id);
    if (!snapshot) {
      throw new Error(`Change set ${id} holds no snapshot.`);
    }
    return snapshot;
  }

  private assertStatus(changeSet: ChangeSet, allowed: ChangeSetStatus[], operation: string): void {
    if (!allowed.includes(changeSet.status)) {
      throw new InvalidTransitionError(changeSet.id, changeSet.status, operation);
    }
  }

  private timeoutFor(options: BackendCallOptions): number {
    return options.timeoutMs ?? this.config.backendTimeoutMs;
  }
}
