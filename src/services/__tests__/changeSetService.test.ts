import { beforeEach, describe, expect, it, vi } from "vitest";
import { EngineConfig } from "../../config.js";
import {
  AuditLogError,
  BackendWriteError,
  ChangeSetNotFoundError,
  DiffComputationError,
  InvalidProposalError,
  InvalidTransitionError,
  RestoreFailureError,
  ScopeConflictError
} from "../../errors.js";
import { Logger } from "../../logger.js";
import { SessionStore } from "../../sessionStore.js";
import { DocumentBackend, ProposalInput, TableCell } from "../../types.js";
import { AuditLog, MemoryAuditSink, replayAuditTrail } from "../auditLogService.js";
import { ChangeSetEngine } from "../changeSetService.js";
import { MemoryDocumentBackend } from "../memoryDocumentBackend.js";
import { SnapshotStore } from "../snapshotService.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};

const baseConfig: EngineConfig = {
  previewRequired: true,
  tableChangeThreshold: 3,
  backupBeforeApply: false,
  backendTimeoutMs: 1000,
  terminalTtlMs: 60_000,
  auditLogPath: "unused.jsonl",
  logLevel: "error"
};

const paragraphScope = { documentId: "doc-1", locator: "paragraph:0" };
const tableScope = { documentId: "doc-1", locator: "table:0" };

const tableCells: TableCell[] = [
  { row: 0, col: 0, value: "A" },
  { row: 0, col: 1, value: "B" },
  { row: 1, col: 0, value: "C" },
  { row: 1, col: 1, value: "D" }
];

const textProposal: Extract<ProposalInput, { kind: "text" | "document" }> = {
  kind: "text",
  scope: paragraphScope,
  prompt: "use a different animal",
  model: "test-model",
  before: "the cat sat",
  after: "the dog sat"
};

function tableProposal(after: TableCell[]): ProposalInput {
  return { kind: "table", scope: tableScope, prompt: "fix the table", model: "test-model", before: tableCells, after };
}

function loadDocument(backend: MemoryDocumentBackend): void {
  backend.load("doc-1", {
    paragraphs: ["the cat sat", "second paragraph"],
    tables: [tableCells]
  });
}

function build(backend: DocumentBackend, overrides: Partial<EngineConfig> = {}) {
  const now = () => new Date("2026-03-01T10:00:00.000Z");
  const sink = new MemoryAuditSink();
  const snapshots = new SnapshotStore(backend, now);
  const engine = new ChangeSetEngine({
    backend,
    store: new SessionStore(snapshots, now, backend.overlaps?.bind(backend)),
    snapshots,
    auditLog: new AuditLog(sink),
    config: { ...baseConfig, ...overrides },
    logger: silentLogger,
    now
  });
  return { engine, sink };
}

describe("ChangeSetEngine", () => {
  let backend: MemoryDocumentBackend;
  let engine: ChangeSetEngine;
  let sink: MemoryAuditSink;

  beforeEach(() => {
    backend = new MemoryDocumentBackend();
    loadDocument(backend);
    ({ engine, sink } = build(backend));
  });

  async function approvedTextChange(): Promise<string> {
    const { id } = await engine.create(textProposal, "assistant");
    await engine.preview(id);
    await engine.approve(id, "reviewer");
    return id;
  }

  describe("review flow", () => {
    it("walks a text change from draft to applied", async () => {
      const created = await engine.create(textProposal, "assistant");
      expect(created.status).toBe("draft");
      expect(created.diff).toBeNull();

      const diff = await engine.preview(created.id);
      expect(diff).toEqual({
        kind: "text",
        spans: [
          { tag: "equal", text: "the " },
          { tag: "delete", text: "cat" },
          { tag: "insert", text: "dog" },
          { tag: "equal", text: " sat" }
        ]
      });
      expect(engine.get(created.id)?.snapshotId).not.toBeNull();

      await engine.approve(created.id, "reviewer", "reads better");
      const applied = await engine.apply(created.id, "reviewer");

      expect(applied.status).toBe("applied");
      expect(applied.snapshotId).toBeNull();
      expect(backend.export("doc-1").paragraphs).toEqual(["the dog sat", "second paragraph"]);

      const history = await engine.history(created.id);
      expect(history.map((entry) => [entry.fromStatus, entry.toStatus])).toEqual([
        [null, "draft"],
        ["draft", "previewed"],
        ["previewed", "approved"],
        ["approved", "applied"]
      ]);
      expect(history[0].actor).toBe("assistant");
      expect(history[2].reason).toBe("reads better");
    });

    it("leaves an audit trail that replays cleanly", async () => {
      const applied = await approvedTextChange();
      await engine.apply(applied, "reviewer");
      const second = await engine.create({ ...textProposal, before: "the dog sat", after: "the bird sat" });
      await engine.preview(second.id);
      await engine.reject(second.id, "reviewer");

      const replay = replayAuditTrail(await sink.readAll());
      expect(replay.violations).toEqual([]);
      expect(replay.finalStatus.get(applied)).toBe("applied");
      expect(replay.finalStatus.get(second.id)).toBe("rejected");
    });

    it("lists change sets by status and document", async () => {
      const text = await engine.create(textProposal);
      const table = await engine.create(tableProposal(tableCells));
      await engine.preview(table.id);

      expect(engine.list({ status: "draft" }).map((item) => item.id)).toEqual([text.id]);
      expect(engine.list({ documentId: "doc-1" })).toHaveLength(2);
    });
  });

  describe("state machine enforcement", () => {
    it("refuses to approve before preview", async () => {
      const { id } = await engine.create(textProposal);
      await expect(engine.approve(id, "reviewer")).rejects.toThrow(
        `Cannot approve change set ${id} while it is draft.`
      );
    });

    it("refuses to apply before approval", async () => {
      const { id } = await engine.create(textProposal);
      await engine.preview(id);
      await expect(engine.apply(id)).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
    });

    it("refuses a second preview", async () => {
      const { id } = await engine.create(textProposal);
      await engine.preview(id);
      await expect(engine.preview(id)).rejects.toThrow(`Cannot preview change set ${id} while it is previewed.`);
    });

    it("refuses to touch a terminal change set", async () => {
      const id = await approvedTextChange();
      await engine.apply(id);
      await expect(engine.reject(id, "reviewer")).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(engine.apply(id)).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it("reports unknown ids", async () => {
      await expect(engine.approve("missing", "reviewer")).rejects.toBeInstanceOf(ChangeSetNotFoundError);
    });
  });

  describe("concurrency", () => {
    it("admits one of two concurrent proposals for the same scope", async () => {
      const results = await Promise.allSettled([engine.create(textProposal), engine.create(textProposal)]);

      expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
      const rejected = results.find((result) => result.status === "rejected");
      expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(ScopeConflictError);
      expect(engine.list()).toHaveLength(1);
    });

    it("lets exactly one concurrent approval win", async () => {
      const { id } = await engine.create(textProposal);
      await engine.preview(id);

      const results = await Promise.allSettled([engine.approve(id, "alice"), engine.approve(id, "bob")]);

      expect(results.map((result) => result.status).sort()).toEqual(["fulfilled", "rejected"]);
      const approvals = (await engine.history(id)).filter((entry) => entry.toStatus === "approved");
      expect(approvals).toHaveLength(1);
    });

    it("treats the whole document as overlapping each of its paragraphs", async () => {
      const whole = await engine.create({
        kind: "document",
        scope: { documentId: "doc-1", locator: "document" },
        prompt: "rewrite everything",
        model: "test-model",
        before: "the cat sat\nsecond paragraph",
        after: "THE CAT SAT\nsecond paragraph"
      });

      await expect(
        engine.create({ ...textProposal, scope: { documentId: "doc-1", locator: "paragraph:1" } })
      ).rejects.toThrow(`Scope doc-1::paragraph:1 already has an active change set (${whole.id}).`);
      expect((await engine.create(tableProposal(tableCells))).status).toBe("draft");

      await engine.preview(whole.id);
      await engine.reject(whole.id, "reviewer");
      expect((await engine.create({ ...textProposal, before: "the cat sat" })).status).toBe("draft");
      await expect(
        engine.create({
          kind: "document",
          scope: { documentId: "doc-1", locator: "document" },
          prompt: "again",
          model: "test-model",
          before: "",
          after: ""
        })
      ).rejects.toBeInstanceOf(ScopeConflictError);
    });

    it("serializes overlapping proposals that race", async () => {
      const results = await Promise.allSettled([
        engine.create({ ...textProposal, kind: "document", scope: { documentId: "doc-1", locator: "document" } }),
        engine.create(textProposal)
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      expect((await sink.readAll()).filter((entry) => entry.toStatus === "draft")).toHaveLength(1);
    });

    it("frees the scope once a change set is terminal", async () => {
      const { id } = await engine.create(textProposal);
      await expect(engine.create(textProposal)).rejects.toBeInstanceOf(ScopeConflictError);
      await engine.preview(id);
      await engine.reject(id, "reviewer");

      expect((await engine.create(textProposal)).status).toBe("draft");
    });
  });

  describe("preview", () => {
    it("fails a change set whose before text no longer matches the document", async () => {
      const { id } = await engine.create({ ...textProposal, before: "the cow sat" });

      await expect(engine.preview(id)).rejects.toThrow(
        "Scope paragraph:0 no longer matches the proposal's before text."
      );

      const failed = engine.get(id);
      expect(failed?.status).toBe("failed");
      expect(failed?.snapshotId).toBeNull();
      expect((await engine.history(id)).map((entry) => entry.toStatus)).toEqual(["draft", "previewed", "failed"]);
    });

    it("fails a table change set whose cells drifted", async () => {
      await backend.write(tableScope, { kind: "cells", patches: [{ row: 1, col: 1, value: "Z" }] });
      const { id } = await engine.create(tableProposal(tableCells));

      await expect(engine.preview(id)).rejects.toBeInstanceOf(DiffComputationError);
      expect(engine.get(id)?.status).toBe("failed");
    });

    it("records a failed preview atomically", async () => {
      const { id } = await engine.create({ ...textProposal, before: "the cow sat" });
      vi.spyOn(sink, "append").mockRejectedValueOnce(new Error("disk full"));

      await expect(engine.preview(id)).rejects.toBeInstanceOf(AuditLogError);
      expect(engine.get(id)?.status).toBe("draft");
      expect((await engine.history(id)).map((entry) => entry.toStatus)).toEqual(["draft"]);

      await expect(engine.preview(id)).rejects.toBeInstanceOf(DiffComputationError);
      expect(replayAuditTrail(await sink.readAll()).violations).toEqual([]);
      expect(engine.get(id)?.status).toBe("failed");
    });

    it("flags table changes above the threshold for confirmation", async () => {
      const small = await engine.create(
        tableProposal(tableCells.map((cell) => (cell.row === 0 && cell.col === 0 ? { ...cell, value: "a" } : cell)))
      );
      await engine.preview(small.id);
      expect(engine.get(small.id)?.confirmationRequired).toBe(false);
      await engine.reject(small.id, "reviewer");

      const large = await engine.create(tableProposal(tableCells.map((cell) => ({ ...cell, value: cell.value.toLowerCase() }))));
      await engine.preview(large.id);
      expect(engine.get(large.id)?.confirmationRequired).toBe(true);
    });
  });

  describe("reject", () => {
    it("leaves the document alone when rejecting a preview", async () => {
      const { id } = await engine.create(textProposal);
      await engine.preview(id);
      const rejected = await engine.reject(id, "reviewer", "not now");

      expect(rejected.status).toBe("rejected");
      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
      const last = (await engine.history(id)).at(-1);
      expect(last).toMatchObject({
        fromStatus: "previewed",
        toStatus: "rejected",
        reason: "not now",
        reasonCode: "rejected_after_preview",
        restore: "not_required"
      });
    });

    it("restores the snapshot when rejecting an approved change set", async () => {
      const id = await approvedTextChange();
      await backend.write(paragraphScope, { kind: "text", text: "scribbled over" });

      await engine.reject(id, "reviewer");

      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
      expect((await engine.history(id)).at(-1)).toMatchObject({
        fromStatus: "approved",
        toStatus: "rejected",
        reasonCode: "rejected_after_approval",
        restore: "restored"
      });
    });

    it("fails the change set when the restore cannot be written", async () => {
      const id = await approvedTextChange();
      vi.spyOn(backend, "write").mockRejectedValueOnce(new Error("read-only volume"));

      await expect(engine.reject(id, "reviewer")).rejects.toBeInstanceOf(RestoreFailureError);

      expect(engine.get(id)?.status).toBe("failed");
      const replay = replayAuditTrail(await sink.readAll());
      expect(replay.unresolvedRestores.map((entry) => entry.changeSetId)).toEqual([id]);
    });
  });

  describe("apply", () => {
    it("rolls back a text write that fails halfway", async () => {
      const id = await approvedTextChange();
      const write = backend.write.bind(backend);
      vi.spyOn(backend, "write").mockImplementationOnce(async (scope, payload) => {
        await write(scope, payload);
        throw new Error("connection reset");
      });

      const failure = engine.apply(id, "reviewer");
      await expect(failure).rejects.toBeInstanceOf(BackendWriteError);
      await expect(failure).rejects.toThrow(`Applying change set ${id} failed: connection reset`);

      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
      const changeSet = engine.get(id);
      expect(changeSet?.status).toBe("failed");
      expect(changeSet?.error).toBe("connection reset");
      const history = await engine.history(id);
      expect(history.map((entry) => [entry.fromStatus, entry.toStatus])).toEqual([
        [null, "draft"],
        ["draft", "previewed"],
        ["previewed", "approved"],
        ["approved", "failed"]
      ]);
      expect(history[3]).toMatchObject({ error: "connection reset", restore: "restored" });
    });

    it("writes only the changed cells of a table", async () => {
      const { id } = await engine.create(
        tableProposal([
          { row: 0, col: 0, value: "A" },
          { row: 0, col: 1, value: "X" },
          { row: 1, col: 0, value: "C" },
          { row: 1, col: 1, value: "D" },
          { row: 2, col: 0, value: "N" }
        ])
      );
      await engine.preview(id);
      await engine.approve(id, "reviewer");
      const writeSpy = vi.spyOn(backend, "write");

      await engine.apply(id, "reviewer");

      expect(writeSpy).toHaveBeenCalledTimes(1);
      expect(writeSpy).toHaveBeenLastCalledWith(tableScope, {
        kind: "cells",
        patches: [
          { row: 0, col: 1, value: "X" },
          { row: 2, col: 0, value: "N" }
        ]
      });
      expect(backend.export("doc-1").tables?.[0]).toEqual([
        { row: 0, col: 0, value: "A" },
        { row: 0, col: 1, value: "X" },
        { row: 1, col: 0, value: "C" },
        { row: 1, col: 1, value: "D" },
        { row: 2, col: 0, value: "N" }
      ]);
    });

    it("restores each touched cell after a partial table write", async () => {
      const { id } = await engine.create(
        tableProposal([
          { row: 0, col: 0, value: "A" },
          { row: 0, col: 1, value: "X" },
          { row: 1, col: 0, value: "C" },
          { row: 1, col: 1, value: "D" },
          { row: 2, col: 0, value: "N" }
        ])
      );
      await engine.preview(id);
      await engine.approve(id, "reviewer");
      const write = backend.write.bind(backend);
      vi.spyOn(backend, "write").mockImplementationOnce(async (scope, payload) => {
        if (payload.kind === "cells") {
          await write(scope, { kind: "cells", patches: payload.patches.slice(0, 1) });
        }
        throw new Error("lost connection");
      });

      await expect(engine.apply(id, "reviewer")).rejects.toBeInstanceOf(BackendWriteError);

      expect(backend.export("doc-1").tables?.[0]).toEqual(tableCells);
    });

    it("waits for a timed-out write to settle before rolling back", async () => {
      const id = await approvedTextChange();
      const write = backend.write.bind(backend);
      vi.spyOn(backend, "write").mockImplementationOnce(async (scope, payload) => {
        await delay(60);
        await write(scope, payload);
      });

      await expect(engine.apply(id, "reviewer", { timeoutMs: 40 })).rejects.toBeInstanceOf(BackendWriteError);
      await delay(100);

      const changeSet = engine.get(id);
      expect(changeSet?.status).toBe("failed");
      expect(changeSet?.error).toBe("Apply timed out after 40ms.");
      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
      expect((await engine.history(id)).at(-1)).toMatchObject({ toStatus: "failed", restore: "restored" });
    });

    it("reports a restore failure when a timed-out write never settles", async () => {
      const id = await approvedTextChange();
      const writeSpy = vi.spyOn(backend, "write").mockImplementationOnce(() => new Promise<void>(() => undefined));

      await expect(engine.apply(id, "reviewer", { timeoutMs: 20 })).rejects.toBeInstanceOf(RestoreFailureError);

      expect(writeSpy).toHaveBeenCalledTimes(1);
      expect(engine.get(id)?.error).toBe("Apply timed out after 20ms.");
      expect((await engine.history(id)).at(-1)).toMatchObject({
        fromStatus: "approved",
        toStatus: "failed",
        restore: "failed"
      });
    });

    it("reports a failed rollback as a restore failure", async () => {
      const id = await approvedTextChange();
      vi.spyOn(backend, "write")
        .mockRejectedValueOnce(new Error("write refused"))
        .mockRejectedValueOnce(new Error("restore refused"));

      await expect(engine.apply(id, "reviewer")).rejects.toBeInstanceOf(RestoreFailureError);
      expect((await engine.history(id)).at(-1)).toMatchObject({ toStatus: "failed", restore: "failed" });
    });

    it("rolls back and stays approved when the audit entry cannot be written", async () => {
      const id = await approvedTextChange();
      vi.spyOn(sink, "append").mockRejectedValueOnce(new Error("disk full"));

      await expect(engine.apply(id, "reviewer")).rejects.toBeInstanceOf(AuditLogError);

      expect(engine.get(id)?.status).toBe("approved");
      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
    });

    it("backs up the whole document first when configured", async () => {
      ({ engine, sink } = build(backend, { backupBeforeApply: true }));
      const id = await approvedTextChange();

      await engine.apply(id, "reviewer");

      expect(backend.getBackup("doc-1@1")?.paragraphs).toEqual(["the cat sat", "second paragraph"]);
      expect(backend.export("doc-1").paragraphs[0]).toBe("the dog sat");
    });

    it("fails the apply when the backend cannot take backups", async () => {
      const plain: DocumentBackend = {
        read: (scope) => backend.read(scope),
        write: (scope, payload) => backend.write(scope, payload)
      };
      ({ engine, sink } = build(plain, { backupBeforeApply: true }));
      const id = await approvedTextChange();

      await expect(engine.apply(id, "reviewer")).rejects.toThrow(
        `Applying change set ${id} failed: Document backend does not support whole-document backups.`
      );
      expect(engine.get(id)?.status).toBe("failed");
      expect(backend.export("doc-1").paragraphs[0]).toBe("the cat sat");
    });
  });

  describe("durability", () => {
    it("creates nothing when the audit entry cannot be written", async () => {
      vi.spyOn(sink, "append").mockRejectedValueOnce(new Error("disk full"));

      await expect(engine.create(textProposal)).rejects.toBeInstanceOf(AuditLogError);
      expect(engine.list()).toEqual([]);
    });

    it("validates proposals", async () => {
      const duplicate = tableProposal([
        { row: 0, col: 0, value: "A" },
        { row: 0, col: 0, value: "B" }
      ]);
      await expect(engine.create(duplicate)).rejects.toThrow("Invalid proposal: after: duplicate cell (0, 0)");
      await expect(
        engine.create({ ...textProposal, scope: { documentId: "", locator: "paragraph:0" } })
      ).rejects.toBeInstanceOf(InvalidProposalError);
    });

    it("keeps history readable after reclaiming terminal change sets", async () => {
      const { id } = await engine.create(textProposal);
      await engine.preview(id);
      await engine.reject(id, "reviewer");

      expect(engine.gc(0)).toEqual([id]);
      expect(engine.get(id)).toBeUndefined();
      expect((await engine.history(id)).map((entry) => entry.toStatus)).toEqual(["draft", "previewed", "rejected"]);
    });
  });
});
