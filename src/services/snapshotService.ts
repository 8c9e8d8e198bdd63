import { v4 as uuidv4 } from "uuid";
import { withTimeout } from "../concurrency.js";
import { BackendReadError, BackendWriteError, errorMessage } from "../errors.js";
import {
  CellPatch,
  DocumentBackend,
  Scope,
  ScopeContent,
  SnapshotHandle,
  WritePayload,
  cellKey
} from "../types.js";

type StoredSnapshot = {
  handle: SnapshotHandle;
  content: ScopeContent;
};

function cloneContent(content: ScopeContent): ScopeContent {
  if (content.kind === "text") {
    return { kind: "text", text: content.text };
  }
  return { kind: "table", cells: content.cells.map((cell) => ({ ...cell })) };
}

/**
 * Holds the verbatim pre-change content of a scope for the change set that owns it.
 * A change set owns at most one snapshot at a time.
 */
export class SnapshotStore {
  private readonly snapshots = new Map<string, StoredSnapshot>();

  constructor(
    private readonly backend: DocumentBackend,
    private readonly now: () => Date = () => new Date()
  ) {}

  async capture(changeSetId: string, scope: Scope, timeoutMs: number): Promise<SnapshotHandle> {
    if (this.snapshots.has(changeSetId)) {
      throw new Error(`Change set ${changeSetId} already holds a snapshot.`);
    }

    let content: ScopeContent;
    try {
      content = await withTimeout(this.backend.read(scope), timeoutMs, "Snapshot capture");
    } catch (error) {
      throw new BackendReadError(`Failed to read scope ${scope.locator}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    const handle: SnapshotHandle = {
      id: uuidv4(),
      changeSetId,
      scope: { ...scope },
      capturedAt: this.now().toISOString()
    };
    this.snapshots.set(changeSetId, { handle, content: cloneContent(content) });
    return { ...handle, scope: { ...handle.scope } };
  }

  get(changeSetId: string): { handle: SnapshotHandle; content: ScopeContent } | undefined {
    const stored = this.snapshots.get(changeSetId);
    if (!stored) {
      return undefined;
    }
    return { handle: { ...stored.handle }, content: cloneContent(stored.content) };
  }

  async restore(handle: SnapshotHandle, timeoutMs: number): Promise<void> {
    const stored = this.requireOwned(handle);
    const payload: WritePayload =
      stored.content.kind === "text"
        ? { kind: "text", text: stored.content.text }
        : {
            kind: "cells",
            patches: stored.content.cells.map((cell) => ({ row: cell.row, col: cell.col, value: cell.value }))
          };
    await this.write(stored.handle.scope, payload, timeoutMs);
  }

  async restoreCells(
    handle: SnapshotHandle,
    cells: Array<{ row: number; col: number }>,
    timeoutMs: number
  ): Promise<void> {
    const stored = this.requireOwned(handle);
    if (stored.content.kind !== "table") {
      throw new Error(`Snapshot ${handle.id} does not hold table content.`);
    }

    const prior = new Map(stored.content.cells.map((cell) => [cellKey(cell.row, cell.col), cell.value]));
    const patches: CellPatch[] = cells.map((cell) => ({
      row: cell.row,
      col: cell.col,
      value: prior.get(cellKey(cell.row, cell.col)) ?? null
    }));
    if (patches.length === 0) {
      return;
    }
    await this.write(stored.handle.scope, { kind: "cells", patches }, timeoutMs);
  }

  release(changeSetId: string): boolean {
    return this.snapshots.delete(changeSetId);
  }

  private requireOwned(handle: SnapshotHandle): StoredSnapshot {
    const stored = this.snapshots.get(handle.changeSetId);
    if (!stored || stored.handle.id !== handle.id) {
      throw new Error(`Snapshot ${handle.id} is not held by change set ${handle.changeSetId}.`);
    }
    return stored;
  }

  private async write(
    scope: Scope,
    payload: WritePayload,
    timeoutMs: number
  ): Promise<void> {
    try {
      await withTimeout(this.backend.write(scope, payload), timeoutMs, "Snapshot restore");
    } catch (error) {
      throw new BackendWriteError(`Failed to restore scope ${scope.locator}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }
}
