import { InvalidTransitionError, ScopeConflictError } from "./errors.js";
import { SnapshotStore } from "./services/snapshotService.js";
import { canTransition, isTerminal } from "./stateMachine.js";
import { ChangeSet, ChangeSetFilter, ChangeSetStatus, DiffResult, Scope, scopeKey } from "./types.js";

export type TransitionPatch = {
  diff?: DiffResult;
  snapshotId?: string;
  confirmationRequired?: boolean;
  error?: string;
};

export type ScopeOverlap = (left: Scope, right: Scope) => boolean;

const sameScope: ScopeOverlap = (left, right) => scopeKey(left) === scopeKey(right);

function cloneChangeSet(changeSet: ChangeSet): ChangeSet {
  return structuredClone(changeSet);
}

export class SessionStore {
  private readonly changeSets = new Map<string, ChangeSet>();
  private readonly activeByScope = new Map<string, string>();

  constructor(
    private readonly snapshots: SnapshotStore,
    private readonly now: () => Date = () => new Date(),
    private readonly overlaps: ScopeOverlap = sameScope
  ) {}

  insert(changeSet: ChangeSet): ChangeSet {
    if (changeSet.status !== "draft") {
      throw new Error(`New change sets must start as draft, got ${changeSet.status}.`);
    }
    if (this.changeSets.has(changeSet.id)) {
      throw new Error(`Change set ${changeSet.id} already exists.`);
    }

    const key = scopeKey(changeSet.scope);
    const active = this.findActive(changeSet.scope);
    if (active) {
      throw new ScopeConflictError(key, active.id);
    }

    this.changeSets.set(changeSet.id, cloneChangeSet(changeSet));
    this.activeByScope.set(key, changeSet.id);
    return cloneChangeSet(changeSet);
  }

  get(id: string): ChangeSet | undefined {
    const changeSet = this.changeSets.get(id);
    return changeSet ? cloneChangeSet(changeSet) : undefined;
  }

  /** The active change set whose scope overlaps `scope`, if any. */
  findActive(scope: Scope): ChangeSet | undefined {
    for (const id of this.activeByScope.values()) {
      const changeSet = this.changeSets.get(id);
      if (changeSet && this.overlaps(changeSet.scope, scope)) {
        return cloneChangeSet(changeSet);
      }
    }
    return undefined;
  }

  list(filter: ChangeSetFilter = {}): ChangeSet[] {
    const statuses =
      filter.status === undefined ? undefined : Array.isArray(filter.status) ? filter.status : [filter.status];
    const wantedScope = filter.scope ? scopeKey(filter.scope) : undefined;

    return [...this.changeSets.values()]
      .filter((changeSet) => !statuses || statuses.includes(changeSet.status))
      .filter((changeSet) => !wantedScope || scopeKey(changeSet.scope) === wantedScope)
      .filter((changeSet) => !filter.documentId || changeSet.scope.documentId === filter.documentId)
      .sort((left, right) => left.createdAt.localeCompare(right.createdAt))
      .map(cloneChangeSet);
  }

  transition(
    id: string,
    from: ChangeSetStatus,
    to: ChangeSetStatus,
    patch: TransitionPatch = {}
  ): ChangeSet {
    const changeSet = this.changeSets.get(id);
    if (!changeSet) {
      throw new Error(`Change set ${id} not found.`);
    }
    if (changeSet.status !== from || !canTransition(from, to)) {
      throw new InvalidTransitionError(id, changeSet.status, `move to ${to}`);
    }

    if (patch.diff !== undefined) {
      if (changeSet.diff !== null) {
        throw new Error(`Change set ${id} already has a computed diff.`);
      }
      changeSet.diff = structuredClone(patch.diff);
    }
    if (patch.snapshotId !== undefined) {
      changeSet.snapshotId = patch.snapshotId;
    }
    if (patch.confirmationRequired !== undefined) {
      changeSet.confirmationRequired = patch.confirmationRequired;
    }
    if (patch.error !== undefined) {
      changeSet.error = patch.error;
    }

    changeSet.status = to;
    changeSet.updatedAt = this.now().toISOString();

    if (isTerminal(to)) {
      const key = scopeKey(changeSet.scope);
      if (this.activeByScope.get(key) === id) {
        this.activeByScope.delete(key);
      }
      this.snapshots.release(id);
      changeSet.snapshotId = null;
    }

    return cloneChangeSet(changeSet);
  }

  gc(terminalTtlMs: number): string[] {
    const cutoff = this.now().getTime() - terminalTtlMs;
    const removed: string[] = [];
    for (const [id, changeSet] of this.changeSets.entries()) {
      if (isTerminal(changeSet.status) && Date.parse(changeSet.updatedAt) <= cutoff) {
        this.changeSets.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  size(): number {
    return this.changeSets.size;
  }
}
