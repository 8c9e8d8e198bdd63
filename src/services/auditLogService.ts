import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AuditLogError, errorMessage } from "../errors.js";
import { canTransition } from "../stateMachine.js";
import { AuditEntry, ChangeSetStatus } from "../types.js";

export type AuditSink = {
  /** Persists the entries as one durable write: all of them or none. */
  append(entries: readonly AuditEntry[]): Promise<void>;
  readAll(): Promise<AuditEntry[]>;
};

const statusSchema = z.enum(["draft", "previewed", "approved", "applied", "rejected", "failed"]);

const auditEntrySchema = z.object({
  id: z.string().min(1),
  changeSetId: z.string().min(1),
  timestamp: z.string().min(1),
  actor: z.string().min(1),
  fromStatus: statusSchema.nullable(),
  toStatus: statusSchema,
  reason: z.string().optional(),
  reasonCode: z.enum(["rejected_after_preview", "rejected_after_approval"]).optional(),
  error: z.string().optional(),
  restore: z.enum(["not_required", "restored", "failed"]).optional()
});

export class MemoryAuditSink implements AuditSink {
  private readonly entries: AuditEntry[] = [];

  async append(entries: readonly AuditEntry[]): Promise<void> {
    this.entries.push(...entries.map((entry) => ({ ...entry })));
  }

  async readAll(): Promise<AuditEntry[]> {
    return this.entries.map((entry) => ({ ...entry }));
  }
}

/**
 * JSON Lines file, one entry per line. Every append is a single write flushed with fsync before it
 * resolves, and appends are written in call order.
 */
export class JsonlAuditSink implements AuditSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(entries: readonly AuditEntry[]): Promise<void> {
    const lines = entries.map((entry) => `${JSON.stringify(entry)}\n`).join("");
    const write = this.queue.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(this.filePath, "a");
      try {
        await handle.appendFile(lines, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
    });
    this.queue = write.catch(() => undefined);
    return write;
  }

  async readAll(): Promise<AuditEntry[]> {
    let raw = "";
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      const code = (error as { code?: string }).code;
      if (code === "ENOENT") {
        return [];
      }
      throw new AuditLogError(`Failed to read audit log ${this.filePath}.`, { cause: error });
    }

    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line, index) => {
        let value: unknown;
        try {
          value = JSON.parse(line);
        } catch (error) {
          throw new AuditLogError(`Audit log line ${index + 1} is invalid JSON.`, { cause: error });
        }
        const parsed = auditEntrySchema.safeParse(value);
        if (!parsed.success) {
          throw new AuditLogError(`Audit log line ${index + 1} is not a valid entry.`, {
            cause: parsed.error
          });
        }
        return parsed.data;
      });
  }
}

export class AuditLog {
  private readonly byChangeSet = new Map<string, AuditEntry[]>();

  constructor(private readonly sink: AuditSink) {}

  async append(entry: AuditEntry): Promise<AuditEntry> {
    const [frozen] = await this.appendAll([entry]);
    return frozen;
  }

  /** Appends several entries atomically; none is indexed unless the sink persisted all of them. */
  async appendAll(entries: AuditEntry[]): Promise<AuditEntry[]> {
    const frozen = entries.map((entry) => Object.freeze({ ...entry }));
    try {
      await this.sink.append(frozen);
    } catch (error) {
      const ids = [...new Set(entries.map((entry) => entry.changeSetId))].join(", ");
      throw new AuditLogError(`Failed to persist audit entry for change set ${ids}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    for (const entry of frozen) {
      const indexed = this.byChangeSet.get(entry.changeSetId) ?? [];
      indexed.push(entry);
      this.byChangeSet.set(entry.changeSetId, indexed);
    }
    return frozen;
  }

  async query(changeSetId: string): Promise<AuditEntry[]> {
    const cached = this.byChangeSet.get(changeSetId);
    if (cached) {
      return [...cached];
    }
    const all = await this.sink.readAll();
    return all.filter((entry) => entry.changeSetId === changeSetId);
  }

  evict(changeSetIds: string[]): void {
    for (const id of changeSetIds) {
      this.byChangeSet.delete(id);
    }
  }
}

export type AuditViolation = {
  changeSetId: string;
  entryId: string;
  message: string;
};

export type AuditReplay = {
  finalStatus: Map<string, ChangeSetStatus>;
  violations: AuditViolation[];
  unresolvedRestores: AuditEntry[];
};

export function replayAuditTrail(entries: AuditEntry[]): AuditReplay {
  const finalStatus = new Map<string, ChangeSetStatus>();
  const violations: AuditViolation[] = [];
  const unresolvedRestores: AuditEntry[] = [];

  for (const entry of entries) {
    const current = finalStatus.get(entry.changeSetId) ?? null;
    if (entry.fromStatus !== current) {
      violations.push({
        changeSetId: entry.changeSetId,
        entryId: entry.id,
        message: `expected from ${current ?? "nothing"}, entry says ${entry.fromStatus ?? "nothing"}`
      });
    } else if (!canTransition(entry.fromStatus, entry.toStatus)) {
      violations.push({
        changeSetId: entry.changeSetId,
        entryId: entry.id,
        message: `illegal edge ${entry.fromStatus ?? "nothing"} -> ${entry.toStatus}`
      });
    }
    if (entry.restore === "failed") {
      unresolvedRestores.push(entry);
    }
    finalStatus.set(entry.changeSetId, entry.toStatus);
  }

  return { finalStatus, violations, unresolvedRestores };
}
