import "dotenv/config";
import { EngineConfig, loadConfig } from "./config.js";
import { Logger, createLogger } from "./logger.js";
import { SessionStore } from "./sessionStore.js";
import { AuditLog, AuditSink, JsonlAuditSink } from "./services/auditLogService.js";
import { ChangeSetEngine } from "./services/changeSetService.js";
import { SnapshotStore } from "./services/snapshotService.js";
import { DocumentBackend } from "./types.js";

export type CreateEngineOptions = {
  backend: DocumentBackend;
  config?: Partial<Omit<EngineConfig, "previewRequired">>;
  auditSink?: AuditSink;
  logger?: Logger;
  now?: () => Date;
};

export function createChangeSetEngine(options: CreateEngineOptions): ChangeSetEngine {
  const config: EngineConfig = { ...loadConfig(), ...options.config, previewRequired: true };
  const now = options.now ?? (() => new Date());
  const snapshots = new SnapshotStore(options.backend, now);

  return new ChangeSetEngine({
    backend: options.backend,
    store: new SessionStore(snapshots, now, options.backend.overlaps?.bind(options.backend)),
    snapshots,
    auditLog: new AuditLog(options.auditSink ?? new JsonlAuditSink(config.auditLogPath)),
    config,
    logger: options.logger ?? createLogger("changeset", config.logLevel),
    now
  });
}

export { ChangeSetEngine } from "./services/changeSetService.js";
export { loadConfig } from "./config.js";
export type { EngineConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { SessionStore } from "./sessionStore.js";
export type { ScopeOverlap, TransitionPatch } from "./sessionStore.js";
export { SnapshotStore } from "./services/snapshotService.js";
export {
  AuditLog,
  JsonlAuditSink,
  MemoryAuditSink,
  replayAuditTrail
} from "./services/auditLogService.js";
export type { AuditReplay, AuditSink, AuditViolation } from "./services/auditLogService.js";
export {
  applyCellChanges,
  computeDiff,
  diffTable,
  diffText,
  summarizeDiff,
  tokenizeText
} from "./services/diffService.js";
export type { DiffSummary } from "./services/diffService.js";
export { MemoryDocumentBackend } from "./services/memoryDocumentBackend.js";
export { DocxDocumentBackend } from "./services/docxDocumentBackend.js";
export { formatScopeLocator, locatorsOverlap, parseScopeLocator } from "./services/scopeLocator.js";
export type { ScopeLocator } from "./services/scopeLocator.js";
export { ACTIVE_STATUSES, canTransition, isTerminal } from "./stateMachine.js";
export * from "./errors.js";
export * from "./types.js";
