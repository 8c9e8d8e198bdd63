import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LogLevel } from "./logger.js";

export type EngineConfig = {
  previewRequired: true;
  tableChangeThreshold: number;
  backupBeforeApply: boolean;
  backendTimeoutMs: number;
  terminalTtlMs: number;
  auditLogPath: string;
  logLevel: LogLevel;
};

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  CHANGESET_PREVIEW_REQUIRED: booleanFlag
    .default("true")
    .refine((value) => value, { message: "Preview cannot be disabled." }),
  CHANGESET_TABLE_CHANGE_THRESHOLD: z.coerce.number().int().min(0).default(50),
  CHANGESET_BACKUP_BEFORE_APPLY: booleanFlag.default("false"),
  CHANGESET_BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CHANGESET_TERMINAL_TTL_MS: z.coerce.number().int().min(0).default(24 * 60 * 60 * 1000),
  CHANGESET_AUDIT_LOG_PATH: z.string().min(1).default("data/audit-log.jsonl"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    previewRequired: true,
    tableChangeThreshold: values.CHANGESET_TABLE_CHANGE_THRESHOLD,
    backupBeforeApply: values.CHANGESET_BACKUP_BEFORE_APPLY,
    backendTimeoutMs: values.CHANGESET_BACKEND_TIMEOUT_MS,
    terminalTtlMs: values.CHANGESET_TERMINAL_TTL_MS,
    auditLogPath: values.CHANGESET_AUDIT_LOG_PATH,
    logLevel: values.LOG_LEVEL
  };
}
