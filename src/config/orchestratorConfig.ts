import { z } from "zod";

import { readOptionalEnum, readOptionalInt, readOptionalString } from "./env.js";
import { LOG_LEVELS } from "../logger.js";

/** Error raised when the merged configuration does not satisfy the schema. */
export class ConfigurationError extends Error {
  public readonly code = "E-CONFIG-INVALID";
  public readonly details: { issues: Array<{ path: string; message: string }> };

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`invalid orchestrator configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`);
    this.name = "ConfigurationError";
    this.details = { issues };
  }
}

/** Upper bound accepted for `maxConcurrency`. */
export const MAX_CONCURRENCY_LIMIT = 256;

const OrchestratorConfigSchema = z
  .object({
    /** Upper bound of concurrently running agent tasks. */
    maxConcurrency: z.number().int().min(1).max(MAX_CONCURRENCY_LIMIT).default(4),
    /** Default per-task deadline; `0` disables timeouts. */
    taskTimeoutMs: z.number().int().min(0).default(600_000),
    /** Failed agents tolerated before the run is finalised early; `null` disables the threshold. */
    maxFailures: z.number().int().min(1).nullable().default(null),
    contextHistoryLimit: z.number().int().min(1).default(1_000),
    brokerHistoryLimit: z.number().int().min(1).default(1_000),
    streamBufferSize: z.number().int().min(1).default(256),
    logFile: z.string().min(1).nullable().default(null),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .strict();

export type OrchestratorConfig = z.output<typeof OrchestratorConfigSchema>;

/**
 * Resolves the orchestrator configuration. Explicit overrides win over the
 * `AUDIT_*` environment variables, which win over the schema defaults.
 */
export function loadOrchestratorConfig(overrides: Partial<OrchestratorConfig> = {}): OrchestratorConfig {
  const candidate = {
    maxConcurrency: overrides.maxConcurrency ?? readOptionalInt("AUDIT_MAX_CONCURRENCY", { min: 1 }),
    taskTimeoutMs: overrides.taskTimeoutMs ?? readOptionalInt("AUDIT_TASK_TIMEOUT_MS", { min: 0 }),
    maxFailures:
      overrides.maxFailures !== undefined
        ? overrides.maxFailures
        : readOptionalInt("AUDIT_MAX_FAILURES", { min: 1 }),
    contextHistoryLimit: overrides.contextHistoryLimit ?? readOptionalInt("AUDIT_CONTEXT_HISTORY", { min: 1 }),
    brokerHistoryLimit: overrides.brokerHistoryLimit ?? readOptionalInt("AUDIT_BROKER_HISTORY", { min: 1 }),
    streamBufferSize: overrides.streamBufferSize ?? readOptionalInt("AUDIT_STREAM_BUFFER", { min: 1 }),
    logFile: overrides.logFile !== undefined ? overrides.logFile : readOptionalString("AUDIT_LOG_FILE"),
    logLevel: overrides.logLevel ?? readOptionalEnum("AUDIT_LOG_LEVEL", LOG_LEVELS),
  };

  const parsed = OrchestratorConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}
