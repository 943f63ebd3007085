import type { OrchestratorConfig } from "../../src/config/orchestratorConfig.js";
import { AgentOrchestrator, type AgentOrchestratorOptions } from "../../src/orchestrator/orchestrator.js";
import type { AgentTaskResult } from "../../src/orchestrator/types.js";
import { createCapturingLogger } from "./logger.js";

/** Orchestrator with a capturing logger and task deadlines disabled unless configured. */
export function createOrchestrator(
  config: Partial<OrchestratorConfig> = {},
  options: Omit<AgentOrchestratorOptions, "config" | "logger"> = {},
) {
  const { logger, entries } = createCapturingLogger();
  const orchestrator = new AgentOrchestrator({ ...options, logger, config: { taskTimeoutMs: 0, ...config } });
  return { orchestrator, entries, logger };
}

export const ok = (data?: unknown): AgentTaskResult => (data === undefined ? { success: true } : { success: true, data });

export const fail = (error: string): AgentTaskResult => ({ success: false, error });
