import { z } from "zod";

import { joinContextPath } from "../context/paths.js";
import type { StructuredLogger } from "../logger.js";
import type { AgentBrokerHandle, AgentContextHandle } from "./handles.js";

/** Scheduling state of one agent within a run. */
export type AgentRunState = "pending" | "ready" | "running" | "succeeded" | "failed" | "skipped";

const TERMINAL_STATES = new Set<AgentRunState>(["succeeded", "failed", "skipped"]);

export function isTerminalState(state: AgentRunState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Value returned by an agent task. Only `success` drives scheduling. */
export type AgentTaskResult =
  | { success: true; data?: unknown }
  | { success: false; error: string; data?: unknown };

export const AgentTaskResultSchema = z.discriminatedUnion("success", [
  z.object({ success: z.literal(true), data: z.unknown().optional() }),
  z.object({ success: z.literal(false), error: z.string(), data: z.unknown().optional() }),
]);

/** Everything a task receives when the orchestrator starts it. */
export interface AgentInvocation {
  readonly agentName: string;
  readonly runId: string;
  /** Shared context bound to the agent's identity as writer. */
  readonly context: AgentContextHandle;
  /** Broker bound to the agent's identity as sender. */
  readonly broker: AgentBrokerHandle;
  /** Aborted when the run is cancelled or the task deadline expires. */
  readonly signal: AbortSignal;
  readonly logger: StructuredLogger;
}

/** The opaque unit of work wrapped by an agent. */
export type AgentTask = (invocation: AgentInvocation) => AgentTaskResult | Promise<AgentTaskResult>;

export interface PredecessorSpec {
  agent: string;
  /** Allow this agent to start even when the predecessor failed or was skipped. */
  tolerateFailure?: boolean;
}

/** Descriptor accepted by {@link AgentOrchestrator.register}. */
export interface AgentDescriptorInput {
  name: string;
  task: AgentTask;
  predecessors?: ReadonlyArray<string | PredecessorSpec>;
  /** Context prefixes that must hold at least one entry before the agent starts. */
  readDependencies?: readonly string[];
  /** Failure of an optional agent does not fail the run. */
  optional?: boolean;
  /** Per-task deadline in milliseconds; `0` disables it, omitted uses the run default. */
  timeoutMs?: number | null;
}

/** Normalised, immutable descriptor. */
export interface AgentDescriptor {
  readonly name: string;
  readonly task: AgentTask;
  readonly predecessors: ReadonlyArray<{ readonly agent: string; readonly tolerateFailure: boolean }>;
  readonly readDependencies: readonly string[];
  readonly optional: boolean;
  readonly timeoutMs: number | null;
}

export interface AgentRunRecord {
  name: string;
  state: AgentRunState;
  error: string | null;
  skipReason: string | null;
  readyAt: number | null;
  startedAt: number | null;
  finishedAt: number | null;
  data: unknown;
}

export type RunStatus = "succeeded" | "failed";

export type RunFailureReason = "agent_failures" | "cancelled" | "failure_threshold";

export interface RunResult {
  runId: string;
  status: RunStatus;
  reason: RunFailureReason | null;
  cancellationReason: string | null;
  agents: Record<string, AgentRunRecord>;
  succeeded: string[];
  failed: Array<{ agent: string; error: string }>;
  skipped: Array<{ agent: string; reason: string }>;
  /** Agents in the order they were dispatched. */
  executionOrder: string[];
  startedAt: number;
  finishedAt: number;
}

export type RunPhase = "idle" | "running" | "finished";

export interface RunSnapshot {
  runId: string | null;
  phase: RunPhase;
  agents: Record<string, AgentRunRecord>;
  counts: Record<AgentRunState, number>;
  running: string[];
}

/** Payload of the lifecycle broadcast published on {@link agentStatusTopic}. */
export interface AgentStatusBroadcast {
  runId: string;
  agent: string;
  state: AgentRunState;
  error: string | null;
  reason: string | null;
}

/** Payload of the broadcast published on {@link RUN_STATUS_TOPIC}. */
export interface RunStatusBroadcast {
  runId: string;
  status: RunStatus;
  reason: RunFailureReason | null;
}

/** Observational status mirrored into the context for external consumers. */
export type ExternalAgentStatus = "in_progress" | "completed" | "failed";

export const ORCHESTRATOR_IDENTITY = "orchestrator";

export const RUN_STATUS_TOPIC = "run/status";

export function agentStatusTopic(agent: string): string {
  return `agent/${agent}/status`;
}

export function analysisStatusPath(runId: string, agent: string): string {
  return joinContextPath(runId, "analysis_status", agent);
}
