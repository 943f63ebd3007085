import { randomUUID } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { z } from "zod";

import { MAX_CONCURRENCY_LIMIT, loadOrchestratorConfig, type OrchestratorConfig } from "../config/orchestratorConfig.js";
import { joinContextPath } from "../context/paths.js";
import type { ContextValue } from "../context/sharedContext.js";
import { StructuredLogger } from "../logger.js";
import { SetupError } from "../orchestrator/errors.js";
import { AgentOrchestrator, type RunHandle } from "../orchestrator/orchestrator.js";
import type { AgentRunRecord, RunResult } from "../orchestrator/types.js";
import { resolvePipeline, type PipelineDocument } from "./pipeline.js";
import type { AgentRegistry } from "./registry.js";

/** Identity recorded as writer of the request entries. */
export const ANALYSIS_SERVICE_IDENTITY = "analysis_service";

const AnalysisOptionsSchema = z
  .object({
    deep_analysis: z.boolean().default(false),
    include_deps: z.boolean().default(false),
    /**
     * `true` uses the configured concurrency, `false` or any number ≤ 1 runs
     * agents one at a time. Larger numbers are capped at the concurrency limit.
     */
    parallel_execution: z.union([z.boolean(), z.number().int()]).default(true),
  })
  .strict();

export type AnalysisOptions = z.input<typeof AnalysisOptionsSchema>;

/** Raised when a submission carries an invalid repository or options. */
export class InvalidAnalysisRequestError extends Error {
  public readonly code = "E-REQUEST-INVALID";
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "InvalidAnalysisRequestError";
    this.details = details;
  }
}

/** Raised when a run identifier was never issued by the service. */
export class UnknownRunError extends Error {
  public readonly code = "E-RUN-UNKNOWN";
  public readonly details: { runId: string };

  constructor(runId: string) {
    super(`unknown analysis run ${runId}`);
    this.name = "UnknownRunError";
    this.details = { runId };
  }
}

export type AnalysisState = "running" | "succeeded" | "failed";

export interface AnalysisStatus {
  runId: string;
  repository: string;
  state: AnalysisState;
  agents: Record<string, AgentRunRecord>;
  result: RunResult | null;
  /** Every context entry recorded under the run namespace. */
  context: Record<string, ContextValue>;
}

export interface AnalysisServiceOptions {
  registry: AgentRegistry;
  pipeline: PipelineDocument;
  config?: Partial<OrchestratorConfig>;
  logger?: StructuredLogger;
  now?: () => number;
  idFactory?: () => string;
}

interface TrackedRun {
  readonly runId: string;
  readonly repository: string;
  readonly orchestrator: AgentOrchestrator;
  readonly handle: RunHandle;
  readonly done: Promise<RunResult>;
  result: RunResult | null;
}

function copyRecords(records: Record<string, AgentRunRecord>): Record<string, AgentRunRecord> {
  const copy: Record<string, AgentRunRecord> = {};
  for (const [name, record] of Object.entries(records)) {
    copy[name] = { ...record };
  }
  return copy;
}

function copyResult(result: RunResult): RunResult {
  return {
    ...result,
    agents: copyRecords(result.agents),
    succeeded: [...result.succeeded],
    failed: result.failed.map((entry) => ({ ...entry })),
    skipped: result.skipped.map((entry) => ({ ...entry })),
    executionOrder: [...result.executionOrder],
  };
}

/**
 * Submission interface for repository audits. Every submission gets its own
 * orchestrator, shared context and broker, which are torn down when the run
 * finishes; the context stays readable for status queries.
 */
export class AnalysisService {
  private readonly runs = new Map<string, TrackedRun>();
  private readonly registry: AgentRegistry;
  private readonly pipeline: PipelineDocument;
  private readonly config: OrchestratorConfig;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private disposed = false;

  constructor(options: AnalysisServiceOptions) {
    this.registry = options.registry;
    this.pipeline = options.pipeline;
    this.config = loadOrchestratorConfig(options.config);
    this.logger =
      options.logger ?? new StructuredLogger({ level: this.config.logLevel, logFile: this.config.logFile });
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  /** Starts an audit of `repository` and returns its run identifier. */
  submit(repository: string, options: AnalysisOptions = {}): string {
    if (this.disposed) {
      throw new SetupError("E-SETUP-LOCKED", "the analysis service has been disposed");
    }
    const target = typeof repository === "string" ? repository.trim() : "";
    if (!target) {
      throw new InvalidAnalysisRequestError("repository must be a non-empty string");
    }
    const parsed = AnalysisOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidAnalysisRequestError("analysis options are invalid", parsed.error.flatten());
    }
    const request = parsed.data;
    const parallel = request.parallel_execution;
    const maxConcurrency =
      parallel === true
        ? this.config.maxConcurrency
        : parallel === false
          ? 1
          : Math.min(MAX_CONCURRENCY_LIMIT, Math.max(1, parallel));

    const runId = this.idFactory();
    const orchestrator = new AgentOrchestrator({
      config: { ...this.config, maxConcurrency },
      logger: this.logger,
      now: this.now,
    });
    for (const descriptor of resolvePipeline(this.pipeline, this.registry, { runId })) {
      orchestrator.register(descriptor);
    }
    orchestrator.validate();

    const context = orchestrator.sharedContext;
    context.set(joinContextPath(runId, "request", "repository"), target, ANALYSIS_SERVICE_IDENTITY);
    context.set(joinContextPath(runId, "request", "options"), request, ANALYSIS_SERVICE_IDENTITY);

    const handle = orchestrator.start({ runId });
    const done = handle.result.then((result) => {
      tracked.result = result;
      this.logger.info("analysis_finished", {
        run_id: runId,
        repository: target,
        status: result.status,
        reason: result.reason,
      });
      return result;
    });
    const tracked: TrackedRun = { runId, repository: target, orchestrator, handle, done, result: null };
    this.runs.set(runId, tracked);
    this.logger.info("analysis_submitted", {
      run_id: runId,
      repository: target,
      max_concurrency: maxConcurrency,
      deep_analysis: request.deep_analysis,
      include_deps: request.include_deps,
    });
    return runId;
  }

  /** Point-in-time view of a run. Records and lists are copies; task `data` is shared. */
  getStatus(runId: string): AnalysisStatus {
    const tracked = this.lookup(runId);
    const result = tracked.result ? copyResult(tracked.result) : null;
    return {
      runId,
      repository: tracked.repository,
      state: result ? result.status : "running",
      agents: result ? copyRecords(result.agents) : tracked.handle.snapshot().agents,
      result,
      context: tracked.orchestrator.sharedContext.getSubtree(runId),
    };
  }

  /** Resolves with the final result of the run. */
  async wait(runId: string): Promise<RunResult> {
    return this.lookup(runId).done;
  }

  /** Returns `false` when the run already finished. */
  cancel(runId: string, reason?: string): boolean {
    return this.lookup(runId).handle.cancel(reason);
  }

  /**
   * Forgets a finished run together with its orchestrator and context.
   * Returns `false` and keeps the run while it is still running.
   */
  release(runId: string): boolean {
    const tracked = this.lookup(runId);
    if (tracked.result === null) {
      return false;
    }
    this.runs.delete(runId);
    this.logger.debug("analysis_released", { run_id: runId });
    return true;
  }

  /** Identifiers of every tracked run, oldest first. */
  list(): string[] {
    return [...this.runs.keys()];
  }

  /**
   * Cancels every unfinished run and waits until their tasks settled. Later
   * submissions are rejected.
   */
  async dispose(): Promise<void> {
    this.disposed = true;
    for (const tracked of this.runs.values()) {
      tracked.handle.cancel("service disposed");
    }
    await Promise.all(
      [...this.runs.values()].map(async (tracked) => {
        await tracked.done;
        await tracked.orchestrator.drain();
      }),
    );
    await this.logger.flush();
  }

  private lookup(runId: string): TrackedRun {
    const tracked = this.runs.get(runId);
    if (!tracked) {
      throw new UnknownRunError(runId);
    }
    return tracked;
  }
}
