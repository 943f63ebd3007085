import { randomUUID } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { MessageBroker } from "../broker/messageBroker.js";
import { loadOrchestratorConfig, type OrchestratorConfig } from "../config/orchestratorConfig.js";
import { ContextPathError, normaliseContextPrefix } from "../context/paths.js";
import { SharedContextManager, type ContextWatchStream } from "../context/sharedContext.js";
import { runWithRunContext } from "../infra/runContext.js";
import { StructuredLogger } from "../logger.js";
import { runtimeClearTimeout, runtimeSetTimeout, type TimeoutHandle } from "../runtime/timers.js";
import { RunCancelledError, SetupError, TaskError, TaskTimeoutError, describeError } from "./errors.js";
import { buildDependencyGraph, type DependencyGraph } from "./graph.js";
import { AgentHandles } from "./handles.js";
import {
  AgentTaskResultSchema,
  ORCHESTRATOR_IDENTITY,
  RUN_STATUS_TOPIC,
  agentStatusTopic,
  analysisStatusPath,
  isTerminalState,
  type AgentDescriptor,
  type AgentDescriptorInput,
  type AgentInvocation,
  type AgentRunRecord,
  type AgentRunState,
  type AgentStatusBroadcast,
  type ExternalAgentStatus,
  type RunPhase,
  type RunResult,
  type RunSnapshot,
  type RunStatusBroadcast,
} from "./types.js";

export interface AgentOrchestratorOptions {
  /** Overrides merged over the `AUDIT_*` environment and the defaults. */
  config?: Partial<OrchestratorConfig>;
  /** Store shared by the agents. Created (and closed at run end) when omitted. */
  context?: SharedContextManager;
  /** Broker shared by the agents. Created (and shut down at run end) when omitted. */
  broker?: MessageBroker;
  logger?: StructuredLogger;
  now?: () => number;
  idFactory?: () => string;
}

export interface StartOptions {
  runId?: string;
}

/** Control surface of a started run. */
export interface RunHandle {
  readonly runId: string;
  /** Settles with the final result once every agent is terminal. Never rejects. */
  readonly result: Promise<RunResult>;
  /** Returns `false` when the run already finished. */
  cancel(reason?: string): boolean;
  snapshot(): RunSnapshot;
}

type TaskOutcome = { ok: true; data: unknown } | { ok: false; error: TaskError | TaskTimeoutError };

type Verdict =
  | { kind: "ready" }
  | { kind: "blocked" }
  | { kind: "skip"; reason: string }
  | { kind: "awaiting_context"; prefix: string };

function normaliseDescriptor(input: AgentDescriptorInput): AgentDescriptor {
  const name = typeof input.name === "string" ? input.name.trim() : "";
  if (!name || name.includes("/") || name === "*" || name === "**") {
    throw new SetupError("E-SETUP-INVALID", `invalid agent name "${String(input.name)}"`, { name: input.name });
  }
  if (typeof input.task !== "function") {
    throw new SetupError("E-SETUP-INVALID", `agent '${name}' has no task`, { name });
  }

  const predecessors = new Map<string, boolean>();
  for (const entry of input.predecessors ?? []) {
    const spec = typeof entry === "string" ? { agent: entry } : entry;
    const agent = spec.agent.trim();
    if (!agent) {
      throw new SetupError("E-SETUP-INVALID", `agent '${name}' lists an empty predecessor`, { name });
    }
    predecessors.set(agent, (predecessors.get(agent) ?? false) || spec.tolerateFailure === true);
  }

  const readDependencies = new Set<string>();
  for (const raw of input.readDependencies ?? []) {
    let prefix: string;
    try {
      prefix = normaliseContextPrefix(raw);
    } catch (error) {
      if (error instanceof ContextPathError) {
        throw new SetupError("E-SETUP-INVALID", `agent '${name}': ${error.message}`, { name, prefix: raw });
      }
      throw error;
    }
    if (!prefix) {
      throw new SetupError("E-SETUP-INVALID", `agent '${name}' lists an empty read dependency`, { name });
    }
    readDependencies.add(prefix);
  }

  const timeoutMs = input.timeoutMs ?? null;
  if (timeoutMs !== null && (!Number.isInteger(timeoutMs) || timeoutMs < 0)) {
    throw new SetupError("E-SETUP-INVALID", `agent '${name}' has an invalid timeout`, { name, timeoutMs });
  }

  return Object.freeze({
    name,
    task: input.task,
    predecessors: [...predecessors].map(([agent, tolerateFailure]) => Object.freeze({ agent, tolerateFailure })),
    readDependencies: [...readDependencies],
    optional: input.optional === true,
    timeoutMs,
  });
}

/**
 * Runs a set of agents as one dependency-ordered, partially parallel
 * pipeline. An orchestrator drives a single run: agents are registered,
 * the graph is validated, and {@link start} schedules every agent until each
 * one succeeded, failed or was skipped.
 *
 * All state transitions happen inside {@link pump}, which is re-entrancy
 * guarded, so the scheduler behaves like a single-threaded state machine even
 * though agent tasks run concurrently.
 */
export class AgentOrchestrator {
  private readonly descriptors = new Map<string, AgentDescriptor>();
  private readonly config: OrchestratorConfig;
  private readonly context: SharedContextManager;
  private readonly broker: MessageBroker;
  private readonly ownsContext: boolean;
  private readonly ownsBroker: boolean;
  private readonly logger: StructuredLogger;
  private readonly now: () => number;
  private readonly idFactory: () => string;

  private phase: RunPhase = "idle";
  private runId: string | null = null;
  private startedAt = 0;
  private readonly records = new Map<string, AgentRunRecord>();
  private readonly readyQueue: string[] = [];
  private readonly running = new Set<string>();
  private readonly executionOrder: string[] = [];
  private readonly agentHandles = new Map<string, AgentHandles>();
  /** Task bodies and completion handlers that have not settled yet. */
  private readonly inflight = new Set<Promise<void>>();
  private readonly dependencyWatches: ContextWatchStream[] = [];
  private readonly watchLoops: Promise<void>[] = [];
  private readonly runController = new AbortController();
  private failures = 0;
  private terminationReason: "cancelled" | "failure_threshold" | null = null;
  private cancellationReason: string | null = null;
  private pumping = false;
  private pumpRequested = false;
  private resultPromise: Promise<RunResult> | null = null;
  private resolveResult: ((result: RunResult) => void) | null = null;
  private completion: Promise<void> | null = null;

  constructor(options: AgentOrchestratorOptions = {}) {
    this.config = loadOrchestratorConfig(options.config);
    this.now = options.now ?? (() => Date.now());
    this.idFactory = options.idFactory ?? (() => randomUUID());
    this.logger =
      options.logger ?? new StructuredLogger({ level: this.config.logLevel, logFile: this.config.logFile });
    this.ownsContext = options.context === undefined;
    this.context =
      options.context ??
      new SharedContextManager({ now: this.now, historyLimit: this.config.contextHistoryLimit });
    this.ownsBroker = options.broker === undefined;
    this.broker =
      options.broker ??
      new MessageBroker({
        now: this.now,
        historyLimit: this.config.brokerHistoryLimit,
        streamBufferSize: this.config.streamBufferSize,
        logger: this.logger,
      });
  }

  get sharedContext(): SharedContextManager {
    return this.context;
  }

  get messageBroker(): MessageBroker {
    return this.broker;
  }

  get settings(): Readonly<OrchestratorConfig> {
    return this.config;
  }

  /** Adds an agent. Only allowed before the run starts. */
  register(input: AgentDescriptorInput): AgentDescriptor {
    if (this.phase !== "idle") {
      throw new SetupError("E-SETUP-LOCKED", "agents cannot be registered once the run started", {
        runId: this.runId,
      });
    }
    const descriptor = normaliseDescriptor(input);
    if (this.descriptors.has(descriptor.name)) {
      throw new SetupError("E-SETUP-DUPLICATE", `agent '${descriptor.name}' is already registered`, {
        name: descriptor.name,
      });
    }
    this.descriptors.set(descriptor.name, descriptor);
    return descriptor;
  }

  /** Validates the predecessor graph; throws {@link SetupError} when it cannot be scheduled. */
  validate(): DependencyGraph {
    return buildDependencyGraph([...this.descriptors.values()]);
  }

  /**
   * Validates the graph and begins scheduling. Setup failures are thrown
   * synchronously and no task is started.
   */
  start(options: StartOptions = {}): RunHandle {
    if (this.phase !== "idle") {
      throw new SetupError("E-SETUP-LOCKED", "this orchestrator already started a run", { runId: this.runId });
    }
    const graph = this.validate();
    const runId = options.runId ?? this.idFactory();
    this.runId = runId;
    this.phase = "running";
    this.startedAt = this.now();
    for (const descriptor of this.descriptors.values()) {
      this.records.set(descriptor.name, {
        name: descriptor.name,
        state: "pending",
        error: null,
        skipReason: null,
        readyAt: null,
        startedAt: null,
        finishedAt: null,
        data: null,
      });
    }
    const result = new Promise<RunResult>((resolve) => {
      this.resolveResult = resolve;
    });
    this.resultPromise = result;

    runWithRunContext({ runId, agent: null }, () => {
      this.logger.info("run_started", {
        agents: graph.order,
        max_concurrency: this.config.maxConcurrency,
        task_timeout_ms: this.config.taskTimeoutMs,
        max_failures: this.config.maxFailures,
      });
      this.openDependencyWatches();
      this.pump();
    });

    return {
      runId,
      result,
      cancel: (reason) => this.cancel(reason),
      snapshot: () => this.status(),
    };
  }

  /** Starts the run and waits for its result. Setup failures reject. */
  async run(options: StartOptions = {}): Promise<RunResult> {
    return this.start(options).result;
  }

  /**
   * Cancels the run: every non-terminal agent becomes skipped and running
   * tasks see their signal aborted. Returns `false` when nothing is running.
   */
  cancel(reason?: string): boolean {
    const runId = this.runId;
    if (this.phase !== "running" || runId === null) {
      return false;
    }
    runWithRunContext({ runId, agent: null }, () => {
      this.cancellationReason = reason ?? null;
      this.logger.warn("run_cancel_requested", { reason: this.cancellationReason });
      this.interrupt("cancelled", reason ? `run cancelled: ${reason}` : "run cancelled");
      this.pump();
    });
    return true;
  }

  status(): RunSnapshot {
    const counts: Record<AgentRunState, number> = {
      pending: 0,
      ready: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
    };
    for (const record of this.records.values()) {
      counts[record.state] += 1;
    }
    return {
      runId: this.runId,
      phase: this.phase,
      agents: this.copyRecords(),
      counts,
      running: [...this.running],
    };
  }

  /**
   * Resolves once the run finished and every task promise settled, including
   * tasks that kept running after being cancelled or timed out.
   */
  async drain(): Promise<void> {
    if (!this.resultPromise) {
      return;
    }
    await this.resultPromise;
    await this.completion;
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private openDependencyWatches(): void {
    const prefixes = new Set<string>();
    for (const descriptor of this.descriptors.values()) {
      for (const prefix of descriptor.readDependencies) {
        prefixes.add(prefix);
      }
    }
    for (const prefix of prefixes) {
      const stream = this.context.watch(prefix);
      this.dependencyWatches.push(stream);
      this.watchLoops.push(this.followDependency(stream));
    }
  }

  private async followDependency(stream: ContextWatchStream): Promise<void> {
    for await (const change of stream) {
      this.logger.debug("dependency_updated", {
        prefix: stream.prefix,
        path: change.path,
        version: change.version,
        writer: change.writer,
      });
      this.pump();
    }
  }

  private pump(): void {
    if (this.pumping) {
      this.pumpRequested = true;
      return;
    }
    this.pumping = true;
    try {
      do {
        this.pumpRequested = false;
        this.step();
      } while (this.pumpRequested && this.phase === "running");
    } finally {
      this.pumping = false;
    }
  }

  private step(): void {
    if (this.phase !== "running") {
      return;
    }
    this.promotePending();
    this.dispatchReady();
    if (this.phase !== "running") {
      return;
    }
    const idle = this.running.size === 0 && this.readyQueue.length === 0;
    if (idle && this.ownsContext && this.skipStalledAgents()) {
      this.pumpRequested = true;
      return;
    }
    for (const record of this.records.values()) {
      if (!isTerminalState(record.state)) {
        return;
      }
    }
    this.finalize();
  }

  private evaluate(descriptor: AgentDescriptor): Verdict {
    let blocked = false;
    for (const { agent, tolerateFailure } of descriptor.predecessors) {
      const state = this.recordOf(agent).state;
      if (state === "succeeded") {
        continue;
      }
      if (state === "failed" || state === "skipped") {
        if (tolerateFailure) {
          continue;
        }
        return { kind: "skip", reason: `predecessor '${agent}' ${state}` };
      }
      blocked = true;
    }
    if (blocked) {
      return { kind: "blocked" };
    }
    const missing = descriptor.readDependencies.find((prefix) => !this.context.has(prefix));
    return missing === undefined ? { kind: "ready" } : { kind: "awaiting_context", prefix: missing };
  }

  private promotePending(): void {
    let changed = true;
    while (changed) {
      changed = false;
      for (const record of this.records.values()) {
        if (record.state !== "pending") {
          continue;
        }
        const verdict = this.evaluate(this.descriptorOf(record.name));
        if (verdict.kind === "skip") {
          this.markSkipped(record, verdict.reason);
          changed = true;
        } else if (verdict.kind === "ready") {
          record.state = "ready";
          record.readyAt = this.now();
          this.readyQueue.push(record.name);
          this.logger.debug("agent_ready", { agent: record.name });
        }
      }
    }
  }

  private dispatchReady(): void {
    while (this.phase === "running" && this.running.size < this.config.maxConcurrency) {
      const name = this.readyQueue.shift();
      if (name === undefined) {
        return;
      }
      this.launch(name);
    }
  }

  /**
   * Only the agents write to an owned context, so once none runs, agents
   * still waiting on context can never start. A provided context may be
   * written from outside; its waiters stay pending until a watch event or
   * `cancel()`.
   */
  private skipStalledAgents(): boolean {
    let skipped = false;
    for (const record of this.records.values()) {
      if (record.state !== "pending") {
        continue;
      }
      const verdict = this.evaluate(this.descriptorOf(record.name));
      if (verdict.kind === "awaiting_context") {
        this.markSkipped(record, `context dependency '${verdict.prefix}' was never populated`);
        skipped = true;
      }
    }
    return skipped;
  }

  private launch(name: string): void {
    const record = this.recordOf(name);
    const descriptor = this.descriptorOf(name);
    record.state = "running";
    record.startedAt = this.now();
    this.running.add(name);
    this.executionOrder.push(name);
    this.logger.info("agent_started", { agent: name });
    this.writeStatus(name, "in_progress");
    this.broadcast(record);

    this.track(
      this.execute(descriptor).then((outcome) => {
        this.complete(name, outcome);
      }),
    );
  }

  private async execute(descriptor: AgentDescriptor): Promise<TaskOutcome> {
    const runId = this.requireRunId();
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(this.runController.signal.reason);
    this.runController.signal.addEventListener("abort", forwardAbort, { once: true });

    const handles = new AgentHandles(descriptor.name, this.context, this.broker);
    this.agentHandles.set(descriptor.name, handles);
    const timeoutMs = descriptor.timeoutMs ?? this.config.taskTimeoutMs;
    const deadline = timeoutMs > 0 ? this.armDeadline(descriptor.name, timeoutMs, controller) : null;

    const invocation: AgentInvocation = {
      agentName: descriptor.name,
      runId,
      context: handles.context,
      broker: handles.broker,
      signal: controller.signal,
      logger: this.logger,
    };
    const work = runWithRunContext({ runId, agent: descriptor.name }, () => this.invoke(descriptor, invocation));
    this.track(work);
    try {
      return await (deadline ? Promise.race([work, deadline.promise]) : work);
    } finally {
      deadline?.clear();
      this.runController.signal.removeEventListener("abort", forwardAbort);
      handles.close();
    }
  }

  private async invoke(descriptor: AgentDescriptor, invocation: AgentInvocation): Promise<TaskOutcome> {
    try {
      const raw: unknown = await descriptor.task(invocation);
      const parsed = AgentTaskResultSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0]?.message ?? "unknown issue";
        return {
          ok: false,
          error: new TaskError(descriptor.name, `agent '${descriptor.name}' returned an invalid result: ${issue}`),
        };
      }
      if (parsed.data.success) {
        return { ok: true, data: parsed.data.data ?? null };
      }
      return { ok: false, error: new TaskError(descriptor.name, parsed.data.error) };
    } catch (error) {
      return { ok: false, error: new TaskError(descriptor.name, describeError(error), error) };
    }
  }

  private armDeadline(
    agent: string,
    timeoutMs: number,
    controller: AbortController,
  ): { promise: Promise<TaskOutcome>; clear(): void } {
    let handle: TimeoutHandle | null = null;
    const promise = new Promise<TaskOutcome>((resolve) => {
      handle = runtimeSetTimeout(() => {
        const error = new TaskTimeoutError(agent, timeoutMs);
        controller.abort(error);
        resolve({ ok: false, error });
      }, timeoutMs);
    });
    return {
      promise,
      clear: () => {
        if (handle !== null) {
          runtimeClearTimeout(handle);
        }
      },
    };
  }

  private track(promise: Promise<unknown>): void {
    const settled: Promise<void> = promise.then(
      () => {
        this.inflight.delete(settled);
      },
      (error: unknown) => {
        this.inflight.delete(settled);
        this.logger.error("agent_promise_rejected", { error: describeError(error) });
      },
    );
    this.inflight.add(settled);
  }

  private complete(name: string, outcome: TaskOutcome): void {
    const record = this.recordOf(name);
    if (this.phase !== "running" || record.state !== "running") {
      this.logger.debug("agent_result_discarded", { agent: name, state: record.state });
      return;
    }
    this.running.delete(name);
    record.finishedAt = this.now();
    const durationMs = record.finishedAt - (record.startedAt ?? record.finishedAt);

    if (outcome.ok) {
      record.state = "succeeded";
      record.data = outcome.data;
      this.writeStatus(name, "completed");
      this.logger.info("agent_succeeded", { agent: name, duration_ms: durationMs });
    } else {
      record.state = "failed";
      record.error = outcome.error.message;
      this.failures += 1;
      this.writeStatus(name, "failed");
      this.logger.warn("agent_failed", {
        agent: name,
        code: outcome.error.code,
        error: outcome.error.message,
        duration_ms: durationMs,
      });
    }
    this.broadcast(record);

    const threshold = this.config.maxFailures;
    if (!outcome.ok && threshold !== null && this.failures >= threshold) {
      this.logger.warn("failure_threshold_reached", { failures: this.failures, max_failures: threshold });
      this.interrupt("failure_threshold", "failure threshold reached");
    }
    this.pump();
  }

  private interrupt(reason: "cancelled" | "failure_threshold", message: string): void {
    this.terminationReason ??= reason;
    this.readyQueue.length = 0;
    for (const record of this.records.values()) {
      if (isTerminalState(record.state)) {
        continue;
      }
      this.running.delete(record.name);
      this.markSkipped(record, message);
    }
    this.runController.abort(new RunCancelledError(this.requireRunId(), this.cancellationReason ?? message));
  }

  private markSkipped(record: AgentRunRecord, reason: string): void {
    record.state = "skipped";
    record.skipReason = reason;
    record.finishedAt = this.now();
    this.agentHandles.get(record.name)?.close();
    this.logger.info("agent_skipped", { agent: record.name, reason });
    this.broadcast(record);
  }

  private finalize(): void {
    this.phase = "finished";
    const runId = this.requireRunId();
    for (const stream of this.dependencyWatches) {
      stream.close();
    }
    for (const handles of this.agentHandles.values()) {
      handles.close();
    }

    const result = this.buildResult(runId, this.now());
    this.publish<RunStatusBroadcast>(RUN_STATUS_TOPIC, { runId, status: result.status, reason: result.reason });
    this.logger.info("run_finished", {
      status: result.status,
      reason: result.reason,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
      skipped: result.skipped.length,
      duration_ms: result.finishedAt - result.startedAt,
    });

    if (this.ownsBroker) {
      this.broker.shutdown();
    }
    if (this.ownsContext) {
      this.context.close();
    }

    this.completion = Promise.allSettled(this.watchLoops).then((outcomes) => {
      for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
          this.logger.error("dependency_watch_failed", { error: describeError(outcome.reason) });
        }
      }
      this.resolveResult?.(result);
      this.resolveResult = null;
    });
  }

  private buildResult(runId: string, finishedAt: number): RunResult {
    const succeeded: string[] = [];
    const failed: RunResult["failed"] = [];
    const skipped: RunResult["skipped"] = [];
    let requiredMissing = false;
    for (const record of this.records.values()) {
      if (record.state === "succeeded") {
        succeeded.push(record.name);
        continue;
      }
      if (record.state === "failed") {
        failed.push({ agent: record.name, error: record.error ?? "unknown error" });
      } else {
        skipped.push({ agent: record.name, reason: record.skipReason ?? "skipped" });
      }
      if (!this.descriptorOf(record.name).optional) {
        requiredMissing = true;
      }
    }

    const reason = this.terminationReason ?? (requiredMissing ? "agent_failures" : null);
    return {
      runId,
      status: reason === null ? "succeeded" : "failed",
      reason,
      cancellationReason: this.cancellationReason,
      agents: this.copyRecords(),
      succeeded,
      failed,
      skipped,
      executionOrder: [...this.executionOrder],
      startedAt: this.startedAt,
      finishedAt,
    };
  }

  private broadcast(record: AgentRunRecord): void {
    const payload: AgentStatusBroadcast = {
      runId: this.requireRunId(),
      agent: record.name,
      state: record.state,
      error: record.error,
      reason: record.skipReason,
    };
    this.publish(agentStatusTopic(record.name), payload);
  }

  private publish<TPayload>(topic: string, payload: TPayload): void {
    if (this.broker.isShutDown) {
      this.logger.debug("broadcast_skipped", { topic });
      return;
    }
    this.broker.publish(topic, payload, ORCHESTRATOR_IDENTITY);
  }

  private writeStatus(agent: string, status: ExternalAgentStatus): void {
    try {
      this.context.set(analysisStatusPath(this.requireRunId(), agent), status, ORCHESTRATOR_IDENTITY);
    } catch (error) {
      this.logger.warn("status_write_failed", { agent, status, error: describeError(error) });
    }
  }

  private copyRecords(): Record<string, AgentRunRecord> {
    const copy: Record<string, AgentRunRecord> = {};
    for (const [name, record] of this.records) {
      copy[name] = { ...record };
    }
    return copy;
  }

  private recordOf(name: string): AgentRunRecord {
    const record = this.records.get(name);
    if (!record) {
      throw new Error(`no run record for agent '${name}'`);
    }
    return record;
  }

  private descriptorOf(name: string): AgentDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new Error(`agent '${name}' is not registered`);
    }
    return descriptor;
  }

  private requireRunId(): string {
    if (this.runId === null) {
      throw new Error("the run has not started");
    }
    return this.runId;
  }
}
