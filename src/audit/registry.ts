import { SetupError } from "../orchestrator/errors.js";
import type { AgentTask } from "../orchestrator/types.js";

/** Raised when a pipeline references an implementation nobody registered. */
export class UnknownAgentImplementationError extends Error {
  public readonly code = "E-AGENT-UNKNOWN";
  public readonly details: { implementation: string; available: string[] };

  constructor(implementation: string, available: string[]) {
    super(`no agent implementation registered under "${implementation}"`);
    this.name = "UnknownAgentImplementationError";
    this.details = { implementation, available };
  }
}

/** Binds implementation names used by pipeline documents to agent tasks. */
export class AgentRegistry {
  private readonly tasks = new Map<string, AgentTask>();

  constructor(entries: Record<string, AgentTask> = {}) {
    for (const [name, task] of Object.entries(entries)) {
      this.register(name, task);
    }
  }

  register(implementation: string, task: AgentTask): this {
    const key = implementation.trim();
    if (!key) {
      throw new SetupError("E-SETUP-INVALID", "agent implementation name must not be empty");
    }
    if (this.tasks.has(key)) {
      throw new SetupError("E-SETUP-DUPLICATE", `agent implementation "${key}" is already registered`, {
        implementation: key,
      });
    }
    this.tasks.set(key, task);
    return this;
  }

  has(implementation: string): boolean {
    return this.tasks.has(implementation.trim());
  }

  resolve(implementation: string): AgentTask {
    const task = this.tasks.get(implementation.trim());
    if (!task) {
      throw new UnknownAgentImplementationError(implementation, this.names());
    }
    return task;
  }

  names(): string[] {
    return [...this.tasks.keys()].sort();
  }
}
