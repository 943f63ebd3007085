import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Correlation identifiers attached to everything executed on behalf of a run. */
export interface RunContextSnapshot {
  /** Identifier of the orchestrator run. */
  readonly runId: string;
  /** Agent currently executing, or `null` for orchestrator-level work. */
  readonly agent: string | null;
}

const storage = new AsyncLocalStorage<RunContextSnapshot>();

/**
 * Executes the callback with the provided run correlation exposed to nested
 * async work. The logger reads it back to stamp `run_id`/`agent` on entries.
 */
export function runWithRunContext<T>(context: RunContextSnapshot, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the run correlation associated with the current async execution. */
export function getRunContext(): RunContextSnapshot | undefined {
  return storage.getStore();
}
