import { runtimeClearTimeout, runtimeSetTimeout } from "../runtime/timers.js";
import { describeError } from "./errors.js";
import type { AgentInvocation, AgentTask, AgentTaskResult } from "./types.js";

export interface RetryOptions {
  /** Total number of attempts, including the first one. */
  attempts: number;
  /** Delay before the second attempt. */
  delayMs?: number;
  /** Multiplier applied to the delay after every failed attempt. */
  backoffFactor?: number;
}

/** Resolves after `delayMs`, or early with `false` once `signal` aborts. */
function pause(delayMs: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      runtimeClearTimeout(handle);
      resolve(false);
    };
    const handle = runtimeSetTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, delayMs);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Wraps a task so that thrown errors and `{ success: false }` results are
 * retried before the failure is reported to the orchestrator. Retries stop as
 * soon as the invocation signal aborts.
 */
export function withRetries(task: AgentTask, options: RetryOptions): AgentTask {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const factor = Math.max(1, options.backoffFactor ?? 1);

  return async (invocation: AgentInvocation): Promise<AgentTaskResult> => {
    let delay = Math.max(0, options.delayMs ?? 0);
    let last: AgentTaskResult = { success: false, error: "task was not attempted" };

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      try {
        last = await task(invocation);
      } catch (error) {
        last = { success: false, error: describeError(error) };
      }
      if (last.success || attempt === attempts || invocation.signal.aborted) {
        return last;
      }

      invocation.logger.warn("agent_attempt_failed", {
        agent: invocation.agentName,
        attempt,
        attempts,
        error: last.error,
        retry_in_ms: delay,
      });
      if (delay > 0 && !(await pause(delay, invocation.signal))) {
        return last;
      }
      delay *= factor;
    }
    return last;
  };
}
