import { clearTimeout as nodeClearTimeout, setTimeout as nodeSetTimeout } from "node:timers";

/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/**
 * Timer functions are looked up on `globalThis` at call time instead of being
 * captured on import, so Sinon fake timers installed by a test also drive the
 * task deadlines of the orchestrator.
 */
function resolveSetTimeout(): typeof nodeSetTimeout {
  const candidate: unknown = Reflect.get(globalThis, "setTimeout");
  return typeof candidate === "function" ? (candidate as typeof nodeSetTimeout) : nodeSetTimeout;
}

function resolveClearTimeout(): typeof nodeClearTimeout {
  const candidate: unknown = Reflect.get(globalThis, "clearTimeout");
  return typeof candidate === "function" ? (candidate as typeof nodeClearTimeout) : nodeClearTimeout;
}

/** Schedules `callback` after `delayMs` using the active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return resolveSetTimeout()(callback, delayMs);
}

/** Cancels a timeout scheduled with {@link runtimeSetTimeout}. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  resolveClearTimeout()(handle);
}
