/** Stable codes carried by {@link SetupError}. */
export type SetupErrorCode =
  | "E-SETUP-CYCLE"
  | "E-SETUP-UNKNOWN"
  | "E-SETUP-DUPLICATE"
  | "E-SETUP-INVALID"
  | "E-SETUP-LOCKED";

/**
 * Raised while registering agents or validating the dependency graph. A run
 * rejected with this error never starts any task.
 */
export class SetupError extends Error {
  public readonly code: SetupErrorCode;
  public readonly details?: unknown;

  constructor(code: SetupErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "SetupError";
    this.code = code;
    this.details = details;
  }
}

/** Failure recorded for an agent task. Never thrown out of the orchestrator. */
export class TaskError extends Error {
  public readonly code = "E-TASK-FAILED";
  public readonly details: { agent: string };

  constructor(agent: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TaskError";
    this.details = { agent };
  }
}

/** Reason used to abort a task that exceeded its deadline. */
export class TaskTimeoutError extends Error {
  public readonly code = "E-TASK-TIMEOUT";
  public readonly details: { agent: string; timeoutMs: number };

  constructor(agent: string, timeoutMs: number) {
    super(`agent '${agent}' timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.details = { agent, timeoutMs };
  }
}

/**
 * Raised when an agent writes to the context or publishes after its handles
 * were released, i.e. once its task ended, timed out or was cancelled.
 */
export class AgentHandleClosedError extends Error {
  public readonly code = "E-HANDLE-CLOSED";
  public readonly details: { agent: string; operation: string };

  constructor(agent: string, operation: string) {
    super(`agent '${agent}' cannot ${operation} after its task was released`);
    this.name = "AgentHandleClosedError";
    this.details = { agent, operation };
  }
}

/** Reason given to the abort signal of tasks interrupted by a run cancellation. */
export class RunCancelledError extends Error {
  public readonly code = "E-RUN-CANCELLED";
  public readonly details: { runId: string; reason: string | null };

  constructor(runId: string, reason: string | null) {
    super(reason ? `run ${runId} cancelled: ${reason}` : `run ${runId} cancelled`);
    this.name = "RunCancelledError";
    this.details = { runId, reason };
  }
}

/** Human readable message for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
