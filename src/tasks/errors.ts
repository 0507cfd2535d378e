// ── Task Errors ─────────────────────────────────────────────────────────────

/**
 * Thrown by a job body (or by `ctx.throwIfCancelled()` / `ctx.report()`) to
 * end a task in the `cancelled` state. Not a failure: `error` stays null.
 */
export class TaskCancelledError extends Error {
  override readonly name = "TaskCancelledError";

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} was cancelled`);
  }
}

export class TaskNotFoundError extends Error {
  override readonly name = "TaskNotFoundError";

  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`);
  }
}
