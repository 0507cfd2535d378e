// ── Task Kind ───────────────────────────────────────────────────────────────

export const TASK_KINDS = ["capture", "export", "render"] as const;
export type TaskKind = (typeof TASK_KINDS)[number];

// ── Task Status ─────────────────────────────────────────────────────────────

export const TASK_STATUSES = [
  "pending",
  "running",
  "completed",
  "failed",
  "cancelled",
] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TERMINAL_STATUSES: readonly TaskStatus[] = [
  "completed",
  "failed",
  "cancelled",
];

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

// ── Task State Machine ──────────────────────────────────────────────────────

export const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["running", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
} as const;

export class InvalidTransitionError extends Error {
  override readonly name = "InvalidTransitionError";
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus,
  ) {
    super(`Invalid status transition for task ${taskId}: "${from}" -> "${to}"`);
  }
}

export function validateTransition(
  taskId: string,
  from: TaskStatus,
  to: TaskStatus,
): void {
  const allowed = VALID_TRANSITIONS[from];
  if (!allowed.includes(to)) {
    throw new InvalidTransitionError(taskId, from, to);
  }
}

// ── Snapshot ────────────────────────────────────────────────────────────────

/**
 * Point-in-time view of a task, as exposed to callers and progress streams.
 * Timestamps are ISO strings; `elapsed` and `eta` are seconds.
 */
export interface TaskSnapshot {
  readonly id: string;
  readonly kind: TaskKind;
  readonly name: string;
  readonly subjectId: string | null;
  readonly status: TaskStatus;
  readonly progress: number;
  readonly current: number;
  readonly total: number;
  readonly message: string;
  /** Items per second; 0 until something has been processed. */
  readonly rate: number;
  readonly elapsed: number;
  readonly eta: number | null;
  readonly error: string | null;
  readonly cancelRequested: boolean;
  readonly createdAt: string;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
}

export interface TaskFilter {
  readonly status?: TaskStatus | readonly TaskStatus[];
  readonly kind?: TaskKind;
  readonly subjectId?: string;
}
