import type { Logger } from "../observability/logger.ts";
import type { TaskFilter, TaskKind, TaskSnapshot } from "../types/task.ts";
import { TaskCancelledError, TaskNotFoundError } from "./errors.ts";
import { generateTaskId } from "./id.ts";
import { TaskRecord } from "./task-record.ts";
import { WorkerPool } from "./worker-pool.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface TaskManagerConfig {
  readonly maxConcurrency: number;
  /** How long terminal tasks stay visible before `gc()` evicts them. */
  readonly retentionMs: number;
  readonly gcIntervalMs: number;
}

export const DEFAULT_TASK_MANAGER_CONFIG: TaskManagerConfig = {
  maxConcurrency: 4,
  retentionMs: 3_600_000,
  gcIntervalMs: 60_000,
};

export const DEFAULT_WATCH_INTERVAL_MS = 500;

// ── Job Contract ────────────────────────────────────────────────────────────

/**
 * Capability object handed to a job body. Cancellation is cooperative: the
 * body polls `isCancelled()`, calls `throwIfCancelled()`, or passes `signal`
 * to anything that accepts one.
 */
export interface JobContext {
  readonly taskId: string;
  readonly signal: AbortSignal;
  /**
   * Record progress. Throws TaskCancelledError once cancellation has been
   * requested, so a reporting loop stops at its next step.
   */
  report(current: number, total: number, message?: string): void;
  isCancelled(): boolean;
  throwIfCancelled(): void;
}

export type JobBody<R = unknown> = (ctx: JobContext) => Promise<R> | R;

export interface SubmitOptions {
  readonly subjectId?: string | null;
  readonly name?: string;
}

export interface WatchOptions {
  readonly intervalMs?: number;
  readonly signal?: AbortSignal;
}

// ── Dependencies ────────────────────────────────────────────────────────────

export interface TaskManagerDeps {
  readonly logger: Logger;
  readonly config?: Partial<TaskManagerConfig>;
  readonly clock?: () => Date;
  readonly idGenerator?: (kind: TaskKind, now: Date) => string;
}

// ── Task Manager ────────────────────────────────────────────────────────────

export class TaskManager {
  private readonly config: TaskManagerConfig;
  private readonly clock: () => Date;
  private readonly idGenerator: (kind: TaskKind, now: Date) => string;
  private readonly logger: Logger;

  private readonly tasks = new Map<string, TaskRecord>();
  private readonly pool: WorkerPool;
  private gcTimer: ReturnType<typeof setInterval> | null = null;

  constructor(deps: TaskManagerDeps) {
    this.config = { ...DEFAULT_TASK_MANAGER_CONFIG, ...deps.config };
    this.clock = deps.clock ?? (() => new Date());
    this.idGenerator = deps.idGenerator ?? generateTaskId;
    this.logger = deps.logger.child({ module: "task-manager" });
    this.pool = new WorkerPool({
      maxConcurrency: this.config.maxConcurrency,
      onError: (err) => {
        this.logger.error("task_pool_error", {
          error: err instanceof Error ? err.message : String(err),
        });
      },
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Start periodic eviction of expired terminal tasks. */
  start(): void {
    if (this.gcTimer) return;
    this.gcTimer = setInterval(() => this.gc(), this.config.gcIntervalMs);
  }

  stop(): void {
    if (this.gcTimer) {
      clearInterval(this.gcTimer);
      this.gcTimer = null;
    }
  }

  /** Request cancellation of every non-terminal task. Returns how many. */
  cancelAll(): number {
    let count = 0;
    for (const id of [...this.tasks.keys()]) {
      if (this.cancel(id)) count++;
    }
    return count;
  }

  /** Resolves once no task is running or waiting for a slot. */
  drain(): Promise<void> {
    return this.pool.idle();
  }

  // ── Submit ──────────────────────────────────────────────────────────────

  /**
   * Register a task and queue its body. Returns the task ID immediately;
   * the body runs once the pool has a free slot.
   */
  submit<R>(kind: TaskKind, body: JobBody<R>, options: SubmitOptions = {}): string {
    const now = this.clock();
    const id = this.claimId(this.idGenerator(kind, now));
    const record = new TaskRecord({
      id,
      kind,
      name: options.name ?? kind,
      subjectId: options.subjectId ?? null,
      createdAt: now,
    });
    this.tasks.set(id, record);

    this.logger.info("task_submitted", {
      taskId: id,
      kind,
      subjectId: record.subjectId,
      queued: this.pool.queued,
    });

    this.pool.submit(() => this.execute(record, body));
    return id;
  }

  /** A registered ID is never reused; a colliding candidate gets a numeric suffix. */
  private claimId(candidate: string): string {
    if (!this.tasks.has(candidate)) return candidate;
    let n = 2;
    while (this.tasks.has(`${candidate}-${n}`)) n++;
    const id = `${candidate}-${n}`;
    this.logger.warn("task_id_collision", { candidate, taskId: id });
    return id;
  }

  // ── Cancel ──────────────────────────────────────────────────────────────

  /**
   * True iff the task exists and was not already terminal. A pending task
   * is cancelled on the spot and its body never runs; a running task only
   * gets the flag.
   */
  cancel(id: string): boolean {
    const record = this.tasks.get(id);
    if (!record || record.isTerminal()) return false;

    record.requestCancel();
    if (record.status === "pending") {
      record.cancel(this.clock());
      this.logger.info("task_cancelled", { taskId: id, while: "pending" });
    } else {
      this.logger.info("task_cancel_requested", { taskId: id });
    }
    return true;
  }

  // ── Read ────────────────────────────────────────────────────────────────

  get(id: string): TaskSnapshot | null {
    return this.tasks.get(id)?.snapshot(this.clock()) ?? null;
  }

  /** The body's return value, once the task has completed. */
  getResult(id: string): unknown {
    const record = this.tasks.get(id);
    if (!record || record.status !== "completed") return undefined;
    return record.result;
  }

  /** Snapshots of every registered task, oldest first. */
  listActive(filter: TaskFilter = {}): TaskSnapshot[] {
    const now = this.clock();
    const statuses =
      filter.status === undefined
        ? null
        : typeof filter.status === "string"
          ? [filter.status]
          : filter.status;

    const snapshots: TaskSnapshot[] = [];
    for (const record of this.tasks.values()) {
      if (statuses && !statuses.includes(record.status)) continue;
      if (filter.kind && record.kind !== filter.kind) continue;
      if (filter.subjectId !== undefined && record.subjectId !== filter.subjectId) continue;
      snapshots.push(record.snapshot(now));
    }
    return snapshots;
  }

  /** Whether a pending or running task exists for this subject and kind. */
  hasActive(subjectId: string, kind: TaskKind): boolean {
    for (const record of this.tasks.values()) {
      if (
        record.subjectId === subjectId &&
        record.kind === kind &&
        !record.isTerminal()
      ) {
        return true;
      }
    }
    return false;
  }

  /** Resolves with the final snapshot. Throws TaskNotFoundError for unknown IDs. */
  waitFor(id: string): Promise<TaskSnapshot> {
    const record = this.tasks.get(id);
    if (!record) return Promise.reject(new TaskNotFoundError(id));
    return record.whenSettled();
  }

  /**
   * Progress stream: yields a snapshot immediately, then every `intervalMs`
   * (and once more on settlement) until the task is terminal or `signal`
   * aborts.
   */
  async *watch(id: string, options: WatchOptions = {}): AsyncGenerator<TaskSnapshot, void> {
    const record = this.tasks.get(id);
    if (!record) throw new TaskNotFoundError(id);
    const intervalMs = options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS;

    while (true) {
      yield record.snapshot(this.clock());
      if (record.isTerminal() || options.signal?.aborted) return;
      await nextPoll(intervalMs, record.whenSettled(), options.signal);
      if (options.signal?.aborted) return;
    }
  }

  // ── GC ──────────────────────────────────────────────────────────────────

  /** Evict terminal tasks that finished more than `retentionMs` ago. */
  gc(now: Date = this.clock()): number {
    let evicted = 0;
    for (const [id, record] of this.tasks) {
      const finishedAt = record.finishedAt;
      if (!finishedAt || !record.isTerminal()) continue;
      if (now.getTime() - finishedAt.getTime() > this.config.retentionMs) {
        this.tasks.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.debug("task_gc", { evicted, remaining: this.tasks.size });
    }
    return evicted;
  }

  // ── Internal: Execute ───────────────────────────────────────────────────

  private async execute<R>(record: TaskRecord, body: JobBody<R>): Promise<void> {
    // Cancelled while waiting for a slot
    if (record.status !== "pending") return;

    record.start(this.clock());
    this.logger.info("task_started", {
      taskId: record.id,
      kind: record.kind,
      subjectId: record.subjectId,
    });

    const ctx: JobContext = {
      taskId: record.id,
      signal: record.signal,
      report: (current, total, message) => {
        if (record.observeCancel()) throw new TaskCancelledError(record.id);
        record.report(current, total, message);
      },
      isCancelled: () => record.observeCancel(),
      throwIfCancelled: () => {
        if (record.observeCancel()) throw new TaskCancelledError(record.id);
      },
    };

    try {
      const result = await body(ctx);
      if (record.cancelRequested && record.cancelObserved) {
        this.finishCancelled(record);
      } else {
        record.complete(this.clock(), result);
        this.logger.info("task_completed", {
          taskId: record.id,
          kind: record.kind,
          elapsed: record.snapshot(this.clock()).elapsed,
        });
      }
    } catch (err) {
      if (err instanceof TaskCancelledError || (record.cancelRequested && isAbortError(err))) {
        this.finishCancelled(record);
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      record.fail(this.clock(), message);
      this.logger.error("task_failed", {
        taskId: record.id,
        kind: record.kind,
        subjectId: record.subjectId,
        error: message,
      });
    }
  }

  private finishCancelled(record: TaskRecord): void {
    record.cancel(this.clock());
    this.logger.info("task_cancelled", { taskId: record.id, while: "running" });
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

function nextPoll(
  ms: number,
  settled: Promise<unknown>,
  signal: AbortSignal | undefined,
): Promise<void> {
  return new Promise((resolve) => {
    let done = false;
    const finish = () => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
    settled.then(finish, finish);
  });
}
