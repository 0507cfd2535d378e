import { isTerminal, validateTransition } from "../types/task.ts";
import type { TaskKind, TaskSnapshot, TaskStatus } from "../types/task.ts";

export interface TaskRecordInit {
  readonly id: string;
  readonly kind: TaskKind;
  readonly name: string;
  readonly subjectId: string | null;
  readonly createdAt: Date;
}

/**
 * Mutable state of one unit of asynchronous work. Every method is a
 * synchronous block, so a snapshot never observes a half-applied update.
 */
export class TaskRecord {
  readonly id: string;
  readonly kind: TaskKind;
  readonly name: string;
  readonly subjectId: string | null;
  readonly createdAt: Date;

  private _status: TaskStatus = "pending";
  private _progress = 0;
  private _current = 0;
  private _total = 0;
  private _message = "";
  private _startedAt: Date | null = null;
  private _finishedAt: Date | null = null;
  private _error: string | null = null;
  private _result: unknown = undefined;
  private _cancelRequested = false;
  private _cancelObserved = false;

  private readonly controller = new AbortController();
  private readonly settled: Promise<TaskSnapshot>;
  private resolveSettled: (snapshot: TaskSnapshot) => void = () => {};

  constructor(init: TaskRecordInit) {
    this.id = init.id;
    this.kind = init.kind;
    this.name = init.name;
    this.subjectId = init.subjectId;
    this.createdAt = init.createdAt;
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  // ── Accessors ───────────────────────────────────────────────────────────

  get status(): TaskStatus {
    return this._status;
  }

  get progress(): number {
    return this._progress;
  }

  get result(): unknown {
    return this._result;
  }

  get error(): string | null {
    return this._error;
  }

  get finishedAt(): Date | null {
    return this._finishedAt;
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  /** True once the body has read the cancellation flag after a request. */
  get cancelObserved(): boolean {
    return this._cancelObserved;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isTerminal(): boolean {
    return isTerminal(this._status);
  }

  // ── Transitions ─────────────────────────────────────────────────────────

  start(now: Date): void {
    this.transition("running");
    this._startedAt = now;
  }

  complete(now: Date, result: unknown): void {
    this.transition("completed");
    this._result = result;
    this._progress = 100;
    this.finish(now);
  }

  fail(now: Date, message: string): void {
    this.transition("failed");
    this._error = message;
    this.finish(now);
  }

  cancel(now: Date): void {
    this.transition("cancelled");
    this.finish(now);
  }

  /**
   * Raise the cancellation flag and abort the signal. The body decides when
   * to stop; nothing is interrupted here.
   */
  requestCancel(): void {
    if (this._cancelRequested) return;
    this._cancelRequested = true;
    this.controller.abort();
  }

  /** Read the flag on behalf of the body. */
  observeCancel(): boolean {
    if (this._cancelRequested) this._cancelObserved = true;
    return this._cancelRequested;
  }

  // ── Progress ────────────────────────────────────────────────────────────

  /**
   * Record progress. Ignored unless running. `progress` only moves forward;
   * a total of 0 means "unknown" and leaves it untouched.
   */
  report(current: number, total: number, message?: string): void {
    if (this._status !== "running") return;
    this._current = Math.max(0, current);
    this._total = Math.max(0, total);
    if (message !== undefined) this._message = message;
    if (this._total > 0) {
      const pct = Math.min(100, (this._current / this._total) * 100);
      this._progress = Math.max(this._progress, pct);
    }
  }

  // ── Read ────────────────────────────────────────────────────────────────

  snapshot(now: Date): TaskSnapshot {
    const elapsed = this.elapsedSeconds(now);
    const rate = elapsed > 0 && this._current > 0 ? this._current / elapsed : 0;

    let eta: number | null = null;
    if (this._status === "completed") {
      eta = 0;
    } else if (this._status === "running" && this._total > 0 && rate > 0) {
      eta = Math.max(0, this._total - this._current) / rate;
    }

    return {
      id: this.id,
      kind: this.kind,
      name: this.name,
      subjectId: this.subjectId,
      status: this._status,
      progress: this._progress,
      current: this._current,
      total: this._total,
      message: this._message,
      rate: round(rate, 2),
      elapsed: round(elapsed, 1),
      eta: eta === null ? null : round(eta, 1),
      error: this._error,
      cancelRequested: this._cancelRequested,
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      finishedAt: this._finishedAt?.toISOString() ?? null,
    };
  }

  /** Resolves with the final snapshot once the task reaches a terminal state. */
  whenSettled(): Promise<TaskSnapshot> {
    return this.settled;
  }

  // ── Internal ────────────────────────────────────────────────────────────

  private transition(to: TaskStatus): void {
    validateTransition(this.id, this._status, to);
    this._status = to;
  }

  private finish(now: Date): void {
    this._finishedAt = now;
    this.resolveSettled(this.snapshot(now));
  }

  private elapsedSeconds(now: Date): number {
    if (!this._startedAt) return 0;
    const end = this._finishedAt ?? now;
    return Math.max(0, end.getTime() - this._startedAt.getTime()) / 1000;
  }
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
