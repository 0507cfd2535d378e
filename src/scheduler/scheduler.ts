import type { Logger } from "../observability/logger.ts";
import type { TaskManager, JobBody } from "../tasks/task-manager.ts";
import type { TaskKind } from "../types/task.ts";
import { SUBJECT_TASK_KIND } from "../types/subject.ts";
import type { Subject } from "../types/subject.ts";
import { SubjectValidationError } from "../workspace/subject-validation.ts";
import { matchesSchedule, nextFireTime } from "./expression.ts";
import type { ScheduleExpression } from "./expression.ts";

// ── Config ──────────────────────────────────────────────────────────────────

export interface SchedulerConfig {
  /** Tick period; also the de-duplication window and interval match granularity. */
  readonly tickIntervalMs: number;
  /** Missed tick windows a late tick evaluates before its own; older ones are dropped. */
  readonly maxCatchUpTicks: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  tickIntervalMs: 1_000,
  maxCatchUpTicks: 5,
};

// ── Job Factory ─────────────────────────────────────────────────────────────

export interface ScheduledJob {
  readonly kind: TaskKind;
  readonly name: string;
  readonly body: JobBody;
}

export type JobFactory = (subject: Subject, firedAt: Date) => ScheduledJob;

// ── Dependencies ────────────────────────────────────────────────────────────

export interface SchedulerDeps {
  readonly taskManager: TaskManager;
  readonly jobFactory: JobFactory;
  readonly logger: Logger;
  readonly subjects?: readonly Subject[];
  readonly config?: Partial<SchedulerConfig>;
  readonly clock?: () => Date;
}

// ── Results ─────────────────────────────────────────────────────────────────

export type SkipReason =
  | "disabled"
  | "schedule_overlap_skipped"
  | "already_fired_this_window"
  | `fire_error: ${string}`;

export interface FiredEntry {
  readonly subjectId: string;
  readonly scheduleId: string;
  readonly taskId: string;
}

export interface SkipEntry {
  readonly subjectId: string;
  readonly scheduleId: string | null;
  readonly reason: SkipReason;
}

export interface TickResult {
  readonly timestamp: string;
  readonly fired: readonly FiredEntry[];
  readonly skipped: readonly SkipEntry[];
}

export type RunNowResult =
  | { readonly status: "submitted"; readonly taskId: string }
  | { readonly status: "skipped"; readonly reason: SkipReason }
  | { readonly status: "not_found" };

export interface UpcomingRun {
  readonly subjectId: string;
  readonly subjectName: string;
  readonly scheduleId: string;
  readonly kind: TaskKind;
  readonly nextRun: Date;
}

type FireOutcome =
  | { readonly fired: true; readonly taskId: string }
  | { readonly fired: false; readonly reason: SkipReason };

// ── Scheduler ───────────────────────────────────────────────────────────────

export class Scheduler {
  private readonly config: SchedulerConfig;
  private readonly clock: () => Date;
  private readonly taskManager: TaskManager;
  private readonly jobFactory: JobFactory;
  private readonly logger: Logger;

  /** Replaced wholesale by reload(); never mutated in place. */
  private snapshot: ReadonlyMap<string, Subject> = new Map();
  private readonly lastFiredWindow = new Map<string, number>();
  /** Start of the latest tick window evaluated, in epoch ms. */
  private lastEvaluated: number | null = null;

  private running = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private alignTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(deps: SchedulerDeps) {
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...deps.config };
    if (this.config.tickIntervalMs <= 0) {
      throw new RangeError(`tickIntervalMs must be positive, got ${this.config.tickIntervalMs}`);
    }
    if (!Number.isInteger(this.config.maxCatchUpTicks) || this.config.maxCatchUpTicks < 0) {
      throw new RangeError(
        `maxCatchUpTicks must be a non-negative integer, got ${this.config.maxCatchUpTicks}`,
      );
    }
    this.clock = deps.clock ?? (() => new Date());
    this.taskManager = deps.taskManager;
    this.jobFactory = deps.jobFactory;
    this.logger = deps.logger.child({ module: "scheduler" });
    if (deps.subjects) this.snapshot = buildSnapshot(deps.subjects);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  /** Start the tick loop, with the first tick aligned to a tick boundary. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastEvaluated = null;

    const period = this.config.tickIntervalMs;
    const msUntilBoundary = period - (this.clock().getTime() % period);

    this.alignTimer = setTimeout(() => {
      this.alignTimer = null;
      this.guardedTick();
      this.tickTimer = setInterval(() => this.guardedTick(), period);
    }, msUntilBoundary);

    this.logger.info("scheduler_started", {
      subjectCount: this.snapshot.size,
      tickIntervalMs: period,
    });
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.alignTimer) {
      clearTimeout(this.alignTimer);
      this.alignTimer = null;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.logger.info("scheduler_stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  // ── Subjects ────────────────────────────────────────────────────────────

  /**
   * Replace the subject set. The new snapshot is built in full before the
   * swap, so a rejected reload leaves the current one in place.
   */
  reload(subjects: readonly Subject[]): void {
    const next = buildSnapshot(subjects);
    const previous = this.snapshot;
    this.snapshot = next;

    for (const id of this.lastFiredWindow.keys()) {
      if (!next.has(id)) this.lastFiredWindow.delete(id);
    }

    this.logger.info("subjects_reloaded", {
      previousCount: previous.size,
      subjectCount: next.size,
    });
  }

  getSubjects(): readonly Subject[] {
    return [...this.snapshot.values()];
  }

  getSubject(id: string): Subject | null {
    return this.snapshot.get(id) ?? null;
  }

  // ── Tick ────────────────────────────────────────────────────────────────

  /**
   * Evaluate every enabled subject at the start of the tick window holding
   * `now`, and at the start of each window missed since the previous tick
   * (up to `maxCatchUpTicks`). A subject fires at most once per tick window
   * even when several of its schedules match.
   */
  tick(now: Date = this.clock()): TickResult {
    const subjects = this.snapshot;
    const instants = this.windowsToEvaluate(now);
    const fired: FiredEntry[] = [];
    const skipped: SkipEntry[] = [];

    for (const subject of subjects.values()) {
      if (!subject.enabled) {
        skipped.push({ subjectId: subject.id, scheduleId: null, reason: "disabled" });
        continue;
      }

      for (const instant of instants) {
        for (const schedule of subject.schedules) {
          if (!matchesSchedule(schedule, instant, this.config.tickIntervalMs)) continue;

          const outcome = this.fire(subject, schedule.id, instant);
          if (outcome.fired) {
            fired.push({ subjectId: subject.id, scheduleId: schedule.id, taskId: outcome.taskId });
          } else {
            skipped.push({ subjectId: subject.id, scheduleId: schedule.id, reason: outcome.reason });
          }
        }
      }
    }

    return { timestamp: now.toISOString(), fired, skipped };
  }

  /**
   * Manual trigger. Goes through the same de-duplication as a scheduled
   * fire; disabled subjects can still be run by hand.
   */
  runNow(subjectId: string, now: Date = this.clock()): RunNowResult {
    const subject = this.snapshot.get(subjectId);
    if (!subject) return { status: "not_found" };

    const outcome = this.fire(subject, null, now);
    return outcome.fired
      ? { status: "submitted", taskId: outcome.taskId }
      : { status: "skipped", reason: outcome.reason };
  }

  // ── Upcoming ────────────────────────────────────────────────────────────

  /** Next fire time of every enabled schedule of every enabled subject, soonest first. */
  getUpcoming(now: Date = this.clock()): UpcomingRun[] {
    const upcoming: UpcomingRun[] = [];
    for (const subject of this.snapshot.values()) {
      if (!subject.enabled) continue;
      for (const schedule of subject.schedules) {
        const nextRun = nextFireTime(schedule, now);
        if (!nextRun) continue;
        upcoming.push({
          subjectId: subject.id,
          subjectName: subject.name,
          scheduleId: schedule.id,
          kind: SUBJECT_TASK_KIND[subject.kind],
          nextRun,
        });
      }
    }
    return upcoming.sort((a, b) => a.nextRun.getTime() - b.nextRun.getTime());
  }

  // ── Internal: Fire ──────────────────────────────────────────────────────

  private fire(subject: Subject, scheduleId: string | null, now: Date): FireOutcome {
    const windowKey = Math.floor(now.getTime() / this.config.tickIntervalMs);
    const kind = SUBJECT_TASK_KIND[subject.kind];

    if (this.lastFiredWindow.get(subject.id) === windowKey) {
      this.logger.debug("schedule_dedup_skipped", { subjectId: subject.id, scheduleId });
      return { fired: false, reason: "already_fired_this_window" };
    }

    if (this.taskManager.hasActive(subject.id, kind)) {
      this.logger.info("schedule_overlap_skipped", { subjectId: subject.id, scheduleId, kind });
      return { fired: false, reason: "schedule_overlap_skipped" };
    }

    try {
      const job = this.jobFactory(subject, now);
      const taskId = this.taskManager.submit(job.kind, job.body, {
        subjectId: subject.id,
        name: job.name,
      });
      this.lastFiredWindow.set(subject.id, windowKey);
      this.logger.info("schedule_fired", {
        subjectId: subject.id,
        scheduleId,
        taskId,
        kind: job.kind,
        manual: scheduleId === null,
      });
      return { fired: true, taskId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error("schedule_fire_failed", { subjectId: subject.id, scheduleId, error: message });
      return { fired: false, reason: `fire_error: ${message}` };
    }
  }

  // ── Internal: Windows ───────────────────────────────────────────────────

  /**
   * Window starts to evaluate for a tick at `now`, ascending. Timers run late
   * and the event loop stalls, so consecutive ticks can straddle a whole
   * window; those windows are evaluated here instead of being skipped.
   */
  private windowsToEvaluate(now: Date): Date[] {
    const period = this.config.tickIntervalMs;
    const current = Math.floor(now.getTime() / period) * period;
    const last = this.lastEvaluated;

    if (last === null || current <= last) {
      if (last === null) this.lastEvaluated = current;
      return [new Date(current)];
    }
    this.lastEvaluated = current;

    const missed = (current - last) / period - 1;
    const caughtUp = Math.min(missed, this.config.maxCatchUpTicks);
    if (caughtUp < missed) {
      this.logger.warn("tick_windows_dropped", {
        dropped: missed - caughtUp,
        from: new Date(last + period).toISOString(),
      });
    } else if (missed > 0) {
      this.logger.debug("tick_catch_up", { missed });
    }

    const instants: Date[] = [];
    for (let t = current - caughtUp * period; t <= current; t += period) {
      instants.push(new Date(t));
    }
    return instants;
  }

  // ── Internal: Timer ─────────────────────────────────────────────────────

  private guardedTick(): void {
    if (!this.running) return;
    try {
      const result = this.tick();
      if (result.fired.length > 0) {
        this.logger.debug("tick_completed", {
          fired: result.fired.length,
          skipped: result.skipped.length,
        });
      }
    } catch (err) {
      this.logger.error("tick_error", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function buildSnapshot(subjects: readonly Subject[]): ReadonlyMap<string, Subject> {
  const next = new Map<string, Subject>();
  subjects.forEach((subject, index) => {
    if (next.has(subject.id)) {
      throw new SubjectValidationError(
        `Duplicate subject id "${subject.id}"`,
        subject.id,
        `subjects[${index}].id`,
      );
    }
    assertUniqueScheduleIds(subject);
    next.set(subject.id, subject);
  });
  return next;
}

function assertUniqueScheduleIds(subject: Subject): void {
  const seen = new Set<string>();
  subject.schedules.forEach((schedule: ScheduleExpression, i) => {
    if (seen.has(schedule.id)) {
      throw new SubjectValidationError(
        `Subject "${subject.id}": "schedules[${i}].id" duplicates schedule id "${schedule.id}"`,
        subject.id,
        `schedules[${i}].id`,
      );
    }
    seen.add(schedule.id);
  });
}
