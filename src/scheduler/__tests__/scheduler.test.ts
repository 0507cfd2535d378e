import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import { Scheduler } from "../scheduler.ts";
import type { JobFactory } from "../scheduler.ts";
import { TaskManager } from "../../tasks/task-manager.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { SubjectValidationError, parseSubject } from "../../workspace/subject-validation.ts";
import type { Subject } from "../../types/subject.ts";
import type { TaskKind } from "../../types/task.ts";

// ── Helpers ─────────────────────────────────────────────────────────────────

interface Gate {
  readonly promise: Promise<void>;
  open(): void;
}

function gate(): Gate {
  let open = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

const BASE = new Date(2026, 2, 1, 8, 0, 0);

function at(seconds: number): Date {
  return new Date(BASE.getTime() + seconds * 1_000);
}

function camera(id: string, schedules: readonly Record<string, unknown>[], enabled = true): Subject {
  return parseSubject(
    {
      id,
      kind: "camera",
      enabled,
      camera: { url: `http://${id}.local/snap.jpg`, outputDir: `/data/${id}` },
      schedules,
    },
    { now: BASE },
  );
}

let logger: BufferLogger;
let manager: TaskManager;
let jobGate: Gate;
let counter: number;

const jobFactory: JobFactory = (subject) => ({
  kind: "capture",
  name: `Capture ${subject.name}`,
  body: () => jobGate.promise,
});

function makeScheduler(subjects: readonly Subject[], factory: JobFactory = jobFactory): Scheduler {
  return new Scheduler({
    taskManager: manager,
    jobFactory: factory,
    logger,
    subjects,
    config: { tickIntervalMs: 1_000 },
  });
}

function count(msg: string): number {
  return logger.entries.filter((e) => e.msg === msg).length;
}

beforeEach(() => {
  logger = new BufferLogger();
  counter = 0;
  manager = new TaskManager({
    logger,
    idGenerator: (kind: TaskKind) => `${kind}-${++counter}`,
  });
  jobGate = gate();
});

afterEach(() => {
  jobGate.open();
});

// ── Tick ────────────────────────────────────────────────────────────────────

describe("Scheduler.tick", () => {
  it("submits a job tagged with the subject when a schedule matches", () => {
    const scheduler = makeScheduler([camera("garden", [{ hour: "8", minute: "0" }])]);

    const result = scheduler.tick(BASE);

    expect(result.timestamp).toBe(BASE.toISOString());
    expect(result.fired).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", taskId: "capture-1" },
    ]);
    expect(result.skipped).toEqual([]);
    const task = manager.get("capture-1");
    expect(task?.subjectId).toBe("garden");
    expect(task?.name).toBe("Capture garden");
    expect(logger.has("info", "schedule_fired")).toBe(true);
  });

  it("does nothing when no schedule matches", () => {
    const scheduler = makeScheduler([camera("garden", [{ hour: "9", minute: "0" }])]);
    expect(scheduler.tick(BASE)).toEqual({
      timestamp: BASE.toISOString(),
      fired: [],
      skipped: [],
    });
    expect(manager.listActive()).toEqual([]);
  });

  it("skips a subject whose previous task is still active", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*", second: "*" }])]);

    expect(scheduler.tick(at(0)).fired).toHaveLength(1);
    const second = scheduler.tick(at(1));

    expect(second.fired).toEqual([]);
    expect(second.skipped).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", reason: "schedule_overlap_skipped" },
    ]);
    expect(logger.has("info", "schedule_overlap_skipped")).toBe(true);
    expect(manager.listActive({ subjectId: "garden" })).toHaveLength(1);
  });

  it("fires again once the previous task has finished", async () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*", second: "*" }])]);

    scheduler.tick(at(0));
    jobGate.open();
    await manager.waitFor("capture-1");

    expect(scheduler.tick(at(1)).fired).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", taskId: "capture-2" },
    ]);
  });

  it("fires a subject at most once per tick window", async () => {
    const scheduler = makeScheduler([
      camera("garden", [{ minute: "*" }, { id: "top-of-hour", minute: "0" }]),
    ]);

    const result = scheduler.tick(BASE);
    expect(result.fired.map((f) => f.scheduleId)).toEqual(["schedule_0"]);
    expect(result.skipped).toEqual([
      { subjectId: "garden", scheduleId: "top-of-hour", reason: "already_fired_this_window" },
    ]);

    jobGate.open();
    await manager.waitFor("capture-1");
    expect(scheduler.tick(new Date(BASE.getTime() + 400)).skipped).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", reason: "already_fired_this_window" },
      { subjectId: "garden", scheduleId: "top-of-hour", reason: "already_fired_this_window" },
    ]);
  });

  it("reports disabled subjects and ignores disabled schedules", () => {
    const scheduler = makeScheduler([
      camera("porch", [{ minute: "*" }], false),
      camera("garden", [{ minute: "*", enabled: false }]),
    ]);

    expect(scheduler.tick(BASE)).toEqual({
      timestamp: BASE.toISOString(),
      fired: [],
      skipped: [{ subjectId: "porch", scheduleId: null, reason: "disabled" }],
    });
  });

  it("records a failing job factory as a skip without throwing", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*" }])], () => {
      throw new Error("no camera");
    });

    const result = scheduler.tick(BASE);
    expect(result.skipped).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", reason: "fire_error: no camera" },
    ]);
    expect(logger.has("error", "schedule_fire_failed")).toBe(true);
    expect(manager.listActive()).toEqual([]);
  });

  it("fires interval schedules within the tick window after each sample", () => {
    const scheduler = makeScheduler([
      camera("garden", [{ type: "interval", intervalAmount: 15, intervalUnit: "minutes" }]),
    ]);

    expect(scheduler.tick(new Date(BASE.getTime() + 15 * 60_000 + 999)).fired).toHaveLength(1);
    expect(scheduler.tick(new Date(BASE.getTime() + 16 * 60_000)).fired).toEqual([]);
  });
});

// ── Late Ticks ──────────────────────────────────────────────────────────────

describe("Scheduler.tick — late ticks", () => {
  const noon = () => camera("garden", [{ hour: "12", minute: "0", second: "0" }]);

  it("evaluates a window that fell between two ticks", () => {
    const scheduler = makeScheduler([noon()]);

    expect(scheduler.tick(new Date(2026, 2, 1, 11, 59, 59, 20)).fired).toEqual([]);
    expect(scheduler.tick(new Date(2026, 2, 1, 12, 0, 1, 50)).fired).toEqual([
      { subjectId: "garden", scheduleId: "schedule_0", taskId: "capture-1" },
    ]);
  });

  it("drops windows older than the catch-up limit and logs them", () => {
    const scheduler = new Scheduler({
      taskManager: manager,
      jobFactory,
      logger,
      subjects: [noon()],
      config: { tickIntervalMs: 1_000, maxCatchUpTicks: 5 },
    });

    scheduler.tick(new Date(2026, 2, 1, 11, 59, 50));
    expect(scheduler.tick(new Date(2026, 2, 1, 12, 0, 10)).fired).toEqual([]);

    const dropped = logger.entries.find((e) => e.msg === "tick_windows_dropped");
    expect(dropped?.data).toMatchObject({ dropped: 14 });
  });

  it("catches up within the limit", () => {
    const scheduler = new Scheduler({
      taskManager: manager,
      jobFactory,
      logger,
      subjects: [noon()],
      config: { tickIntervalMs: 1_000, maxCatchUpTicks: 30 },
    });

    scheduler.tick(new Date(2026, 2, 1, 11, 59, 50));
    expect(scheduler.tick(new Date(2026, 2, 1, 12, 0, 10)).fired).toHaveLength(1);
    expect(logger.has("warn", "tick_windows_dropped")).toBe(false);
  });

  it("rejects a negative catch-up limit", () => {
    expect(
      () =>
        new Scheduler({
          taskManager: manager,
          jobFactory,
          logger,
          config: { maxCatchUpTicks: -1 },
        }),
    ).toThrow("maxCatchUpTicks must be a non-negative integer, got -1");
  });
});

// ── Reload ──────────────────────────────────────────────────────────────────

describe("Scheduler.reload", () => {
  it("swaps the subject set", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*" }])]);
    scheduler.reload([camera("porch", [{ minute: "*" }])]);

    expect(scheduler.getSubjects().map((s) => s.id)).toEqual(["porch"]);
    expect(scheduler.tick(BASE).fired.map((f) => f.subjectId)).toEqual(["porch"]);
    expect(logger.has("info", "subjects_reloaded")).toBe(true);
  });

  it("keeps the previous subjects when the new set is invalid", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*" }])]);

    expect(() =>
      scheduler.reload([camera("porch", []), camera("porch", [])]),
    ).toThrow(SubjectValidationError);
    expect(scheduler.getSubjects().map((s) => s.id)).toEqual(["garden"]);
    expect(scheduler.getSubject("porch")).toBeNull();
  });
});

// ── Run Now ─────────────────────────────────────────────────────────────────

describe("Scheduler.runNow", () => {
  it("submits a job for a known subject", () => {
    const scheduler = makeScheduler([camera("garden", [])]);
    expect(scheduler.runNow("garden", BASE)).toEqual({ status: "submitted", taskId: "capture-1" });
  });

  it("returns not_found for an unknown subject", () => {
    const scheduler = makeScheduler([]);
    expect(scheduler.runNow("nope", BASE)).toEqual({ status: "not_found" });
  });

  it("applies the same overlap check as a scheduled fire", () => {
    const scheduler = makeScheduler([camera("garden", [])]);
    scheduler.runNow("garden", at(0));
    expect(scheduler.runNow("garden", at(5))).toEqual({
      status: "skipped",
      reason: "schedule_overlap_skipped",
    });
  });

  it("runs disabled subjects by hand", () => {
    const scheduler = makeScheduler([camera("porch", [{ minute: "*" }], false)]);
    expect(scheduler.runNow("porch", BASE).status).toBe("submitted");
  });
});

// ── Upcoming ────────────────────────────────────────────────────────────────

describe("Scheduler.getUpcoming", () => {
  it("lists the next fire of each enabled schedule, soonest first", () => {
    const scheduler = makeScheduler([
      camera("noon", [{ hour: "12", minute: "0" }]),
      camera("quarter", [{ type: "interval", intervalAmount: 15 }]),
      camera("off", [{ minute: "*" }], false),
    ]);

    expect(scheduler.getUpcoming(BASE)).toEqual([
      {
        subjectId: "quarter",
        subjectName: "quarter",
        scheduleId: "schedule_0",
        kind: "capture",
        nextRun: new Date(2026, 2, 1, 8, 15, 0),
      },
      {
        subjectId: "noon",
        subjectName: "noon",
        scheduleId: "schedule_0",
        kind: "capture",
        nextRun: new Date(2026, 2, 1, 12, 0, 0),
      },
    ]);
  });
});

// ── Tick Loop ───────────────────────────────────────────────────────────────

describe("Scheduler lifecycle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 2, 1, 8, 0, 0, 500));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("aligns the first tick to the next boundary and ticks every period", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*", second: "*" }])]);
    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);

    vi.advanceTimersByTime(499);
    expect(count("schedule_fired")).toBe(0);

    vi.advanceTimersByTime(1);
    expect(count("schedule_fired")).toBe(1);

    vi.advanceTimersByTime(2_000);
    expect(count("schedule_fired")).toBe(1);
    expect(count("schedule_overlap_skipped")).toBe(2);

    scheduler.stop();
    expect(scheduler.isRunning()).toBe(false);
  });

  it("stops ticking after stop()", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*", second: "*" }])]);
    scheduler.start();
    scheduler.start();
    scheduler.stop();

    vi.advanceTimersByTime(5_000);
    expect(count("schedule_fired")).toBe(0);
    expect(count("scheduler_started")).toBe(1);
    expect(count("scheduler_stopped")).toBe(1);
  });

  it("logs tick errors instead of throwing", () => {
    const scheduler = makeScheduler([camera("garden", [{ minute: "*", second: "*" }])]);
    vi.spyOn(scheduler, "tick").mockImplementation(() => {
      throw new Error("boom");
    });
    scheduler.start();

    vi.advanceTimersByTime(500);
    expect(logger.has("error", "tick_error")).toBe(true);
    scheduler.stop();
  });
});
