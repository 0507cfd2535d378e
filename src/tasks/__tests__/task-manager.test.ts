import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { TaskManager } from "../task-manager.ts";
import type { JobContext } from "../task-manager.ts";
import { TaskCancelledError, TaskNotFoundError } from "../errors.ts";
import { generateTaskId } from "../id.ts";
import { BufferLogger } from "../../observability/logger.ts";
import type { TaskKind, TaskSnapshot } from "../../types/task.ts";

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

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

let now: Date;
let logger: BufferLogger;
let counter: number;

function makeManager(maxConcurrency = 2): TaskManager {
  return new TaskManager({
    logger,
    clock: () => now,
    idGenerator: (kind: TaskKind) => `${kind}-${++counter}`,
    config: { maxConcurrency, retentionMs: 60_000, gcIntervalMs: 10_000 },
  });
}

beforeEach(() => {
  now = new Date("2026-03-01T10:00:00.000Z");
  logger = new BufferLogger();
  counter = 0;
});

// ── Submit / Complete ───────────────────────────────────────────────────────

describe("TaskManager — submit", () => {
  it("returns an ID immediately and completes with the body's result", async () => {
    const manager = makeManager();
    const id = manager.submit("capture", () => "ok", { subjectId: "garden", name: "Capture garden" });

    expect(id).toBe("capture-1");
    expect(manager.get(id)?.status).toBe("pending");

    const final = await manager.waitFor(id);
    expect(final.status).toBe("completed");
    expect(final.progress).toBe(100);
    expect(final.name).toBe("Capture garden");
    expect(final.subjectId).toBe("garden");
    expect(manager.getResult(id)).toBe("ok");
    expect(logger.has("info", "task_completed")).toBe(true);
  });

  it("defaults the name to the kind and subject to null", async () => {
    const manager = makeManager();
    const id = manager.submit("render", async () => undefined);
    const final = await manager.waitFor(id);
    expect(final.name).toBe("render");
    expect(final.subjectId).toBeNull();
  });

  it("records progress reported by the body", async () => {
    const manager = makeManager();
    const halfway = gate();
    const release = gate();
    const id = manager.submit("export", async (ctx: JobContext) => {
      ctx.report(5, 10, "halfway");
      halfway.open();
      await release.promise;
      ctx.report(10, 10, "done");
    });

    await halfway.promise;
    now = new Date("2026-03-01T10:00:05.000Z");
    const mid = manager.get(id);
    expect(mid?.progress).toBe(50);
    expect(mid?.message).toBe("halfway");
    expect(mid?.rate).toBe(1);
    expect(mid?.eta).toBe(5);

    release.open();
    const final = await manager.waitFor(id);
    expect(final.message).toBe("done");
    expect(final.progress).toBe(100);
  });
});

// ── Failure ─────────────────────────────────────────────────────────────────

describe("TaskManager — failure", () => {
  it("records the error message and does not retry", async () => {
    const manager = makeManager();
    let calls = 0;
    const id = manager.submit("capture", async () => {
      calls++;
      throw new Error("camera unreachable");
    }, { subjectId: "garden" });

    const final = await manager.waitFor(id);
    expect(final.status).toBe("failed");
    expect(final.error).toBe("camera unreachable");
    expect(calls).toBe(1);
    expect(manager.getResult(id)).toBeUndefined();

    const entry = logger.getByLevel("error")[0];
    expect(entry?.msg).toBe("task_failed");
    expect(entry?.data).toEqual({
      module: "task-manager",
      taskId: "capture-1",
      kind: "capture",
      subjectId: "garden",
      error: "camera unreachable",
    });
  });

  it("catches synchronous throws from the body", async () => {
    const manager = makeManager();
    const id = manager.submit("capture", () => {
      throw new Error("sync boom");
    });
    expect((await manager.waitFor(id)).error).toBe("sync boom");
  });

  it("stringifies non-Error rejections", async () => {
    const manager = makeManager();
    const id = manager.submit("capture", () => Promise.reject("plain string"));
    expect((await manager.waitFor(id)).error).toBe("plain string");
  });
});

// ── Cancellation ────────────────────────────────────────────────────────────

describe("TaskManager — cancel", () => {
  it("returns false for unknown tasks", () => {
    expect(makeManager().cancel("nope")).toBe(false);
  });

  it("never runs the body of a task cancelled while pending", async () => {
    const manager = makeManager(1);
    const blocker = gate();
    const first = manager.submit("export", () => blocker.promise);
    const body = vi.fn(() => "never");
    const second = manager.submit("export", body);

    expect(manager.cancel(second)).toBe(true);
    expect(manager.get(second)?.status).toBe("cancelled");

    blocker.open();
    await manager.waitFor(first);
    await manager.drain();
    expect(body).not.toHaveBeenCalled();
    expect(manager.get(second)?.error).toBeNull();
  });

  it("ends a cooperating task as cancelled", async () => {
    const manager = makeManager();
    const started = gate();
    const proceed = gate();
    const id = manager.submit("export", async (ctx) => {
      started.open();
      await proceed.promise;
      ctx.throwIfCancelled();
      return "unreachable";
    });

    await started.promise;
    expect(manager.cancel(id)).toBe(true);
    expect(manager.get(id)?.cancelRequested).toBe(true);
    expect(manager.get(id)?.status).toBe("running");

    proceed.open();
    const final = await manager.waitFor(id);
    expect(final.status).toBe("cancelled");
    expect(final.error).toBeNull();
  });

  it("stops a reporting loop at its next report", async () => {
    const manager = makeManager();
    const started = gate();
    const proceed = gate();
    let reached = 0;
    const id = manager.submit("export", async (ctx) => {
      for (let i = 1; i <= 3; i++) {
        ctx.report(i, 3);
        reached = i;
        if (i === 1) {
          started.open();
          await proceed.promise;
        }
      }
    });

    await started.promise;
    manager.cancel(id);
    proceed.open();

    const final = await manager.waitFor(id);
    expect(final.status).toBe("cancelled");
    expect(reached).toBe(1);
  });

  it("treats a body that returns after observing the flag as cancelled", async () => {
    const manager = makeManager();
    const started = gate();
    const proceed = gate();
    const id = manager.submit("export", async (ctx) => {
      started.open();
      await proceed.promise;
      if (ctx.isCancelled()) return "partial";
      return "full";
    });

    await started.promise;
    manager.cancel(id);
    proceed.open();
    expect((await manager.waitFor(id)).status).toBe("cancelled");
  });

  it("lets a body that never checks run to completion", async () => {
    const manager = makeManager();
    const started = gate();
    const proceed = gate();
    const id = manager.submit("capture", async () => {
      started.open();
      await proceed.promise;
      return "done";
    });

    await started.promise;
    expect(manager.cancel(id)).toBe(true);
    proceed.open();

    const final = await manager.waitFor(id);
    expect(final.status).toBe("completed");
    expect(final.cancelRequested).toBe(true);
    expect(manager.getResult(id)).toBe("done");
  });

  it("maps an AbortError after a request to cancelled", async () => {
    const manager = makeManager();
    const started = gate();
    const id = manager.submit("render", (ctx) => {
      started.open();
      return new Promise((_resolve, reject) => {
        ctx.signal.addEventListener("abort", () => {
          const err = new Error("aborted");
          err.name = "AbortError";
          reject(err);
        });
      });
    });

    await started.promise;
    manager.cancel(id);
    expect((await manager.waitFor(id)).status).toBe("cancelled");
  });

  it("accepts a TaskCancelledError thrown by the body itself", async () => {
    const manager = makeManager();
    const id = manager.submit("capture", (ctx) => {
      throw new TaskCancelledError(ctx.taskId);
    });
    expect((await manager.waitFor(id)).status).toBe("cancelled");
  });

  it("returns false for a task that already finished", async () => {
    const manager = makeManager();
    const id = manager.submit("capture", () => "ok");
    await manager.waitFor(id);
    expect(manager.cancel(id)).toBe(false);
  });

  it("cancelAll() requests cancellation of every live task", async () => {
    const manager = makeManager(1);
    const blocker = gate();
    manager.submit("export", async (ctx) => {
      await blocker.promise;
      ctx.throwIfCancelled();
    });
    manager.submit("export", () => "queued");

    await flush();
    expect(manager.cancelAll()).toBe(2);
    blocker.open();
    await manager.drain();
    expect(manager.listActive().map((t) => t.status)).toEqual(["cancelled", "cancelled"]);
  });
});

// ── Registry ────────────────────────────────────────────────────────────────

describe("TaskManager — registry", () => {
  it("lists every registered task oldest first, with filters", async () => {
    const manager = makeManager(1);
    const blocker = gate();
    const a = manager.submit("capture", () => blocker.promise, { subjectId: "garden" });
    const b = manager.submit("export", () => "x", { subjectId: "garden" });
    const c = manager.submit("capture", () => "y", { subjectId: "porch" });
    await flush();

    expect(manager.listActive().map((t) => t.id)).toEqual([a, b, c]);
    expect(manager.listActive({ status: "running" }).map((t) => t.id)).toEqual([a]);
    expect(manager.listActive({ status: ["pending"] }).map((t) => t.id)).toEqual([b, c]);
    expect(manager.listActive({ kind: "capture" }).map((t) => t.id)).toEqual([a, c]);
    expect(manager.listActive({ subjectId: "porch" }).map((t) => t.id)).toEqual([c]);

    blocker.open();
    await manager.drain();
    expect(manager.listActive().map((t) => t.status)).toEqual([
      "completed",
      "completed",
      "completed",
    ]);
  });

  it("hasActive() tracks pending and running tasks per subject and kind", async () => {
    const manager = makeManager();
    const blocker = gate();
    const id = manager.submit("capture", () => blocker.promise, { subjectId: "garden" });

    expect(manager.hasActive("garden", "capture")).toBe(true);
    expect(manager.hasActive("garden", "export")).toBe(false);
    expect(manager.hasActive("porch", "capture")).toBe(false);

    blocker.open();
    await manager.waitFor(id);
    expect(manager.hasActive("garden", "capture")).toBe(false);
  });

  it("get() returns null and waitFor() rejects for unknown IDs", async () => {
    const manager = makeManager();
    expect(manager.get("missing")).toBeNull();
    await expect(manager.waitFor("missing")).rejects.toBeInstanceOf(TaskNotFoundError);
  });
});

// ── GC ──────────────────────────────────────────────────────────────────────

describe("TaskManager — gc", () => {
  it("evicts terminal tasks older than the retention window", async () => {
    const manager = makeManager();
    const blocker = gate();
    const done = manager.submit("capture", () => "ok");
    const live = manager.submit("export", () => blocker.promise);
    await manager.waitFor(done);

    expect(manager.gc(new Date("2026-03-01T10:01:00.000Z"))).toBe(0);
    expect(manager.gc(new Date("2026-03-01T10:01:00.001Z"))).toBe(1);
    expect(manager.get(done)).toBeNull();
    expect(manager.get(live)?.status).toBe("running");

    blocker.open();
    await manager.drain();
  });

  describe("timer", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("runs gc on the configured interval between start() and stop()", () => {
      vi.useFakeTimers();
      const manager = makeManager();
      const gc = vi.spyOn(manager, "gc");

      manager.start();
      vi.advanceTimersByTime(25_000);
      expect(gc).toHaveBeenCalledTimes(2);

      manager.stop();
      vi.advanceTimersByTime(30_000);
      expect(gc).toHaveBeenCalledTimes(2);
    });
  });
});

// ── Watch ───────────────────────────────────────────────────────────────────

describe("TaskManager — watch", () => {
  it("yields snapshots until the task is terminal", async () => {
    const manager = makeManager();
    const release = gate();
    const id = manager.submit("export", async (ctx) => {
      ctx.report(1, 4);
      await release.promise;
      return "done";
    });
    await flush();

    const seen: TaskSnapshot[] = [];
    for await (const snap of manager.watch(id, { intervalMs: 5 })) {
      seen.push(snap);
      if (seen.length === 2) release.open();
    }

    expect(seen[0]?.status).toBe("running");
    expect(seen[0]?.progress).toBe(25);
    expect(seen.at(-1)?.status).toBe("completed");
  });

  it("stops when the signal aborts", async () => {
    const manager = makeManager();
    const blocker = gate();
    const id = manager.submit("export", () => blocker.promise);
    const controller = new AbortController();

    let count = 0;
    for await (const snap of manager.watch(id, { intervalMs: 5, signal: controller.signal })) {
      count++;
      expect(snap.id).toBe(id);
      controller.abort();
    }
    expect(count).toBe(1);

    blocker.open();
    await manager.drain();
  });

  it("throws TaskNotFoundError for unknown IDs", async () => {
    const manager = makeManager();
    await expect(manager.watch("missing").next()).rejects.toBeInstanceOf(TaskNotFoundError);
  });
});

// ── IDs ─────────────────────────────────────────────────────────────────────

describe("TaskManager — IDs", () => {
  it("keeps both tasks when the generator repeats an ID", async () => {
    const jobGate = gate();
    const manager = new TaskManager({ logger, clock: () => now, idGenerator: () => "capture-x" });

    const first = manager.submit("capture", () => jobGate.promise, { subjectId: "cam1" });
    const second = manager.submit("capture", () => jobGate.promise, { subjectId: "cam2" });

    expect([first, second]).toEqual(["capture-x", "capture-x-2"]);
    expect(manager.listActive().map((t) => [t.id, t.subjectId])).toEqual([
      ["capture-x", "cam1"],
      ["capture-x-2", "cam2"],
    ]);
    expect(manager.hasActive("cam1", "capture")).toBe(true);
    expect(manager.hasActive("cam2", "capture")).toBe(true);
    expect(logger.has("warn", "task_id_collision")).toBe(true);

    jobGate.open();
    await manager.drain();
  });

  it("generates date-prefixed IDs with a 12-character random suffix", () => {
    const id = generateTaskId("export", new Date("2026-03-01T10:00:00.000Z"));
    expect(id).toMatch(/^export-20260301-[0-9a-f]{12}$/);
  });
});
