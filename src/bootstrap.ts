import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { TaskManager } from "./tasks/task-manager.ts";
import type { WatchOptions } from "./tasks/task-manager.ts";
import type { TaskFilter, TaskSnapshot } from "./types/task.ts";
import type { Subject } from "./types/subject.ts";
import { Scheduler } from "./scheduler/scheduler.ts";
import type { RunNowResult, UpcomingRun } from "./scheduler/scheduler.ts";
import { InMemoryHistoryStore } from "./history/history-store.ts";
import type { HistoryStore } from "./history/history-store.ts";
import { createJobFactory, createRenderJob } from "./jobs/index.ts";
import type { JobDeps, RenderRequest } from "./jobs/index.ts";
import { HttpImageFetcher } from "./media/http-fetcher.ts";
import { FileSystemImageSink, FileSystemImageSource } from "./media/fs-images.ts";
import { FfmpegImageProcessor, FfmpegVideoEncoder } from "./media/ffmpeg.ts";
import { WorkspaceError } from "./workspace/errors.ts";
import { loadSubjectsFile } from "./workspace/subject-loader.ts";
import { parseSubjects } from "./workspace/subject-validation.ts";

// ── Application Interface ──────────────────────────────────────────────────

/** The boundary an HTTP layer or CLI drives. */
export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly taskManager: TaskManager;
  readonly scheduler: Scheduler;
  readonly history: HistoryStore;

  listTasks(filter?: TaskFilter): TaskSnapshot[];
  getTask(id: string): TaskSnapshot | null;
  cancelTask(id: string): boolean;
  runNow(subjectId: string): RunNowResult;
  /**
   * Replace the subject set from raw definitions, or re-read the subjects
   * file when none are given. Invalid input leaves the current set running.
   * Resolves with the new subject count.
   */
  reload(definitions?: unknown): Promise<number>;
  watchTask(id: string, options?: WatchOptions): AsyncGenerator<TaskSnapshot, void>;
  upcoming(): UpcomingRun[];
  /** Submit a one-off video render. Returns the task ID. */
  render(request: RenderRequest): string;

  start(): void;
  shutdown(): Promise<void>;
}

export interface BootstrapOptions {
  readonly logger?: Logger;
  /** Skip reading the subjects file. */
  readonly subjects?: readonly Subject[];
  readonly collaborators?: Partial<Omit<JobDeps, "logger" | "history">>;
  readonly history?: HistoryStore;
  readonly clock?: () => Date;
  /** Install SIGTERM/SIGINT handlers that shut the application down. */
  readonly handleSignals?: boolean;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Composition root: builds the task manager, scheduler and job
 * collaborators once and wires them together.
 */
export async function bootstrap(
  config: RuntimeConfig,
  options: BootstrapOptions = {},
): Promise<Application> {
  // 1. Logger first, so everything below can log
  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      base: { service: "lapse-scheduler" },
    });
  const log = logger.child({ module: "bootstrap" });

  log.info("bootstrap_started", {
    subjectsFile: config.subjectsFile,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    maxConcurrency: config.tasks.maxConcurrency,
  });

  // 2. Subjects
  const subjects = options.subjects ?? (await readSubjects(config.subjectsFile, log));

  // 3. Task manager
  const taskManager = new TaskManager({
    logger,
    clock: options.clock,
    config: {
      maxConcurrency: config.tasks.maxConcurrency,
      retentionMs: config.tasks.retentionMs,
    },
  });

  // 4. Job collaborators
  const history = options.history ?? new InMemoryHistoryStore({ clock: options.clock });
  const jobDeps: JobDeps = {
    fetcher: options.collaborators?.fetcher ?? new HttpImageFetcher(),
    processor:
      options.collaborators?.processor ?? new FfmpegImageProcessor(config.media.ffmpegPath),
    sink: options.collaborators?.sink ?? new FileSystemImageSink(),
    source: options.collaborators?.source ?? new FileSystemImageSource(),
    encoder: options.collaborators?.encoder ?? new FfmpegVideoEncoder(config.media.ffmpegPath),
    history,
    logger,
  };

  // 5. Scheduler
  const scheduler = new Scheduler({
    taskManager,
    jobFactory: createJobFactory(jobDeps),
    logger,
    subjects,
    clock: options.clock,
    config: { tickIntervalMs: config.scheduler.tickIntervalMs },
  });

  log.info("subjects_loaded", {
    subjects: subjects.length,
    schedules: subjects.reduce((n, s) => n + s.schedules.length, 0),
  });

  let shuttingDown = false;

  const app: Application = {
    config,
    logger,
    taskManager,
    scheduler,
    history,

    listTasks: (filter) => taskManager.listActive(filter),
    getTask: (id) => taskManager.get(id),
    cancelTask: (id) => taskManager.cancel(id),
    runNow: (subjectId) => scheduler.runNow(subjectId),
    watchTask: (id, watchOptions) => taskManager.watch(id, watchOptions),
    upcoming: () => scheduler.getUpcoming(),

    async reload(definitions?: unknown): Promise<number> {
      const next =
        definitions === undefined
          ? await loadSubjectsFile(config.subjectsFile)
          : parseSubjects(definitions);
      scheduler.reload(next);
      return next.length;
    },

    render(request: RenderRequest): string {
      return taskManager.submit("render", createRenderJob(request, jobDeps), {
        name: `Render ${request.name ?? request.inputDir}`,
      });
    },

    start(): void {
      taskManager.start();
      scheduler.start();
      log.info("application_started");
    },

    async shutdown(): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info("shutdown_started");

      // 1. Stop scheduling new work
      scheduler.stop();

      // 2. Ask running jobs to stop and wait for them
      const cancelled = taskManager.cancelAll();
      await taskManager.drain();
      taskManager.stop();
      log.info("tasks_drained", { cancelled });

      // 3. Remove signal handlers to prevent accumulation
      process.removeListener("SIGTERM", sigtermHandler);
      process.removeListener("SIGINT", sigintHandler);

      log.info("shutdown_completed");
    },
  };

  // Signal handlers for graceful shutdown (with dedup guard)
  let signalHandled = false;
  const onSignal = (signal: string): void => {
    if (signalHandled) return;
    signalHandled = true;
    log.info("signal_received", { signal });
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("shutdown_failed", {
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      },
    );
  };

  const sigtermHandler = () => onSignal("SIGTERM");
  const sigintHandler = () => onSignal("SIGINT");
  if (options.handleSignals ?? true) {
    process.on("SIGTERM", sigtermHandler);
    process.on("SIGINT", sigintHandler);
  }

  return app;
}

// ── Helpers ────────────────────────────────────────────────────────────────

/** A missing subjects file means no subjects yet; anything else is fatal. */
async function readSubjects(path: string, log: Logger): Promise<Subject[]> {
  try {
    return await loadSubjectsFile(path);
  } catch (err: unknown) {
    if (err instanceof WorkspaceError && err.code === "NOT_FOUND") {
      log.warn("subjects_file_missing", { path });
      return [];
    }
    throw err;
  }
}
