export * from "./types/index.ts";
export * from "./observability/index.ts";
export * from "./scheduler/index.ts";
export * from "./workspace/index.ts";

// ── Time Filter ──────────────────────────────────────────────────────────────
export {
  TimeFilterError,
  FILTER_MODES,
  DEFAULT_MAX_DISTANCE_MINUTES,
  compileTimeFilter,
  selectItems,
  generateSlots,
  toDateKey,
  type DateKey,
  type DateSpan,
  type FilterMode,
  type TimeFilterSpec,
  type TimedItem,
  type CompiledTimeFilter,
} from "./filter/time-filter.ts";

// ── Tasks ────────────────────────────────────────────────────────────────────
export {
  TaskManager,
  DEFAULT_TASK_MANAGER_CONFIG,
  DEFAULT_WATCH_INTERVAL_MS,
  type TaskManagerConfig,
  type TaskManagerDeps,
  type JobContext,
  type JobBody,
  type SubmitOptions,
  type WatchOptions,
} from "./tasks/task-manager.ts";
export { TaskCancelledError, TaskNotFoundError } from "./tasks/errors.ts";
export { generateTaskId } from "./tasks/id.ts";

// ── Jobs ─────────────────────────────────────────────────────────────────────
export * from "./jobs/index.ts";

// ── History ──────────────────────────────────────────────────────────────────
export {
  InMemoryHistoryStore,
  DEFAULT_HISTORY_CONFIG,
  generateRecordId,
  type HistoryStore,
  type CaptureRecord,
  type ExportRecord,
  type VideoRecord,
  type NewExportRecord,
  type NewVideoRecord,
} from "./history/history-store.ts";

// ── Media ────────────────────────────────────────────────────────────────────
export { HttpImageFetcher } from "./media/http-fetcher.ts";
export { FileSystemImageSource, FileSystemImageSink } from "./media/fs-images.ts";
export { FfmpegImageProcessor, FfmpegVideoEncoder } from "./media/ffmpeg.ts";

// ── Application ──────────────────────────────────────────────────────────────
export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export { bootstrap, type Application, type BootstrapOptions } from "./bootstrap.ts";
