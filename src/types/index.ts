// ── Type re-exports ──────────────────────────────────────────────────────────
export type { TaskKind, TaskStatus, TaskSnapshot, TaskFilter } from "./task.ts";

export type {
  SubjectKind,
  ResizeSpec,
  VideoSpec,
  CameraSource,
  ExportTarget,
  CameraSubject,
  ExportSubject,
  Subject,
} from "./subject.ts";

// ── Runtime value re-exports ─────────────────────────────────────────────────
export {
  TASK_KINDS,
  TASK_STATUSES,
  TERMINAL_STATUSES,
  VALID_TRANSITIONS,
  InvalidTransitionError,
  isTerminal,
  validateTransition,
} from "./task.ts";

export {
  SUBJECT_KINDS,
  SUBJECT_TASK_KIND,
  DEFAULT_RESIZE,
  DEFAULT_IMAGE_EXT,
  DEFAULT_IMAGE_QUALITY,
  DEFAULT_VIDEO_FPS,
  DEFAULT_VIDEO_CODEC,
} from "./subject.ts";
