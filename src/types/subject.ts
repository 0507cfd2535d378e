import type { TimeFilterSpec } from "../filter/time-filter.ts";
import type { ScheduleExpression } from "../scheduler/expression.ts";
import type { TaskKind } from "./task.ts";

// ── Subject Kind ────────────────────────────────────────────────────────────

export const SUBJECT_KINDS = ["camera", "export"] as const;
export type SubjectKind = (typeof SUBJECT_KINDS)[number];

/** The task a subject's schedules trigger. */
export const SUBJECT_TASK_KIND: Record<SubjectKind, TaskKind> = {
  camera: "capture",
  export: "export",
};

// ── Output Options ──────────────────────────────────────────────────────────

export interface ResizeSpec {
  readonly width: number;
  readonly height: number;
}

export const DEFAULT_RESIZE: ResizeSpec = { width: 1920, height: 1080 };
export const DEFAULT_IMAGE_EXT = "jpg";
export const DEFAULT_IMAGE_QUALITY = 50;

export interface VideoSpec {
  readonly fps: number;
  readonly codec: string;
  /** Defaults to the export directory with an .mp4 extension. */
  readonly output: string | null;
}

export const DEFAULT_VIDEO_FPS = 24;
export const DEFAULT_VIDEO_CODEC = "libx264";

// ── Subjects ────────────────────────────────────────────────────────────────

export interface CameraSource {
  readonly url: string;
  readonly outputDir: string;
  readonly prefix: string;
  readonly ext: string;
  readonly quality: number;
  readonly resize: ResizeSpec | null;
}

export interface ExportTarget {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly filter: TimeFilterSpec;
  readonly prefix: string;
  readonly ext: string;
  readonly quality: number;
  readonly resize: ResizeSpec | null;
  readonly video: VideoSpec | null;
}

interface SubjectBase {
  readonly id: string;
  readonly name: string;
  readonly enabled: boolean;
  readonly schedules: readonly ScheduleExpression[];
}

export interface CameraSubject extends SubjectBase {
  readonly kind: "camera";
  readonly camera: CameraSource;
}

export interface ExportSubject extends SubjectBase {
  readonly kind: "export";
  readonly export: ExportTarget;
}

export type Subject = CameraSubject | ExportSubject;
