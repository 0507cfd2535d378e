import {
  DEFAULT_IMAGE_EXT,
  DEFAULT_IMAGE_QUALITY,
  DEFAULT_RESIZE,
  DEFAULT_VIDEO_CODEC,
  DEFAULT_VIDEO_FPS,
  SUBJECT_KINDS,
} from "../types/subject.ts";
import type {
  CameraSource,
  ExportTarget,
  ResizeSpec,
  Subject,
  SubjectKind,
  VideoSpec,
} from "../types/subject.ts";
import { CronParseError } from "../scheduler/cron.ts";
import { ScheduleValidationError, parseSchedule } from "../scheduler/expression.ts";
import type { ScheduleExpression } from "../scheduler/expression.ts";
import { INTERVAL_UNITS, isIntervalUnit } from "../scheduler/interval.ts";
import { FILTER_MODES, TimeFilterError, compileTimeFilter } from "../filter/time-filter.ts";
import type { DateSpan, FilterMode, TimeFilterSpec } from "../filter/time-filter.ts";

// ── Error ───────────────────────────────────────────────────────────────────

export class SubjectValidationError extends Error {
  override readonly name = "SubjectValidationError";

  constructor(
    message: string,
    public readonly subjectId: string | null,
    public readonly field: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// ── Raw Input Helpers ───────────────────────────────────────────────────────

type RawObject = Record<string, unknown>;

interface Ctx {
  readonly subjectId: string | null;
  readonly path: string;
}

function isRecord(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(ctx: Ctx, key: string, message: string): never {
  const field = ctx.path && key ? `${ctx.path}.${key}` : ctx.path || key;
  const owner = ctx.subjectId ? `Subject "${ctx.subjectId}"` : "Subject";
  throw new SubjectValidationError(`${owner}: "${field}" ${message}`, ctx.subjectId, field);
}

function at(ctx: Ctx, key: string): Ctx {
  return { ...ctx, path: ctx.path ? `${ctx.path}.${key}` : key };
}

function requireObject(obj: RawObject, key: string, ctx: Ctx): RawObject {
  const value = obj[key];
  if (!isRecord(value)) fail(ctx, key, "must be an object");
  return value;
}

function requireString(obj: RawObject, key: string, ctx: Ctx): string {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    fail(ctx, key, "must be a non-empty string");
  }
  return value;
}

function optionalString(obj: RawObject, key: string, ctx: Ctx, fallback: string): string {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") fail(ctx, key, "must be a string");
  return value;
}

function optionalBoolean(obj: RawObject, key: string, ctx: Ctx, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") fail(ctx, key, "must be true or false");
  return value;
}

function optionalInteger(
  obj: RawObject,
  key: string,
  ctx: Ctx,
  bounds: { readonly min: number; readonly max?: number },
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    fail(ctx, key, "must be an integer");
  }
  if (value < bounds.min || (bounds.max !== undefined && value > bounds.max)) {
    const range = bounds.max === undefined ? `>= ${bounds.min}` : `between ${bounds.min} and ${bounds.max}`;
    fail(ctx, key, `must be ${range}, got ${value}`);
  }
  return value;
}

/** Cron fields may arrive as YAML numbers (`minute: 0`). */
function optionalCronText(obj: RawObject, key: string, ctx: Ctx): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number" && Number.isInteger(value)) return String(value);
  if (typeof value !== "string") fail(ctx, key, "must be a cron field string");
  return value;
}

// ── Subjects ────────────────────────────────────────────────────────────────

/**
 * Validate a list of raw subject definitions (e.g. parsed YAML) and build
 * typed, frozen subjects. Subject IDs must be unique.
 */
export function parseSubjects(
  raw: unknown,
  options: { readonly now?: Date } = {},
): Subject[] {
  if (!Array.isArray(raw)) {
    throw new SubjectValidationError("Subjects must be a list", null, "subjects");
  }

  const seen = new Set<string>();
  return raw.map((entry: unknown, index) => {
    const subject = parseSubject(entry, { now: options.now, index });
    if (seen.has(subject.id)) {
      throw new SubjectValidationError(
        `Duplicate subject id "${subject.id}"`,
        subject.id,
        `subjects[${index}].id`,
      );
    }
    seen.add(subject.id);
    return subject;
  });
}

export function parseSubject(
  raw: unknown,
  options: { readonly now?: Date; readonly index?: number } = {},
): Subject {
  if (!isRecord(raw)) {
    throw new SubjectValidationError(
      `Subject at index ${options.index ?? 0} must be an object`,
      null,
      `subjects[${options.index ?? 0}]`,
    );
  }

  const root: Ctx = { subjectId: null, path: "" };
  const id = requireString(raw, "id", root);
  const ctx: Ctx = { subjectId: id, path: "" };

  const kind = raw["kind"];
  if (!isSubjectKind(kind)) {
    fail(ctx, "kind", `must be one of: ${SUBJECT_KINDS.join(", ")}`);
  }

  const name = optionalString(raw, "name", ctx, id);
  const enabled = optionalBoolean(raw, "enabled", ctx, true);
  const schedules = parseSchedules(raw["schedules"], ctx, options.now);

  if (kind === "camera") {
    return Object.freeze({
      kind,
      id,
      name,
      enabled,
      schedules,
      camera: parseCameraSource(requireObject(raw, "camera", ctx), at(ctx, "camera")),
    });
  }
  return Object.freeze({
    kind,
    id,
    name,
    enabled,
    schedules,
    export: parseExportTarget(requireObject(raw, "export", ctx), at(ctx, "export")),
  });
}

function isSubjectKind(value: unknown): value is SubjectKind {
  return typeof value === "string" && (SUBJECT_KINDS as readonly string[]).includes(value);
}

// ── Schedules ───────────────────────────────────────────────────────────────

function parseSchedules(
  raw: unknown,
  ctx: Ctx,
  now: Date | undefined,
): readonly ScheduleExpression[] {
  if (raw === undefined || raw === null) return Object.freeze([]);
  if (!Array.isArray(raw)) fail(ctx, "schedules", "must be a list");

  const seen = new Set<string>();
  const schedules = raw.map((entry: unknown, i) => {
    const sctx = at(ctx, `schedules[${i}]`);
    if (!isRecord(entry)) fail(ctx, `schedules[${i}]`, "must be an object");

    const expr = parseScheduleEntry(entry, sctx, `schedule_${i}`, now);
    if (seen.has(expr.id)) {
      fail(ctx, `schedules[${i}].id`, `duplicates schedule id "${expr.id}"`);
    }
    seen.add(expr.id);
    return expr;
  });
  return Object.freeze(schedules);
}

function parseScheduleEntry(
  entry: RawObject,
  ctx: Ctx,
  defaultId: string,
  now: Date | undefined,
): ScheduleExpression {
  const id = optionalString(entry, "id", ctx, defaultId);
  const enabled = optionalBoolean(entry, "enabled", ctx, true);
  const type = optionalString(entry, "type", ctx, "cron");

  try {
    if (type === "interval") {
      const unit = entry["intervalUnit"] ?? "minutes";
      if (!isIntervalUnit(unit)) {
        fail(ctx, "intervalUnit", `must be one of: ${INTERVAL_UNITS.join(", ")}`);
      }
      const startDate = entry["startDate"];
      let start: string | undefined;
      if (startDate instanceof Date) {
        start = startDate.toISOString();
      } else if (startDate !== undefined && startDate !== null) {
        start = optionalString(entry, "startDate", ctx, "");
      }
      return parseSchedule(
        {
          id,
          type: "interval",
          enabled,
          intervalAmount: optionalInteger(entry, "intervalAmount", ctx, { min: 1 }) ?? 1,
          intervalUnit: unit,
          startDate: start,
        },
        { now },
      );
    }
    if (type !== "cron") fail(ctx, "type", `must be "cron" or "interval", got "${type}"`);

    return parseSchedule({
      id,
      type: "cron",
      enabled,
      second: optionalCronText(entry, "second", ctx),
      minute: optionalCronText(entry, "minute", ctx),
      hour: optionalCronText(entry, "hour", ctx),
    });
  } catch (err) {
    if (err instanceof CronParseError) {
      fail(ctx, err.field, err.message);
    }
    if (err instanceof ScheduleValidationError) {
      fail(ctx, err.field ?? "schedule", err.message);
    }
    throw err;
  }
}

// ── Camera ──────────────────────────────────────────────────────────────────

function parseCameraSource(raw: RawObject, ctx: Ctx): CameraSource {
  const url = requireString(raw, "url", ctx);
  if (!/^https?:\/\//i.test(url)) fail(ctx, "url", "must be an http(s) URL");

  return Object.freeze({
    url,
    outputDir: requireString(raw, "outputDir", ctx),
    prefix: optionalString(raw, "prefix", ctx, ""),
    ext: optionalString(raw, "ext", ctx, DEFAULT_IMAGE_EXT),
    quality: optionalInteger(raw, "quality", ctx, { min: 1, max: 100 }) ?? DEFAULT_IMAGE_QUALITY,
    resize: parseResize(raw, ctx),
  });
}

function parseResize(raw: RawObject, ctx: Ctx): ResizeSpec | null {
  const value = raw["resize"];
  if (value === undefined || value === null || value === false) return null;
  if (value === true) return DEFAULT_RESIZE;
  if (!isRecord(value)) fail(ctx, "resize", "must be true, false or { width, height }");

  const rctx = at(ctx, "resize");
  return Object.freeze({
    width: optionalInteger(value, "width", rctx, { min: 1 }) ?? DEFAULT_RESIZE.width,
    height: optionalInteger(value, "height", rctx, { min: 1 }) ?? DEFAULT_RESIZE.height,
  });
}

// ── Export ──────────────────────────────────────────────────────────────────

function parseExportTarget(raw: RawObject, ctx: Ctx): ExportTarget {
  const filter = parseFilter(raw["filter"], at(ctx, "filter"));

  return Object.freeze({
    inputDir: requireString(raw, "inputDir", ctx),
    outputDir: requireString(raw, "outputDir", ctx),
    filter,
    prefix: optionalString(raw, "prefix", ctx, ""),
    ext: optionalString(raw, "ext", ctx, DEFAULT_IMAGE_EXT),
    quality: optionalInteger(raw, "quality", ctx, { min: 1, max: 100 }) ?? DEFAULT_IMAGE_QUALITY,
    resize: parseResize(raw, ctx),
    video: parseVideo(raw["video"], at(ctx, "video")),
  });
}

function parseVideo(raw: unknown, ctx: Ctx): VideoSpec | null {
  if (raw === undefined || raw === null || raw === false) return null;
  const value = raw === true ? {} : raw;
  if (!isRecord(value)) fail(ctx, "", "must be true, false or an object");

  const output = optionalString(value, "output", ctx, "");
  return Object.freeze({
    fps: optionalInteger(value, "fps", ctx, { min: 1, max: 240 }) ?? DEFAULT_VIDEO_FPS,
    codec: optionalString(value, "codec", ctx, DEFAULT_VIDEO_CODEC),
    output: output === "" ? null : output,
  });
}

function parseFilter(raw: unknown, ctx: Ctx): TimeFilterSpec {
  const value = raw ?? {};
  if (!isRecord(value)) fail(ctx, "", "must be an object");

  const mode = value["mode"] ?? "nearest";
  if (!isFilterMode(mode)) fail(ctx, "mode", `must be one of: ${FILTER_MODES.join(", ")}`);

  const maxDistance = value["maxDistanceMinutes"];
  if (maxDistance !== undefined && typeof maxDistance !== "number") {
    fail(ctx, "maxDistanceMinutes", "must be a number");
  }

  const spec: TimeFilterSpec = {
    span: parseSpan(value, ctx),
    hour: optionalCronText(value, "hour", ctx) ?? "*",
    minute: optionalCronText(value, "minute", ctx) ?? "*",
    second: optionalCronText(value, "second", ctx) ?? "0",
    mode,
    maxDistanceMinutes: maxDistance,
  };

  try {
    compileTimeFilter(spec);
  } catch (err) {
    if (err instanceof TimeFilterError) fail(ctx, err.field, err.message);
    throw err;
  }
  return Object.freeze(spec);
}

function isFilterMode(value: unknown): value is FilterMode {
  return typeof value === "string" && (FILTER_MODES as readonly string[]).includes(value);
}

/**
 * Dates come either as `dates: [...]`, a single `date`, or a
 * `dateFrom` / `dateTo` range; none of them means every date.
 */
function parseSpan(raw: RawObject, ctx: Ctx): DateSpan {
  const dates = raw["dates"];
  if (dates !== undefined && dates !== null) {
    if (!Array.isArray(dates)) fail(ctx, "dates", "must be a list of YYYY-MM-DD dates");
    const list = dates.map((d: unknown) => dateText(d, ctx, "dates"));
    return { kind: "selected", dates: list };
  }

  const date = raw["date"];
  if (date !== undefined && date !== null) {
    return { kind: "single", date: dateText(date, ctx, "date") };
  }

  const from = raw["dateFrom"];
  const to = raw["dateTo"];
  const hasFrom = from !== undefined && from !== null && from !== "";
  const hasTo = to !== undefined && to !== null && to !== "";
  if (!hasFrom && !hasTo) return { kind: "all" };
  return {
    kind: "range",
    from: hasFrom ? dateText(from, ctx, "dateFrom") : undefined,
    to: hasTo ? dateText(to, ctx, "dateTo") : undefined,
  };
}

/** YAML may hand back a Date for an unquoted date. */
function dateText(value: unknown, ctx: Ctx, key: string): string {
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (typeof value !== "string") fail(ctx, key, "must be a YYYY-MM-DD date");
  return value;
}
