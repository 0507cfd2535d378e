import {
  HOUR_RANGE,
  MINUTE_RANGE,
  SECOND_RANGE,
  expandField,
  fieldMatches,
  parseField,
  serializeField,
} from "./cron.ts";
import type { CronField } from "./cron.ts";
import {
  intervalMatches,
  intervalSamples,
  isIntervalUnit,
  nextIntervalFire,
} from "./interval.ts";
import type { IntervalTiming, IntervalUnit } from "./interval.ts";

// ── Types ───────────────────────────────────────────────────────────────────

interface ScheduleBase {
  readonly id: string;
  readonly enabled: boolean;
}

export interface CronSchedule extends ScheduleBase {
  readonly kind: "cron";
  readonly second: CronField;
  readonly minute: CronField;
  readonly hour: CronField;
}

export interface IntervalSchedule extends ScheduleBase, IntervalTiming {
  readonly kind: "interval";
}

export type ScheduleExpression = CronSchedule | IntervalSchedule;

// ── Persisted Form ──────────────────────────────────────────────────────────
// The shape stored in subject configuration and exchanged with editors.

export interface CronScheduleSpec {
  readonly id: string;
  readonly type: "cron";
  readonly enabled: boolean;
  readonly second: string;
  readonly minute: string;
  readonly hour: string;
}

export interface IntervalScheduleSpec {
  readonly id: string;
  readonly type: "interval";
  readonly enabled: boolean;
  readonly intervalAmount: number;
  readonly intervalUnit: IntervalUnit;
  readonly startDate: string;
}

export type ScheduleSpec = CronScheduleSpec | IntervalScheduleSpec;

/** Loosely-specified input: omitted fields take their defaults. */
export type ScheduleInput =
  | (Partial<Omit<CronScheduleSpec, "type">> & { readonly type?: "cron" })
  | (Partial<Omit<IntervalScheduleSpec, "type" | "intervalAmount" | "intervalUnit">> & {
      readonly type: "interval";
      readonly intervalAmount: number;
      readonly intervalUnit: IntervalUnit;
    });

export const DEFAULT_CRON_FIELDS = {
  second: "0",
  minute: "*",
  hour: "*",
} as const;

// ── Error ───────────────────────────────────────────────────────────────────

export class ScheduleValidationError extends Error {
  override readonly name = "ScheduleValidationError";

  constructor(
    message: string,
    public readonly scheduleId: string | null,
    public readonly field?: string,
  ) {
    super(message);
  }
}

// ── Construction ────────────────────────────────────────────────────────────

export function createCronSchedule(options: {
  readonly id: string;
  readonly enabled?: boolean;
  readonly second?: string;
  readonly minute?: string;
  readonly hour?: string;
}): CronSchedule {
  return Object.freeze({
    kind: "cron",
    id: options.id,
    enabled: options.enabled ?? true,
    second: parseField(options.second ?? DEFAULT_CRON_FIELDS.second, SECOND_RANGE),
    minute: parseField(options.minute ?? DEFAULT_CRON_FIELDS.minute, MINUTE_RANGE),
    hour: parseField(options.hour ?? DEFAULT_CRON_FIELDS.hour, HOUR_RANGE),
  });
}

export function createIntervalSchedule(options: {
  readonly id: string;
  readonly enabled?: boolean;
  readonly amount: number;
  readonly unit: IntervalUnit;
  readonly anchor: Date;
}): IntervalSchedule {
  if (!Number.isInteger(options.amount) || options.amount < 1) {
    throw new ScheduleValidationError(
      `Interval amount must be a positive integer, got ${options.amount}`,
      options.id,
      "intervalAmount",
    );
  }
  if (!isIntervalUnit(options.unit)) {
    throw new ScheduleValidationError(
      `Interval unit must be seconds, minutes or hours, got "${String(options.unit)}"`,
      options.id,
      "intervalUnit",
    );
  }
  if (Number.isNaN(options.anchor.getTime())) {
    throw new ScheduleValidationError(
      "Interval anchor is not a valid date",
      options.id,
      "startDate",
    );
  }
  return Object.freeze({
    kind: "interval",
    id: options.id,
    enabled: options.enabled ?? true,
    amount: options.amount,
    unit: options.unit,
    anchor: new Date(options.anchor.getTime()),
  });
}

// ── Parse / Serialize ───────────────────────────────────────────────────────

/**
 * Build an expression from its persisted form. Interval schedules without a
 * start date are anchored at `now`.
 */
export function parseSchedule(
  input: ScheduleInput,
  defaults: { readonly id?: string; readonly now?: Date } = {},
): ScheduleExpression {
  const id = input.id ?? defaults.id ?? "schedule_0";

  if (input.type === "interval") {
    let anchor = defaults.now ?? new Date();
    if (input.startDate) {
      anchor = new Date(input.startDate);
      if (Number.isNaN(anchor.getTime())) {
        throw new ScheduleValidationError(
          `Invalid start date "${input.startDate}"`,
          id,
          "startDate",
        );
      }
    }
    return createIntervalSchedule({
      id,
      enabled: input.enabled,
      amount: input.intervalAmount,
      unit: input.intervalUnit,
      anchor,
    });
  }

  return createCronSchedule({
    id,
    enabled: input.enabled,
    second: input.second,
    minute: input.minute,
    hour: input.hour,
  });
}

export function serializeSchedule(expr: ScheduleExpression): ScheduleSpec {
  if (expr.kind === "interval") {
    return {
      id: expr.id,
      type: "interval",
      enabled: expr.enabled,
      intervalAmount: expr.amount,
      intervalUnit: expr.unit,
      startDate: expr.anchor.toISOString(),
    };
  }
  return {
    id: expr.id,
    type: "cron",
    enabled: expr.enabled,
    second: serializeField(expr.second),
    minute: serializeField(expr.minute),
    hour: serializeField(expr.hour),
  };
}

// ── Match ───────────────────────────────────────────────────────────────────

/**
 * Pure match test. Cron schedules compare the local second, minute and hour
 * of `instant`; interval schedules match within `granularityMs` after each
 * sample instant. Disabled schedules never match.
 */
export function matchesSchedule(
  expr: ScheduleExpression,
  instant: Date,
  granularityMs: number = 1_000,
): boolean {
  if (!expr.enabled) return false;
  if (expr.kind === "interval") {
    return intervalMatches(expr, instant, granularityMs);
  }
  return (
    fieldMatches(expr.second, instant.getSeconds()) &&
    fieldMatches(expr.minute, instant.getMinutes()) &&
    fieldMatches(expr.hour, instant.getHours())
  );
}

// ── Next Fire ───────────────────────────────────────────────────────────────

/**
 * First instant strictly after `after` at which the schedule fires, or null
 * for a disabled schedule.
 */
export function nextFireTime(expr: ScheduleExpression, after: Date): Date | null {
  if (!expr.enabled) return null;
  if (expr.kind === "interval") return nextIntervalFire(expr, after);

  const hours = expandField(expr.hour);
  const minutes = expandField(expr.minute);
  const seconds = expandField(expr.second);

  // No day-level fields, so a match always exists within the next day.
  for (let dayOffset = 0; dayOffset <= 1; dayOffset++) {
    for (const hour of hours) {
      if (dayOffset === 0 && hour < after.getHours()) continue;
      for (const minute of minutes) {
        for (const second of seconds) {
          const candidate = new Date(
            after.getFullYear(),
            after.getMonth(),
            after.getDate() + dayOffset,
            hour,
            minute,
            second,
          );
          if (candidate.getTime() > after.getTime()) return candidate;
        }
      }
    }
  }
  return null;
}

// ── Preview ─────────────────────────────────────────────────────────────────

/**
 * A few sample times for display, as "HH:MM" (or "HH:MM:SS" when seconds
 * matter). Cron samples walk the first hours of the day; interval samples
 * start at the anchor.
 */
export function previewSamples(expr: ScheduleExpression, count: number = 4): string[] {
  if (expr.kind === "interval") {
    const withSeconds = expr.unit === "seconds";
    return intervalSamples(expr, count).map((t) =>
      formatClock(t.getHours(), t.getMinutes(), withSeconds ? t.getSeconds() : null),
    );
  }

  const hours = expandField(expr.hour, 5);
  const minutes = expandField(expr.minute, 60);
  const seconds = expandField(expr.second, 60);
  const showSeconds = serializeField(expr.second) !== "0";

  const samples: string[] = [];
  for (const h of hours) {
    for (const m of minutes) {
      for (const s of seconds) {
        if (samples.length >= count) return samples;
        samples.push(formatClock(h, m, showSeconds ? s : null));
      }
    }
  }
  return samples;
}

function formatClock(hour: number, minute: number, second: number | null): string {
  const base = `${pad2(hour)}:${pad2(minute)}`;
  return second === null ? base : `${base}:${pad2(second)}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}
