import { HOUR_RANGE, isWildcard, serializeField } from "./cron.ts";
import {
  ScheduleValidationError,
  createCronSchedule,
  createIntervalSchedule,
  serializeSchedule,
} from "./expression.ts";
import type { ScheduleExpression, ScheduleSpec } from "./expression.ts";
import { isIntervalUnit } from "./interval.ts";
import type { IntervalUnit } from "./interval.ts";

// ── Simplified Schedule Builder ─────────────────────────────────────────────
//
// Editors offer "every <amount> <unit>, from <hour|now> to <hour>". This
// module turns those fields into an expression and, where possible, back.

export type BuilderFrom = number | "now";

export interface ScheduleBuilderFields {
  readonly amount: number;
  readonly unit: IntervalUnit;
  readonly from: BuilderFrom;
  /** 0 means "all day" when `from` is also 0. */
  readonly to: number;
}

/**
 * Camera schedules treat `from: "now"` as an interval anchored at the current
 * time. Export filters have no "now": it means "from the start of the
 * collection", i.e. every hour.
 */
export type BuilderContext = "camera" | "export";

export interface BuildOptions {
  readonly id: string;
  readonly enabled?: boolean;
  readonly now?: Date;
  readonly context?: BuilderContext;
}

export type ReversedSchedule =
  | { readonly kind: "simple"; readonly fields: ScheduleBuilderFields }
  | {
      readonly kind: "advanced";
      readonly reason: string;
      readonly spec: ScheduleSpec;
    };

// ── Hour Window ─────────────────────────────────────────────────────────────

/**
 * Hour sub-expression for an active window. `0,0` is all day; a window whose
 * start is after its end wraps past midnight (22→2 gives "22-23,0-2").
 */
export function buildHourRange(from: number, to: number): string {
  assertHour(from, "from");
  assertHour(to, "to");
  if (from === 0 && to === 0) return "*";
  if (from === to) return String(from);
  if (from < to) return `${from}-${to}`;
  return `${from}-${HOUR_RANGE.max},${HOUR_RANGE.min}-${to}`;
}

function assertHour(value: number, field: string): void {
  if (!Number.isInteger(value) || value < HOUR_RANGE.min || value > HOUR_RANGE.max) {
    throw new ScheduleValidationError(
      `"${field}" must be an hour between ${HOUR_RANGE.min} and ${HOUR_RANGE.max}, got ${value}`,
      null,
      field,
    );
  }
}

// ── Build ───────────────────────────────────────────────────────────────────

export function buildSchedule(
  fields: ScheduleBuilderFields,
  options: BuildOptions,
): ScheduleExpression {
  const { amount, unit } = fields;
  if (!Number.isInteger(amount) || amount < 1) {
    throw new ScheduleValidationError(
      `Amount must be a positive integer, got ${amount}`,
      options.id,
      "amount",
    );
  }
  if (!isIntervalUnit(unit)) {
    throw new ScheduleValidationError(
      `Unit must be seconds, minutes or hours, got "${String(unit)}"`,
      options.id,
      "unit",
    );
  }

  const context = options.context ?? "camera";
  if (fields.from === "now" && context === "camera") {
    assertHour(fields.to, "to");
    return createIntervalSchedule({
      id: options.id,
      enabled: options.enabled,
      amount,
      unit,
      anchor: options.now ?? new Date(),
    });
  }

  const from = fields.from === "now" ? 0 : fields.from;
  let hour = buildHourRange(from, fields.to);
  let minute = "0";
  let second = "0";

  switch (unit) {
    case "seconds":
      minute = "*";
      second = amount >= 60 ? "0" : `*/${amount}`;
      break;
    case "minutes":
      minute = amount >= 60 ? "0" : `*/${amount}`;
      break;
    case "hours":
      if (hour === "*") hour = `*/${amount}`;
      break;
  }

  return createCronSchedule({
    id: options.id,
    enabled: options.enabled,
    second,
    minute,
    hour,
  });
}

// ── Reverse ─────────────────────────────────────────────────────────────────

/**
 * Recover builder fields from an expression. The result is "simple" only if
 * rebuilding those fields reproduces the expression exactly; anything else
 * (e.g. the hour list "6,18") comes back as a read-only "advanced" spec.
 */
export function reverseSchedule(
  expr: ScheduleExpression,
  context: BuilderContext = "camera",
): ReversedSchedule {
  const spec = serializeSchedule(expr);

  if (expr.kind === "interval") {
    if (context === "export") {
      return {
        kind: "advanced",
        reason: "Interval schedules have no export filter equivalent",
        spec,
      };
    }
    return {
      kind: "simple",
      fields: { amount: expr.amount, unit: expr.unit, from: "now", to: 0 },
    };
  }

  const hourText = serializeField(expr.hour);
  const minuteText = serializeField(expr.minute);
  const secondText = serializeField(expr.second);

  const window = reverseHourWindow(hourText);
  const { amount, unit } = reverseCadence(hourText, minuteText, secondText);
  const from: BuilderFrom =
    context === "export" && isWildcard(expr.hour) ? "now" : window.from;
  const fields: ScheduleBuilderFields = { amount, unit, from, to: window.to };

  let rebuilt: ScheduleSpec;
  try {
    rebuilt = serializeSchedule(
      buildSchedule(fields, { id: expr.id, enabled: expr.enabled, context }),
    );
  } catch (err) {
    if (!(err instanceof ScheduleValidationError)) throw err;
    return { kind: "advanced", reason: err.message, spec };
  }

  if (!sameSpec(rebuilt, spec)) {
    return {
      kind: "advanced",
      reason: `"${hourText} ${minuteText} ${secondText}" (hour minute second) has no from/to/every equivalent`,
      spec,
    };
  }
  return { kind: "simple", fields };
}

function reverseHourWindow(hour: string): { from: number; to: number } {
  if (hour === "*" || /^\*\/\d+$/.test(hour)) return { from: 0, to: 0 };

  const range = /^(\d+)-(\d+)$/.exec(hour);
  if (range) return { from: Number(range[1]), to: Number(range[2]) };

  const wrapped = /^(\d+)-23,0-(\d+)$/.exec(hour);
  if (wrapped) return { from: Number(wrapped[1]), to: Number(wrapped[2]) };

  const list = /^(\d+),/.exec(hour);
  if (list) return { from: Number(list[1]), to: 0 };

  const single = /^(\d+)$/.exec(hour);
  if (single) return { from: Number(single[1]), to: Number(single[1]) };

  return { from: 0, to: 0 };
}

function reverseCadence(
  hour: string,
  minute: string,
  second: string,
): { amount: number; unit: IntervalUnit } {
  const secondStep = /^\*\/(\d+)$/.exec(second);
  if (second !== "0" && secondStep) {
    return { amount: Number(secondStep[1]), unit: "seconds" };
  }
  if (minute === "*") return { amount: 1, unit: "minutes" };
  if (minute === "0") {
    const hourStep = /^\*\/(\d+)$/.exec(hour);
    return { amount: hourStep ? Number(hourStep[1]) : 1, unit: "hours" };
  }
  const minuteStep = /^\*\/(\d+)$/.exec(minute);
  if (minuteStep) return { amount: Number(minuteStep[1]), unit: "minutes" };
  return { amount: 1, unit: "minutes" };
}

function sameSpec(a: ScheduleSpec, b: ScheduleSpec): boolean {
  if (a.type === "cron" && b.type === "cron") {
    return a.hour === b.hour && a.minute === b.minute && a.second === b.second;
  }
  return false;
}
