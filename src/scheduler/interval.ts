// ── Interval Schedules ──────────────────────────────────────────────────────
//
// A schedule anchored to a start instant that fires every `amount` units
// thereafter, independent of wall-clock alignment.

export const INTERVAL_UNITS = ["seconds", "minutes", "hours"] as const;
export type IntervalUnit = (typeof INTERVAL_UNITS)[number];

export const UNIT_MS: Record<IntervalUnit, number> = {
  seconds: 1_000,
  minutes: 60_000,
  hours: 3_600_000,
};

export interface IntervalTiming {
  readonly amount: number;
  readonly unit: IntervalUnit;
  readonly anchor: Date;
}

export function isIntervalUnit(value: unknown): value is IntervalUnit {
  return (
    typeof value === "string" &&
    (INTERVAL_UNITS as readonly string[]).includes(value)
  );
}

export function intervalPeriodMs(timing: IntervalTiming): number {
  return timing.amount * UNIT_MS[timing.unit];
}

/**
 * True when `instant` falls inside the tick window that starts at a sample
 * instant, i.e. `(instant - anchor) mod period < granularityMs`.
 */
export function intervalMatches(
  timing: IntervalTiming,
  instant: Date,
  granularityMs: number,
): boolean {
  const delta = instant.getTime() - timing.anchor.getTime();
  if (delta < 0) return false;
  return delta % intervalPeriodMs(timing) < granularityMs;
}

/**
 * The k-th sample instant: `anchor + k * period`.
 */
export function intervalSampleAt(timing: IntervalTiming, k: number): Date {
  return new Date(timing.anchor.getTime() + k * intervalPeriodMs(timing));
}

/**
 * First `count` sample instants at or after `from` (defaults to the anchor).
 */
export function intervalSamples(
  timing: IntervalTiming,
  count: number,
  from?: Date,
): Date[] {
  const first = from ? firstSampleIndexAtOrAfter(timing, from) : 0;
  const samples: Date[] = [];
  for (let k = first; k < first + count; k++) {
    samples.push(intervalSampleAt(timing, k));
  }
  return samples;
}

function firstSampleIndexAtOrAfter(timing: IntervalTiming, from: Date): number {
  const delta = from.getTime() - timing.anchor.getTime();
  if (delta <= 0) return 0;
  return Math.ceil(delta / intervalPeriodMs(timing));
}

/**
 * Next sample strictly after `after`.
 */
export function nextIntervalFire(timing: IntervalTiming, after: Date): Date {
  const delta = after.getTime() - timing.anchor.getTime();
  if (delta < 0) return new Date(timing.anchor);
  const k = Math.floor(delta / intervalPeriodMs(timing)) + 1;
  return intervalSampleAt(timing, k);
}
