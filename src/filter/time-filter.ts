import {
  CronParseError,
  HOUR_RANGE,
  MINUTE_RANGE,
  SECOND_RANGE,
  expandField,
  fieldMatches,
  parseField,
} from "../scheduler/cron.ts";
import type { CronField } from "../scheduler/cron.ts";

// ── Types ───────────────────────────────────────────────────────────────────

/** Local calendar date, "YYYY-MM-DD". */
export type DateKey = string;

export type DateSpan =
  | { readonly kind: "all" }
  | { readonly kind: "single"; readonly date: DateKey }
  | { readonly kind: "range"; readonly from?: DateKey; readonly to?: DateKey }
  | { readonly kind: "selected"; readonly dates: readonly DateKey[] };

export const FILTER_MODES = ["exact", "nearest"] as const;
export type FilterMode = (typeof FILTER_MODES)[number];

export interface TimeFilterSpec {
  readonly span: DateSpan;
  readonly hour: string;
  readonly minute: string;
  /** Seconds of each slot instant in nearest mode. Defaults to "0". */
  readonly second?: string;
  readonly mode: FilterMode;
  /** Nearest-mode search window around each slot. Defaults to 5 minutes. */
  readonly maxDistanceMinutes?: number;
}

export interface TimedItem<T> {
  readonly timestamp: Date;
  readonly payload: T;
}

export interface CompiledTimeFilter {
  readonly spec: TimeFilterSpec;
  readonly hour: CronField;
  readonly minute: CronField;
  readonly second: CronField;
  readonly maxDistanceMs: number;
  includesDate(date: DateKey): boolean;
}

export const DEFAULT_MAX_DISTANCE_MINUTES = 5;

// ── Error ───────────────────────────────────────────────────────────────────

export class TimeFilterError extends Error {
  override readonly name = "TimeFilterError";

  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
  }
}

// ── Compile ─────────────────────────────────────────────────────────────────

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validate a filter spec up front. Every mask, date and window problem is
 * reported here, before any item is scanned.
 */
export function compileTimeFilter(spec: TimeFilterSpec): CompiledTimeFilter {
  const hour = parseMask(spec.hour, HOUR_RANGE);
  const minute = parseMask(spec.minute, MINUTE_RANGE);
  const second = parseMask(spec.second ?? "0", SECOND_RANGE);

  if (!(FILTER_MODES as readonly string[]).includes(spec.mode)) {
    throw new TimeFilterError(
      `Filter mode must be one of: ${FILTER_MODES.join(", ")}. Got "${spec.mode}"`,
      "mode",
    );
  }

  const windowMinutes = spec.maxDistanceMinutes ?? DEFAULT_MAX_DISTANCE_MINUTES;
  if (!Number.isFinite(windowMinutes) || windowMinutes < 0) {
    throw new TimeFilterError(
      `maxDistanceMinutes must be a non-negative number, got ${windowMinutes}`,
      "maxDistanceMinutes",
    );
  }

  return Object.freeze({
    spec,
    hour,
    minute,
    second,
    maxDistanceMs: windowMinutes * 60_000,
    includesDate: compileSpan(spec.span),
  });
}

function parseMask(text: string, range: typeof HOUR_RANGE): CronField {
  try {
    return parseField(text, range);
  } catch (err) {
    if (err instanceof CronParseError) {
      throw new TimeFilterError(err.message, range.name);
    }
    throw err;
  }
}

function compileSpan(span: DateSpan): (date: DateKey) => boolean {
  switch (span.kind) {
    case "all":
      return () => true;
    case "single": {
      assertDateKey(span.date, "span.date");
      return (date) => date === span.date;
    }
    case "range": {
      if (span.from !== undefined) assertDateKey(span.from, "span.from");
      if (span.to !== undefined) assertDateKey(span.to, "span.to");
      if (span.from !== undefined && span.to !== undefined && span.from > span.to) {
        throw new TimeFilterError(
          `Date range start ${span.from} is after end ${span.to}`,
          "span",
        );
      }
      const { from, to } = span;
      return (date) =>
        (from === undefined || date >= from) && (to === undefined || date <= to);
    }
    case "selected": {
      for (const date of span.dates) assertDateKey(date, "span.dates");
      const selected = new Set(span.dates);
      return (date) => selected.has(date);
    }
  }
}

function assertDateKey(value: string, field: string): void {
  if (!DATE_KEY.test(value) || Number.isNaN(new Date(`${value}T00:00:00`).getTime())) {
    throw new TimeFilterError(`"${field}" must be a YYYY-MM-DD date, got "${value}"`, field);
  }
}

// ── Select ──────────────────────────────────────────────────────────────────

interface IndexedItem<T> {
  readonly item: TimedItem<T>;
  readonly time: number;
  readonly index: number;
}

/**
 * Select the payloads of `items` that pass the filter, in timestamp order
 * (input order among equal timestamps).
 *
 * - exact: items whose minute-truncated timestamp is a slot.
 * - nearest: for each slot, ascending, the closest not-yet-chosen item
 *   within the search window; ties go to the earlier timestamp, then to the
 *   earlier input position.
 */
export function selectItems<T>(
  items: readonly TimedItem<T>[],
  filter: TimeFilterSpec | CompiledTimeFilter,
): T[] {
  const compiled = isCompiled(filter) ? filter : compileTimeFilter(filter);
  if (items.length === 0) return [];

  const candidates: IndexedItem<T>[] = [];
  items.forEach((item, index) => {
    if (compiled.includesDate(toDateKey(item.timestamp))) {
      candidates.push({ item, time: item.timestamp.getTime(), index });
    }
  });
  candidates.sort(byTimeThenIndex);

  const chosen =
    compiled.spec.mode === "exact"
      ? candidates.filter(({ item }) => isExactSlot(compiled, item.timestamp))
      : selectNearest(compiled, candidates);

  return chosen.sort(byTimeThenIndex).map(({ item }) => item.payload);
}

function isCompiled(
  filter: TimeFilterSpec | CompiledTimeFilter,
): filter is CompiledTimeFilter {
  return "includesDate" in filter;
}

function isExactSlot(filter: CompiledTimeFilter, timestamp: Date): boolean {
  return (
    fieldMatches(filter.hour, timestamp.getHours()) &&
    fieldMatches(filter.minute, timestamp.getMinutes())
  );
}

function selectNearest<T>(
  filter: CompiledTimeFilter,
  candidates: readonly IndexedItem<T>[],
): IndexedItem<T>[] {
  const dates = [...new Set(candidates.map((c) => toDateKey(c.item.timestamp)))];
  const slots = dates.flatMap((date) => generateSlots(filter, date));

  const used = new Set<number>();
  const chosen: IndexedItem<T>[] = [];

  for (const slot of slots) {
    const pick = nearestUnused(candidates, used, slot.getTime());
    if (pick === null) continue;
    const candidate = candidates[pick];
    if (!candidate) continue;
    if (Math.abs(candidate.time - slot.getTime()) > filter.maxDistanceMs) continue;
    used.add(pick);
    chosen.push(candidate);
  }

  return chosen;
}

/**
 * Index of the unused candidate closest to `target`, scanning outward from
 * the insertion point. Candidates are sorted by (time, index), so the first
 * unused item on each side is the best one on that side.
 */
function nearestUnused<T>(
  candidates: readonly IndexedItem<T>[],
  used: ReadonlySet<number>,
  target: number,
): number | null {
  const insertAt = lowerBound(candidates, target);

  let left = insertAt - 1;
  while (left >= 0 && used.has(left)) left--;
  // Walk back to the earliest input among equal timestamps on the left side
  while (left > 0 && !used.has(left - 1) && candidates[left - 1]?.time === candidates[left]?.time) {
    left--;
  }

  let right = insertAt;
  while (right < candidates.length && used.has(right)) right++;

  const leftItem = left >= 0 ? candidates[left] : undefined;
  const rightItem = right < candidates.length ? candidates[right] : undefined;

  if (!leftItem && !rightItem) return null;
  if (!leftItem) return right;
  if (!rightItem) return left;

  const leftDistance = target - leftItem.time;
  const rightDistance = rightItem.time - target;
  // Equal distance: the left item has the earlier timestamp
  return leftDistance <= rightDistance ? left : right;
}

function lowerBound<T>(candidates: readonly IndexedItem<T>[], target: number): number {
  let lo = 0;
  let hi = candidates.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const midItem = candidates[mid];
    if (midItem !== undefined && midItem.time < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

// ── Slots ───────────────────────────────────────────────────────────────────

/**
 * Every target instant on `date`: hour × minute × second, ascending.
 */
export function generateSlots(filter: CompiledTimeFilter, date: DateKey): Date[] {
  const [year = 0, month = 1, day = 1] = date.split("-").map(Number);
  const hours = expandField(filter.hour);
  const minutes = expandField(filter.minute);
  const seconds = expandField(filter.second);

  const slots: Date[] = [];
  for (const h of hours) {
    for (const m of minutes) {
      for (const s of seconds) {
        slots.push(new Date(year, month - 1, day, h, m, s));
      }
    }
  }
  return slots;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

export function toDateKey(date: Date): DateKey {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function byTimeThenIndex<T>(a: IndexedItem<T>, b: IndexedItem<T>): number {
  return a.time - b.time || a.index - b.index;
}
