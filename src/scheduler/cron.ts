// ── Cron Sub-expression Grammar ─────────────────────────────────────────────
//
// One field of a second/minute/hour schedule, over a fixed integer range.
// Supports: *, */N, A-B, A-B/N, A/N (= A-max/N), single values, and comma
// lists of any of these. A window that crosses the top of the range is
// written as two ranges, e.g. hours "22-23,0-2".

// ── Ranges ──────────────────────────────────────────────────────────────────

export interface FieldRange {
  readonly name: string;
  readonly min: number;
  readonly max: number;
}

export const SECOND_RANGE: FieldRange = { name: "second", min: 0, max: 59 };
export const MINUTE_RANGE: FieldRange = { name: "minute", min: 0, max: 59 };
export const HOUR_RANGE: FieldRange = { name: "hour", min: 0, max: 23 };

// ── Types ───────────────────────────────────────────────────────────────────

export type FieldTerm =
  | { readonly type: "any"; readonly step: number }
  | {
      readonly type: "range";
      readonly start: number;
      readonly end: number;
      readonly step: number;
    }
  | { readonly type: "value"; readonly value: number };

export interface CronField {
  readonly range: FieldRange;
  readonly terms: readonly FieldTerm[];
}

// ── Error ───────────────────────────────────────────────────────────────────

export class CronParseError extends Error {
  override readonly name = "CronParseError";

  constructor(
    message: string,
    public readonly expression: string,
    public readonly field: string,
  ) {
    super(message);
  }
}

// ── Parse ───────────────────────────────────────────────────────────────────

/**
 * Parse one cron field (e.g. "*\/15", "22-23,0-2") over `range`.
 * Throws CronParseError for malformed text, out-of-range values,
 * reversed ranges and non-positive steps.
 */
export function parseField(text: string, range: FieldRange): CronField {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new CronParseError(
      `Empty expression in field "${range.name}"`,
      text,
      range.name,
    );
  }

  const terms = trimmed.split(",").map((part) => {
    const term = part.trim();
    if (!term) {
      throw new CronParseError(
        `Empty value in field "${range.name}"`,
        text,
        range.name,
      );
    }
    return parseTerm(term, range, text);
  });

  return Object.freeze({ range, terms: Object.freeze(terms) });
}

function parseTerm(term: string, range: FieldRange, text: string): FieldTerm {
  const stepParts = term.split("/");
  if (stepParts.length > 2) {
    throw new CronParseError(
      `Invalid step expression "${term}" in field "${range.name}"`,
      text,
      range.name,
    );
  }

  const [base = "", rawStep] = stepParts;
  const step = rawStep === undefined ? null : parseStep(rawStep, range, text);

  if (base === "*") {
    return { type: "any", step: step ?? 1 };
  }

  if (base.includes("-")) {
    const bounds = base.split("-");
    if (bounds.length !== 2) {
      throw new CronParseError(
        `Invalid range "${base}" in field "${range.name}"`,
        text,
        range.name,
      );
    }
    const start = parseValue(bounds[0] ?? "", range, text);
    const end = parseValue(bounds[1] ?? "", range, text);
    if (start > end) {
      throw new CronParseError(
        `Range start ${start} > end ${end} in field "${range.name}"; ` +
          `write a wrapping window as two ranges (e.g. "${start}-${range.max},${range.min}-${end}")`,
        text,
        range.name,
      );
    }
    return { type: "range", start, end, step: step ?? 1 };
  }

  const value = parseValue(base, range, text);
  if (step !== null) {
    return { type: "range", start: value, end: range.max, step };
  }
  return { type: "value", value };
}

function parseStep(raw: string, range: FieldRange, text: string): number {
  const step = parseInteger(raw, range, text);
  if (step <= 0) {
    throw new CronParseError(
      `Step value must be positive in field "${range.name}", got ${step}`,
      text,
      range.name,
    );
  }
  return step;
}

function parseValue(raw: string, range: FieldRange, text: string): number {
  const value = parseInteger(raw, range, text);
  if (value < range.min || value > range.max) {
    throw new CronParseError(
      `Value ${value} out of range [${range.min}-${range.max}] in field "${range.name}"`,
      text,
      range.name,
    );
  }
  return value;
}

function parseInteger(raw: string, range: FieldRange, text: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CronParseError(
      `Non-numeric value "${raw}" in field "${range.name}"`,
      text,
      range.name,
    );
  }
  return parseInt(raw, 10);
}

// ── Match ───────────────────────────────────────────────────────────────────

/**
 * Exact membership test. Works on the terms directly, so it never depends on
 * an enumerated (and possibly capped) value list.
 */
export function fieldMatches(field: CronField, value: number): boolean {
  if (!Number.isInteger(value)) return false;
  if (value < field.range.min || value > field.range.max) return false;
  return field.terms.some((term) => termMatches(term, value, field.range));
}

function termMatches(term: FieldTerm, value: number, range: FieldRange): boolean {
  switch (term.type) {
    case "any":
      return (value - range.min) % term.step === 0;
    case "range":
      return (
        value >= term.start &&
        value <= term.end &&
        (value - term.start) % term.step === 0
      );
    case "value":
      return value === term.value;
  }
}

// ── Expand ──────────────────────────────────────────────────────────────────

/**
 * Enumerate the values a field selects, ascending and de-duplicated,
 * capped at `maxItems`. Used for previews and slot generation only.
 */
export function expandField(
  field: CronField,
  maxItems: number = Number.POSITIVE_INFINITY,
): number[] {
  const values: number[] = [];
  for (let v = field.range.min; v <= field.range.max; v++) {
    if (values.length >= maxItems) break;
    if (fieldMatches(field, v)) values.push(v);
  }
  return values;
}

// ── Serialize ───────────────────────────────────────────────────────────────

/**
 * Canonical text for a parsed field. `parseField(serializeField(f))` yields
 * a field with identical terms.
 */
export function serializeField(field: CronField): string {
  return field.terms.map(serializeTerm).join(",");
}

function serializeTerm(term: FieldTerm): string {
  switch (term.type) {
    case "any":
      return term.step === 1 ? "*" : `*/${term.step}`;
    case "range": {
      const span = `${term.start}-${term.end}`;
      return term.step === 1 ? span : `${span}/${term.step}`;
    }
    case "value":
      return String(term.value);
  }
}

/**
 * True when the field selects every value in its range.
 */
export function isWildcard(field: CronField): boolean {
  return field.terms.some((t) => t.type === "any" && t.step === 1);
}
