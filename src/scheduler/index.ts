// ── Scheduler ────────────────────────────────────────────────────────────────
export {
  Scheduler,
  DEFAULT_SCHEDULER_CONFIG,
  type SchedulerConfig,
  type SchedulerDeps,
  type JobFactory,
  type ScheduledJob,
  type TickResult,
  type FiredEntry,
  type SkipEntry,
  type SkipReason,
  type RunNowResult,
  type UpcomingRun,
} from "./scheduler.ts";

// ── Schedule Expressions ─────────────────────────────────────────────────────
export {
  ScheduleValidationError,
  DEFAULT_CRON_FIELDS,
  createCronSchedule,
  createIntervalSchedule,
  parseSchedule,
  serializeSchedule,
  matchesSchedule,
  nextFireTime,
  previewSamples,
  type CronSchedule,
  type IntervalSchedule,
  type ScheduleExpression,
  type ScheduleSpec,
  type ScheduleInput,
} from "./expression.ts";

// ── Cron Fields ──────────────────────────────────────────────────────────────
export {
  CronParseError,
  parseField,
  fieldMatches,
  expandField,
  serializeField,
  isWildcard,
  SECOND_RANGE,
  MINUTE_RANGE,
  HOUR_RANGE,
  type CronField,
  type FieldRange,
} from "./cron.ts";

// ── Intervals ────────────────────────────────────────────────────────────────
export {
  INTERVAL_UNITS,
  intervalSamples,
  nextIntervalFire,
  type IntervalUnit,
} from "./interval.ts";

// ── Builder ──────────────────────────────────────────────────────────────────
export {
  buildHourRange,
  buildSchedule,
  reverseSchedule,
  type ScheduleBuilderFields,
  type ReversedSchedule,
} from "./builder.ts";
