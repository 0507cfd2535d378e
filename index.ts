/**
 * lapse-scheduler
 *
 * Fires timelapse capture and export jobs on cron and interval schedules and
 * runs them as cancellable, progress-reporting background tasks.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
