import { getRandomValues } from "node:crypto";
import type { TaskKind } from "../types/task.ts";

/**
 * Generate a task ID: {kind}-{YYYYMMDD}-{12-char-hex}
 * Example: "capture-20260219-a1b2c3d4e5f6"
 */
export function generateTaskId(kind: TaskKind, now: Date = new Date()): string {
  const dateStr = now.toISOString().slice(0, 10).replace(/-/g, "");
  const bytes = getRandomValues(new Uint8Array(6));
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
  return `${kind}-${dateStr}-${hex}`;
}
