import type { Logger } from "../observability/logger.ts";
import type { HistoryStore } from "../history/history-store.ts";
import type { ResizeSpec } from "../types/subject.ts";
import { TaskCancelledError } from "../tasks/errors.ts";

// ── Collaborators ───────────────────────────────────────────────────────────

/** A stored image together with the instant it was taken. */
export interface ImageRef {
  readonly path: string;
  readonly name: string;
  readonly timestamp: Date;
}

export interface ImageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Uint8Array>;
}

export interface ImageProcessor {
  /** Re-encode at `quality`, resizing first when `size` is given. */
  resize(bytes: Uint8Array, size: ResizeSpec | null, quality: number): Promise<Uint8Array>;
}

export interface ImageSink {
  /** Returns the path the image was written to. */
  write(dir: string, name: string, bytes: Uint8Array): Promise<string>;
}

export interface ImageSource {
  list(dir: string): Promise<ImageRef[]>;
  read(ref: ImageRef): Promise<Uint8Array>;
}

export interface VideoEncodeOptions {
  readonly output: string;
  readonly fps: number;
  readonly codec: string;
  readonly signal?: AbortSignal;
}

export interface EncodedVideo {
  readonly path: string;
  readonly sizeBytes: number;
}

export interface VideoEncoder {
  encode(
    frames: readonly string[],
    options: VideoEncodeOptions,
    onProgress: (current: number, total: number) => void,
  ): Promise<EncodedVideo>;
}

export interface JobDeps {
  readonly fetcher: ImageFetcher;
  readonly processor: ImageProcessor;
  readonly sink: ImageSink;
  readonly source: ImageSource;
  readonly encoder: VideoEncoder;
  readonly history: HistoryStore;
  readonly logger: Logger;
}

// ── Errors ──────────────────────────────────────────────────────────────────

/** A collaborator failed inside a job body. Recorded on the task, never retried. */
export class TaskExecutionError extends Error {
  override readonly name = "TaskExecutionError";

  constructor(
    message: string,
    public readonly step: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isCancellation(err: unknown): boolean {
  return (
    err instanceof TaskCancelledError ||
    (err instanceof Error && err.name === "AbortError")
  );
}

/**
 * Run one collaborator call, wrapping its failure in TaskExecutionError.
 * Cancellation passes through untouched.
 */
export async function runStep<T>(step: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isCancellation(err) || err instanceof TaskExecutionError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new TaskExecutionError(`${step} failed: ${message}`, step, { cause: err });
  }
}
