import type { JobContext } from "../../tasks/task-manager.ts";
import { TaskCancelledError } from "../../tasks/errors.ts";
import { InMemoryHistoryStore } from "../../history/history-store.ts";
import { BufferLogger } from "../../observability/logger.ts";
import type { ResizeSpec } from "../../types/subject.ts";
import type {
  EncodedVideo,
  ImageFetcher,
  ImageProcessor,
  ImageRef,
  ImageSink,
  ImageSource,
  JobDeps,
  VideoEncodeOptions,
  VideoEncoder,
} from "../types.ts";

// ── Job Context ─────────────────────────────────────────────────────────────

export interface TestContext extends JobContext {
  readonly reports: Array<{ current: number; total: number; message: string | undefined }>;
  cancel(): void;
}

export function createTestContext(taskId = "task-1"): TestContext {
  const controller = new AbortController();
  const reports: TestContext["reports"] = [];
  const ctx: TestContext = {
    taskId,
    signal: controller.signal,
    reports,
    report(current, total, message) {
      if (controller.signal.aborted) throw new TaskCancelledError(taskId);
      reports.push({ current, total, message });
    },
    isCancelled: () => controller.signal.aborted,
    throwIfCancelled() {
      if (controller.signal.aborted) throw new TaskCancelledError(taskId);
    },
    cancel: () => controller.abort(),
  };
  return ctx;
}

// ── Collaborators ───────────────────────────────────────────────────────────

export class FakeFetcher implements ImageFetcher {
  readonly calls: string[] = [];
  error: Error | null = null;

  async fetch(url: string): Promise<Uint8Array> {
    this.calls.push(url);
    if (this.error) throw this.error;
    return new TextEncoder().encode(`image from ${url}`);
  }
}

export class FakeProcessor implements ImageProcessor {
  readonly calls: Array<{ size: ResizeSpec | null; quality: number }> = [];

  async resize(bytes: Uint8Array, size: ResizeSpec | null, quality: number): Promise<Uint8Array> {
    this.calls.push({ size, quality });
    return bytes;
  }
}

export class MemorySink implements ImageSink {
  readonly files = new Map<string, string>();
  onWrite: (path: string) => void = () => {};

  async write(dir: string, name: string, bytes: Uint8Array): Promise<string> {
    const path = `${dir}/${name}`;
    this.files.set(path, new TextDecoder().decode(bytes));
    this.onWrite(path);
    return path;
  }
}

export class MemorySource implements ImageSource {
  readonly refs: ImageRef[] = [];

  constructor(private readonly dir: string) {}

  add(name: string, timestamp: Date): this {
    this.refs.push({ path: `${this.dir}/${name}`, name, timestamp });
    return this;
  }

  async list(dir: string): Promise<ImageRef[]> {
    if (dir !== this.dir) throw new Error(`ENOENT: no such directory ${dir}`);
    return [...this.refs];
  }

  async read(ref: ImageRef): Promise<Uint8Array> {
    return new TextEncoder().encode(ref.name);
  }
}

export class FakeEncoder implements VideoEncoder {
  readonly calls: Array<{ frames: readonly string[]; options: VideoEncodeOptions }> = [];
  error: Error | null = null;

  async encode(
    frames: readonly string[],
    options: VideoEncodeOptions,
    onProgress: (current: number, total: number) => void,
  ): Promise<EncodedVideo> {
    this.calls.push({ frames, options });
    if (this.error) throw this.error;
    frames.forEach((_, i) => onProgress(i + 1, frames.length));
    return { path: options.output, sizeBytes: 2048 };
  }
}

// ── Deps ────────────────────────────────────────────────────────────────────

export interface TestJobDeps extends JobDeps {
  readonly fetcher: FakeFetcher;
  readonly processor: FakeProcessor;
  readonly sink: MemorySink;
  readonly source: MemorySource;
  readonly encoder: FakeEncoder;
  readonly history: InMemoryHistoryStore;
  readonly logger: BufferLogger;
}

export function createTestJobDeps(sourceDir = "/data/garden"): TestJobDeps {
  let n = 0;
  return {
    fetcher: new FakeFetcher(),
    processor: new FakeProcessor(),
    sink: new MemorySink(),
    source: new MemorySource(sourceDir),
    encoder: new FakeEncoder(),
    history: new InMemoryHistoryStore({
      clock: () => new Date("2026-03-02T00:00:00.000Z"),
      idGenerator: () => `rec-${++n}`,
    }),
    logger: new BufferLogger(),
  };
}
