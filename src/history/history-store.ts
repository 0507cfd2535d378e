import { getRandomValues } from "node:crypto";

// ── Records ─────────────────────────────────────────────────────────────────

export interface CaptureRecord {
  readonly subjectId: string;
  readonly subjectName: string;
  readonly time: string;
  readonly success: boolean;
  readonly error: string | null;
  readonly filePath: string | null;
}

export interface ExportRecord {
  readonly id: string;
  readonly createdAt: string;
  readonly name: string;
  readonly subjectId: string | null;
  readonly inputDir: string;
  readonly outputDir: string;
  readonly hour: string;
  readonly minute: string;
  readonly imageCount: number;
}

export interface VideoRecord {
  readonly id: string;
  readonly createdAt: string;
  readonly name: string;
  readonly inputDir: string;
  readonly outputPath: string;
  readonly fps: number;
  readonly codec: string;
  readonly fileSize: number;
}

export type NewExportRecord = Omit<ExportRecord, "id" | "createdAt">;
export type NewVideoRecord = Omit<VideoRecord, "id" | "createdAt">;

// ── Store ───────────────────────────────────────────────────────────────────

/** Newest-first history of captures, exports and rendered videos. */
export interface HistoryStore {
  addCapture(record: CaptureRecord): void;
  getCaptures(limit?: number): CaptureRecord[];

  addExport(record: NewExportRecord): string;
  getExports(): ExportRecord[];
  getExport(id: string): ExportRecord | null;
  deleteExport(id: string): boolean;

  addVideo(record: NewVideoRecord): string;
  getVideos(): VideoRecord[];
  getVideo(id: string): VideoRecord | null;
  deleteVideo(id: string): boolean;
}

export interface InMemoryHistoryConfig {
  readonly maxCaptures: number;
}

export const DEFAULT_HISTORY_CONFIG: InMemoryHistoryConfig = {
  maxCaptures: 200,
};

export interface InMemoryHistoryDeps {
  readonly config?: Partial<InMemoryHistoryConfig>;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
}

export class InMemoryHistoryStore implements HistoryStore {
  private readonly config: InMemoryHistoryConfig;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  private captures: CaptureRecord[] = [];
  private exports: ExportRecord[] = [];
  private videos: VideoRecord[] = [];

  constructor(deps: InMemoryHistoryDeps = {}) {
    this.config = { ...DEFAULT_HISTORY_CONFIG, ...deps.config };
    this.clock = deps.clock ?? (() => new Date());
    this.idGenerator = deps.idGenerator ?? generateRecordId;
  }

  // ── Captures ────────────────────────────────────────────────────────────

  addCapture(record: CaptureRecord): void {
    this.captures.unshift(record);
    if (this.captures.length > this.config.maxCaptures) {
      this.captures.length = this.config.maxCaptures;
    }
  }

  getCaptures(limit?: number): CaptureRecord[] {
    return limit === undefined ? [...this.captures] : this.captures.slice(0, limit);
  }

  // ── Exports ─────────────────────────────────────────────────────────────

  addExport(record: NewExportRecord): string {
    const id = uniqueId(this.idGenerator(), (candidate) =>
      this.exports.some((r) => r.id === candidate),
    );
    this.exports.unshift({ ...record, id, createdAt: this.clock().toISOString() });
    return id;
  }

  getExports(): ExportRecord[] {
    return [...this.exports];
  }

  getExport(id: string): ExportRecord | null {
    return this.exports.find((r) => r.id === id) ?? null;
  }

  deleteExport(id: string): boolean {
    const before = this.exports.length;
    this.exports = this.exports.filter((r) => r.id !== id);
    return this.exports.length < before;
  }

  // ── Videos ──────────────────────────────────────────────────────────────

  addVideo(record: NewVideoRecord): string {
    const id = uniqueId(this.idGenerator(), (candidate) =>
      this.videos.some((r) => r.id === candidate),
    );
    this.videos.unshift({ ...record, id, createdAt: this.clock().toISOString() });
    return id;
  }

  getVideos(): VideoRecord[] {
    return [...this.videos];
  }

  getVideo(id: string): VideoRecord | null {
    return this.videos.find((r) => r.id === id) ?? null;
  }

  deleteVideo(id: string): boolean {
    const before = this.videos.length;
    this.videos = this.videos.filter((r) => r.id !== id);
    return this.videos.length < before;
  }
}

/** 16-char hex record ID. */
export function generateRecordId(): string {
  const bytes = getRandomValues(new Uint8Array(8));
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}

function uniqueId(candidate: string, taken: (id: string) => boolean): string {
  if (!taken(candidate)) return candidate;
  let n = 2;
  while (taken(`${candidate}-${n}`)) n++;
  return `${candidate}-${n}`;
}
