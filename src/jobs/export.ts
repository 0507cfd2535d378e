import type { JobBody } from "../tasks/task-manager.ts";
import type { ExportSubject } from "../types/subject.ts";
import { compileTimeFilter, selectItems } from "../filter/time-filter.ts";
import type { ImageRef, JobDeps } from "./types.ts";
import { isCancellation, runStep } from "./types.ts";
import { defaultVideoPath, encodeVideo } from "./render.ts";

// ── Result ──────────────────────────────────────────────────────────────────

export type VideoOutcome =
  | {
      readonly created: true;
      readonly path: string;
      readonly videoId: string;
      readonly sizeBytes: number;
    }
  | { readonly created: false; readonly error: string };

export interface ExportResult {
  readonly imageCount: number;
  readonly outputDir: string;
  readonly exportId: string;
  /** Null when no video was requested or nothing was exported. */
  readonly video: VideoOutcome | null;
}

export const EXPORT_INDEX_PADDING = 5;

/** `{prefix}{index zero-padded to 5}.{ext}` */
export function exportFileName(prefix: string, index: number, ext: string): string {
  return `${prefix}${String(index).padStart(EXPORT_INDEX_PADDING, "0")}.${ext}`;
}

// ── Export Job ──────────────────────────────────────────────────────────────

/**
 * Select images from the subject's input directory with its time filter,
 * write them as a numbered sequence, and optionally chain a video render.
 * A failed render is reported in the result; the export itself still
 * completes.
 */
export function createExportJob(subject: ExportSubject, deps: JobDeps): JobBody<ExportResult> {
  const logger = deps.logger.child({ module: "export-job", subjectId: subject.id });
  const target = subject.export;
  const filter = compileTimeFilter(target.filter);

  return async (ctx) => {
    ctx.report(0, 0, "Loading image set...");
    const refs = await runStep("list", () => deps.source.list(target.inputDir));

    ctx.report(0, 0, "Filtering images by schedule...");
    const selected = selectItems<ImageRef>(
      refs.map((ref) => ({ timestamp: ref.timestamp, payload: ref })),
      filter,
    );
    const total = selected.length;

    const written: string[] = [];
    if (total > 0) {
      ctx.report(0, total, `Writing ${total} images...`);
      for (const [i, ref] of selected.entries()) {
        ctx.throwIfCancelled();
        const raw = await runStep("read", () => deps.source.read(ref));
        const bytes = await runStep("process", () =>
          deps.processor.resize(raw, target.resize, target.quality),
        );
        const name = exportFileName(target.prefix, i, target.ext);
        written.push(await runStep("write", () => deps.sink.write(target.outputDir, name, bytes)));
        ctx.report(i + 1, total, `Wrote ${name}`);
      }
    } else {
      ctx.report(0, 0, "No images matched the time filter.");
    }

    const exportId = deps.history.addExport({
      name: subject.name,
      subjectId: subject.id,
      inputDir: target.inputDir,
      outputDir: target.outputDir,
      hour: target.filter.hour,
      minute: target.filter.minute,
      imageCount: total,
    });
    logger.info("export_written", { taskId: ctx.taskId, imageCount: total, exportId });

    let video: VideoOutcome | null = null;
    if (target.video && total > 0) {
      ctx.report(total, total, "Starting video render...");
      try {
        const rendered = await encodeVideo(deps, ctx, written, {
          inputDir: target.outputDir,
          output: target.video.output ?? defaultVideoPath(target.outputDir),
          fps: target.video.fps,
          codec: target.video.codec,
          name: subject.name,
        });
        video = {
          created: true,
          path: rendered.outputPath,
          videoId: rendered.videoId,
          sizeBytes: rendered.fileSize,
        };
      } catch (err) {
        if (isCancellation(err)) throw err;
        const message = err instanceof Error ? err.message : String(err);
        logger.warn("export_video_failed", { taskId: ctx.taskId, error: message });
        video = { created: false, error: message };
      }
    }

    return { imageCount: total, outputDir: target.outputDir, exportId, video };
  };
}
