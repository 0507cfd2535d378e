import type { JobBody, JobContext } from "../tasks/task-manager.ts";
import { DEFAULT_IMAGE_EXT, DEFAULT_VIDEO_CODEC, DEFAULT_VIDEO_FPS } from "../types/subject.ts";
import { TaskExecutionError, runStep } from "./types.ts";
import type { JobDeps } from "./types.ts";

// ── Request ─────────────────────────────────────────────────────────────────

export interface RenderRequest {
  readonly inputDir: string;
  /** Defaults to `inputDir` with an .mp4 extension. */
  readonly output?: string;
  readonly fps?: number;
  readonly codec?: string;
  /** Frame extension; other files in `inputDir` are ignored. */
  readonly ext?: string;
  readonly name?: string;
}

export interface RenderResult {
  readonly outputPath: string;
  readonly videoId: string;
  readonly fileSize: number;
}

// ── Shared Encode Step ──────────────────────────────────────────────────────

export interface EncodeSpec {
  readonly inputDir: string;
  readonly output: string;
  readonly fps: number;
  readonly codec: string;
  readonly name: string;
}

export function defaultVideoPath(dir: string): string {
  return `${dir.replace(/[\\/]+$/, "")}.mp4`;
}

/** Encode frames, reporting per-frame progress, and record the video. */
export async function encodeVideo(
  deps: Pick<JobDeps, "encoder" | "history">,
  ctx: JobContext,
  frames: readonly string[],
  spec: EncodeSpec,
): Promise<RenderResult> {
  ctx.report(0, frames.length, `Encoding ${frames.length} frames...`);
  const video = await runStep("encode", () =>
    deps.encoder.encode(
      frames,
      { output: spec.output, fps: spec.fps, codec: spec.codec, signal: ctx.signal },
      (current, total) => ctx.report(current, total, `Encoding frame ${current}/${total}`),
    ),
  );

  const videoId = deps.history.addVideo({
    name: spec.name,
    inputDir: spec.inputDir,
    outputPath: video.path,
    fps: spec.fps,
    codec: spec.codec,
    fileSize: video.sizeBytes,
  });
  return { outputPath: video.path, videoId, fileSize: video.sizeBytes };
}

// ── Render Job ──────────────────────────────────────────────────────────────

/** Render every frame in a directory, in file-name order, to one video. */
export function createRenderJob(request: RenderRequest, deps: JobDeps): JobBody<RenderResult> {
  const logger = deps.logger.child({ module: "render-job" });
  const ext = (request.ext ?? DEFAULT_IMAGE_EXT).toLowerCase();
  const output = request.output ?? defaultVideoPath(request.inputDir);

  return async (ctx) => {
    ctx.report(0, 0, "Listing frames...");
    const refs = await runStep("list", () => deps.source.list(request.inputDir));
    const frames = refs
      .filter((ref) => ref.name.toLowerCase().endsWith(`.${ext}`))
      .map((ref) => ref.path)
      .sort();

    if (frames.length === 0) {
      throw new TaskExecutionError(`No .${ext} frames found in ${request.inputDir}`, "list");
    }

    const result = await encodeVideo(deps, ctx, frames, {
      inputDir: request.inputDir,
      output,
      fps: request.fps ?? DEFAULT_VIDEO_FPS,
      codec: request.codec ?? DEFAULT_VIDEO_CODEC,
      name: request.name ?? baseName(output),
    });

    logger.info("video_rendered", {
      taskId: ctx.taskId,
      frames: frames.length,
      outputPath: result.outputPath,
      fileSize: result.fileSize,
    });
    return result;
  };
}

function baseName(path: string): string {
  const file = path.split(/[\\/]/).pop() ?? path;
  const dot = file.lastIndexOf(".");
  return dot > 0 ? file.slice(0, dot) : file;
}
