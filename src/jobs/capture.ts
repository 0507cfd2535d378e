import type { JobBody } from "../tasks/task-manager.ts";
import type { CameraSubject } from "../types/subject.ts";
import { isCancellation, runStep } from "./types.ts";
import type { JobDeps } from "./types.ts";

export interface CaptureResult {
  readonly filePath: string;
}

/** `{prefix}{YYYY-MM-DD_HH-MM-SS}.{ext}` in local time. */
export function captureFileName(prefix: string, at: Date, ext: string): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const date = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}-${pad(at.getMinutes())}-${pad(at.getSeconds())}`;
  return `${prefix}${date}_${time}.${ext}`;
}

/**
 * Fetch one frame from the camera, re-encode it and save it. Every attempt,
 * successful or not, lands in capture history.
 */
export function createCaptureJob(
  subject: CameraSubject,
  deps: JobDeps,
  firedAt: Date,
): JobBody<CaptureResult> {
  const logger = deps.logger.child({ module: "capture-job", subjectId: subject.id });
  const { camera } = subject;

  return async (ctx) => {
    try {
      ctx.report(0, 3, "Fetching image...");
      const raw = await runStep("fetch", () => deps.fetcher.fetch(camera.url, ctx.signal));

      ctx.report(1, 3, "Processing image...");
      const bytes = await runStep("process", () =>
        deps.processor.resize(raw, camera.resize, camera.quality),
      );

      const name = captureFileName(camera.prefix, firedAt, camera.ext);
      ctx.report(2, 3, `Saving ${name}...`);
      const filePath = await runStep("write", () => deps.sink.write(camera.outputDir, name, bytes));

      ctx.report(3, 3, `Saved ${filePath}`);
      deps.history.addCapture({
        subjectId: subject.id,
        subjectName: subject.name,
        time: firedAt.toISOString(),
        success: true,
        error: null,
        filePath,
      });
      logger.info("image_captured", { taskId: ctx.taskId, filePath });
      return { filePath };
    } catch (err) {
      if (!isCancellation(err)) {
        const message = err instanceof Error ? err.message : String(err);
        deps.history.addCapture({
          subjectId: subject.id,
          subjectName: subject.name,
          time: firedAt.toISOString(),
          success: false,
          error: message,
          filePath: null,
        });
      }
      throw err;
    }
  };
}
