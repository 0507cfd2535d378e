import type { JobFactory } from "../scheduler/scheduler.ts";
import { createCaptureJob } from "./capture.ts";
import { createExportJob } from "./export.ts";
import type { JobDeps } from "./types.ts";

export {
  TaskExecutionError,
  type ImageRef,
  type ImageFetcher,
  type ImageProcessor,
  type ImageSink,
  type ImageSource,
  type VideoEncoder,
  type VideoEncodeOptions,
  type EncodedVideo,
  type JobDeps,
} from "./types.ts";
export { createCaptureJob, captureFileName, type CaptureResult } from "./capture.ts";
export { createExportJob, exportFileName, type ExportResult, type VideoOutcome } from "./export.ts";
export { createRenderJob, type RenderRequest, type RenderResult } from "./render.ts";

/** Builds the job a subject's schedule fires: camera → capture, export → export. */
export function createJobFactory(deps: JobDeps): JobFactory {
  return (subject, firedAt) => {
    if (subject.kind === "camera") {
      return {
        kind: "capture",
        name: `Capture ${subject.name}`,
        body: createCaptureJob(subject, deps, firedAt),
      };
    }
    return {
      kind: "export",
      name: `Export ${subject.name}`,
      body: createExportJob(subject, deps),
    };
  };
}
