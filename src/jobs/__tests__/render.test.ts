import { describe, expect, it } from "vitest";
import { createRenderJob, defaultVideoPath } from "../render.ts";
import { TaskExecutionError } from "../types.ts";
import { createTestContext, createTestJobDeps } from "./helpers.ts";

describe("defaultVideoPath", () => {
  it("puts the video beside the frame directory", () => {
    expect(defaultVideoPath("/exports/garden")).toBe("/exports/garden.mp4");
    expect(defaultVideoPath("/exports/garden/")).toBe("/exports/garden.mp4");
  });
});

describe("createRenderJob", () => {
  it("encodes matching frames in name order and records the video", async () => {
    const deps = createTestJobDeps("/exports/garden");
    const t = new Date(2026, 2, 1, 8, 0);
    deps.source.add("00001.jpg", t).add("notes.txt", t).add("00000.jpg", t);
    const ctx = createTestContext();

    const result = await createRenderJob({ inputDir: "/exports/garden", fps: 12 }, deps)(ctx);

    expect(deps.encoder.calls[0]?.frames).toEqual([
      "/exports/garden/00000.jpg",
      "/exports/garden/00001.jpg",
    ]);
    expect(result).toEqual({ outputPath: "/exports/garden.mp4", videoId: "rec-1", fileSize: 2048 });
    expect(deps.history.getVideos()).toEqual([
      {
        id: "rec-1",
        createdAt: "2026-03-02T00:00:00.000Z",
        name: "garden",
        inputDir: "/exports/garden",
        outputPath: "/exports/garden.mp4",
        fps: 12,
        codec: "libx264",
        fileSize: 2048,
      },
    ]);
    expect(ctx.reports.at(-1)).toEqual({ current: 2, total: 2, message: "Encoding frame 2/2" });
  });

  it("fails when there are no frames", async () => {
    const deps = createTestJobDeps("/exports/garden");

    const run = createRenderJob({ inputDir: "/exports/garden" }, deps)(createTestContext());
    await expect(run).rejects.toBeInstanceOf(TaskExecutionError);
    await expect(run).rejects.toThrow("No .jpg frames found in /exports/garden");
  });
});
