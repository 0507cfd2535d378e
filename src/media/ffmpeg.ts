import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execa } from "execa";
import type { ResizeSpec } from "../types/subject.ts";
import type {
  EncodedVideo,
  ImageProcessor,
  VideoEncodeOptions,
  VideoEncoder,
} from "../jobs/types.ts";

export const DEFAULT_FFMPEG_PATH = "ffmpeg";

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Maps JPEG quality 1..100 onto ffmpeg's -q:v scale 31..2 (lower is better). */
export function ffmpegQuality(quality: number): number {
  const clamped = Math.min(100, Math.max(1, quality));
  return Math.round(31 - ((clamped - 1) * 29) / 99);
}

/** Concat-demuxer playlist showing each frame for 1/fps seconds. */
export function concatPlaylist(frames: readonly string[], fps: number): string {
  const duration = (1 / fps).toFixed(6);
  const lines: string[] = [];
  for (const frame of frames) {
    lines.push(`file '${frame.replace(/'/g, "'\\''")}'`);
    lines.push(`duration ${duration}`);
  }
  // The last entry's duration is ignored unless the file is repeated
  const last = frames[frames.length - 1];
  if (last !== undefined) lines.push(`file '${last.replace(/'/g, "'\\''")}'`);
  return `${lines.join("\n")}\n`;
}

/** Frame count from a `-progress` line (`frame=42`), or null. */
export function parseProgressFrame(line: string): number | null {
  const m = /^frame=\s*(\d+)\s*$/.exec(line.trim());
  return m?.[1] === undefined ? null : Number(m[1]);
}

// ── Image Processor ─────────────────────────────────────────────────────────

/** Re-encodes (and optionally scales) a single image through ffmpeg pipes. */
export class FfmpegImageProcessor implements ImageProcessor {
  constructor(private readonly ffmpegPath: string = DEFAULT_FFMPEG_PATH) {}

  async resize(bytes: Uint8Array, size: ResizeSpec | null, quality: number): Promise<Uint8Array> {
    const args = ["-hide_banner", "-loglevel", "error", "-i", "pipe:0"];
    if (size) args.push("-vf", `scale=${size.width}:${size.height}`);
    args.push("-q:v", String(ffmpegQuality(quality)), "-f", "image2", "-c:v", "mjpeg", "pipe:1");

    const { stdout } = await execa(this.ffmpegPath, args, {
      input: bytes,
      encoding: "buffer",
    });
    return stdout;
  }
}

// ── Video Encoder ───────────────────────────────────────────────────────────

export class FfmpegVideoEncoder implements VideoEncoder {
  constructor(private readonly ffmpegPath: string = DEFAULT_FFMPEG_PATH) {}

  async encode(
    frames: readonly string[],
    options: VideoEncodeOptions,
    onProgress: (current: number, total: number) => void,
  ): Promise<EncodedVideo> {
    const workDir = await mkdtemp(join(tmpdir(), "lapse-encode-"));
    const playlist = join(workDir, "frames.txt");

    try {
      await writeFile(playlist, concatPlaylist(frames, options.fps), "utf-8");
      const subprocess = execa(
        this.ffmpegPath,
        [
          "-hide_banner",
          "-y",
          "-f", "concat",
          "-safe", "0",
          "-i", playlist,
          "-r", String(options.fps),
          "-c:v", options.codec,
          "-pix_fmt", "yuv420p",
          "-progress", "pipe:1",
          "-nostats",
          options.output,
        ],
        { cancelSignal: options.signal },
      );

      for await (const line of subprocess) {
        const frame = parseProgressFrame(line);
        if (frame !== null) onProgress(Math.min(frame, frames.length), frames.length);
      }
      await subprocess;
    } catch (err) {
      if (options.signal?.aborted) throw options.signal.reason;
      throw err;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }

    const { size } = await stat(options.output);
    return { path: options.output, sizeBytes: size };
  }
}
