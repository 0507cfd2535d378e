import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import type { ImageRef, ImageSink, ImageSource } from "../jobs/types.ts";

export const IMAGE_EXTENSIONS: readonly string[] = [".jpg", ".jpeg", ".png", ".webp"];

const FILENAME_TIMESTAMP = /(\d{4})-(\d{2})-(\d{2})[_ T](\d{2})[-:](\d{2})[-:](\d{2})/;

/**
 * Local time encoded in a capture file name
 * (`garden_2026-03-01_08-00-00.jpg`), or null.
 */
export function timestampFromName(name: string): Date | null {
  const m = FILENAME_TIMESTAMP.exec(name);
  if (!m) return null;
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }
  const date = new Date(year, month - 1, day, hour, minute, second);
  return Number.isNaN(date.getTime()) || date.getMonth() !== month - 1 ? null : date;
}

/**
 * Images in one directory (not recursive), timestamped from their file name
 * and falling back to modification time.
 */
export class FileSystemImageSource implements ImageSource {
  async list(dir: string): Promise<ImageRef[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const refs: ImageRef[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      if (!IMAGE_EXTENSIONS.includes(extname(entry.name).toLowerCase())) continue;

      const path = join(dir, entry.name);
      const timestamp = timestampFromName(entry.name) ?? (await stat(path)).mtime;
      refs.push({ path, name: entry.name, timestamp });
    }
    return refs.sort((a, b) => a.name.localeCompare(b.name));
  }

  async read(ref: ImageRef): Promise<Uint8Array> {
    return readFile(ref.path);
  }
}

export class FileSystemImageSink implements ImageSink {
  async write(dir: string, name: string, bytes: Uint8Array): Promise<string> {
    await mkdir(dir, { recursive: true });
    const path = join(dir, name);
    await writeFile(path, bytes);
    return path;
  }
}
