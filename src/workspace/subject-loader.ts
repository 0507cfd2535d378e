import { readFile } from "node:fs/promises";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { Subject } from "../types/subject.ts";
import { WorkspaceError } from "./errors.ts";
import { parseSubjects } from "./subject-validation.ts";

// ── Subject File ────────────────────────────────────────────────────────────
//
// subjects.yaml:
//
//   subjects:
//     - id: garden
//       kind: camera
//       camera: { url: "http://cam.local/snap.jpg", outputDir: ./captures/garden }
//       schedules:
//         - { minute: "*/5", hour: "6-20" }

/**
 * Read and validate a YAML subject file. The root is either a list of
 * subjects or an object with a `subjects` list.
 */
export async function loadSubjectsFile(
  path: string,
  options: { readonly now?: Date } = {},
): Promise<Subject[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new WorkspaceError(`Subject file not found: ${path}`, "NOT_FOUND", path);
    }
    throw new WorkspaceError(
      `Failed to read subject file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      "READ_FAILED",
      path,
    );
  }
  return parseSubjectsYaml(content, { ...options, path });
}

export function parseSubjectsYaml(
  content: string,
  options: { readonly now?: Date; readonly path?: string } = {},
): Subject[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new WorkspaceError(
        `Invalid YAML${options.path ? ` in ${options.path}` : ""}: ${err.message}`,
        "PARSE_ERROR",
        options.path,
      );
    }
    throw err;
  }

  if (raw === null || raw === undefined) return [];
  const list = isSubjectsDocument(raw) ? raw.subjects : raw;
  return parseSubjects(list ?? [], { now: options.now });
}

function isSubjectsDocument(value: unknown): value is { subjects?: unknown } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
