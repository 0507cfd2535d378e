// ── Workspace Error Codes ────────────────────────────────────────────────────

export type WorkspaceErrorCode =
  | "NOT_FOUND"
  | "READ_FAILED"
  | "PARSE_ERROR";

// ── Workspace Error ──────────────────────────────────────────────────────────

export class WorkspaceError extends Error {
  override readonly name = "WorkspaceError";

  constructor(
    message: string,
    public readonly code: WorkspaceErrorCode,
    public readonly path?: string,
  ) {
    super(message);
  }
}
