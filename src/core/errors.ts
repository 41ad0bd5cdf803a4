export const ERROR_HINTS = {
  SNAPSHOT_UNAVAILABLE: 'Check that the branch and commit exist in the repository (try fetching first)',
  INTERNAL_INCONSISTENCY: 'This is a bug in entity extraction; re-run with RUST_AST_DIFF_LOG_LEVEL=debug and report it',
  REPO_UNAVAILABLE: 'Pass --repo-url to clone, or point --path at an existing git checkout',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

export class AstDiffError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint: string = ERROR_HINTS[code],
    public readonly meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AstDiffError';
  }
}

/** A commit or branch state could not be obtained. Aborts the whole run. */
export class SnapshotUnavailableError extends AstDiffError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('SNAPSHOT_UNAVAILABLE', message, ERROR_HINTS.SNAPSHOT_UNAVAILABLE, meta);
    this.name = 'SnapshotUnavailableError';
  }
}

/** Extractor contract violation. */
export class InternalInconsistencyError extends AstDiffError {
  constructor(message: string, meta?: Record<string, unknown>) {
    super('INTERNAL_INCONSISTENCY', message, ERROR_HINTS.INTERNAL_INCONSISTENCY, meta);
    this.name = 'InternalInconsistencyError';
  }
}

export function isAstDiffError(error: unknown): error is AstDiffError {
  return error instanceof AstDiffError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
