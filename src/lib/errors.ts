export type FstabErrorKind =
  | "file-not-found"
  | "backup-failed"
  | "read-failed"
  | "no-root-entry"
  | "subvol-not-found"
  | "commit-failed"
  | "verification-failed";

export type ErrorCategory = "input" | "structural" | "commit" | "external";

export function errorCategory(kind: FstabErrorKind): ErrorCategory {
  switch (kind) {
    case "file-not-found":
    case "read-failed":
      return "input";
    case "no-root-entry":
    case "subvol-not-found":
      return "structural";
    case "commit-failed":
    case "verification-failed":
      return "commit";
    case "backup-failed":
      return "external";
  }
}

export class FstabError extends Error {
  constructor(readonly kind: FstabErrorKind, message: string) {
    super(message);
    this.name = "FstabError";
  }

  get category(): ErrorCategory {
    return errorCategory(this.kind);
  }
}

/** Bad command-line input; rendered as a one-line error plus exit 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
