/**
 * Error taxonomy shared by every pipeline stage.
 *
 * Components surface these as `{ ok: false, error }` results; the orchestrator
 * maps them onto a single outcome report naming the failing stage.
 */
export type ErrorKind =
  | "SchemaError"
  | "SourceUnavailable"
  | "BuildFailure"
  | "TransientInfraError"
  | "SigningFailed"
  | "PublicationError"
  | "ConcurrentUpdateConflict"
  | "Timeout";

export class LibraryError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly details: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, opts?: { retryable?: boolean; details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = kind;
    this.kind = kind;
    this.retryable = opts?.retryable ?? false;
    this.details = opts?.details ?? {};
  }

  toJSON(): { kind: ErrorKind; message: string; retryable: boolean; details: Record<string, unknown> } {
    return { kind: this.kind, message: this.message, retryable: this.retryable, details: this.details };
  }
}

/** One offending location in a manifest, e.g. `build.platforms.1`. */
export type FieldIssue = {
  path: string;
  message: string;
  keyword: string;
};

export class SchemaError extends LibraryError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[], source?: string) {
    super("SchemaError", message, { details: { issues, ...(source ? { source } : {}) } });
    this.issues = issues;
  }

  /** Paths of every offending field, in report order. */
  paths(): string[] {
    return this.issues.map((i) => i.path);
  }
}

export class SourceUnavailableError extends LibraryError {
  constructor(message: string, opts: { repo: string; ref: string; retryable: boolean; cause?: unknown }) {
    super("SourceUnavailable", message, {
      retryable: opts.retryable,
      details: { repo: opts.repo, ref: opts.ref },
      cause: opts.cause,
    });
  }
}

export class BuildFailureError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("BuildFailure", message, { details, cause });
  }
}

export class TransientInfraError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("TransientInfraError", message, { retryable: true, details, cause });
  }
}

export class SigningFailedError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("SigningFailed", message, { details, cause });
  }
}

export class PublicationError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super("PublicationError", message, { details, cause });
  }
}

export class ConcurrentUpdateConflictError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ConcurrentUpdateConflict", message, { details });
  }
}

export class TimeoutError extends LibraryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("Timeout", message, { details });
  }
}

export function isLibraryError(e: unknown): e is LibraryError {
  return e instanceof LibraryError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
