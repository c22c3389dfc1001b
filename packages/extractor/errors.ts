import type { DocumentRef } from "./types";

export type ErrorCode =
  | "CONFIG"
  | "UNSUPPORTED_FORMAT"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "EXTRACTION_RESPONSE"
  | "FATAL_EXTRACTION"
  | "RUN_ABORTED"
  | "BATCH";

export class PagesiftError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends PagesiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export class UnsupportedFormatError extends PagesiftError {
  constructor(readonly path: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported dataset format: ${path}`);
  }
}

export class DatasetNotFoundError extends PagesiftError {
  constructor(readonly path: string) {
    super("NOT_FOUND", `Dataset not found: ${path}`);
  }
}

export class WorkspaceExistsError extends PagesiftError {
  constructor(readonly dir: string, options?: { cause?: unknown }) {
    super("ALREADY_EXISTS", `Run directory already exists: ${dir}`, options);
  }
}

/**
 * The generation service answered, but not with a usable record. The
 * document stays out of the message so that its path never reaches the
 * fatal error classifier.
 */
export class ExtractionResponseError extends PagesiftError {
  constructor(
    readonly ref: DocumentRef,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("EXTRACTION_RESPONSE", message, options);
  }
}

/**
 * A document failed in a way that will repeat for every remaining document.
 */
export class FatalExtractionError extends PagesiftError {
  constructor(
    readonly ref: DocumentRef,
    cause: unknown,
  ) {
    super("FATAL_EXTRACTION", `Fatal error while extracting ${ref}: ${describe(cause)}`, { cause });
  }
}

export interface AbortedRunSummary {
  dispatched: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  flushes: number;
}

export class RunAbortedError extends PagesiftError {
  constructor(
    readonly summary: AbortedRunSummary,
    cause: FatalExtractionError,
  ) {
    super(
      "RUN_ABORTED",
      `Run aborted after ${summary.succeeded} records: ${cause.message}`,
      { cause },
    );
  }
}

/**
 * A batch job could not be submitted or its results could not be collected.
 */
export class BatchError extends PagesiftError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("BATCH", message, options);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
