export type ErrorCode =
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "EXTERNAL_FETCH_ERROR"
  | "MERGE_CONFLICT";

/**
 * Base error for failures the engine raises itself. Anything else reaching
 * the entry point (a Store outage, a driver error) is treated as fatal.
 */
export class ShortlistError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    options: { context?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options.context;
  }
}

export class NotFoundError extends ShortlistError {
  constructor(resource: string, id: number) {
    super(`${resource} ${id} not found`, "NOT_FOUND", {
      context: { resource, id },
    });
  }
}

export class ValidationError extends ShortlistError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", { context });
  }
}

export class ExternalFetchError extends ShortlistError {
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super(`Failed to fetch ${url}: ${message}`, "EXTERNAL_FETCH_ERROR", {
      context: { url },
      cause,
    });
    this.url = url;
  }
}

export class MergeConflictError extends ShortlistError {
  readonly canonicalId: number;
  readonly duplicateIds: number[];

  constructor(canonicalId: number, duplicateIds: number[], cause: unknown) {
    super(
      `Merge into candidate ${canonicalId} rolled back: ${errorMessage(cause)}`,
      "MERGE_CONFLICT",
      { context: { canonicalId, duplicateIds }, cause }
    );
    this.canonicalId = canonicalId;
    this.duplicateIds = duplicateIds;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
