export type GeotagErrorCode =
  | "transient_fetch"
  | "fatal_auth"
  | "item_processing"
  | "corrupt_checkpoint"
  | "storage_io";

export type GeotagErrorContext = Partial<{
  itemId: string;
  status: number;
  apiCode: string;
  path: string;
  requestUrl: string;
}>;

type GeotagErrorArgs = {
  message: string;
  context?: GeotagErrorContext;
  cause?: unknown;
};

abstract class GeotagError extends Error {
  abstract readonly code: GeotagErrorCode;
  readonly context: GeotagErrorContext;
  readonly cause?: unknown;

  constructor(args: GeotagErrorArgs) {
    super(args.message);
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Network failure, timeout, HTTP 5xx/429 or an API throttling error.
 * Aborts the current crawl pass; the next run resumes from the checkpoint.
 */
export class TransientFetchError extends GeotagError {
  readonly code = "transient_fetch";
  readonly status?: number;
  readonly retryDelayMs?: number;

  constructor(args: GeotagErrorArgs & { status?: number; retryDelayMs?: number }) {
    super(args);
    this.name = "TransientFetchError";
    this.status = args.status;
    this.retryDelayMs = args.retryDelayMs;
  }
}

/** Authorization or login failure. Aborts the whole run. */
export class FatalAuthError extends GeotagError {
  readonly code = "fatal_auth";
  readonly status?: number;

  constructor(args: GeotagErrorArgs & { status?: number }) {
    super(args);
    this.name = "FatalAuthError";
    this.status = args.status;
  }
}

export class ItemProcessingError extends GeotagError {
  readonly code = "item_processing";

  constructor(args: GeotagErrorArgs) {
    super(args);
    this.name = "ItemProcessingError";
  }
}

export class CorruptCheckpointError extends GeotagError {
  readonly code = "corrupt_checkpoint";

  constructor(args: GeotagErrorArgs) {
    super(args);
    this.name = "CorruptCheckpointError";
  }
}

/** Checkpoint write failed. Always fatal: silent loss of queue progress is not acceptable. */
export class StorageIOError extends GeotagError {
  readonly code = "storage_io";

  constructor(args: GeotagErrorArgs) {
    super(args);
    this.name = "StorageIOError";
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
