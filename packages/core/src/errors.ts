/**
 * Error taxonomy for the video job pipeline.
 *
 * Every error carries a `kind` discriminant. The stored text of a failed job is
 * rendered by {@link describeJobError} as `"<kind>: <message>"` so operators can
 * tell a remote timeout apart from a provider rejection.
 */

export enum ErrorKind {
  VALIDATION = 'validation',
  PROVIDER_NOT_FOUND = 'provider_not_found',
  INPUT_STAGING = 'input_staging',
  REMOTE_CALL = 'remote_call',
  REMOTE_TIMEOUT = 'remote_timeout',
  DOWNLOAD = 'download',
  NOT_FOUND = 'not_found',
  STORE = 'store',
}

export abstract class VideoJobError extends Error {
  abstract readonly kind: ErrorKind;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends VideoJobError {
  readonly kind = ErrorKind.VALIDATION;
}

export class ProviderNotFoundError extends VideoJobError {
  readonly kind = ErrorKind.PROVIDER_NOT_FOUND;

  constructor(
    readonly providerName: string,
    readonly available: string[]
  ) {
    super(`Provider '${providerName}' not found. Available providers: ${available.join(', ')}`);
  }
}

// Upload handshake failed; re-running staging alone is enough to retry
export class InputStagingError extends VideoJobError {
  readonly kind = ErrorKind.INPUT_STAGING;
  override readonly retryable = true;
}

export class RemoteCallError extends VideoJobError {
  readonly kind = ErrorKind.REMOTE_CALL;

  constructor(
    message: string,
    readonly status?: number,
    readonly responseData?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RemoteTimeoutError extends VideoJobError {
  readonly kind = ErrorKind.REMOTE_TIMEOUT;

  constructor(
    message: string,
    readonly remoteJobId?: string,
    readonly attempts?: number
  ) {
    super(message);
  }
}

export class DownloadError extends VideoJobError {
  readonly kind = ErrorKind.DOWNLOAD;
  override readonly retryable = true;
}

export class JobNotFoundError extends VideoJobError {
  readonly kind = ErrorKind.NOT_FOUND;

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

export class StoreError extends VideoJobError {
  readonly kind = ErrorKind.STORE;
  override readonly retryable = true;
}

export function isVideoJobError(error: unknown): error is VideoJobError {
  return error instanceof VideoJobError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Text stored on a FAILED job. Unclassified errors are reported as remote call
 * failures since they surface from inside a provider call.
 */
export function describeJobError(error: unknown): string {
  const kind = isVideoJobError(error) ? error.kind : ErrorKind.REMOTE_CALL;
  return `${kind}: ${errorMessage(error)}`;
}
