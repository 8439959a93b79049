/**
 * Error taxonomy shared by the local store, the remote store client and the
 * sync services.
 *
 * Local-phase errors (NotFound, InvalidData) are thrown to callers.
 * Remote-phase errors are recorded by the sync layer and retried when
 * `isRetryableError` says so.
 */

export type SyncErrorCode =
  | 'not_found'
  | 'invalid_data'
  | 'network_unavailable'
  | 'quota_exceeded'
  | 'sync_conflict'
  | 'permission_denied'
  | 'cloud_not_configured'
  | 'compression_failed';

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends SyncError {
  readonly code = 'not_found';
  readonly retryable = false;

  constructor(readonly entity: string, readonly id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class InvalidDataError extends SyncError {
  readonly code = 'invalid_data';
  readonly retryable = false;
}

export class NetworkUnavailableError extends SyncError {
  readonly code = 'network_unavailable';
  readonly retryable = true;

  constructor(message = 'Remote store is not reachable', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class QuotaExceededError extends SyncError {
  readonly code = 'quota_exceeded';
  readonly retryable = false;

  constructor(message = 'Remote storage quota exceeded', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class SyncConflictError extends SyncError {
  readonly code = 'sync_conflict';
  readonly retryable = true;
}

/**
 * The remote refused the write for the signed-in user (row-level security).
 */
export class PermissionDeniedError extends SyncError {
  readonly code = 'permission_denied';
  readonly retryable = false;
}

export class CloudNotConfiguredError extends SyncError {
  readonly code = 'cloud_not_configured';
  readonly retryable = false;

  constructor(message = 'Cloud storage not configured') {
    super(message);
  }
}

export class CompressionFailedError extends SyncError {
  readonly code = 'compression_failed';
  readonly retryable = false;

  constructor(message = 'Failed to compress image', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Unknown errors (thrown by fetch, the SDK, the file system) are treated as
 * transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof SyncError) {
    return error.retryable;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
