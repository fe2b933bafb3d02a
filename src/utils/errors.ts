/**
 * Error taxonomy for sync runs
 *
 * - TransientFetchError: network/timeout opening the source, retried with backoff
 * - StructuralError: the listing structure is gone, never retried
 * - StoreError: a catalog read/write failed, the batch is retried
 * - ConflictError: a run was requested while one is already running
 */

export type SyncErrorCode = 'TRANSIENT_FETCH' | 'STRUCTURAL' | 'STORE' | 'CONFLICT';

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientFetchError extends SyncError {
  readonly code = 'TRANSIENT_FETCH';
  readonly retryable = true;
}

export class StructuralError extends SyncError {
  readonly code = 'STRUCTURAL';
  readonly retryable = false;

  constructor(message: string, readonly snapshotPath: string | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreError extends SyncError {
  readonly code = 'STORE';
  readonly retryable = true;
}

export class ConflictError extends SyncError {
  readonly code = 'CONFLICT';
  readonly retryable = false;

  constructor(message = 'already running') {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryable(error: unknown): boolean {
  return error instanceof SyncError && error.retryable;
}
