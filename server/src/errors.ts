export type ErrorKind = 'storage' | 'store' | 'validation' | 'not_found';

export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Object storage unreachable, access denied or rejected the request.
 * `code` carries the provider error code (`NoSuchBucket`, `AccessDenied`, ...) when one was returned.
 */
export class StorageError extends AppError {
  readonly kind = 'storage';
  readonly status: number = 500;

  constructor(message: string, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreError extends AppError {
  readonly kind = 'store';
  readonly status: number = 500;
}

export class ValidationError extends AppError {
  readonly kind = 'validation';
  readonly status: number = 400;
}

export class NotFoundError extends AppError {
  readonly kind = 'not_found';
  readonly status: number = 404;
}

export type Result<T, E extends AppError = AppError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const err = <E extends AppError>(error: E): { ok: false; error: E } => ({ ok: false, error });

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));
