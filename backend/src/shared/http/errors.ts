/**
 * backend/src/shared/http/errors.ts
 *
 * AppError is the one error type controllers, services and policies throw on
 * purpose. error-handler.ts turns it into `{ error: { code, message } }` with
 * the status that belongs to its code.
 *
 * Module-specific wording lives next to each module (account.errors.ts, ...);
 * this file only knows codes and statuses.
 */

const STATUS_BY_CODE = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  INTERNAL: 500,
} as const;

export type AppErrorCode = keyof typeof STATUS_BY_CODE;

/** Log-only context. Never serialized into a response. */
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  override readonly name = 'AppError';
  readonly status: number;

  constructor(
    readonly code: AppErrorCode,
    message: string,
    readonly meta?: AppErrorMeta,
  ) {
    super(message);
    this.status = STATUS_BY_CODE[code];
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta): AppError {
    return new AppError('VALIDATION_ERROR', message, meta);
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta): AppError {
    return new AppError('UNAUTHORIZED', message, meta);
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta): AppError {
    return new AppError('FORBIDDEN', message, meta);
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta): AppError {
    return new AppError('NOT_FOUND', message, meta);
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta): AppError {
    return new AppError('CONFLICT', message, meta);
  }
}
