import { ErrorCode } from '@/lib/errors/error-codes';

import type { ErrorCodeType } from '@/lib/errors/error-codes';

export type ErrorCategory = 'auth' | 'permission' | 'config' | 'network' | 'parse' | 'io' | 'unknown';

export type AppError = {
  code: ErrorCodeType;
  category: ErrorCategory;
  message: string;
  retryable: boolean;
  redacted_context?: Record<string, unknown>;
};

/** Thrown wrapper so an `AppError` survives `throw`/`catch` with a stack. */
export class AppErrorException extends Error {
  readonly appError: AppError;

  constructor(appError: AppError) {
    super(appError.message);
    this.name = 'AppErrorException';
    this.appError = appError;
  }
}

export function isAppError(err: unknown): err is AppError {
  if (!err || typeof err !== 'object') return false;
  return (
    'code' in err &&
    'category' in err &&
    'message' in err &&
    'retryable' in err &&
    typeof err.code === 'string' &&
    typeof err.category === 'string' &&
    typeof err.message === 'string' &&
    typeof err.retryable === 'boolean'
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalizes anything thrown into an `AppError` tagged with the stage it came from.
 * Known errors keep their code; their context gains the stage.
 */
export function toAppError(err: unknown, stage: string): AppError {
  const known = err instanceof AppErrorException ? err.appError : isAppError(err) ? err : null;
  if (known) return { ...known, redacted_context: { stage, ...known.redacted_context } };

  return {
    code: ErrorCode.INTERNAL_ERROR,
    category: 'unknown',
    message: 'internal error',
    retryable: false,
    redacted_context: { stage, cause: errorMessage(err) },
  };
}
