// Response envelopes and error-to-status mapping for the HTTP surface

import { ErrorKind, isVideoJobError } from '@vidgen/core';

export interface SuccessBody<T> {
  success: true;
  message: string;
  results: T;
}

export interface ErrorBody {
  success: false;
  message: string;
}

export function successBody<T>(message: string, results: T): SuccessBody<T> {
  return { success: true, message, results };
}

export function errorBody(message: string): ErrorBody {
  return { success: false, message };
}

/** Error raised by the authentication stage; carries its own HTTP status. */
export class AuthError extends Error {
  constructor(
    readonly status: 401 | 403 | 503,
    message: string
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export function httpStatusFor(error: unknown): number {
  if (error instanceof AuthError) return error.status;
  if (!isVideoJobError(error)) return 500;
  switch (error.kind) {
    case ErrorKind.NOT_FOUND:
      return 404;
    case ErrorKind.VALIDATION:
    case ErrorKind.PROVIDER_NOT_FOUND:
      return 400;
    default:
      return 500;
  }
}
