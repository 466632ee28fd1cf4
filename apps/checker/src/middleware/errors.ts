import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'INTERNAL';

export type ErrorResponse = {
  error: { code: ErrorCode; message: string };
};

export class AppError extends Error {
  constructor(
    readonly status: ContentfulStatusCode,
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

function errorBody(code: ErrorCode, message: string): ErrorResponse {
  return { error: { code, message } };
}

export function handleError(err: unknown, c: Context): Response {
  if (err instanceof AppError) {
    return c.json(errorBody(err.code, err.message), err.status);
  }

  if (err instanceof ZodError) {
    return c.json(errorBody('INVALID_ARGUMENT', err.message), 400);
  }

  // Never echo internals to callers.
  console.error('unhandled error', err);
  return c.json(errorBody('INTERNAL', 'Internal Server Error'), 500);
}

export function handleNotFound(c: Context): Response {
  return c.json(errorBody('NOT_FOUND', 'Not Found'), 404);
}
