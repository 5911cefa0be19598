/**
 * Error Rendering
 *
 * All failures leave the API as
 * { status: "error", error_kind, message, fault, retryable }.
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import { ForgeError, InternalError, ValidationError, type ErrorBody } from '../errors';
import type { AppEnv } from '../types';

export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const error = normalize(err);

  if (error.fault === 'server') {
    console.error(`[ERROR] ${c.req.method} ${c.req.path} → ${error.kind}`, err);
  } else {
    console.log(`[ERROR] ${c.req.method} ${c.req.path} → ${error.kind}: ${error.message}`);
  }

  return respond(c, error);
};

export const notFoundHandler: NotFoundHandler<AppEnv> = (c) => {
  const body: ErrorBody = {
    status: 'error',
    error_kind: 'ValidationError',
    message: `Route not found: ${c.req.method} ${c.req.path}`,
    fault: 'client',
    retryable: false,
  };
  return c.json(body, 404);
};

/**
 * zValidator hook: turn zod failures into ValidationError.
 */
export function rejectInvalid(result: { success: true } | { success: false; error: ZodError }): void {
  if (!result.success) {
    const details = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const summary = details.map((d) => (d.path ? `${d.path}: ${d.message}` : d.message)).join('; ');
    throw new ValidationError(`Invalid request: ${summary}`, details);
  }
}

export function respond(c: Context<AppEnv>, error: ForgeError): Response {
  return c.json(error.toBody(), error.httpStatus);
}

function normalize(err: unknown): ForgeError {
  if (err instanceof ForgeError) return err;
  // Hono raises HTTPException for malformed JSON bodies and similar request faults
  if (err instanceof HTTPException && err.status < 500) {
    return new ValidationError(err.message);
  }
  return new InternalError();
}
