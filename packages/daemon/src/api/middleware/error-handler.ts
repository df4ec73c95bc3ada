/**
 * Error handler: Hono onError handler converting errors to PoolNodeError-shaped JSON.
 *
 * - PoolNodeError: responds with error.httpStatus and error.toJSON()
 * - ZodError: responds with 400 VALIDATION_FAILED and the flattened issues
 * - HTTPException (e.g. malformed JSON body): its own response
 * - Anything else: 500 INTERNAL_ERROR with the error message
 *
 * Every body carries the requestId from context.
 */

import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { PoolNodeError } from '@poolnode/core';
import type { ApiEnv } from '../env.js';

export const errorHandler: ErrorHandler<ApiEnv> = (err, c) => {
  const requestId = c.get('requestId');

  if (err instanceof PoolNodeError) {
    return c.json({ ...err.toJSON(), requestId }, err.httpStatus);
  }

  if (err instanceof ZodError) {
    const validation = new PoolNodeError('VALIDATION_FAILED', {
      details: {
        issues: err.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
    return c.json({ ...validation.toJSON(), requestId }, validation.httpStatus);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error(`[API] unhandled error on ${c.req.method} ${c.req.path}:`, err);
  const internal = new PoolNodeError('INTERNAL_ERROR', {
    message: err.message || undefined,
    cause: err,
  });
  return c.json({ ...internal.toJSON(), requestId }, internal.httpStatus);
};
