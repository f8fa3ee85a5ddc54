/**
 * API middleware: request validation and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { apiError, ExtractionError, TypedError, createTypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

/**
 * Parse a request body against a zod schema, answering 400 on failure.
 * Returns undefined when the response has already been sent.
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, req: Request, res: Response): T | undefined {
  const result = schema.safeParse(req.body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    res.status(400).json(apiError(validationError(
      `Invalid request body: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      { issues },
    )));
    return undefined;
  }
  return result.data;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ExtractionError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // express.json() rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  const typedError = createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });

  res.status(500).json(apiError(typedError));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('CONFIG.')) return 422;
  if (error.code.startsWith('RUN.INVALID_STATE_TRANSITION')) return 409;
  return 500;
}
