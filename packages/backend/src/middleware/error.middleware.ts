import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { ErrorResponse } from '@protocol-scout/shared';
import { AppError, ProtocolNotFoundError } from '../errors.js';
import { log } from '../logger.js';

// body-parser and other http-errors style failures carry their own status
function statusOf(err: unknown): number {
  if (err instanceof AppError) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
) => {
  const message = err instanceof Error ? err.message : 'Internal server error';
  const status = statusOf(err);

  if (status >= 500) log.error('error', err);
  else log.warn('error', `${status}: ${message}`);

  const body: ErrorResponse = { error: message };
  if (err instanceof ProtocolNotFoundError) body.suggestions = err.suggestions;

  res.status(status).json(body);
};
