import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ApplicationAlreadyCopiedError,
  ApplicationArchivedError,
  ApplicationExpiredError,
  CreditProductNotFoundError,
  describeError,
  DispatchError,
  ForbiddenActorError,
  InvalidStateTransitionError,
  LifecycleError,
  MissingLenderError,
  NotFoundError,
  SkippedAwardError,
  UpstreamHttpError,
} from '../../errors';
import { ApiResponse } from '../types';

const UNPROCESSABLE_CODES = new Set(['AMOUNT_OUT_OF_RANGE']);

export function statusForError(err: LifecycleError): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof ForbiddenActorError) return 403;
  if (
    err instanceof InvalidStateTransitionError ||
    err instanceof ApplicationAlreadyCopiedError ||
    err instanceof SkippedAwardError
  ) {
    return 409;
  }
  if (
    err instanceof ApplicationExpiredError ||
    err instanceof ApplicationArchivedError ||
    err instanceof MissingLenderError ||
    err instanceof CreditProductNotFoundError ||
    UNPROCESSABLE_CODES.has(err.code)
  ) {
    return 422;
  }
  if (err instanceof DispatchError || err instanceof UpstreamHttpError) return 502;
  return 500;
}

function send(res: Response, status: number, error: NonNullable<ApiResponse<null>['error']>): void {
  const response: ApiResponse<null> = { success: false, error };
  res.status(status).json(response);
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  console.error('[API Error]', {
    correlationId: req.correlationId,
    path: req.path,
    method: req.method,
    error: describeError(err),
    stack: process.env.NODE_ENV === 'development' && err instanceof Error ? err.stack : undefined,
  });

  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Request body is invalid',
      details: { issues: err.issues },
      correlationId: req.correlationId,
    });
    return;
  }

  if (err instanceof LifecycleError) {
    const status = statusForError(err);
    if (status !== 500) {
      send(res, status, { code: err.code, message: err.message, correlationId: req.correlationId });
      return;
    }
  }

  // Never leak internal errors to client
  send(res, 500, {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    correlationId: req.correlationId,
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  send(res, 404, {
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    correlationId: req.correlationId,
  });
}
