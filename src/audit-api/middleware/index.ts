import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import type { ZodError } from 'zod';
import type { AuditError } from '@core/errors';
import type { ApiResponse, AuditErrorKind } from '@shared/types';

export const requestLogger = morgan('dev');

/** Forwards a rejected handler promise to the error handler. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const STATUS_BY_KIND: Record<AuditErrorKind, number> = {
  RunNotFound: 404,
  NoRunsForScenario: 404,
  MalformedRecord: 400,
  AmbiguousTimestamp: 400,
};

export function sendAuditError(res: Response, error: AuditError): void {
  const body: ApiResponse = { success: false, error: error.message, kind: error.kind };
  res.status(STATUS_BY_KIND[error.kind]).json(body);
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  // body-parser marks client errors (malformed JSON, oversized body) with a 4xx status.
  const status = 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500 ? err.status : 500;
  console.error('[ERROR]', err.message);
  const body: ApiResponse = { success: false, error: err.message };
  res.status(status).json(body);
}
