import type { NextFunction, Request, Response } from 'express';
import { AppError } from './AppError';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error(`[api] ${err.message}`, err.cause ?? '');
    }

    return res.status(err.statusCode).json({
      error: err.message,
      details: err.details ?? null
    });
  }

  // body-parser marks its own failures (bad JSON, body too large) with a status
  if (isHttpError(err)) {
    return res.status(err.status).json({
      error: err.expose ? err.message : 'Bad request',
      details: null
    });
  }

  console.error('Unhandled error:', err);

  return res.status(500).json({
    error: 'Internal server error'
  });
}

function isHttpError(
  err: unknown
): err is { status: number; message: string; expose?: boolean } {
  if (typeof err !== 'object' || err === null) return false;
  if (!('status' in err) || !('message' in err)) return false;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500;
}
