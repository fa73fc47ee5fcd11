import type { NextFunction, Request, Response } from 'express';

import { AppError, NotFoundError } from '../utils/errors.js';

// body-parser tags its errors with the status to answer.
function hasClientStatus(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function notFound(req: Request, res: Response, next: NextFunction) {
  next(new NotFoundError(`No route for ${req.method} ${req.path}`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler.
  next: NextFunction
) {
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (hasClientStatus(err)) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error(err instanceof Error ? err.stack : err);
  res.status(500).json({ error: 'An unexpected error occurred.' });
}
