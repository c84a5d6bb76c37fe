import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { errorMessage, StagingError } from '../errors';

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'Invalid request', issues: err.issues });
    return;
  }

  if (err instanceof StagingError) {
    if (err.statusCode >= 500) console.error(`[api] ${err.message}`);
    res.status(err.statusCode).json({ error: err.message, details: err.details });
    return;
  }

  console.error('[api] unhandled error', err);
  res.status(500).json({ error: errorMessage(err) || 'Internal error' });
};
