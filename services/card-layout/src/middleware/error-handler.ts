import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { createLogger } from '@headline/config';
import { FontUnavailableError, InvalidFitRequestError } from '@headline/text-fit';

const log = createLogger('error-handler');

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

function isJsonSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({ error: err.message, code: err.code });
    return;
  }

  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation error', code: 'VALIDATION_ERROR', details: err.errors });
    return;
  }

  if (err instanceof InvalidFitRequestError) {
    res.status(400).json({ error: err.message, code: err.code, details: err.issues });
    return;
  }

  if (isJsonSyntaxError(err)) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_JSON' });
    return;
  }

  if (err instanceof FontUnavailableError) {
    log.error({ err, fontSource: err.fontSource, path: req.path }, 'Font unavailable');
    res.status(503).json({ error: 'Text measurement is unavailable', code: err.code });
    return;
  }

  log.error({ err, method: req.method, path: req.path }, 'Unhandled error');
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
