import { describe, expect, it, vi } from 'vitest';

const logMock = vi.hoisted(() => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }));

vi.mock('@headline/config', () => ({
  createLogger: () => logMock,
}));

import express from 'express';
import request from 'supertest';
import { FontUnavailableError, InvalidFitRequestError } from '@headline/text-fit';
import { AppError, errorHandler } from '../middleware/error-handler.js';

function appThrowing(err: Error) {
  const app = express();
  app.get('/boom', () => {
    throw err;
  });
  app.use(errorHandler);
  return app;
}

describe('errorHandler', () => {
  it('uses the status and code of an AppError', async () => {
    const res = await request(appThrowing(new AppError(409, 'Already planned', 'CONFLICT'))).get('/boom');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: 'Already planned', code: 'CONFLICT' });
  });

  it('maps invalid fit requests to 400 with their issues', async () => {
    const err = new InvalidFitRequestError([{ path: 'boxWidth', message: 'must be positive' }]);
    const res = await request(appThrowing(err)).get('/boom');

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('INVALID_FIT_REQUEST');
    expect(res.body.details).toEqual([{ path: 'boxWidth', message: 'must be positive' }]);
  });

  it('maps font failures to 503', async () => {
    const res = await request(appThrowing(new FontUnavailableError('No usable font', 'Helvetica'))).get('/boom');

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ error: 'Text measurement is unavailable', code: 'FONT_UNAVAILABLE' });
    expect(logMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ fontSource: 'Helvetica', path: '/boom' }),
      'Font unavailable',
    );
  });

  it('hides unexpected errors behind a 500', async () => {
    const res = await request(appThrowing(new Error('kaput'))).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });
});
