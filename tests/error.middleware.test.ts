import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { errorHandler } from '../src/middlewares/error.middleware';

const failingWith = (error: unknown) => {
  const app = express();
  app.get('/fail', (_req, _res, next) => next(error));
  app.use(errorHandler);
  return app;
};

const pgError = (code: string) => Object.assign(new Error(`pg error ${code}`), { code });

describe('errorHandler', () => {
  it('maps an out-of-range database value to invalid input', async () => {
    const res = await request(failingWith(pgError('22003'))).get('/fail').expect(400);
    expect(res.body).toEqual({ success: false, message: 'Value out of range', error: { code: 'INVALID_INPUT' } });
  });

  it('maps a unique violation to a conflict', async () => {
    const res = await request(failingWith(pgError('23505'))).get('/fail').expect(409);
    expect(res.body.error.code).toBe('CONFLICT');
  });

  it('hides unexpected failures behind a 500', async () => {
    const res = await request(failingWith(new Error('boom'))).get('/fail').expect(500);
    expect(res.body.message).toBe('Internal server error');
    expect(res.body.error.code).toBe('INTERNAL_ERROR');
  });
});
