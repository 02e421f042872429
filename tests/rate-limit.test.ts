import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { rateLimit } from '../src/middlewares/rateLimit.middleware';

const appWithLimiter = (now: () => number) => {
  const app = express();
  app.post('/login', rateLimit({ windowMs: 1000, maxRequests: 2, now }), (_req, res) => {
    res.json({ ok: true });
  });
  return app;
};

describe('rateLimit', () => {
  it('blocks requests over the limit until the window resets', async () => {
    let clock = 0;
    const app = appWithLimiter(() => clock);

    await request(app).post('/login').expect(200);
    const second = await request(app).post('/login').expect(200);
    expect(second.headers['x-ratelimit-remaining']).toBe('0');

    const blocked = await request(app).post('/login').expect(429);
    expect(blocked.headers['retry-after']).toBe('1');
    expect(blocked.body.error.code).toBe('TOO_MANY_REQUESTS');

    clock = 1000;
    await request(app).post('/login').expect(200);
  });

  it('keeps separate counts per limiter', async () => {
    const first = appWithLimiter(() => 0);
    const second = appWithLimiter(() => 0);

    await request(first).post('/login').expect(200);
    await request(first).post('/login').expect(200);
    await request(first).post('/login').expect(429);
    await request(second).post('/login').expect(200);
  });
});
