import request from 'supertest';
import express from 'express';
import { createLimiter, DEFAULT_RATE_LIMIT, STRICT_RATE_LIMIT } from '../src/middleware/rateLimiter.js';

describe('Rate Limiter Middleware', () => {
  let app: express.Application;

  beforeEach(() => {
    app = express();
  });

  it('should allow requests up to the limit', async () => {
    app.use(createLimiter({ windowMs: 60_000, limit: 5 }));
    app.get('/', (req, res) => res.send('OK'));

    for (let i = 0; i < 5; i++) {
      const res = await request(app).get('/');
      expect(res.statusCode).toEqual(200);
    }
  });

  it('should block requests over the limit', async () => {
    app.use(createLimiter({ windowMs: 60_000, limit: 3 }));
    app.get('/', (req, res) => res.send('OK'));

    for (let i = 0; i < 3; i++) {
      await request(app).get('/');
    }

    const res = await request(app).get('/');
    expect(res.statusCode).toEqual(429);
  });

  it('should send standard rate limit headers only', async () => {
    app.use(createLimiter({ windowMs: 60_000, limit: 3 }));
    app.get('/', (req, res) => res.send('OK'));

    const res = await request(app).get('/');

    expect(res.headers['ratelimit-limit']).toBe('3');
    expect(res.headers['ratelimit-remaining']).toBe('2');
    expect(res.headers['x-ratelimit-limit']).toBeUndefined();
  });

  it('should be stricter for metrics than for reports', () => {
    expect(DEFAULT_RATE_LIMIT).toEqual({ windowMs: 60_000, limit: 600 });
    expect(STRICT_RATE_LIMIT).toEqual({ windowMs: 60_000, limit: 60 });
  });
});
