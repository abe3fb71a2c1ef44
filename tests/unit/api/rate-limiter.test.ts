/**
 * Rate Limiter Tests
 */

import express, { Express } from 'express';
import request from 'supertest';
import { createCipherRateLimiter, createRateLimiter } from '../../../src/api/middleware/rate-limiter';

const createLimitedApp = (limiter: express.RequestHandler): Express => {
  const app = express();
  app.use(limiter);
  app.get('/ping', (req, res) => {
    res.json({ ok: true });
  });
  return app;
};

describe('rate limiters', () => {
  it('should answer 429 in the API response shape once the limit is reached', async () => {
    // Arrange
    const app = createLimitedApp(createCipherRateLimiter(1));
    await request(app).get('/ping').expect(200);

    // Act
    const response = await request(app).get('/ping').expect(429);

    // Assert
    expect(response.body).toMatchObject({
      success: false,
      data: null,
      error: {
        code: 'CIPHER_RATE_LIMIT',
        message: 'Emotion detection rate limit exceeded.',
        details: { limit: 1, window: '1 minute' },
      },
    });
  });

  it('should stamp each rejection with the time it happened', async () => {
    // Arrange: the limiter is created well before the rejected request
    const app = createLimitedApp(createRateLimiter(1));
    await new Promise((resolve) => setTimeout(resolve, 20));
    const before = Date.now();
    await request(app).get('/ping').expect(200);

    // Act
    const response = await request(app).get('/ping').expect(429);

    // Assert
    expect(response.body.error.code).toBe('RATE_LIMIT_EXCEEDED');
    expect(Date.parse(response.body.timestamp)).toBeGreaterThanOrEqual(before);
  });
});
