import { Request, Response } from 'express';
import rateLimit from 'express-rate-limit';
import { ApiResponse } from './error-handler';

const WINDOW_MS = 60 * 1000; // 1 minute

/**
 * Per-IP limiter answering 429 in the standard response shape
 */
const createLimiter = (limit: number, code: string, message: string) =>
  rateLimit({
    windowMs: WINDOW_MS,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      const body: ApiResponse<null> = {
        success: false,
        data: null,
        error: {
          code,
          message,
          details: {
            limit,
            window: '1 minute',
          },
        },
        timestamp: new Date().toISOString(),
      };
      res.status(429).json(body);
    },
  });

/**
 * General API rate limiter
 */
export const createRateLimiter = (limit: number) =>
  createLimiter(limit, 'RATE_LIMIT_EXCEEDED', 'Too many requests. Please try again later.');

/**
 * Detection and cipher operations (may call a remote classifier)
 */
export const createCipherRateLimiter = (limit: number) =>
  createLimiter(limit, 'CIPHER_RATE_LIMIT', 'Emotion detection rate limit exceeded.');
