import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { isEmotionCipherError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ErrorHandler');

/**
 * API Response format
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data: T | null;
  error: {
    code: string;
    message: string;
    details?: unknown;
  } | null;
  timestamp: string;
}

export function apiResponse<T>(data: T): ApiResponse<T> {
  return {
    success: true,
    data,
    error: null,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response<ApiResponse<null>>,
  // Express recognizes error handlers by their four parameters
  _next: NextFunction
): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({
      success: false,
      data: null,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request data',
        details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
      timestamp: new Date().toISOString(),
    });
    return;
  }

  if (isEmotionCipherError(err)) {
    if (err.statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed`, err);
    } else {
      logger.debug(`${req.method} ${req.path} rejected`, { code: err.code, message: err.message });
    }

    res.status(err.statusCode).json({
      success: false,
      data: null,
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
      timestamp: new Date().toISOString(),
    });
    return;
  }

  logger.error(`${req.method} ${req.path} failed`, err);

  // Handle unknown errors
  res.status(500).json({
    success: false,
    data: null,
    error: {
      code: 'INTERNAL_ERROR',
      message: process.env.NODE_ENV === 'development' && err instanceof Error
        ? err.message
        : 'An unexpected error occurred',
    },
    timestamp: new Date().toISOString(),
  });
}
