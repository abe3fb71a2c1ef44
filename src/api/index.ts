import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { ServiceContainer } from '../services';
import { errorHandler } from './middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { createCipherRateLimiter, createRateLimiter } from './middleware/rate-limiter';
import { createEmotionRouter } from './routes/emotion';
import { createCipherRouter } from './routes/cipher';

/**
 * Create and configure Express application
 */
export function createApp(services: ServiceContainer): Express {
  const app = express();
  const { api } = services.config;

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: process.env.ALLOWED_ORIGINS?.split(',') || ['http://localhost:3000', 'http://localhost:5173'],
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '1mb' }));

  // Compression
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // Rate limiting (applied to API routes)
  app.use('/api', createRateLimiter(api.rateLimit));

  // Health check (before routes for fast response)
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      version: '1.0.0',
      classifierChain: services.emotionDetector.describeChain(),
      timestamp: new Date().toISOString(),
    });
  });

  // API routes
  const cipherLimiter = createCipherRateLimiter(api.cipherRateLimit);
  app.use('/api/v1/emotion', cipherLimiter, createEmotionRouter(services.emotionDetector));
  app.use('/api/v1/cipher', cipherLimiter, createCipherRouter(services.cipher));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      data: null,
      error: {
        code: 'NOT_FOUND',
        message: `Route not found: ${req.method} ${req.path}`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
