import dotenv from 'dotenv';
import { createApp } from './api';
import { ServiceContainer } from './services';
import { getConfig } from './utils/config';
import { createLogger } from './utils/logger';

// Load environment variables
dotenv.config();

const logger = createLogger('Server');

const HOST = process.env.HOST || '0.0.0.0';

/**
 * Start the Emotion Cipher API server
 */
function start(): void {
  try {
    logger.info('Emotion Cipher API Server Starting...');
    const config = getConfig();
    const services = new ServiceContainer({ config });
    const app = createApp(services);
    const port = config.api.port;

    const server = app.listen(port, HOST, () => {
      logger.info('Emotion Cipher API Server Ready', {
        host: HOST,
        port,
        healthCheck: `http://${HOST}:${port}/health`,
        apiBase: `http://${HOST}:${port}/api/v1`,
      });
      logger.info('Available endpoints: POST /api/v1/emotion/detect, POST /api/v1/cipher/encrypt, POST /api/v1/cipher/decrypt, GET /api/v1/cipher/examples');
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}. Starting graceful shutdown...`);

      server.close(() => {
        logger.info('HTTP server closed. Goodbye!');
        process.exit(0);
      });

      // Force shutdown after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', error);
    process.exit(1);
  }
}

start();
