import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';

import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { getCorsOptions } from './config/cors.config';
import { closePool } from './db/pool';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
// Bootstrap DI container (auto-runs on import, must be before routes)
import './bootstrap';
import routes from './routes';
import { errorHandler } from './middleware/error.middleware';

const app = express();

// Trust proxy for correct IP detection behind load balancers/proxies
app.set('trust proxy', 1);

app.use(
  helmet({
    // API server, no HTML served
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  })
);
app.use(cors(getCorsOptions()));
app.use(express.json({ limit: '100kb' }));
app.use(requestTimingMiddleware);

// Routes
app.use('/api', routes);

// Global error handler (must be last)
app.use(errorHandler);

const server = createServer(app);

server.listen(env.PORT, '0.0.0.0', () => {
  logger.info('Tournament backend started', {
    port: env.PORT,
    healthCheck: `http://localhost:${env.PORT}/api/health`,
  });
});

// Graceful shutdown
let isShuttingDown = false;
const gracefulShutdown = () => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('Shutting down gracefully...');

  server.close(() => {
    logger.info('HTTP server closed');
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to close database pool', { error: String(error) });
        process.exit(1);
      });
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGINT', gracefulShutdown);
process.on('SIGTERM', gracefulShutdown);

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  gracefulShutdown();
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: String(reason) });
  gracefulShutdown();
});

export default app;
