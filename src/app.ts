import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';

import { config } from './config/index.js';
import type { Container } from './container.js';
import { createRoutes } from './api/routes/index.js';
import { requestLogger } from './api/middleware/audit.middleware.js';
import { errorHandler, notFoundHandler } from './api/middleware/error.middleware.js';
import { standardRateLimit } from './api/middleware/rateLimit.middleware.js';

export function createApp(container: Container): Express {
  const app: Express = express();

  // Trust proxy for proper IP detection
  app.set('trust proxy', 1);

  // ==================== MIDDLEWARE ====================

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: config.isProduction ? undefined : false,
  }));

  // CORS
  app.use(cors({
    origin: config.server.allowedOrigins,
    credentials: true,
  }));

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use(requestLogger);

  // Rate limiting
  app.use(standardRateLimit);

  // ==================== ROUTES ====================

  app.use(createRoutes(container));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'tenant-sync',
      description: 'Multi-tenant OAuth integrations and background data sync',
      version: '1.0.0',
      status: 'running',
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
