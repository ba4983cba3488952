import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { DatabaseConfig, RateLimitConfig } from './config';
import { errorHandler } from './middlewares/errorHandler';
import { createApiLimiter } from './middlewares/rateLimit';
import { createCaregiverRouter } from './routes/caregiver';
import { createSeniorRouter } from './routes/senior';
import { createSystemRouter } from './routes/system';
import type { ServiceResolver } from './services/domain/serviceContainer';
import { setupSentryErrorHandler } from './utils/sentry';

export type CreateAppOptions = {
  resolveServices: ServiceResolver;
  databaseConfig: DatabaseConfig;
  rateLimit: RateLimitConfig;
};

export function createApp(options: CreateAppOptions): express.Express {
  const app = express();

  // Trust the first proxy hop so per-IP rate limiting sees the client address
  app.set('trust proxy', 1);

  // Open CORS: any origin (reflected so credentials work), any method and header
  app.use(cors({
    origin: true,
    credentials: true,
  }));

  // Security headers for a JSON-only API
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: {
      action: 'deny',
    },
    noSniff: true,
    hidePoweredBy: true,
    referrerPolicy: {
      policy: 'strict-origin-when-cross-origin',
    },
  }));

  app.use(express.json({ limit: '1mb' }));
  app.use(createApiLimiter(options.rateLimit));

  app.use('/', createSystemRouter({
    resolveServices: options.resolveServices,
    databaseConfig: options.databaseConfig,
  }));
  app.use('/api/senior', createSeniorRouter({ resolveServices: options.resolveServices }));
  app.use('/api/caregiver', createCaregiverRouter({ resolveServices: options.resolveServices }));

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);

  // Centralized error handling
  app.use(errorHandler);

  return app;
}
