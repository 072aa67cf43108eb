import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createJobs, Engine } from '../container';
import { createAuthMiddleware, requireClientType } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import { createRequestLogger } from './middleware/request-logger';
import { createAdminRoutes } from './routes/admin-routes';
import { createLenderApplicationRoutes } from './routes/lender-application-routes';
import { createPublicApplicationRoutes } from './routes/public-application-routes';

export interface AppOptions {
  corsOrigin?: string;
  // Requests per minute on the public borrower endpoints
  publicRateLimit?: number;
}

export function createApp(engine: Engine, options: AppOptions = {}): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: options.corsOrigin ?? engine.config.frontendUrl,
    credentials: true,
  }));

  // Rate limiting
  app.use('/api/v1', rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 1000,
    standardHeaders: true,
    legacyHeaders: false,
  }));
  const publicLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: options.publicRateLimit ?? 30,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  app.use(createRequestLogger({ quiet: engine.config.quiet }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: engine.clock().toISOString() });
  });

  const authenticate = createAuthMiddleware(engine.credentials, engine.clock);

  app.use('/api/v1/public/applications', publicLimiter, createPublicApplicationRoutes(engine.lifecycle));
  app.use(
    '/api/v1/lender/applications',
    authenticate,
    requireClientType('LENDER', 'ADMIN'),
    createLenderApplicationRoutes(engine.lifecycle)
  );
  app.use(
    '/api/v1/admin',
    authenticate,
    requireClientType('ADMIN'),
    createAdminRoutes({ ingestor: engine.ingestor, jobs: createJobs(engine) })
  );

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
