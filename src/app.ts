import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import type { Config } from './config/index.js';
import { identifyActor } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createActionRouter } from './routes/action.routes.js';
import { createAssetRouter } from './routes/asset.routes.js';
import { createAuditRouter } from './routes/audit.routes.js';
import { createComplianceRouter } from './routes/compliance.routes.js';
import { createDashboardRouter } from './routes/dashboard.routes.js';
import { createProjectRouter } from './routes/project.routes.js';
import { createReferenceRouter } from './routes/reference.routes.js';
import { createReviewRouter } from './routes/review.routes.js';
import { createRiskRouter } from './routes/risk.routes.js';
import { createSupplierRouter } from './routes/supplier.routes.js';
import type { Services } from './services/index.js';
import { httpLogStream, type Logger } from './utils/logger.js';

export interface AppDeps {
  services: Services;
  config: Config;
  logger: Logger;
}

export function createApp({ services, config, logger }: AppDeps): Express {
  const app = express();

  // Trust proxy (the actor header is set by the authenticating proxy in front of us)
  app.set('trust proxy', 1);

  // ============================================
  // SECURITY MIDDLEWARE
  // ============================================

  app.use(helmet());

  app.use(
    cors({
      origin: config.server.corsOrigin,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Requested-With', config.auth.actorHeader],
      exposedHeaders: ['X-Request-ID'],
      maxAge: 600,
    }),
  );

  app.use(
    '/api',
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: config.server.rateLimitMax,
      message: { success: false, error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' } },
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path === '/health',
    }),
  );

  app.use(express.json({ limit: '1mb' }));

  // ============================================
  // LOGGING
  // ============================================

  app.use(
    morgan('combined', {
      stream: httpLogStream(logger),
      skip: (req) => req.url === '/api/health',
    }),
  );
  app.use(requestLogger(logger));
  app.use(identifyActor(config.auth.actorHeader));

  // ============================================
  // API ROUTES
  // ============================================

  app.get('/api/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/api/reference', createReferenceRouter());
  app.use('/api/projects', createProjectRouter(services.projects));
  app.use('/api/risks', createRiskRouter(services.risks, services.audit));
  app.use('/api/compliance', createComplianceRouter(services.compliance));
  app.use('/api/actions', createActionRouter(services.actions));
  app.use('/api/suppliers', createSupplierRouter(services.suppliers));
  app.use('/api/assets', createAssetRouter(services.assets));
  app.use('/api/reviews', createReviewRouter(services.reviews));
  app.use('/api/audit', createAuditRouter(services.audit));
  app.use('/api/dashboard', createDashboardRouter(services.dashboard));

  // ============================================
  // ERROR HANDLING
  // ============================================

  app.use(notFoundHandler);
  app.use(errorHandler(logger, config.server.nodeEnv === 'development'));

  return app;
}
