import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import { corsConfig } from './config';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { apiLimiter } from './middlewares/rateLimit';
import { createBookingsRouter } from './routes/bookings';
import { createDogsRouter } from './routes/dogs';
import { createOwnersRouter } from './routes/owners';
import { createSittersRouter } from './routes/sitters';
import {
  getDefaultDomainServices,
  type DomainServiceContainer,
} from './services/domain/serviceContainer';
import { ok, sendEnvelope } from './utils/apiResponse';
import { setupSentryErrorHandler } from './utils/sentry';

export type CreateAppOptions = {
  getServices?: () => DomainServiceContainer;
  /** Disable for tests that fire many requests from one address. */
  rateLimit?: boolean;
};

// In development, allow localhost and common development ports
const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8080'];

export function createApp(options: CreateAppOptions = {}): express.Express {
  const getServices = options.getServices ?? getDefaultDomainServices;
  const app = express();

  // Trust proxy - required for rate limiting behind Cloud Functions/Load Balancer
  app.set('trust proxy', true);

  const allAllowedOrigins = [
    ...corsConfig.allowedOrigins,
    ...(corsConfig.isDevelopment ? DEV_ORIGINS : []),
  ];

  if (allAllowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. Browser requests from other origins will be rejected.',
    );
  }

  app.use(
    cors({
      // Requests with no origin (curl, server-to-server) are allowed
      origin: (origin, callback) => {
        if (!origin || allAllowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
        callback(null, false);
      },
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  );

  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  if (options.rateLimit !== false) {
    app.use(apiLimiter);
  }

  app.use('/owners', createOwnersRouter(getServices));
  app.use('/dogs', createDogsRouter(getServices));
  app.use('/sitters', createSittersRouter(getServices));
  app.use('/bookings', createBookingsRouter(getServices));

  app.get('/health', (req, res) => {
    sendEnvelope(res, ok({ status: 'ok', timestamp: new Date().toISOString() }));
  });

  app.use(notFoundHandler);

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);
  app.use(errorHandler);

  return app;
}
