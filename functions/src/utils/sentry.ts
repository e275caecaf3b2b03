/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry stays disabled and errors are only logged.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';

const SENTRY_DSN = process.env.SENTRY_DSN || '';

let isInitialized = false;

/**
 * Initialize Sentry. Safe to call more than once.
 */
export function initSentry(): void {
  if (isInitialized) {
    return;
  }

  if (!SENTRY_DSN) {
    functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
    isInitialized = true;
    return;
  }

  Sentry.init({
    dsn: SENTRY_DSN,
    environment: process.env.NODE_ENV || 'development',
    release: process.env.FUNCTIONS_VERSION || 'unknown',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
    enabled: process.env.NODE_ENV !== 'test',

    // Request bodies carry owner contact details
    beforeSend(event) {
      if (event.request?.data) {
        event.request.data = '[REDACTED]';
      }
      return event;
    },

    ignoreErrors: ['ECONNRESET', 'ETIMEDOUT'],
  });

  functions.logger.info('[sentry] Sentry initialized successfully');
  isInitialized = true;
}

/**
 * Log an exception and, when Sentry is enabled, report it.
 */
export function captureException(
  error: unknown,
  context?: Record<string, unknown>,
): string | undefined {
  functions.logger.error('[error]', error, context ?? {});

  if (!SENTRY_DSN) {
    return undefined;
  }

  if (context) {
    return Sentry.withScope((scope) => {
      Object.entries(context).forEach(([key, value]) => {
        scope.setExtra(key, value);
      });
      return Sentry.captureException(error);
    });
  }

  return Sentry.captureException(error);
}

/**
 * Call AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
  if (!SENTRY_DSN) return;
  Sentry.setupExpressErrorHandler(app);
}
