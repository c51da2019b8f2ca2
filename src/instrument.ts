import * as Sentry from '@sentry/node';

import type { Config } from './config/index.js';

/**
 * Initialize Sentry error tracking when a DSN is configured.
 * Returns false (tracking disabled) otherwise, which is the normal case in
 * development and tests.
 */
export function initSentry(sentry: Config['sentry']): boolean {
  if (!sentry) {
    return false;
  }

  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  return true;
}

// Re-export Sentry for use in error handler
export { Sentry };
