import * as Sentry from '@sentry/node';

// Only enabled when a DSN is provided
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    sampleRate: 1.0,
    tracesSampleRate: 0.1,
    release: process.env.APP_RELEASE || undefined,
    serverName: process.env.HOSTNAME || 'vehicle-listing-tracker-local',
  });
}

export function captureError(error: Error, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Non-error notifications, e.g. a cancelled run
export function captureMessage(message: string, level: 'info' | 'warning' | 'error' = 'info', context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    scope.setLevel(level);
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureMessage(message);
  });
}
