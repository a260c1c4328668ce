import * as Sentry from '@sentry/node';

let sentryEnabled = false;

/**
 * Enable error reporting. A no-op when no DSN is configured.
 */
export function initSentry(options: { dsn: string; environment: string; release?: string }): boolean {
  if (!options.dsn || sentryEnabled) return sentryEnabled;

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    release: options.release,
    sampleRate: 1.0,
    tracesSampleRate: 0,
    serverName: 'catalog-harvester',
  });

  sentryEnabled = true;
  return sentryEnabled;
}

// Manual error capture helper
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Add breadcrumb for debugging
export function addBreadcrumb(breadcrumb: {
  category?: string;
  message: string;
  level?: 'debug' | 'info' | 'warning' | 'error';
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

/**
 * Flush pending events before the process exits.
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
