import * as Sentry from '@sentry/nestjs';
import { resolveSentryConfig } from './config/sentry.config';
import { RelayConfigError } from './common/errors/relay-config.error';

const sentry = resolveSentryConfig();

if (sentry.enabled && sentry.dsn) {
  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    debug: sentry.debug,
    // Attach stack trace to messages
    attachStacktrace: true,
    release: process.env.SENTRY_RELEASE || undefined,
    serverName: process.env.HOSTNAME || 'discord-pushover-relay',
    beforeSend(event, hint) {
      // Configuration problems are reported on the console at startup
      if (hint.originalException instanceof RelayConfigError) {
        return null;
      }
      return event;
    },
  });

  console.log(`Sentry initialized for ${sentry.environment} environment`);
}
