import { registerAs } from '@nestjs/config';

export interface SentryConfig {
  dsn: string;
  environment: string;
  enabled: boolean;
  tracesSampleRate: number;
  debug: boolean;
}

export function resolveSentryConfig(
  env: NodeJS.ProcessEnv = process.env,
): SentryConfig {
  const environment = env.NODE_ENV || 'development';
  return {
    dsn: env.SENTRY_DSN || '',
    environment,
    enabled: env.SENTRY_ENABLED === 'true' || environment === 'production',
    tracesSampleRate: parseFloat(env.SENTRY_TRACES_SAMPLE_RATE || '0.1'),
    debug: env.SENTRY_DEBUG === 'true',
  };
}

export const sentryConfig = registerAs('sentry', () => resolveSentryConfig());
