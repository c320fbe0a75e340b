import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  ackPollIntervalMs: number;
}

export const appConfig = registerAs(
  'app',
  (): AppConfig => ({
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '7890', 10),
    ackPollIntervalMs: parseInt(process.env.ACK_POLL_INTERVAL_MS || '5000', 10),
  }),
);

export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(7890),
  RELAY_CONFIG_PATH: Joi.string().optional(),
  ACK_POLL_INTERVAL_MS: Joi.number().integer().min(100).default(5000).messages({
    'number.min': 'ACK_POLL_INTERVAL_MS must be at least 100 milliseconds',
  }),
  SENTRY_DSN: Joi.string().allow('').optional(),
  SENTRY_ENABLED: Joi.string().valid('true', 'false').optional(),
});
