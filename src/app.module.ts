import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { SentryModule } from '@sentry/nestjs/setup';
import { SentryGlobalFilter } from '@sentry/nestjs/setup';
import { HealthModule } from './health/health.module';
import { RoutingModule } from './routing/routing.module';
import { appConfig, configValidationSchema } from './config/app.config';
import { relayConfig } from './config/relay.config';
import { sentryConfig } from './config/sentry.config';

@Module({
  imports: [
    SentryModule.forRoot(),
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, relayConfig, sentryConfig],
      validationSchema: configValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    EventEmitterModule.forRoot(),
    RoutingModule,
    HealthModule,
  ],
  providers: [
    // Global Sentry Error Filter
    {
      provide: APP_FILTER,
      useClass: SentryGlobalFilter,
    },
  ],
})
export class AppModule {}
