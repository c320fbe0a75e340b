import 'reflect-metadata';
// IMPORTANT: Make sure to import `instrument.ts` at the top of your file.
import './instrument';

// All other imports below
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { RelayConfigError } from './common/errors/relay-config.error';
import { resolveConfigPath } from './config/config-path';
import { resolveLogLevels } from './config/log-level';
import { loadRelayConfig } from './config/relay-config.loader';
import { RelayConfig } from './config/relay-config.interface';
import * as packageJson from '../package.json';

async function bootstrap() {
  const args = process.argv.slice(2);
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`${packageJson.name} ${packageJson.version}`);
    return;
  }

  let relay: RelayConfig;
  let configPath: string;
  try {
    configPath = resolveConfigPath(args, process.env, process.cwd());
    relay = loadRelayConfig(configPath);
  } catch (error) {
    if (error instanceof RelayConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const { levels, recognized } = resolveLogLevels(relay.logLevel);
  const app = await NestFactory.create(AppModule, { logger: levels });
  const logger = new Logger('Bootstrap');
  if (!recognized) {
    logger.warn(`Unknown log level '${relay.logLevel}', using info`);
  }

  // Stops the acknowledgement poller and closes the Discord session on SIGINT/SIGTERM
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 7890;
  await app.listen(port);

  const nodeEnv = configService.get<string>('app.nodeEnv') || 'development';
  logger.log(`Using configuration ${configPath}`);
  logger.log(`Health endpoint listening on: ${await app.getUrl()}/api/v1/health`);
  logger.log(`Environment: ${nodeEnv}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
