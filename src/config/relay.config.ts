import { registerAs } from '@nestjs/config';
import { resolveConfigPath } from './config-path';
import { loadRelayConfig } from './relay-config.loader';
import { RelayConfig } from './relay-config.interface';

export const relayConfig = registerAs(
  'relay',
  (): RelayConfig =>
    loadRelayConfig(
      resolveConfigPath(process.argv.slice(2), process.env, process.cwd()),
    ),
);
