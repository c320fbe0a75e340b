import * as fs from 'fs';
import * as path from 'path';
import { RelayConfigError } from '../common/errors/relay-config.error';

export const DEFAULT_CONFIG_FILES = ['relay.yaml', 'relay.yml'];

function configArgument(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-c' || arg === '--config') {
      return argv[i + 1];
    }
    if (arg.startsWith('--config=')) {
      return arg.slice('--config='.length);
    }
  }
  return undefined;
}

/**
 * Config file location: -c/--config argument, then RELAY_CONFIG_PATH,
 * then relay.yaml or relay.yml in the working directory.
 */
export function resolveConfigPath(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  cwd: string,
  exists: (file: string) => boolean = fs.existsSync,
): string {
  const explicit = configArgument(argv) ?? env.RELAY_CONFIG_PATH;
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!exists(resolved)) {
      throw new RelayConfigError(`Config file not found: ${resolved}`);
    }
    return resolved;
  }

  for (const name of DEFAULT_CONFIG_FILES) {
    const candidate = path.join(cwd, name);
    if (exists(candidate)) {
      return candidate;
    }
  }

  throw new RelayConfigError(
    `Configuration file not found. Pass -c <path>, set RELAY_CONFIG_PATH, or place ${DEFAULT_CONFIG_FILES.join(' or ')} in ${cwd}`,
  );
}
