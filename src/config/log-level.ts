import { LogLevel } from '@nestjs/common';

const LEVELS: Record<string, LogLevel[]> = {
  trace: ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'],
  debug: ['debug', 'log', 'warn', 'error', 'fatal'],
  info: ['log', 'warn', 'error', 'fatal'],
  warn: ['warn', 'error', 'fatal'],
  error: ['error', 'fatal'],
};

export interface ResolvedLogLevels {
  levels: LogLevel[];
  recognized: boolean;
}

/**
 * Maps the rule file's logLevel onto Nest logger levels. Empty means info;
 * unknown values fall back to info and are reported as unrecognized.
 */
export function resolveLogLevels(level: string | undefined): ResolvedLogLevels {
  const key = (level ?? '').trim().toLowerCase();
  if (key === '') {
    return { levels: LEVELS.info, recognized: true };
  }
  const levels = LEVELS[key === 'warning' ? 'warn' : key];
  return levels
    ? { levels, recognized: true }
    : { levels: LEVELS.info, recognized: false };
}
