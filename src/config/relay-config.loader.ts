import * as fs from 'fs';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { parse } from 'yaml';
import { RelayConfigError } from '../common/errors/relay-config.error';
import { EnvSubstitutionUtil } from '../common/utils/env-substitution.util';
import { errorMessage } from '../common/utils/error.util';
import {
  EMERGENCY_PRIORITY,
  MAX_PRIORITY,
  MIN_PRIORITY,
} from '../rules/interfaces/rule.interface';
import { ruleLabel } from '../rules/rule-selector.service';
import { RelayConfigDto } from './dto/relay-config.dto';
import { RelayConfig } from './relay-config.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

/**
 * Parses and validates rule-file text. Environment placeholders are
 * substituted before parsing.
 */
export function parseRelayConfig(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): RelayConfig {
  let document: unknown;
  try {
    document = parse(EnvSubstitutionUtil.substitute(text, env));
  } catch (error) {
    throw new RelayConfigError(
      `Invalid YAML: ${errorMessage(error)}`,
    );
  }

  if (!isRecord(document)) {
    throw new RelayConfigError('Configuration must be a YAML mapping');
  }

  const config = plainToInstance(RelayConfigDto, document);
  const problems = flattenErrors(
    validateSync(config, { forbidUnknownValues: true }),
  );
  if (problems.length > 0) {
    throw new RelayConfigError('Invalid configuration', problems);
  }

  return config;
}

export function loadRelayConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): RelayConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new RelayConfigError(
      `Failed to read config file ${filePath}: ${errorMessage(error)}`,
    );
  }
  return parseRelayConfig(text, env);
}

/**
 * Inconsistencies that degrade a rule without making the file unusable.
 */
export function collectConfigWarnings(config: RelayConfig): string[] {
  const warnings: string[] = [];

  config.rules.forEach((rule, index) => {
    const label = ruleLabel(rule, index);
    const { priority, emergency } = rule.actions;

    if (priority < MIN_PRIORITY || priority > MAX_PRIORITY) {
      warnings.push(
        `Rule '${label}' has unknown priority ${priority}; it will be sent as normal priority`,
      );
    }

    if (priority === EMERGENCY_PRIORITY && !emergency) {
      warnings.push(
        `Rule '${label}' has emergency priority but no 'emergency' parameters; it will be sent as high priority without acknowledgement tracking`,
      );
    }
    if (priority !== EMERGENCY_PRIORITY && emergency) {
      warnings.push(
        `Rule '${label}' defines 'emergency' parameters but priority is ${priority}; they are ignored`,
      );
    }
    if (priority === EMERGENCY_PRIORITY && emergency && emergency.expire <= 0) {
      warnings.push(
        `Rule '${label}' has non-positive emergency expire (${emergency.expire}); tracking uses 1 hour`,
      );
    }
  });

  return warnings;
}
