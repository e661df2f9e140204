import { readFileSync, existsSync, writeFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ZodError } from 'zod';
import {
  CogwheelConfigSchema,
  DEFAULT_CONFIG,
  type CogwheelConfig,
} from '../../types/config.js';
import { ConfigError } from '../../core/errors.js';
import { logger } from './logger.js';

export const CONFIG_FILENAME = '.cogwheel.yaml';

/**
 * Find the project root by looking for .cogwheel.yaml or .git
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (currentDir !== dirname(currentDir)) {
    if (
      existsSync(join(currentDir, CONFIG_FILENAME)) ||
      existsSync(join(currentDir, '.git'))
    ) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return null;
}

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILENAME);
}

/**
 * Load and validate the configuration; defaults when the file is absent
 */
export function loadConfig(projectRoot: string): CogwheelConfig {
  const configPath = getConfigPath(projectRoot);

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = parseYaml(content);

    // An empty file parses to null
    return CogwheelConfigSchema.parse(interpolateEnvVars(rawConfig ?? {}));
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid config in ${configPath}: ${details}`);
    }
    if (error instanceof Error) {
      throw new ConfigError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Save configuration to .cogwheel.yaml
 */
export function saveConfig(projectRoot: string, config: CogwheelConfig): void {
  const content = stringifyYaml(config, { indent: 2 });
  writeFileSync(getConfigPath(projectRoot), content, 'utf-8');
}

/**
 * Interpolate environment variables in config values
 * Supports ${VAR_NAME} syntax
 */
export function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        logger.warn(`Environment variable ${varName} is not set`);
        return '';
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }

  return obj;
}
