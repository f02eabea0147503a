/**
 * Config file loading: YAML in, validated Config out.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config } from './types.js';

export const DEFAULT_CONFIG_PATH = './config/config.yaml';

/** @throws ConfigError when the file is missing, unreadable, not YAML, or fails the schema. */
export function loadConfig(path: string): Config {
  if (!existsSync(path)) {
    throw new ConfigError(
      `Failed to read config file at "${path}": file not found. ` +
        'Run `storefront-autopilot --init` to create one, or pass --config <path>.',
    );
  }

  let document: unknown;
  try {
    document = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const stage = err instanceof YAMLParseError ? 'parse YAML in' : 'read';
    throw new ConfigError(`Failed to ${stage} config file "${path}": ${errorMessage(err)}`);
  }

  const result = ConfigSchema.safeParse(document);
  if (!result.success) {
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${z.prettifyError(result.error)}`);
  }

  const config = result.data;
  logger.info({ configPath: path, llm: config.llm.type, categories: config.brand.mainCategories.length }, 'Config loaded');
  return config;
}

/** `--config`, then `CONFIG_PATH`, then {@link DEFAULT_CONFIG_PATH}. */
export function resolveConfigPath(explicit?: string): string {
  return explicit || process.env['CONFIG_PATH'] || DEFAULT_CONFIG_PATH;
}
