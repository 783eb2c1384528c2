/**
 * YAML Configuration Loader
 * ==========================
 * Loads config.yaml from the working directory. Sections are validated by the
 * packages that own them.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

export type AppConfig = Record<string, unknown>;

let cachedConfig: AppConfig | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from config.yaml (or the given path).
 *
 * A missing file yields an empty config. A file that does not parse, or whose
 * root is not a mapping, is a ConfigurationError: silently running with
 * defaults would change which strategy gets selected.
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null && configPath === undefined) {
    return cachedConfig;
  }

  const resolvedPath = configPath || process.env.STRATLAB_CONFIG || join(process.cwd(), 'config.yaml');

  if (!existsSync(resolvedPath)) {
    logger.debug('config.yaml not found, using defaults', { path: resolvedPath });
    return (cachedConfig = {});
  }

  let parsed: unknown;
  try {
    parsed = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError('Failed to parse config.yaml', resolvedPath, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (parsed === undefined || parsed === null) {
    return (cachedConfig = {});
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError('config.yaml root must be a mapping', resolvedPath);
  }

  logger.info('Loaded configuration from config.yaml', { path: resolvedPath });
  cachedConfig = parsed;
  return parsed;
}

/**
 * Validate one top-level section of config.yaml with a zod schema.
 * An absent section is validated as {} so schema defaults apply.
 */
export function loadConfigSection<T>(
  section: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  config: AppConfig = loadConfigFromYaml()
): T {
  const raw = config[section] ?? {};
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${[section, ...issue.path].join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, section);
  }
  return result.data;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
