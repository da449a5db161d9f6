/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from gwmodel.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { MODEL_VERSIONS } from './model-version.js';

export const AppConfigSchema = z.object({
  model: z
    .object({
      version: z.enum(MODEL_VERSIONS).optional(),
      exeName: z.string().min(1).optional(),
      verbose: z.boolean().optional(),
      listUnit: z.number().int().positive().optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// Keyed by resolved path
const cachedConfigs = new Map<string, AppConfig>();

/**
 * Load configuration from gwmodel.yaml file
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  const defaultPath = configPath || join(process.cwd(), 'gwmodel.yaml');
  const cached = cachedConfigs.get(defaultPath);
  if (cached) {
    return cached;
  }

  if (!existsSync(defaultPath)) {
    logger.debug('gwmodel.yaml not found, using environment variables only', { path: defaultPath });
    cachedConfigs.set(defaultPath, {});
    return {};
  }

  try {
    const content = readFileSync(defaultPath, 'utf-8');
    const config = AppConfigSchema.parse(load(content) ?? {});
    logger.info('Loaded configuration from gwmodel.yaml', { path: defaultPath });
    cachedConfigs.set(defaultPath, config);
    return config;
  } catch (error) {
    logger.warn('Failed to load gwmodel.yaml, using environment variables only', {
      path: defaultPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfigs.set(defaultPath, {});
    return {};
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfigs.clear();
}
