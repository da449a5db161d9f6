/**
 * Configuration loading from environment variables
 *
 * Provides typed model defaults. Explicit options win over gwmodel.yaml,
 * which wins over the environment.
 */

import { ConfigurationError } from '../errors.js';
import { MODEL_VERSIONS, isModelVersion } from './model-version.js';
import type { ModelVersion } from './model-version.js';
import { loadConfigFromYaml } from './yaml-config.js';

export * from './model-version.js';
export * from './yaml-config.js';

export interface ModelDefaults {
  version: ModelVersion;
  exeName: string;
  verbose: boolean;
  listUnit: number;
}

/**
 * Load model defaults from environment variables
 */
export function getEnvModelDefaults(): ModelDefaults {
  const { GWMODEL_VERSION, GWMODEL_EXE, GWMODEL_VERBOSE, GWMODEL_LIST_UNIT } = process.env;

  const version = (GWMODEL_VERSION || 'mf2005').toLowerCase();
  if (!isModelVersion(version)) {
    throw new ConfigurationError(
      `Unsupported model version '${version}', expected one of ${MODEL_VERSIONS.join(', ')}`,
      'GWMODEL_VERSION'
    );
  }

  const listUnit = GWMODEL_LIST_UNIT ? Number(GWMODEL_LIST_UNIT) : 2;
  if (!Number.isInteger(listUnit) || listUnit <= 0) {
    throw new ConfigurationError(
      `GWMODEL_LIST_UNIT must be a positive integer, got '${GWMODEL_LIST_UNIT ?? ''}'`,
      'GWMODEL_LIST_UNIT'
    );
  }

  return {
    version,
    exeName: GWMODEL_EXE || 'mf2005.exe',
    verbose: GWMODEL_VERBOSE === 'true' || GWMODEL_VERBOSE === '1',
    listUnit,
  };
}

/**
 * Model defaults with gwmodel.yaml applied over the environment
 */
export function getModelDefaults(configPath?: string): ModelDefaults {
  const env = getEnvModelDefaults();
  const model = loadConfigFromYaml(configPath).model ?? {};

  return {
    version: model.version ?? env.version,
    exeName: model.exeName ?? env.exeName,
    verbose: model.verbose ?? env.verbose,
    listUnit: model.listUnit ?? env.listUnit,
  };
}
