/**
 * Load options schema
 */

import { z } from 'zod';
import { MODEL_VERSIONS, ValidationError, getModelDefaults } from '@gwmodel/utils';
import type { ModelVersion } from '@gwmodel/utils';
import { PackageRegistry } from '../registry/registry.js';

export const LoadModelOptionsSchema = z.object({
  version: z.enum(MODEL_VERSIONS).optional(),
  exeName: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  workspace: z.string().min(1).optional(),
  /**
   * Filetypes to load; DIS and the parameter packages are always loaded
   */
  loadOnly: z.union([z.string().min(1), z.array(z.string().min(1))]).optional(),
  listUnit: z.number().int().positive().optional(),
  registry: z.instanceof(PackageRegistry).optional(),
  /**
   * Path of a gwmodel.yaml supplying defaults
   */
  configPath: z.string().optional(),
});

export type LoadModelOptions = z.input<typeof LoadModelOptionsSchema>;

export interface ResolvedLoadOptions {
  version: ModelVersion;
  exeName: string;
  verbose: boolean;
  workspace: string;
  loadOnly?: string[];
  listUnit: number;
  registry?: PackageRegistry;
}

/**
 * Validate options and fill in configured defaults
 *
 * @throws ValidationError on invalid options
 */
export function resolveLoadOptions(options: LoadModelOptions = {}): ResolvedLoadOptions {
  const validation = LoadModelOptionsSchema.safeParse(options);
  if (!validation.success) {
    throw new ValidationError(
      `Invalid load options: ${validation.error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ')}`
    );
  }

  const parsed = validation.data;
  const defaults = getModelDefaults(parsed.configPath);
  const loadOnly =
    parsed.loadOnly === undefined
      ? undefined
      : (Array.isArray(parsed.loadOnly) ? parsed.loadOnly : [parsed.loadOnly]).map((tag) =>
          tag.toUpperCase()
        );

  return {
    version: parsed.version ?? defaults.version,
    exeName: parsed.exeName ?? defaults.exeName,
    verbose: parsed.verbose ?? defaults.verbose,
    workspace: parsed.workspace ?? '.',
    loadOnly,
    listUnit: parsed.listUnit ?? defaults.listUnit,
    registry: parsed.registry,
  };
}
