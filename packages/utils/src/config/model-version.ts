/**
 * Supported simulator versions
 */
export const MODEL_VERSIONS = ['mf2k', 'mf2005', 'mfnwt', 'mfusg'] as const;

export type ModelVersion = (typeof MODEL_VERSIONS)[number];

export function isModelVersion(value: string): value is ModelVersion {
  return MODEL_VERSIONS.some((version) => version === value);
}
