/**
 * @gwmodel/core - Model, name file and load orchestration
 */

export * from './types/index.js';
export { UnitTable } from './unit-table.js';
export { ExternalUnitAllocator, EXTERNAL_UNIT_START } from './external-units.js';
export { Model } from './model.js';
export type { ModelOptions, AddExternalOptions, ExternalSelector } from './model.js';

// Name file
export { parseNameFile, parseNameFileText } from './namefile/parse.js';
export {
  formatNameFile,
  writeNameFile,
  formatEntryLine,
  formatExternalLine,
  relativeToWorkspace,
} from './namefile/write.js';

// Registry
export { PackageRegistry } from './registry/registry.js';
export type { FiletypeResolution, RegisterOptions } from './registry/registry.js';
export { createDefaultRegistry, KNOWN_PACKAGE_KINDS } from './registry/default-registry.js';
export type { KnownPackageKind } from './registry/default-registry.js';

// Parameters
export { ParameterContext } from './parameters/parameter-context.js';
export type { ArraySource } from './parameters/parameter-context.js';
export { readArrayBlock } from './parameters/array-reader.js';

// Packages
export * from './packages/index.js';

// Loading
export { loadModel, locateNameFile, PARAMETER_LOAD_ORDER } from './load/load-model.js';
export type { LoadModelResult } from './load/load-model.js';
export { resolveLoadOptions, LoadModelOptionsSchema } from './load/options.js';
export type { LoadModelOptions, ResolvedLoadOptions } from './load/options.js';
