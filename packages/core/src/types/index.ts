/**
 * Model Domain Types
 *
 * Shared shapes for name-file entries, packages, loaders and load outcomes.
 */

import type { PackageLoadError } from '@gwmodel/utils';
import type { ParameterContext } from '../parameters/parameter-context.js';
import type { UnitTable } from '../unit-table.js';

/**
 * One record of the name file
 */
export interface UnitTableEntry {
  /**
   * File unit number, unique within a table
   */
  unit: number;

  /**
   * Filename as written in the name file (relative to the workspace)
   */
  filename: string;

  /**
   * Upper-cased filetype tag, e.g. DIS or DATA(BINARY)
   */
  filetype: string;

  binary: boolean;

  /**
   * Optional trailing option such as REPLACE or OLD
   */
  option?: string;

  /**
   * 1-based line in the name file the entry came from
   */
  lineNumber?: number;
}

/**
 * A data file tracked by unit number but not owned by any package
 */
export interface ExternalFileEntry {
  unit: number;
  filename: string;
  binary: boolean;
}

/**
 * One (name, unit, filename) triple a package contributes to the name file
 */
export interface PackageFileEntry {
  name: string;
  unit: number;
  filename: string;
}

export interface GridShape {
  nrow: number;
  ncol: number;
  nlay: number;
  nper: number;
}

/**
 * Capability set every package provides
 */
export interface ModelPackage {
  /**
   * Primary filetype tag
   */
  readonly filetype: string;

  /**
   * Name-file entries owned by this package, primary file first
   */
  fileEntries(): PackageFileEntry[];

  /**
   * Write the package's own input file(s) into the workspace
   */
  write(workspace: string): void;
}

/**
 * Package that defines the grid shape
 */
export interface DiscretizationPackage extends ModelPackage, GridShape {}

export function isDiscretizationPackage(pkg: ModelPackage): pkg is DiscretizationPackage {
  return (
    'nrow' in pkg &&
    typeof pkg.nrow === 'number' &&
    'ncol' in pkg &&
    typeof pkg.ncol === 'number' &&
    'nlay' in pkg &&
    typeof pkg.nlay === 'number' &&
    'nper' in pkg &&
    typeof pkg.nper === 'number'
  );
}

/**
 * Load tier of a loader
 *
 * - discretization: loaded before everything else, failure is fatal
 * - parameter: loaded before ordinary packages, feeds the ParameterContext
 * - package: everything else
 */
export type PackageRole = 'discretization' | 'parameter' | 'package';

/**
 * What a loader sees of the model under construction
 */
export interface LoadContext {
  readonly modelName: string;
  readonly workspace: string;

  /**
   * Working table of entries not yet claimed
   */
  readonly unitTable: UnitTable;

  readonly parameters: ParameterContext;

  /**
   * Current grid shape, zeros until DIS is loaded
   */
  readonly shape: GridShape;

  resolvePath(filename: string): string;

  /**
   * Mark a unit as internal to the package, removing it from external tracking
   */
  claimUnit(unit: number): void;
}

export interface PackageLoader<P extends ModelPackage = ModelPackage> {
  readonly filetype: string;
  readonly role: PackageRole;
  load(filename: string, context: LoadContext): P;
}

/**
 * Outcome of one manifest entry during a load
 */
export type PackageLoadResult =
  | { status: 'loaded'; filetype: string; filename: string; package: ModelPackage }
  | { status: 'failed'; filetype: string; filename: string; error: PackageLoadError }
  | { status: 'skipped'; filetype: string; filename: string; reason: string };

/**
 * Pop-list unit that had no entry left to remove
 */
export interface ReconciliationWarning {
  unit: number;
  message: string;
}
