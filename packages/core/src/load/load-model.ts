/**
 * Model Loader
 *
 * Builds a Model from a name file. Order of work:
 *   1. create the model
 *   2. parse the name file
 *   3. load the discretization package (fatal on failure)
 *   4. validate loadOnly, adopt the GLOBAL/LIST entries
 *   5. load parameter packages (PVAL, ZONE, MULT)
 *   6. load the remaining entries in name-file order
 *   7. drop units packages claimed as internal output
 *   8. log a summary
 * Only the discretization step, name-file parsing and loadOnly validation can
 * fail the load; every other package records its own outcome.
 */

import { statSync } from 'fs';
import { basename, join } from 'path';
import {
  InvalidLoadOnlyError,
  MissingDiscretizationError,
  ModelLoadError,
  PackageLoadError,
  createLogger,
  describeError,
  handleError,
} from '@gwmodel/utils';
import type { LogContext } from '@gwmodel/utils';
import { Model } from '../model.js';
import { parseNameFile } from '../namefile/parse.js';
import type {
  LoadContext,
  PackageLoadResult,
  PackageLoader,
  ReconciliationWarning,
  UnitTableEntry,
} from '../types/index.js';
import type { UnitTable } from '../unit-table.js';
import { resolveLoadOptions } from './options.js';
import type { LoadModelOptions } from './options.js';

const logger = createLogger('@gwmodel/core');

/**
 * Parameter packages are resolved in this order; unlisted ones follow
 */
export const PARAMETER_LOAD_ORDER = ['PVAL', 'ZONE', 'MULT'];

export interface LoadModelResult {
  model: Model;
  /**
   * Files loaded successfully, in load order
   */
  loaded: string[];
  /**
   * Files that failed or were skipped, in processing order
   */
  notLoaded: string[];
  results: PackageLoadResult[];
  warnings: ReconciliationWarning[];
}

/**
 * Model name, name file extension and path for a name file argument.
 * An argument that is not an existing file is taken as the model name.
 */
export function locateNameFile(
  namefile: string,
  workspace: string
): { name: string; extension: string; path: string } {
  const direct = join(workspace, namefile);
  if (statSync(direct, { throwIfNoEntry: false })?.isFile()) {
    const dot = namefile.lastIndexOf('.');
    if (dot > 0) {
      return { name: namefile.slice(0, dot), extension: namefile.slice(dot + 1), path: direct };
    }
    return { name: namefile, extension: 'nam', path: direct };
  }
  return { name: namefile, extension: 'nam', path: join(workspace, `${namefile}.nam`) };
}

function parameterRank(filetype: string): number {
  const index = PARAMETER_LOAD_ORDER.indexOf(filetype);
  return index < 0 ? PARAMETER_LOAD_ORDER.length : index;
}

function runLoader(
  model: Model,
  entry: UnitTableEntry,
  loader: PackageLoader,
  context: LoadContext
): PackageLoadResult {
  try {
    const pkg = loader.load(entry.filename, context);
    model.addPackage(pkg);
    context.unitTable.remove(entry.unit);
    return { status: 'loaded', filetype: entry.filetype, filename: entry.filename, package: pkg };
  } catch (error) {
    const failure =
      error instanceof PackageLoadError
        ? error
        : new PackageLoadError(
            `${entry.filetype} package load failed: ${describeError(error)}`,
            entry.filetype,
            entry.filename,
            error
          );
    return { status: 'failed', filetype: entry.filetype, filename: entry.filename, error: failure };
  }
}

/**
 * Requested filetypes, or every filetype left in the table when none are given
 *
 * @throws InvalidLoadOnlyError naming requested filetypes absent from the table
 */
function resolveLoadOnly(
  requested: string[] | undefined,
  working: UnitTable,
  discretizationTag: string
): Set<string> {
  const present = new Set(working.filetypes());
  if (!requested) {
    return present;
  }
  const missing = Array.from(
    new Set(
      requested.filter((tag) => tag !== 'DIS' && tag !== discretizationTag && !present.has(tag))
    )
  );
  if (missing.length > 0) {
    throw new InvalidLoadOnlyError(missing);
  }
  return new Set(requested);
}

/**
 * GLOBAL and LIST entries set the unit and filename of the fixed packages
 */
function adoptFixedPackages(model: Model, working: UnitTable): void {
  for (const fixed of [model.global, model.list]) {
    if (!fixed) {
      continue;
    }
    const entry = working.findByFiletype(fixed.filetype);
    if (entry) {
      fixed.unit = entry.unit;
      fixed.filename = entry.filename;
      working.remove(entry.unit);
    }
  }
}

/**
 * Load an existing model from its name file
 *
 * @param namefile - Name file, relative to the workspace, or a model name
 * @throws ManifestFormatError if the name file cannot be read or parsed
 * @throws MissingDiscretizationError if no entry resolves to a discretization loader
 * @throws ModelLoadError if the discretization package fails to load
 * @throws InvalidLoadOnlyError if loadOnly names filetypes absent from the name file
 */
export function loadModel(namefile: string, options: LoadModelOptions = {}): LoadModelResult {
  const resolved = resolveLoadOptions(options);
  const located = locateNameFile(namefile, resolved.workspace);
  const log = logger.child({ model: located.name });
  const report = (message: string, context?: LogContext): void => {
    if (resolved.verbose) {
      log.info(message, context);
    } else {
      log.debug(message, context);
    }
  };

  report('Creating new model', { namefile: located.path, workspace: resolved.workspace });
  const model = new Model({
    name: located.name,
    namefileExt: located.extension,
    version: resolved.version,
    exeName: resolved.exeName,
    verbose: resolved.verbose,
    workspace: resolved.workspace,
    listUnit: resolved.listUnit,
    registry: resolved.registry,
  });

  const working = parseNameFile(located.path);
  model.unitTable = working.clone();
  report('Parsed name file', { entries: working.size });

  const context = model.createLoadContext(working);
  const results: PackageLoadResult[] = [];
  const warnings: ReconciliationWarning[] = [];

  // Discretization first; the first matching entry wins
  let discretization: { entry: UnitTableEntry; loader: PackageLoader } | undefined;
  for (const entry of working) {
    const loader = model.registry.resolve(entry.filetype);
    if (loader?.role === 'discretization') {
      discretization = { entry, loader };
      break;
    }
  }
  if (!discretization) {
    throw new MissingDiscretizationError(located.path);
  }
  const disEntry = discretization.entry;
  try {
    const pkg = discretization.loader.load(disEntry.filename, context);
    model.addPackage(pkg);
    working.remove(disEntry.unit);
    results.push({ status: 'loaded', filetype: disEntry.filetype, filename: disEntry.filename, package: pkg });
    report(`${disEntry.filetype} package load...success`, { filename: disEntry.filename });
  } catch (error) {
    throw new ModelLoadError(
      `Could not read discretization package: ${basename(disEntry.filename)}. Stopping... ${describeError(error)}`,
      'DISCRETIZATION_LOAD_ERROR',
      { filename: disEntry.filename, filetype: disEntry.filetype },
      error
    );
  }

  const loadOnly = resolveLoadOnly(resolved.loadOnly, working, disEntry.filetype);
  adoptFixedPackages(model, working);

  const handled = new Set<number>();
  const record = (entry: UnitTableEntry, result: PackageLoadResult): void => {
    handled.add(entry.unit);
    results.push(result);
    if (result.status === 'failed') {
      handleError(result.error, { model: located.name });
    } else {
      report(`${entry.filetype} package load...${result.status === 'loaded' ? 'success' : 'skipped'}`, {
        filename: entry.filename,
      });
    }
  };

  // Parameter sources before any package that may refer to them
  const parameterEntries = working
    .list()
    .flatMap((entry) => {
      const loader = model.registry.resolve(entry.filetype);
      return loader?.role === 'parameter' ? [{ entry, loader }] : [];
    })
    .sort((a, b) => parameterRank(a.entry.filetype) - parameterRank(b.entry.filetype));
  for (const { entry, loader } of parameterEntries) {
    record(entry, runLoader(model, entry, loader, context));
  }

  // Remaining entries in name-file order
  for (const entry of working.list()) {
    if (handled.has(entry.unit)) {
      continue;
    }
    const resolution = model.registry.classify(entry.filetype);

    if (resolution.kind === 'package') {
      if (resolution.loader.role === 'discretization') {
        log.warn('Ignoring additional discretization entry', {
          filetype: entry.filetype,
          filename: entry.filename,
          unit: entry.unit,
        });
        record(entry, {
          status: 'skipped',
          filetype: entry.filetype,
          filename: entry.filename,
          reason: `discretization already loaded from '${disEntry.filename}'`,
        });
      } else if (loadOnly.has(entry.filetype)) {
        record(entry, runLoader(model, entry, resolution.loader, context));
      } else {
        record(entry, {
          status: 'skipped',
          filetype: entry.filetype,
          filename: entry.filename,
          reason: 'not in loadOnly',
        });
      }
    } else if (resolution.kind === 'external') {
      // Claimed output units belong to their package
      const owner = model.popList.includes(entry.unit) ? undefined : model.unitOwner(entry.unit);
      if (owner) {
        record(entry, {
          status: 'skipped',
          filetype: entry.filetype,
          filename: entry.filename,
          reason: `unit ${entry.unit} is already used by ${owner}`,
        });
        continue;
      }
      handled.add(entry.unit);
      report(`${entry.filetype} file load...skipped`, { filename: basename(entry.filename) });
      if (!model.popList.includes(entry.unit)) {
        model.addExternal(entry.filename, { unit: entry.unit, binary: resolution.binary });
      }
    } else {
      record(entry, {
        status: 'skipped',
        filetype: entry.filetype,
        filename: entry.filename,
        reason: 'unrecognized filetype',
      });
    }
  }

  // Units claimed by packages are not external files
  for (const unit of model.popList) {
    const removedExternal = model.removeExternal({ unit });
    const removedEntry = working.remove(unit);
    if (!removedExternal && !removedEntry) {
      const warning: ReconciliationWarning = {
        unit,
        message: `external file unit ${unit} does not exist in the unit table`,
      };
      warnings.push(warning);
      log.warn(`Warning: ${warning.message}`, { unit });
    }
  }

  const loaded = results.filter((result) => result.status === 'loaded').map((result) => result.filename);
  const notLoaded = results.filter((result) => result.status !== 'loaded').map((result) => result.filename);

  report(`The following ${loaded.length} packages were successfully loaded.`, {
    files: loaded.map((filename) => basename(filename)),
  });
  if (notLoaded.length > 0) {
    report(`The following ${notLoaded.length} packages were not loaded.`, {
      files: notLoaded.map((filename) => basename(filename)),
    });
  }

  return { model, loaded, notLoaded, results, warnings };
}
