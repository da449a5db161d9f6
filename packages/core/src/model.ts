/**
 * Model
 *
 * Owns the packages, the unit table the model was loaded from, the external
 * data files and the external unit allocator. Grid shape is delegated to the
 * discretization package and is all zeros until one is present.
 */

import { existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import {
  ModelIOError,
  ValidationError,
  createLogger,
  describeError,
  getModelDefaults,
} from '@gwmodel/utils';
import type { ModelVersion } from '@gwmodel/utils';
import { ExternalUnitAllocator } from './external-units.js';
import { formatNameFile, writeNameFile } from './namefile/write.js';
import { Bas6Package } from './packages/bas6.js';
import { FixedPackage, createGlobalPackage, createListPackage } from './packages/fixed.js';
import { ParameterContext } from './parameters/parameter-context.js';
import { createDefaultRegistry } from './registry/default-registry.js';
import type { PackageRegistry } from './registry/registry.js';
import { isDiscretizationPackage } from './types/index.js';
import type {
  DiscretizationPackage,
  ExternalFileEntry,
  GridShape,
  LoadContext,
  ModelPackage,
} from './types/index.js';
import { UnitTable } from './unit-table.js';

const logger = createLogger('@gwmodel/core');

export interface ModelOptions {
  name?: string;
  namefileExt?: string;
  version?: ModelVersion;
  exeName?: string;
  structured?: boolean;
  listUnit?: number;
  workspace?: string;
  /**
   * Directory for external array files; only valid with workspace '.'
   */
  externalPath?: string;
  verbose?: boolean;
  /**
   * Registry to copy; defaults to the built-in kinds
   */
  registry?: PackageRegistry;
}

export interface AddExternalOptions {
  unit?: number;
  binary?: boolean;
}

export type ExternalSelector = { unit: number } | { filename: string };

export class Model {
  private modelName: string;
  readonly namefileExt: string;
  readonly version: ModelVersion;
  exeName: string;
  readonly heading: string;
  readonly structured: boolean;
  readonly workspace: string;
  readonly externalPath?: string;
  readonly external: boolean;
  freeFormat = true;
  verbose: boolean;

  readonly registry: PackageRegistry;
  readonly parameters = new ParameterContext();
  readonly units = new ExternalUnitAllocator();
  readonly global?: FixedPackage;
  readonly list: FixedPackage;

  /**
   * Table the model was loaded from; empty for a model built in code
   */
  unitTable = new UnitTable();

  private readonly ownedPackages: ModelPackage[] = [];
  private readonly externals: ExternalFileEntry[] = [];
  private readonly popUnits: number[] = [];

  constructor(options: ModelOptions = {}) {
    const defaults = getModelDefaults();
    this.modelName = options.name ?? 'modflowtest';
    this.namefileExt = options.namefileExt ?? 'nam';
    this.version = options.version ?? defaults.version;
    this.exeName = options.exeName ?? defaults.exeName;
    this.structured = options.structured ?? true;
    this.workspace = options.workspace ?? '.';
    this.verbose = options.verbose ?? defaults.verbose;
    this.registry = (options.registry ?? createDefaultRegistry()).clone();
    this.heading = `# Name file for ${this.version}, generated by gwmodel.`;

    if (!this.structured && this.version !== 'mfusg') {
      throw new ValidationError('structured=false can only be specified for mfusg models', {
        version: this.version,
      });
    }

    if (this.version === 'mf2k') {
      this.global = createGlobalPackage(this.modelName);
    }
    this.list = createListPackage(this.modelName, options.listUnit ?? defaults.listUnit);

    this.external = false;
    if (options.externalPath !== undefined) {
      if (this.workspace !== '.') {
        throw new ValidationError('external_path cannot be used with a model workspace', {
          workspace: this.workspace,
          externalPath: options.externalPath,
        });
      }
      if (existsSync(options.externalPath)) {
        logger.info(`Note: external_path ${options.externalPath} already exists`);
      } else {
        try {
          mkdirSync(options.externalPath, { recursive: true });
        } catch (error) {
          throw new ModelIOError(
            `Could not create external path '${options.externalPath}': ${describeError(error)}`,
            options.externalPath,
            error
          );
        }
      }
      this.externalPath = options.externalPath;
      this.external = true;
    }
  }

  get name(): string {
    return this.modelName;
  }

  /**
   * Rename the model, renaming the GLOBAL and LIST files with it
   */
  setName(name: string): void {
    this.modelName = name;
    this.global?.rename(name);
    this.list.rename(name);
  }

  get namefile(): string {
    return `${this.modelName}.${this.namefileExt}`;
  }

  // ---------------------------------------------------------------------------
  // Packages
  // ---------------------------------------------------------------------------

  get packages(): readonly ModelPackage[] {
    return this.ownedPackages;
  }

  get packageList(): string[] {
    return this.ownedPackages.map((pkg) => pkg.filetype);
  }

  /**
   * Add a package, replacing one with the same filetype
   */
  addPackage(pkg: ModelPackage): void {
    const index = this.ownedPackages.findIndex(
      (existing) => existing.filetype.toUpperCase() === pkg.filetype.toUpperCase()
    );
    if (index >= 0) {
      logger.warn('Replacing existing package', { model: this.modelName, filetype: pkg.filetype });
      this.ownedPackages[index] = pkg;
    } else {
      this.ownedPackages.push(pkg);
    }
  }

  getPackage(filetype: string): ModelPackage | undefined {
    const tag = filetype.toUpperCase();
    return this.ownedPackages.find((pkg) => pkg.filetype.toUpperCase() === tag);
  }

  hasPackage(filetype: string): boolean {
    return this.getPackage(filetype) !== undefined;
  }

  removePackage(filetype: string): boolean {
    const tag = filetype.toUpperCase();
    const index = this.ownedPackages.findIndex((pkg) => pkg.filetype.toUpperCase() === tag);
    if (index < 0) {
      return false;
    }
    this.ownedPackages.splice(index, 1);
    return true;
  }

  // ---------------------------------------------------------------------------
  // Grid shape
  // ---------------------------------------------------------------------------

  get dis(): DiscretizationPackage | undefined {
    const pkg = this.getPackage('DIS');
    return pkg && isDiscretizationPackage(pkg) ? pkg : undefined;
  }

  get shape(): GridShape {
    const dis = this.dis;
    if (!dis) {
      return { nrow: 0, ncol: 0, nlay: 0, nper: 0 };
    }
    return { nrow: dis.nrow, ncol: dis.ncol, nlay: dis.nlay, nper: dis.nper };
  }

  get nlay(): number {
    return this.shape.nlay;
  }

  get nrow(): number {
    return this.shape.nrow;
  }

  get ncol(): number {
    return this.shape.ncol;
  }

  get nper(): number {
    return this.shape.nper;
  }

  /**
   * Free-format flag from BAS6, false without a BAS6 package
   */
  getIfrefm(): boolean {
    const bas = this.getPackage('BAS6');
    return bas instanceof Bas6Package ? bas.ifrefm : false;
  }

  // ---------------------------------------------------------------------------
  // External files
  // ---------------------------------------------------------------------------

  get externalFiles(): readonly ExternalFileEntry[] {
    return this.externals;
  }

  /**
   * Next allocator unit not already used by a package or external file
   */
  nextExternalUnit(): number {
    let unit = this.units.allocate();
    while (this.unitOwner(unit)) {
      unit = this.units.allocate();
    }
    return unit;
  }

  /**
   * Describes the file holding a unit, or undefined when the unit is free
   */
  unitOwner(unit: number): string | undefined {
    const external = this.externals.find((entry) => entry.unit === unit);
    if (external) {
      return `external file '${external.filename}'`;
    }
    for (const pkg of [this.global, this.list, ...this.ownedPackages]) {
      const entry = pkg?.fileEntries().find((candidate) => candidate.unit === unit);
      if (entry) {
        return `${entry.name} file '${entry.filename}'`;
      }
    }
    return undefined;
  }

  /**
   * Track an external data file, allocating a unit when none is given
   *
   * @throws ValidationError if the unit is already used by a package or another external file
   */
  addExternal(filename: string, options: AddExternalOptions = {}): ExternalFileEntry {
    const unit = options.unit ?? this.nextExternalUnit();
    // unit 0 entries are never written to the name file
    const owner = unit === 0 ? undefined : this.unitOwner(unit);
    if (owner) {
      throw new ValidationError(`Unit ${unit} is already used by ${owner}`, {
        unit,
        filename,
      });
    }
    this.units.reserve(unit);
    const entry: ExternalFileEntry = { unit, filename, binary: options.binary ?? false };
    this.externals.push(entry);
    return entry;
  }

  /**
   * Stop tracking an external file
   *
   * @returns whether an entry was removed
   */
  removeExternal(selector: ExternalSelector): boolean {
    const index = this.externals.findIndex((entry) =>
      'unit' in selector ? entry.unit === selector.unit : entry.filename === selector.filename
    );
    if (index < 0) {
      return false;
    }
    this.externals.splice(index, 1);
    return true;
  }

  /**
   * Units packages have claimed as internal output
   */
  get popList(): readonly number[] {
    return this.popUnits;
  }

  claimUnit(unit: number): void {
    if (!this.popUnits.includes(unit)) {
      this.popUnits.push(unit);
    }
  }

  // ---------------------------------------------------------------------------
  // Loading and writing
  // ---------------------------------------------------------------------------

  /**
   * Context handed to package loaders
   */
  createLoadContext(unitTable: UnitTable): LoadContext {
    const model = this;
    return {
      modelName: this.modelName,
      workspace: this.workspace,
      unitTable,
      parameters: this.parameters,
      get shape() {
        return model.shape;
      },
      resolvePath: (filename) => resolve(this.workspace, filename),
      claimUnit: (unit) => this.claimUnit(unit),
    };
  }

  formatNameFile(): string {
    return formatNameFile(this);
  }

  /**
   * @returns path of the written name file
   */
  writeNameFile(): string {
    return writeNameFile(this);
  }

  /**
   * Write the name file and every package's input file
   *
   * @throws ModelIOError on file system failure
   */
  writeInput(): void {
    this.writeNameFile();
    for (const pkg of this.ownedPackages) {
      try {
        pkg.write(this.workspace);
      } catch (error) {
        if (error instanceof ModelIOError) {
          throw error;
        }
        throw new ModelIOError(
          `Could not write ${pkg.filetype} package: ${describeError(error)}`,
          resolve(this.workspace, pkg.fileEntries()[0]?.filename ?? ''),
          error
        );
      }
    }
    logger.debug('Wrote model input files', {
      model: this.modelName,
      packages: this.packageList,
    });
  }

  toString(): string {
    const { nrow, ncol, nlay, nper } = this.shape;
    return `MODFLOW ${nlay} layer(s), ${nrow} row(s), ${ncol} column(s), ${nper} stress period(s)`;
  }
}
