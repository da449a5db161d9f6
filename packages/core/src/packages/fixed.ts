/**
 * GLOBAL and LIST packages
 *
 * Always present on a model (GLOBAL for mf2k only), never resolved through
 * the registry and never written: the simulator produces these files.
 */

import type { ModelPackage, PackageFileEntry } from '../types/index.js';

export class FixedPackage implements ModelPackage {
  public filename: string;

  constructor(
    readonly filetype: 'GLOBAL' | 'LIST',
    readonly extension: string,
    public unit: number,
    modelName: string
  ) {
    this.filename = `${modelName}.${extension}`;
  }

  rename(modelName: string): void {
    this.filename = `${modelName}.${this.extension}`;
  }

  fileEntries(): PackageFileEntry[] {
    return [{ name: this.filetype, unit: this.unit, filename: this.filename }];
  }

  write(): void {
    // output of the simulator, nothing to write
  }

  toString(): string {
    return this.filetype === 'GLOBAL' ? 'Global Package class' : 'List Package class';
  }
}

export function createGlobalPackage(modelName: string): FixedPackage {
  return new FixedPackage('GLOBAL', 'glo', 1, modelName);
}

export function createListPackage(modelName: string, unit: number = 2): FixedPackage {
  return new FixedPackage('LIST', 'list', unit, modelName);
}
