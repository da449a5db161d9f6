/**
 * Package base classes
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import type { ModelPackage, PackageFileEntry } from '../types/index.js';

/**
 * Package backed by a single input file whose text is kept verbatim
 * and written back unchanged.
 */
export abstract class TextPackage implements ModelPackage {
  constructor(
    readonly filetype: string,
    public unit: number,
    public filename: string,
    readonly text: string
  ) {}

  fileEntries(): PackageFileEntry[] {
    return [{ name: this.filetype, unit: this.unit, filename: this.filename }];
  }

  write(workspace: string): void {
    const path = resolve(workspace, this.filename);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, this.text, 'utf-8');
  }
}

/**
 * Package of a known kind that this library does not interpret
 */
export class OpaquePackage extends TextPackage {}
