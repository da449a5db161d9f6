/**
 * Free-format record reading shared by the package loaders
 */

import { readFileSync } from 'fs';
import { PackageLoadError, describeError } from '@gwmodel/utils';
import type { LoadContext } from '../types/index.js';

/**
 * Read a package input file relative to the workspace
 */
export function readPackageText(filetype: string, filename: string, context: LoadContext): string {
  const path = context.resolvePath(filename);
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new PackageLoadError(
      `Could not read ${filetype} file '${path}': ${describeError(error)}`,
      filetype,
      filename,
      error
    );
  }
}

/**
 * Unit of a file in the working table, or the package default
 */
export function resolveUnit(context: LoadContext, filename: string, fallback: number): number {
  return context.unitTable.findByFilename(filename)?.unit ?? fallback;
}

/**
 * Line cursor over the data records of a package file.
 * Leading comment lines (starting with '#') and blank lines are skipped.
 */
export class RecordCursor {
  private readonly lines: string[];
  private index = 0;

  constructor(
    readonly filetype: string,
    readonly filename: string,
    text: string
  ) {
    this.lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  nextLine(what: string): string {
    const line = this.lines[this.index];
    if (line === undefined) {
      return this.fail(`unexpected end of file while reading ${what}`);
    }
    this.index += 1;
    return line;
  }

  nextTokens(what: string): string[] {
    return this.nextLine(what).split(/\s+/);
  }

  fail(message: string): never {
    throw new PackageLoadError(
      `${this.filetype} file '${this.filename}': ${message}`,
      this.filetype,
      this.filename
    );
  }

  integer(token: string | undefined, what: string): number {
    if (token === undefined || !/^[+-]?\d+$/.test(token)) {
      return this.fail(`expected an integer for ${what}, got '${token ?? ''}'`);
    }
    return Number.parseInt(token, 10);
  }

  number(token: string | undefined, what: string): number {
    const value = token === undefined ? Number.NaN : Number(token.replace(/[dD]/, 'e'));
    if (!Number.isFinite(value)) {
      return this.fail(`expected a number for ${what}, got '${token ?? ''}'`);
    }
    return value;
  }
}
