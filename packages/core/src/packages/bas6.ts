/**
 * Basic (BAS6) package. The options record decides free-format input.
 */

import type { PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const BAS6_DEFAULT_UNIT = 13;

export class Bas6Package extends TextPackage {
  constructor(
    unit: number,
    filename: string,
    text: string,
    readonly options: string[]
  ) {
    super('BAS6', unit, filename, text);
  }

  /**
   * Free-format flag (IFREFM)
   */
  get ifrefm(): boolean {
    return this.options.includes('FREE');
  }
}

export const bas6Loader: PackageLoader<Bas6Package> = {
  filetype: 'BAS6',
  role: 'package',
  load(filename, context) {
    const text = readPackageText('BAS6', filename, context);
    const cursor = new RecordCursor('BAS6', filename, text);
    const options = cursor.nextTokens('options').map((token) => token.toUpperCase());
    return new Bas6Package(resolveUnit(context, filename, BAS6_DEFAULT_UNIT), filename, text, options);
  },
};
