/**
 * Parameter value (PVAL) package
 *
 *   NP
 *   PARNAM VALUE      (NP records)
 */

import type { PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const PVAL_DEFAULT_UNIT = 1005;

export class PvalPackage extends TextPackage {
  constructor(
    unit: number,
    filename: string,
    text: string,
    readonly values: Map<string, number>
  ) {
    super('PVAL', unit, filename, text);
  }
}

export function parsePvalValues(cursor: RecordCursor): Map<string, number> {
  const np = cursor.integer(cursor.nextTokens('NP')[0], 'NP');
  const values = new Map<string, number>();
  for (let i = 0; i < np; i++) {
    const [name, value] = cursor.nextTokens(`parameter ${i + 1}`);
    values.set(name.toUpperCase(), cursor.number(value, `value of ${name}`));
  }
  return values;
}

export const pvalLoader: PackageLoader<PvalPackage> = {
  filetype: 'PVAL',
  role: 'parameter',
  load(filename, context) {
    const text = readPackageText('PVAL', filename, context);
    const values = parsePvalValues(new RecordCursor('PVAL', filename, text));
    for (const [name, value] of values) {
      context.parameters.setValue(name, value);
    }
    return new PvalPackage(resolveUnit(context, filename, PVAL_DEFAULT_UNIT), filename, text, values);
  },
};
