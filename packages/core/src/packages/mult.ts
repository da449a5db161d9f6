/**
 * Multiplier array (MULT) package
 *
 *   NML
 *   MLTNAM [FUNCTION]  then an array block, or a function expression line
 */

import type { ArraySource } from '../parameters/parameter-context.js';
import { readArrayBlock } from '../parameters/array-reader.js';
import type { GridShape, PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const MULT_DEFAULT_UNIT = 1002;

export class MultPackage extends TextPackage {
  constructor(
    unit: number,
    filename: string,
    text: string,
    readonly multipliers: Map<string, ArraySource>
  ) {
    super('MULT', unit, filename, text);
  }
}

export function parseMultArrays(cursor: RecordCursor, shape: GridShape): Map<string, ArraySource> {
  const count = cursor.integer(cursor.nextTokens('NML')[0], 'NML');
  const multipliers = new Map<string, ArraySource>();
  for (let i = 0; i < count; i++) {
    const [rawName, keyword] = cursor.nextTokens(`multiplier ${i + 1} name`);
    const name = rawName.toUpperCase();
    if (keyword !== undefined && keyword.toUpperCase() === 'FUNCTION') {
      multipliers.set(name, {
        kind: 'function',
        expression: cursor.nextLine(`multiplier ${name} function`),
      });
    } else {
      multipliers.set(name, readArrayBlock(cursor, shape.nrow * shape.ncol, `multiplier ${name}`));
    }
  }
  return multipliers;
}

export const multLoader: PackageLoader<MultPackage> = {
  filetype: 'MULT',
  role: 'parameter',
  load(filename, context) {
    const text = readPackageText('MULT', filename, context);
    const multipliers = parseMultArrays(new RecordCursor('MULT', filename, text), context.shape);
    for (const [name, source] of multipliers) {
      context.parameters.setMultiplier(name, source);
    }
    return new MultPackage(resolveUnit(context, filename, MULT_DEFAULT_UNIT), filename, text, multipliers);
  },
};
