/**
 * Discretization (DIS) package
 *
 * Only the first record is interpreted:
 *   NLAY NROW NCOL NPER [ITMUNI LENUNI]
 * The remainder of the file is kept as text.
 */

import type { DiscretizationPackage, PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const DIS_DEFAULT_UNIT = 11;

export interface DisDimensions {
  nlay: number;
  nrow: number;
  ncol: number;
  nper: number;
  itmuni: number;
  lenuni: number;
}

export class DisPackage extends TextPackage implements DiscretizationPackage {
  readonly nlay: number;
  readonly nrow: number;
  readonly ncol: number;
  readonly nper: number;
  readonly itmuni: number;
  readonly lenuni: number;

  constructor(unit: number, filename: string, text: string, dimensions: DisDimensions) {
    super('DIS', unit, filename, text);
    this.nlay = dimensions.nlay;
    this.nrow = dimensions.nrow;
    this.ncol = dimensions.ncol;
    this.nper = dimensions.nper;
    this.itmuni = dimensions.itmuni;
    this.lenuni = dimensions.lenuni;
  }
}

export function parseDisDimensions(cursor: RecordCursor): DisDimensions {
  const tokens = cursor.nextTokens('dataset 1');
  const dimensions = {
    nlay: cursor.integer(tokens[0], 'NLAY'),
    nrow: cursor.integer(tokens[1], 'NROW'),
    ncol: cursor.integer(tokens[2], 'NCOL'),
    nper: cursor.integer(tokens[3], 'NPER'),
    itmuni: tokens[4] === undefined ? 4 : cursor.integer(tokens[4], 'ITMUNI'),
    lenuni: tokens[5] === undefined ? 2 : cursor.integer(tokens[5], 'LENUNI'),
  };
  for (const key of ['nlay', 'nrow', 'ncol', 'nper'] as const) {
    if (dimensions[key] <= 0) {
      cursor.fail(`${key.toUpperCase()} must be positive, got ${dimensions[key]}`);
    }
  }
  return dimensions;
}

export const disLoader: PackageLoader<DisPackage> = {
  filetype: 'DIS',
  role: 'discretization',
  load(filename, context) {
    const text = readPackageText('DIS', filename, context);
    const dimensions = parseDisDimensions(new RecordCursor('DIS', filename, text));
    return new DisPackage(resolveUnit(context, filename, DIS_DEFAULT_UNIT), filename, text, dimensions);
  },
};
