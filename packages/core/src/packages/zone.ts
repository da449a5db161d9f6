/**
 * Zone array (ZONE) package
 *
 *   NZN
 *   ZONNAM            then one array block per zone
 */

import type { ArraySource } from '../parameters/parameter-context.js';
import { readArrayBlock } from '../parameters/array-reader.js';
import type { GridShape, PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const ZONE_DEFAULT_UNIT = 1001;

export class ZonePackage extends TextPackage {
  constructor(
    unit: number,
    filename: string,
    text: string,
    readonly zones: Map<string, ArraySource>
  ) {
    super('ZONE', unit, filename, text);
  }
}

export function parseZoneArrays(cursor: RecordCursor, shape: GridShape): Map<string, ArraySource> {
  const count = cursor.integer(cursor.nextTokens('NZN')[0], 'NZN');
  const zones = new Map<string, ArraySource>();
  for (let i = 0; i < count; i++) {
    const name = cursor.nextTokens(`zone ${i + 1} name`)[0].toUpperCase();
    zones.set(name, readArrayBlock(cursor, shape.nrow * shape.ncol, `zone ${name}`));
  }
  return zones;
}

export const zoneLoader: PackageLoader<ZonePackage> = {
  filetype: 'ZONE',
  role: 'parameter',
  load(filename, context) {
    const text = readPackageText('ZONE', filename, context);
    const zones = parseZoneArrays(new RecordCursor('ZONE', filename, text), context.shape);
    for (const [name, source] of zones) {
      context.parameters.setZone(name, source);
    }
    return new ZonePackage(resolveUnit(context, filename, ZONE_DEFAULT_UNIT), filename, text, zones);
  },
};
