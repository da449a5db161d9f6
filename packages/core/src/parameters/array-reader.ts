/**
 * Free-format 2D array blocks, as used by ZONE and MULT.
 *
 * Control records:
 *   CONSTANT <value>
 *   INTERNAL <multiplier> [fmt] [iprn]      followed by nrow*ncol values
 *   EXTERNAL <unit> <multiplier> [fmt] [iprn]
 *   OPEN/CLOSE <filename> <multiplier> [fmt] [iprn]
 * Values may use the repeat form r*v.
 */

import type { RecordCursor } from '../packages/records.js';
import type { ArraySource } from './parameter-context.js';

export function readArrayBlock(cursor: RecordCursor, count: number, what: string): ArraySource {
  const tokens = cursor.nextTokens(`${what} control record`);
  const control = (tokens[0] ?? '').toUpperCase();

  switch (control) {
    case 'CONSTANT':
      return { kind: 'constant', value: cursor.number(tokens[1], `${what} CONSTANT`) };
    case 'INTERNAL':
      return {
        kind: 'internal',
        multiplier: multiplierOf(cursor, tokens[1], what),
        values: readValues(cursor, count, what),
      };
    case 'EXTERNAL':
      return {
        kind: 'external',
        unit: cursor.integer(tokens[1], `${what} EXTERNAL unit`),
        multiplier: multiplierOf(cursor, tokens[2], what),
      };
    case 'OPEN/CLOSE':
      if (tokens[1] === undefined) {
        return cursor.fail(`${what} OPEN/CLOSE record has no filename`);
      }
      return {
        kind: 'open-close',
        filename: tokens[1].replace(/^['"]|['"]$/g, ''),
        multiplier: multiplierOf(cursor, tokens[2], what),
      };
    default:
      return cursor.fail(`unsupported array control record '${tokens.join(' ')}' for ${what}`);
  }
}

function multiplierOf(cursor: RecordCursor, token: string | undefined, what: string): number {
  return token === undefined ? 1 : cursor.number(token, `${what} multiplier`);
}

function readValues(cursor: RecordCursor, count: number, what: string): number[] {
  const values: number[] = [];
  while (values.length < count) {
    for (const token of cursor.nextTokens(`${what} values`)) {
      const repeat = /^(\d+)\*(.+)$/.exec(token);
      if (repeat) {
        const times = Number.parseInt(repeat[1], 10);
        const value = cursor.number(repeat[2], `${what} value`);
        for (let i = 0; i < times; i++) {
          values.push(value);
        }
      } else {
        values.push(cursor.number(token, `${what} value`));
      }
    }
  }
  if (values.length > count) {
    cursor.fail(`${what} has ${values.length} values, expected ${count}`);
  }
  return values;
}
