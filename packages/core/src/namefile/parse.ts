/**
 * Name File Parser
 *
 * Line grammar: <FILETYPE> <UNIT> <FILENAME> [OPTION]
 * Blank lines and lines starting with '#' are ignored.
 */

import { readFileSync } from 'fs';
import { ManifestFormatError, describeError } from '@gwmodel/utils';
import { UnitTable } from '../unit-table.js';

export function parseNameFileText(text: string, source: string = '<text>'): UnitTable {
  const table = new UnitTable();

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) {
      return;
    }

    const [filetype, unitToken, rawFilename, option] = line.split(/\s+/);
    if (unitToken === undefined || rawFilename === undefined) {
      throw new ManifestFormatError(
        'Expected <FILETYPE> <UNIT> <FILENAME> [OPTION]',
        lineNumber,
        line,
        { source }
      );
    }

    const unit = /^\d+$/.test(unitToken) ? Number.parseInt(unitToken, 10) : Number.NaN;
    if (!(unit > 0)) {
      throw new ManifestFormatError(
        `Unit number must be a positive integer, got '${unitToken}'`,
        lineNumber,
        line,
        { source }
      );
    }

    const existing = table.get(unit);
    if (existing) {
      throw new ManifestFormatError(
        `Unit ${unit} is already assigned to '${existing.filename}' on line ${existing.lineNumber ?? '?'}`,
        lineNumber,
        line,
        { source }
      );
    }

    const tag = filetype.toUpperCase();
    table.add({
      unit,
      filename: rawFilename.replace(/^['"]|['"]$/g, ''),
      filetype: tag,
      binary: tag.includes('BINARY'),
      option: option?.toUpperCase(),
      lineNumber,
    });
  });

  return table;
}

/**
 * Read and parse a name file
 *
 * @throws ManifestFormatError if the file cannot be read or a line is malformed
 */
export function parseNameFile(path: string): UnitTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ManifestFormatError(
      `Could not read name file '${path}': ${describeError(error)}`,
      undefined,
      undefined,
      { path },
      error
    );
  }
  return parseNameFileText(text, path);
}
