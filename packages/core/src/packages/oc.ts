/**
 * Output Control (OC) package, words format.
 *
 * Save units for heads and drawdown are claimed by the package: they are
 * written as OC's own DATA(BINARY) entries rather than as external files.
 */

import type { LoadContext, PackageFileEntry, PackageLoader } from '../types/index.js';
import { TextPackage } from './base.js';
import { readPackageText, RecordCursor, resolveUnit } from './records.js';

export const OC_DEFAULT_UNIT = 14;

export interface OutputFile {
  unit: number;
  filename: string;
}

export interface OcSettings {
  head?: OutputFile;
  drawdown?: OutputFile;
  compactBudget: boolean;
  /**
   * Header records other than save units, e.g. 'HEAD PRINT FORMAT 0'
   */
  options: string[];
  /**
   * Lower-cased actions keyed by 'period,step' (1-based)
   */
  stressPeriodData: Map<string, string[]>;
}

export class OcPackage extends TextPackage {
  constructor(
    unit: number,
    filename: string,
    text: string,
    readonly settings: OcSettings
  ) {
    super('OC', unit, filename, text);
  }

  fileEntries(): PackageFileEntry[] {
    const entries = super.fileEntries();
    for (const output of [this.settings.head, this.settings.drawdown]) {
      if (output) {
        entries.push({ name: 'DATA(BINARY)', unit: output.unit, filename: output.filename });
      }
    }
    return entries;
  }

  /**
   * Whether any time step saves the given output, e.g. 'head' or 'budget'
   */
  saves(output: string): boolean {
    const action = `save ${output.toLowerCase()}`;
    for (const actions of this.stressPeriodData.values()) {
      if (actions.includes(action)) {
        return true;
      }
    }
    return false;
  }

  get stressPeriodData(): Map<string, string[]> {
    return this.settings.stressPeriodData;
  }
}

function outputFile(context: LoadContext, unit: number, extension: string): OutputFile {
  const entry = context.unitTable.get(unit);
  return { unit, filename: entry ? entry.filename : `${context.modelName}.${extension}` };
}

export function parseOcSettings(cursor: RecordCursor, context: LoadContext): OcSettings {
  const settings: OcSettings = {
    compactBudget: false,
    options: [],
    stressPeriodData: new Map(),
  };
  let current: string[] | undefined;

  while (!cursor.done) {
    const line = cursor.nextLine('output control record');
    const tokens = line.toUpperCase().split(/\s+/);
    const [first, second, third, fourth] = tokens;

    if (first === 'PERIOD') {
      const period = cursor.integer(second, 'PERIOD');
      if (third !== 'STEP') {
        cursor.fail(`expected 'PERIOD <n> STEP <n>', got '${line}'`);
      }
      const step = cursor.integer(fourth, 'STEP');
      current = [];
      settings.stressPeriodData.set(`${period},${step}`, current);
    } else if (current) {
      current.push(tokens.join(' ').toLowerCase());
    } else if ((first === 'HEAD' || first === 'DRAWDOWN') && second === 'SAVE' && third === 'UNIT') {
      const unit = cursor.integer(fourth, `${first} SAVE UNIT`);
      if (first === 'HEAD') {
        settings.head = outputFile(context, unit, 'hds');
      } else {
        settings.drawdown = outputFile(context, unit, 'ddn');
      }
    } else if (first === 'COMPACT') {
      settings.compactBudget = true;
    } else {
      settings.options.push(line);
    }
  }

  return settings;
}

export const ocLoader: PackageLoader<OcPackage> = {
  filetype: 'OC',
  role: 'package',
  load(filename, context) {
    const text = readPackageText('OC', filename, context);
    const settings = parseOcSettings(new RecordCursor('OC', filename, text), context);
    for (const output of [settings.head, settings.drawdown]) {
      if (output) {
        context.claimUnit(output.unit);
      }
    }
    return new OcPackage(resolveUnit(context, filename, OC_DEFAULT_UNIT), filename, text, settings);
  },
};
