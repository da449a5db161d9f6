/**
 * Name File Writer
 *
 * Layout:
 *   heading comment
 *   GLOBAL line (mf2k only)
 *   LIST line
 *   one line per package file entry
 *   one DATA / DATA(BINARY) line per external file
 */

import { writeFileSync } from 'fs';
import { join, relative, resolve } from 'path';
import { ModelIOError, describeError } from '@gwmodel/utils';
import type { Model } from '../model.js';

/**
 * 12-character name, 3-digit unit, filename
 */
export function formatEntryLine(name: string, unit: number, filename: string): string {
  return `${name.padEnd(12)} ${String(unit).padStart(3)} ${filename}`;
}

export function formatExternalLine(unit: number, filename: string, binary: boolean): string {
  const paddedUnit = String(unit).padStart(3);
  return binary
    ? `DATA(BINARY)  ${paddedUnit}  ${filename} REPLACE`
    : `DATA          ${paddedUnit}  ${filename}`;
}

export function relativeToWorkspace(workspace: string, filename: string): string {
  return relative(resolve(workspace), resolve(workspace, filename));
}

export function formatNameFile(model: Model): string {
  const lines: string[] = [model.heading];

  if (model.global) {
    lines.push(formatEntryLine(model.global.filetype, model.global.unit, model.global.filename));
  }
  lines.push(formatEntryLine(model.list.filetype, model.list.unit, model.list.filename));

  for (const pkg of model.packages) {
    for (const entry of pkg.fileEntries()) {
      lines.push(
        formatEntryLine(entry.name, entry.unit, relativeToWorkspace(model.workspace, entry.filename))
      );
    }
  }

  for (const external of model.externalFiles) {
    if (external.unit === 0) {
      continue;
    }
    lines.push(
      formatExternalLine(
        external.unit,
        relativeToWorkspace(model.workspace, external.filename),
        external.binary
      )
    );
  }

  return lines.join('\n') + '\n';
}

/**
 * Write the model's name file into its workspace
 *
 * @returns path of the written file
 * @throws ModelIOError on file system failure
 */
export function writeNameFile(model: Model): string {
  const path = join(model.workspace, model.namefile);
  try {
    writeFileSync(path, formatNameFile(model), 'utf-8');
  } catch (error) {
    throw new ModelIOError(`Could not write name file '${path}': ${describeError(error)}`, path, error);
  }
  return path;
}
