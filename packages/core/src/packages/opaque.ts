/**
 * Loader for known package kinds whose contents are not interpreted
 */

import type { PackageLoader } from '../types/index.js';
import { OpaquePackage } from './base.js';
import { readPackageText, resolveUnit } from './records.js';

export function createOpaqueLoader(filetype: string): PackageLoader<OpaquePackage> {
  const tag = filetype.toUpperCase();
  return {
    filetype: tag,
    role: 'package',
    load(filename, context) {
      const text = readPackageText(tag, filename, context);
      return new OpaquePackage(tag, resolveUnit(context, filename, 0), filename, text);
    },
  };
}
