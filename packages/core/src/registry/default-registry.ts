/**
 * Built-in package kinds
 */

import { bas6Loader } from '../packages/bas6.js';
import { disLoader } from '../packages/dis.js';
import { multLoader } from '../packages/mult.js';
import { ocLoader } from '../packages/oc.js';
import { createOpaqueLoader } from '../packages/opaque.js';
import { pvalLoader } from '../packages/pval.js';
import { zoneLoader } from '../packages/zone.js';
import type { PackageLoader } from '../types/index.js';
import { PackageRegistry } from './registry.js';

/**
 * Closed set of package kinds the default registry recognizes
 */
export const KNOWN_PACKAGE_KINDS = [
  'ZONE',
  'MULT',
  'PVAL',
  'BAS6',
  'DIS',
  'BCF6',
  'LPF',
  'HFB6',
  'CHD',
  'WEL',
  'DRN',
  'RCH',
  'EVT',
  'GHB',
  'GMG',
  'RIV',
  'STR',
  'SWI2',
  'PCG',
  'PCGN',
  'NWT',
  'PKS',
  'SFR',
  'SIP',
  'SOR',
  'DE4',
  'OC',
  'UZF',
  'UPW',
] as const;

export type KnownPackageKind = (typeof KNOWN_PACKAGE_KINDS)[number];

const DEDICATED_LOADERS: Partial<Record<KnownPackageKind, PackageLoader>> = {
  DIS: disLoader,
  BAS6: bas6Loader,
  OC: ocLoader,
  PVAL: pvalLoader,
  ZONE: zoneLoader,
  MULT: multLoader,
};

/**
 * Fresh registry holding a loader for every known kind
 */
export function createDefaultRegistry(): PackageRegistry {
  const registry = new PackageRegistry();
  for (const kind of KNOWN_PACKAGE_KINDS) {
    registry.register(DEDICATED_LOADERS[kind] ?? createOpaqueLoader(kind));
  }
  return registry;
}
