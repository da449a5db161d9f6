export { TextPackage, OpaquePackage } from './base.js';
export { FixedPackage, createGlobalPackage, createListPackage } from './fixed.js';
export { DisPackage, disLoader, parseDisDimensions, DIS_DEFAULT_UNIT } from './dis.js';
export type { DisDimensions } from './dis.js';
export { Bas6Package, bas6Loader } from './bas6.js';
export { OcPackage, ocLoader, parseOcSettings } from './oc.js';
export type { OcSettings, OutputFile } from './oc.js';
export { PvalPackage, pvalLoader, parsePvalValues } from './pval.js';
export { ZonePackage, zoneLoader, parseZoneArrays } from './zone.js';
export { MultPackage, multLoader, parseMultArrays } from './mult.js';
export { createOpaqueLoader } from './opaque.js';
export { RecordCursor, readPackageText, resolveUnit } from './records.js';
