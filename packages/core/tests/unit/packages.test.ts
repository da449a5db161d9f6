import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { PackageLoadError } from '@gwmodel/utils';
import { Model } from '../../src/model.js';
import { readArrayBlock } from '../../src/parameters/array-reader.js';
import { bas6Loader } from '../../src/packages/bas6.js';
import { DisPackage, disLoader } from '../../src/packages/dis.js';
import { createGlobalPackage, createListPackage } from '../../src/packages/fixed.js';
import { multLoader } from '../../src/packages/mult.js';
import { ocLoader } from '../../src/packages/oc.js';
import { createOpaqueLoader } from '../../src/packages/opaque.js';
import { pvalLoader } from '../../src/packages/pval.js';
import { RecordCursor } from '../../src/packages/records.js';
import { zoneLoader } from '../../src/packages/zone.js';
import type { LoadContext, UnitTableEntry } from '../../src/types/index.js';
import { UnitTable } from '../../src/unit-table.js';
import { createWorkspace } from '../helpers/workspace.js';
import type { TestWorkspace } from '../helpers/workspace.js';

describe('built-in packages', () => {
  let ws: TestWorkspace;
  let model: Model;

  const contextFor = (entries: UnitTableEntry[] = []): LoadContext =>
    model.createLoadContext(new UnitTable(entries));

  const entry = (filetype: string, unit: number, filename: string): UnitTableEntry => ({
    filetype,
    unit,
    filename,
    binary: filetype.includes('BINARY'),
  });

  beforeEach(() => {
    ws = createWorkspace();
    model = new Model({ name: 'm', workspace: ws.dir });
  });

  afterEach(() => {
    ws.cleanup();
  });

  describe('DIS', () => {
    it('should read the grid dimensions', () => {
      ws.write('m.dis', '# grid\n2 10 15 3\n0 0\n');
      const dis = disLoader.load('m.dis', contextFor([entry('DIS', 12, 'm.dis')]));

      expect(dis.unit).toBe(12);
      expect([dis.nlay, dis.nrow, dis.ncol, dis.nper, dis.itmuni, dis.lenuni]).toEqual([2, 10, 15, 3, 4, 2]);
    });

    it('should fall back to the default unit', () => {
      ws.write('m.dis', '1 1 1 1 1 1\n');

      expect(disLoader.load('m.dis', contextFor()).unit).toBe(11);
    });

    it('should reject non-positive dimensions', () => {
      ws.write('m.dis', '1 0 15 3\n');

      expect(() => disLoader.load('m.dis', contextFor())).toThrow(
        "DIS file 'm.dis': NROW must be positive, got 0"
      );
    });

    it('should reject malformed dimensions', () => {
      ws.write('m.dis', '1 x 15 3\n');

      expect(() => disLoader.load('m.dis', contextFor())).toThrow(
        "DIS file 'm.dis': expected an integer for NROW, got 'x'"
      );
    });

    it('should report a missing file as a package load error', () => {
      expect(() => disLoader.load('missing.dis', contextFor())).toThrow(PackageLoadError);
    });

    it('should write its text back unchanged', () => {
      const text = '# grid\n1 2 3 1\n';
      ws.write('m.dis', text);
      const dis = disLoader.load('m.dis', contextFor());
      const out = createWorkspace();
      try {
        dis.write(join(out.dir, 'nested'));
        expect(readFileSync(join(out.dir, 'nested', 'm.dis'), 'utf-8')).toBe(text);
      } finally {
        out.cleanup();
      }
    });
  });

  describe('BAS6', () => {
    it('should read the options record', () => {
      ws.write('m.bas', '# basic\nxsection free\n1 1 1\n');
      const bas = bas6Loader.load('m.bas', contextFor([entry('BAS6', 13, 'm.bas')]));

      expect(bas.options).toEqual(['XSECTION', 'FREE']);
      expect(bas.ifrefm).toBe(true);
    });

    it('should be fixed format without FREE', () => {
      ws.write('m.bas', 'CHTOCH\n');

      expect(bas6Loader.load('m.bas', contextFor()).ifrefm).toBe(false);
    });
  });

  describe('OC', () => {
    const ocText = [
      'HEAD PRINT FORMAT 0',
      'HEAD SAVE UNIT 51',
      'DRAWDOWN SAVE UNIT 52',
      'COMPACT BUDGET AUX',
      'PERIOD 1 STEP 1',
      '  SAVE HEAD',
      '  Print Budget',
      'PERIOD 2 STEP 3',
      '  SAVE BUDGET',
    ].join('\n');

    it('should read save units and stress period actions', () => {
      ws.write('m.oc', ocText);
      const oc = ocLoader.load(
        'm.oc',
        contextFor([entry('OC', 14, 'm.oc'), entry('DATA(BINARY)', 51, 'm.hds')])
      );

      expect(oc.settings.head).toEqual({ unit: 51, filename: 'm.hds' });
      expect(oc.settings.drawdown).toEqual({ unit: 52, filename: 'm.ddn' });
      expect(oc.settings.compactBudget).toBe(true);
      expect(oc.settings.options).toEqual(['HEAD PRINT FORMAT 0']);
      expect(Array.from(oc.stressPeriodData.entries())).toEqual([
        ['1,1', ['save head', 'print budget']],
        ['2,3', ['save budget']],
      ]);
      expect(oc.saves('head')).toBe(true);
      expect(oc.saves('drawdown')).toBe(false);
    });

    it('should claim its output units and own their entries', () => {
      ws.write('m.oc', ocText);
      const oc = ocLoader.load('m.oc', contextFor([entry('OC', 14, 'm.oc')]));

      expect(model.popList).toEqual([51, 52]);
      expect(oc.fileEntries()).toEqual([
        { name: 'OC', unit: 14, filename: 'm.oc' },
        { name: 'DATA(BINARY)', unit: 51, filename: 'm.hds' },
        { name: 'DATA(BINARY)', unit: 52, filename: 'm.ddn' },
      ]);
    });

    it('should reject a malformed PERIOD record', () => {
      ws.write('m.oc', 'PERIOD 1 X 1\n');

      expect(() => ocLoader.load('m.oc', contextFor())).toThrow(
        "OC file 'm.oc': expected 'PERIOD <n> STEP <n>', got 'PERIOD 1 X 1'"
      );
    });
  });

  describe('parameter sources', () => {
    beforeEach(() => {
      model.addPackage(
        new DisPackage(11, 'm.dis', '', { nlay: 1, nrow: 2, ncol: 3, nper: 1, itmuni: 4, lenuni: 2 })
      );
    });

    it('should load PVAL values into the parameter context', () => {
      ws.write('m.pval', '# values\n2\nHK1 12.5\nrch_a 1.0d-3\n');
      const pval = pvalLoader.load('m.pval', contextFor());

      expect(Array.from(pval.values.entries())).toEqual([
        ['HK1', 12.5],
        ['RCH_A', 0.001],
      ]);
      expect(pval.unit).toBe(1005);
      expect(model.parameters.getValue('hk1')).toBe(12.5);
      expect(model.parameters.valueNames()).toEqual(['HK1', 'RCH_A']);
    });

    it('should load ZONE arrays sized by the grid', () => {
      ws.write('m.zon', ['2', 'ZN1', 'INTERNAL 1 (FREE) 0', '1 1 2', '3*4', 'zn2', 'CONSTANT 3'].join('\n'));
      zoneLoader.load('m.zon', contextFor());

      expect(model.parameters.getZone('ZN1')).toEqual({
        kind: 'internal',
        multiplier: 1,
        values: [1, 1, 2, 4, 4, 4],
      });
      expect(model.parameters.getZone('zn2')).toEqual({ kind: 'constant', value: 3 });
    });

    it('should load MULT arrays and functions', () => {
      ws.write(
        'm.mlt',
        ['3', 'M1', "OPEN/CLOSE 'arrays/m1.ref' 2.5 (FREE) 0", 'm2 function', 'M1 * 2', 'M3', 'EXTERNAL 40 1.0'].join('\n')
      );
      multLoader.load('m.mlt', contextFor());

      expect(model.parameters.getMultiplier('M1')).toEqual({
        kind: 'open-close',
        filename: 'arrays/m1.ref',
        multiplier: 2.5,
      });
      expect(model.parameters.getMultiplier('M2')).toEqual({ kind: 'function', expression: 'M1 * 2' });
      expect(model.parameters.getMultiplier('M3')).toEqual({ kind: 'external', unit: 40, multiplier: 1 });
      expect(model.parameters.multiplierNames()).toEqual(['M1', 'M2', 'M3']);
    });
  });

  describe('array blocks', () => {
    it('should reject too many values', () => {
      const cursor = new RecordCursor('ZONE', 'm.zon', 'INTERNAL 1\n1 2 3 4 5 6 7\n');

      expect(() => readArrayBlock(cursor, 6, 'zone ZN1')).toThrow(
        "ZONE file 'm.zon': zone ZN1 has 7 values, expected 6"
      );
    });

    it('should reject an unknown control record', () => {
      const cursor = new RecordCursor('ZONE', 'm.zon', 'BOGUS 1\n');

      expect(() => readArrayBlock(cursor, 6, 'zone ZN1')).toThrow(
        "ZONE file 'm.zon': unsupported array control record 'BOGUS 1' for zone ZN1"
      );
    });

    it('should report running out of records', () => {
      const cursor = new RecordCursor('ZONE', 'm.zon', 'INTERNAL 1\n1 2\n');

      expect(() => readArrayBlock(cursor, 6, 'zone ZN1')).toThrow(
        "ZONE file 'm.zon': unexpected end of file while reading zone ZN1 values"
      );
    });
  });

  describe('opaque packages', () => {
    it('should keep the file text under the upper-cased tag', () => {
      ws.write('m.wel', '# wells\n1 0\n');
      const loader = createOpaqueLoader('wel');
      const wel = loader.load('m.wel', contextFor([entry('WEL', 20, 'm.wel')]));

      expect(loader.filetype).toBe('WEL');
      expect(wel.filetype).toBe('WEL');
      expect(wel.text).toBe('# wells\n1 0\n');
      expect(wel.fileEntries()).toEqual([{ name: 'WEL', unit: 20, filename: 'm.wel' }]);
    });
  });

  describe('fixed packages', () => {
    it('should follow the model name', () => {
      const global = createGlobalPackage('a');
      const list = createListPackage('a', 6);
      global.rename('b');
      list.rename('b');

      expect(global.fileEntries()).toEqual([{ name: 'GLOBAL', unit: 1, filename: 'b.glo' }]);
      expect(list.fileEntries()).toEqual([{ name: 'LIST', unit: 6, filename: 'b.list' }]);
      expect(String(global)).toBe('Global Package class');
      expect(String(list)).toBe('List Package class');
    });
  });
});
