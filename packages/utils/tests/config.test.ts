import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  clearConfigCache,
  getEnvModelDefaults,
  getModelDefaults,
  isModelVersion,
  loadConfigFromYaml,
} from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';

const ENV_KEYS = ['GWMODEL_VERSION', 'GWMODEL_EXE', 'GWMODEL_VERBOSE', 'GWMODEL_LIST_UNIT'];

describe('config', () => {
  let dir: string;
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    clearConfigCache();
    dir = mkdtempSync(join(tmpdir(), 'gwmodel-config-'));
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    clearConfigCache();
    rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  describe('getEnvModelDefaults', () => {
    it('should fall back to built-in defaults', () => {
      expect(getEnvModelDefaults()).toEqual({
        version: 'mf2005',
        exeName: 'mf2005.exe',
        verbose: false,
        listUnit: 2,
      });
    });

    it('should read the environment', () => {
      process.env.GWMODEL_VERSION = 'MFNWT';
      process.env.GWMODEL_EXE = 'mfnwt';
      process.env.GWMODEL_VERBOSE = 'true';
      process.env.GWMODEL_LIST_UNIT = '6';

      expect(getEnvModelDefaults()).toEqual({
        version: 'mfnwt',
        exeName: 'mfnwt',
        verbose: true,
        listUnit: 6,
      });
    });

    it('should reject an unknown version', () => {
      process.env.GWMODEL_VERSION = 'mf6';

      expect(() => getEnvModelDefaults()).toThrow(ConfigurationError);
    });

    it('should reject a non-positive list unit', () => {
      process.env.GWMODEL_LIST_UNIT = '0';

      expect(() => getEnvModelDefaults()).toThrow(
        "GWMODEL_LIST_UNIT must be a positive integer, got '0'"
      );
    });
  });

  describe('loadConfigFromYaml', () => {
    it('should return an empty config when the file is missing', () => {
      expect(loadConfigFromYaml(join(dir, 'missing.yaml'))).toEqual({});
    });

    it('should parse and cache the model section', () => {
      const path = join(dir, 'gwmodel.yaml');
      writeFileSync(path, 'model:\n  version: mfnwt\n  listUnit: 6\n');

      expect(loadConfigFromYaml(path)).toEqual({ model: { version: 'mfnwt', listUnit: 6 } });

      rmSync(path);
      expect(loadConfigFromYaml(path)).toEqual({ model: { version: 'mfnwt', listUnit: 6 } });
    });

    it('should ignore a config that fails validation', () => {
      const path = join(dir, 'gwmodel.yaml');
      writeFileSync(path, 'model:\n  version: bogus\n');

      expect(loadConfigFromYaml(path)).toEqual({});
    });
  });

  describe('getModelDefaults', () => {
    it('should let the YAML config win over the environment', () => {
      process.env.GWMODEL_VERSION = 'mf2k';
      process.env.GWMODEL_EXE = 'mf2k.exe';
      const path = join(dir, 'gwmodel.yaml');
      writeFileSync(path, 'model:\n  version: mfusg\n');

      expect(getModelDefaults(path)).toEqual({
        version: 'mfusg',
        exeName: 'mf2k.exe',
        verbose: false,
        listUnit: 2,
      });
    });
  });

  it('should recognize supported versions', () => {
    expect(isModelVersion('mf2005')).toBe(true);
    expect(isModelVersion('mf6')).toBe(false);
  });
});
