/**
 * Configuration Loader Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  validateConfig,
} from '../src/config.js';

describe('config', () => {
  describe('createDefaultConfig', () => {
    it('returns the built-in defaults', () => {
      expect(createDefaultConfig()).toEqual({
        defaultLanguage: 'javascript',
        defaultName: 'index',
        preferredExtension: undefined,
        minimumTimeBetweenValidityChecks: 1000,
        prepare: false,
        exposedName: 'executable',
      });
    });
  });

  describe('validateConfig', () => {
    it('treats an empty document as defaults', () => {
      expect(validateConfig(null)).toEqual(createDefaultConfig());
    });

    it('merges given keys over the defaults', () => {
      expect(
        validateConfig({
          defaultLanguage: 'handlebars',
          minimumTimeBetweenValidityChecks: -1,
          prepare: true,
        })
      ).toEqual({
        ...createDefaultConfig(),
        defaultLanguage: 'handlebars',
        minimumTimeBetweenValidityChecks: -1,
        prepare: true,
      });
    });

    it('rejects non-mapping documents', () => {
      expect(() => validateConfig(['a'])).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects unknown keys', () => {
      expect(() => validateConfig({ language: 'js' })).toThrow(
        'Invalid configuration: unknown key language'
      );
    });

    it('rejects empty strings', () => {
      expect(() => validateConfig({ exposedName: '' })).toThrow(
        'Invalid configuration: exposedName must be a non-empty string'
      );
    });

    it('rejects intervals below -1', () => {
      expect(() =>
        validateConfig({ minimumTimeBetweenValidityChecks: -2 })
      ).toThrow(
        'Invalid configuration: minimumTimeBetweenValidityChecks must be an integer >= -1'
      );
    });

    it('rejects non-boolean prepare', () => {
      expect(() => validateConfig({ prepare: 'yes' })).toThrow(
        'Invalid configuration: prepare must be a boolean'
      );
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'weft-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('returns null when the base directory has no config file', () => {
      expect(loadConfig(dir)).toBe(null);
    });

    it('reads weft.yaml from the base directory', () => {
      writeFileSync(
        join(dir, CONFIG_FILE_NAME),
        'defaultLanguage: handlebars\npreferredExtension: html\n'
      );
      const config = loadConfig(dir);
      expect(config?.defaultLanguage).toBe('handlebars');
      expect(config?.preferredExtension).toBe('html');
      expect(config?.defaultName).toBe('index');
    });

    it('reads an explicit path', () => {
      const path = join(dir, 'custom.yaml');
      writeFileSync(path, 'exposedName: page\n');
      expect(loadConfig(dir, path)?.exposedName).toBe('page');
    });

    it('fails when an explicit path is missing', () => {
      const path = join(dir, 'missing.yaml');
      expect(() => loadConfig(dir, path)).toThrow(
        `Invalid configuration: file not found (${path})`
      );
    });

    it('reports YAML syntax errors', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), 'defaultLanguage: [unclosed\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: invalid YAML'
      );
    });
  });
});
