/**
 * Stackword Tests: Configuration
 * Loading and validating .stackword.yaml
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  validateConfig,
} from '../src/index.js';

describe('Stackword: Configuration', () => {
  describe('defaults', () => {
    it('matches the engine defaults', () => {
      expect(createDefaultConfig()).toEqual({
        stackCapacity: 256,
        recursionLimit: 256,
        maxLineLength: 256,
        maxTokens: 128,
        prompt: '> ',
        showStack: false,
      });
    });

    it('treats an empty document as defaults', () => {
      expect(parseConfig('')).toEqual(createDefaultConfig());
      expect(validateConfig(null)).toEqual(createDefaultConfig());
    });
  });

  describe('parseConfig', () => {
    it('merges settings over the defaults', () => {
      const config = parseConfig(
        'stackCapacity: 16\nshowStack: true\nprompt: "sw> "\n'
      );
      expect(config).toEqual({
        ...createDefaultConfig(),
        stackCapacity: 16,
        showStack: true,
        prompt: 'sw> ',
      });
    });

    it('rejects unknown keys', () => {
      expect(() => parseConfig('colour: red')).toThrow(
        'Invalid configuration: unknown key colour'
      );
    });

    it('rejects a document that is not a mapping', () => {
      expect(() => parseConfig('- 1\n- 2\n')).toThrow(
        'Invalid configuration: must be a mapping'
      );
    });

    it('rejects numeric settings out of range or of the wrong type', () => {
      const message =
        'Invalid configuration: stackCapacity must be an integer between 1 and 1000000';
      expect(() => parseConfig('stackCapacity: 0')).toThrow(message);
      expect(() => parseConfig('stackCapacity: 1.5')).toThrow(message);
      expect(() => parseConfig('stackCapacity: "8"')).toThrow(message);
      expect(() => parseConfig('maxTokens: 2000000')).toThrow(
        'Invalid configuration: maxTokens must be an integer between 1 and 1000000'
      );
    });

    it('rejects a prompt that is not a string', () => {
      expect(() => parseConfig('prompt: 5')).toThrow(
        'Invalid configuration: prompt must be a string'
      );
    });

    it('rejects showStack that is not a boolean', () => {
      expect(() => parseConfig('showStack: "yes"')).toThrow(
        'Invalid configuration: showStack must be a boolean'
      );
    });

    it('wraps YAML syntax errors', () => {
      expect(() => parseConfig('stackCapacity: [1, 2')).toThrow(
        /^Invalid configuration: /
      );
    });
  });

  describe('loadConfig', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stackword-test-'));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('returns defaults when the file is absent', () => {
      expect(loadConfig(tempDir)).toEqual(createDefaultConfig());
    });

    it('reads the file from the directory', async () => {
      await fs.writeFile(
        path.join(tempDir, CONFIG_FILE_NAME),
        'recursionLimit: 32\nmaxLineLength: 80\n'
      );
      expect(loadConfig(tempDir)).toMatchObject({
        recursionLimit: 32,
        maxLineLength: 80,
      });
    });
  });
});
