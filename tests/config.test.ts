/**
 * Decla Tests: Configuration file
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../src/config.js';

describe('parseConfig', () => {
  it('reads every setting', () => {
    expect(
      parseConfig('logLevel: 4\nprompt: "decla> "\nbanner: false\n')
    ).toEqual({ logLevel: 4, prompt: 'decla> ', banner: false });
  });

  it('treats an empty document as no settings', () => {
    expect(parseConfig('')).toEqual({});
  });

  it.each([
    ['- logLevel', 'Invalid configuration: must be a mapping'],
    ['color: true', 'Invalid configuration: unknown key color'],
    [
      'logLevel: 9',
      'Invalid configuration: logLevel must be an integer from 0 to 4',
    ],
    [
      'logLevel: "2"',
      'Invalid configuration: logLevel must be an integer from 0 to 4',
    ],
    ['prompt: 3', 'Invalid configuration: prompt must be a string'],
    ['banner: yes', 'Invalid configuration: banner must be a boolean'],
  ])('rejects %j', (content, message) => {
    expect(() => parseConfig(content)).toThrow(ConfigError);
    expect(() => parseConfig(content)).toThrow(message);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('logLevel: [1')).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });
});

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'decla-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  it('returns null when there is no configuration file', () => {
    expect(loadConfig(tempDir)).toBeNull();
  });

  it('merges the file over the defaults', async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), 'logLevel: 3\n');
    expect(loadConfig(tempDir)).toEqual({
      ...createDefaultConfig(),
      logLevel: 3,
    });
  });

  it('has error level, the arrow prompt and a banner by default', () => {
    expect(createDefaultConfig()).toEqual({
      logLevel: 1,
      prompt: '> ',
      banner: true,
    });
  });
});
