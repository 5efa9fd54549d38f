import { describe, it, expect, vi, beforeEach } from 'vitest';
import { join, resolve } from 'node:path';
import {
  CONFIG_FILENAME,
  getConfigPath,
  isOutputFormat,
  loadConfig,
  resetConfigCache
} from '../../../../src/cli/utils/config.js';
import { InvalidArgumentsError } from '../../../../src/cli/utils/errors.js';

const configDir = resolve(__dirname, '../../../fixtures/config');
const validConfig = join(configDir, 'valid', CONFIG_FILENAME);

describe('loadConfig', () => {
  beforeEach(() => {
    resetConfigCache();
  });

  it('loads an explicit configuration file', () => {
    expect(loadConfig(validConfig)).toEqual({ output: { format: 'json', colors: false } });
    expect(getConfigPath()).toBe(validConfig);
  });

  it('finds the configuration file from the working directory', () => {
    vi.spyOn(process, 'cwd').mockReturnValue(join(configDir, 'valid'));

    expect(loadConfig()).toEqual({ output: { format: 'json', colors: false } });
    expect(getConfigPath()).toBe(validConfig);
  });

  it('returns the cached configuration for the same path', () => {
    const first = loadConfig(validConfig);

    expect(loadConfig(validConfig)).toBe(first);
  });

  it('rejects a missing explicit file', () => {
    const missing = join(configDir, 'missing.json');

    expect(() => loadConfig(missing)).toThrow(InvalidArgumentsError);
    expect(() => loadConfig(missing)).toThrow(`Configuration file not found: ${missing}`);
  });

  it('rejects an unsupported output format', () => {
    const file = join(configDir, 'invalid-format', CONFIG_FILENAME);

    expect(() => loadConfig(file)).toThrow(
      `Invalid configuration in ${file}: "output.format" must be one of json, pretty`
    );
  });

  it('rejects a file that is not JSON', () => {
    const file = join(configDir, 'not-json', CONFIG_FILENAME);

    expect(() => loadConfig(file)).toThrow(InvalidArgumentsError);
    expect(() => loadConfig(file)).toThrow(`Invalid configuration in ${file}: `);
  });
});

describe('isOutputFormat', () => {
  it('accepts only known formats', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('pretty')).toBe(true);
    expect(isOutputFormat('table')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });
});
