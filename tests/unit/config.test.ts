import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({ ignoreDirs: [], verbose: false, output: 'summary' });
  });

  it('splits and trims the extra ignore list', () => {
    const config = loadConfig({ CODE_OUTLINE_IGNORE_DIRS: ' vendor, third_party ,,' });
    expect(config.ignoreDirs).toEqual(['vendor', 'third_party']);
  });

  it('reads the verbose flag and output format', () => {
    expect(loadConfig({ CODE_OUTLINE_VERBOSE: '1' }).verbose).toBe(true);
    expect(loadConfig({ CODE_OUTLINE_VERBOSE: 'false' }).verbose).toBe(false);
    expect(loadConfig({ CODE_OUTLINE_OUTPUT: 'jsonl' }).output).toBe('jsonl');
  });

  it('rejects values outside the allowed sets', () => {
    expect(() => loadConfig({ CODE_OUTLINE_OUTPUT: 'xml' })).toThrow(ConfigError);
    expect(() => loadConfig({ CODE_OUTLINE_VERBOSE: 'yes' })).toThrow(/^Invalid environment: CODE_OUTLINE_VERBOSE: /);
  });
});
