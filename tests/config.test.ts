import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, parseConfig } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';

describe('parseConfig', () => {
  it('should return defaults when no YAML is configured', () => {
    expect(parseConfig(undefined)).toEqual({ strict: false, quiet: false, maxBatchSize: 1000 });
    expect(parseConfig('   ')).toBe(DEFAULT_CONFIG);
  });

  it('should merge provided keys over defaults', () => {
    const config = parseConfig('strict: true\nsource: dump-2019\n');
    expect(config).toEqual({ strict: true, quiet: false, maxBatchSize: 1000, source: 'dump-2019' });
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfig('strictness: true')).toThrow(ConfigError);
  });

  it('should reject out-of-range values with the offending path', () => {
    expect(() => parseConfig('maxBatchSize: 0')).toThrow(/Invalid config at "maxBatchSize"/);
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfig('strict: [true')).toThrow(/Invalid config YAML/);
  });

  it('should reject a document that is not a mapping', () => {
    expect(() => parseConfig('just text')).toThrow(/Invalid config at "\(root\)"/);
  });
});
