import { describe, it, expect } from 'vitest';
import { defaultConfig, loadConfig } from './config';
import { Kind } from './versify';

describe('loadConfig()', () => {
  it('should fall back to JSON and Blake3-256', () => {
    expect(loadConfig({})).toEqual({ kind: Kind.JSON, code: 'E' });
    expect(defaultConfig).toEqual({ kind: Kind.JSON, code: 'E' });
  });

  it('should read kind and digest code from the environment', () => {
    expect(loadConfig({ ACDC_KIND: 'cbor', ACDC_DIGEST_CODE: '0D' })).toEqual({ kind: Kind.CBOR, code: '0D' });
  });

  it('should reject unknown values', () => {
    expect(() => loadConfig({ ACDC_KIND: 'yaml' })).toThrow(`Invalid field 'ACDC_KIND': unsupported kind 'YAML'`);
    expect(() => loadConfig({ ACDC_DIGEST_CODE: 'Q' })).toThrow(`Invalid field 'ACDC_DIGEST_CODE': unknown digest code 'Q'`);
  });
});
