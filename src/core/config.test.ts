import { describe, it, expect } from 'vitest';
import { resolveConfig, totalDepth, supportsFracture } from './config';
import { DEFAULT_CONFIG } from './constants';
import { stewWidth } from './stew';

describe('resolveConfig', () => {
  it('returns the default build shape', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges overrides over the defaults', () => {
    const config = resolveConfig({ depth0: 8, depth1: 0 });
    expect(config.depth0).toBe(8);
    expect(config.depth1).toBe(0);
    expect(config.inputWidth).toBe(8);
  });

  it('leaves no room for deeper tables at the default widths', () => {
    // 8 rows need 3 index bits; 16 rows add one per lane: 63 + 2 = 65
    expect(() => resolveConfig({ depth0: 16, depth1: 0 })).toThrow('STEW width 65 exceeds 64 bits');
  });

  it('reaches the full depth once other fields are narrowed', () => {
    // 1 + 4 + 2 * (3*3 + 8 + 7 + 4) = 61
    const config = resolveConfig({ depth0: 128, depth1: 0, outputWidth: 4, condOutputs: 0 });
    expect(config.depth0).toBe(128);
    expect(stewWidth(config)).toBe(61);
  });

  it('rejects out-of-range parameters', () => {
    expect(() => resolveConfig({ depth0: 0 })).toThrow('Invalid depth0: 0 (expected integer 1..128)');
    expect(() => resolveConfig({ depth1: 129 })).toThrow('Invalid depth1: 129 (expected integer 0..128)');
    expect(() => resolveConfig({ lutInputs: 5 })).toThrow('Invalid lutInputs: 5 (expected integer 1..4)');
    expect(() => resolveConfig({ outputWidth: 2.5 })).toThrow('Invalid outputWidth');
  });

  it('rejects a shape whose STEW exceeds 64 bits', () => {
    // 1 + 16 + 4 + 2 * (3*5 + 8 + 3 + 16)
    expect(() => resolveConfig({ inputWidth: 32, outputWidth: 16 })).toThrow('STEW width 105 exceeds 64 bits');
  });
});

describe('table geometry', () => {
  it('concatenates both instances when unfractured', () => {
    expect(totalDepth(resolveConfig())).toBe(8);
    expect(totalDepth(resolveConfig({ depth0: 6, depth1: 2 }))).toBe(8);
  });

  it('needs a second instance to fracture', () => {
    expect(supportsFracture(resolveConfig())).toBe(true);
    expect(supportsFracture(resolveConfig({ depth1: 0 }))).toBe(false);
  });
});
