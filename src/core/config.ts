import { DEFAULT_CONFIG, MAX_DEPTH, MAX_STEW_WIDTH } from './constants';
import type { PrismConfig } from './types';
import { stewWidth } from './stew';

function checkRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid ${name}: ${value} (expected integer ${min}..${max})`);
  }
}

/**
 * Merge a partial build configuration over the defaults and check that the
 * resulting hardware shape can exist.
 */
export function resolveConfig(partial: Partial<PrismConfig> = {}): PrismConfig {
  const config: PrismConfig = { ...DEFAULT_CONFIG, ...partial };

  checkRange('depth0', config.depth0, 1, MAX_DEPTH);
  checkRange('depth1', config.depth1, 0, MAX_DEPTH);
  checkRange('inputWidth', config.inputWidth, 1, 32);
  checkRange('outputWidth', config.outputWidth, 1, 31);
  checkRange('lutInputs', config.lutInputs, 1, 4);
  checkRange('condOutputs', config.condOutputs, 0, 8);

  const width = stewWidth(config);
  if (width > MAX_STEW_WIDTH) {
    throw new Error(`STEW width ${width} exceeds ${MAX_STEW_WIDTH} bits`);
  }
  return config;
}

/** Rows addressable by shard 0 when the table is not fractured. */
export function totalDepth(config: PrismConfig): number {
  return config.depth0 + config.depth1;
}

export function supportsFracture(config: PrismConfig): boolean {
  return config.depth1 > 0;
}
