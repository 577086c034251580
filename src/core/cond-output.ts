import { bit } from './constants';
import type { PrismConfig, Stew } from './types';

/** Fixed wiring: conditional output c reads inputs 2c and 2c+1 (mod input width). */
export function condInputPair(c: number, config: PrismConfig): [number, number] {
  return [(2 * c) % config.inputWidth, (2 * c + 1) % config.inputWidth];
}

/**
 * Conditional outputs of the current row for the current inputs, bit c = output c.
 * Independent of the transition taken this cycle.
 */
export function evalCondOutputs(row: Stew, inputs: number, config: PrismConfig): number {
  let result = 0;
  for (let c = 0; c < config.condOutputs; c++) {
    const [a, b] = condInputPair(c, config);
    const addr = bit(inputs, a) | (bit(inputs, b) << 1);
    result |= bit(row.condLuts[c] ?? 0, addr) << c;
  }
  return result;
}
