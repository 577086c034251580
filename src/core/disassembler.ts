import { decodeStew, stewLayout } from './stew';
import type { PrismConfig, Stew, StewBits } from './types';

function bin(value: number, width: number): string {
  return value.toString(2).padStart(width, '0');
}

function hexField(value: number, bits: number): string {
  return value.toString(16).padStart(Math.ceil(bits / 4), '0');
}

/**
 * Format a STEW as a single human-readable line, e.g.
 *   INC out=000001 | L0 [i3 i1 i0] lut=80 ->2 jmp=000001 | C0=6
 * Selectors are listed most significant LUT address bit first.
 */
export function formatStew(stew: Stew, config: PrismConfig): string {
  const layout = stewLayout(config);
  const parts: string[] = [];

  parts.push(`${stew.increment ? 'INC' : '   '} out=${bin(stew.staticOut, config.outputWidth)}`);

  stew.lanes.forEach((lane, l) => {
    const sel = [...lane.selects].reverse().map(s => `i${s}`).join(' ');
    const lut = hexField(lane.lut, layout.lutSize);
    parts.push(`L${l} [${sel}] lut=${lut} ->${lane.target} jmp=${bin(lane.jumpOut, config.outputWidth)}`);
  });

  if (stew.condLuts.length > 0) {
    parts.push(stew.condLuts.map((lut, c) => `C${c}=${lut.toString(16)}`).join(' '));
  }

  return parts.join(' | ');
}

/** Disassemble a table, one line per row prefixed with its index. */
export function disassembleTable(rows: StewBits[], config: PrismConfig): string[] {
  const width = String(Math.max(0, rows.length - 1)).length;
  return rows.map((bits, i) => `${String(i).padStart(width)}: ${formatStew(decodeStew(bits, config), config)}`);
}
