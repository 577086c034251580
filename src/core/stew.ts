/**
 * STEW (State Execution Word) codec.
 *
 * Rows are handled as named-field records everywhere inside the engine; the
 * packed form only exists on the host windows and in program files. Fields are
 * packed from bit 0 upward:
 *
 *   increment | staticOut | condLuts[] | lane0 {selects[], lut, target, jumpOut} | lane1 {...}
 */
import { COND_LUT_BITS, bitMask, indexBits } from './constants';
import type { CompareLane, PrismConfig, Stew, StewBits, WindowWrite } from './types';

export interface StewField {
  name: string;
  offset: number;
  width: number;
}

export interface StewLayout {
  fields: StewField[];
  width: number;
  /** Bits carried by the LSB window; the MSB window carries the rest */
  lsbBits: number;
  selBits: number;
  siBits: number;
  lutSize: number;
  laneCount: number;
}

export function laneCount(config: PrismConfig): number {
  return config.dualCompare ? 2 : 1;
}

export function stewWidth(config: PrismConfig): number {
  const selBits = indexBits(config.inputWidth);
  const siBits = indexBits(config.depth0 + config.depth1);
  const lane = config.lutInputs * selBits + (1 << config.lutInputs) + siBits + config.outputWidth;
  return 1 + config.outputWidth + config.condOutputs * COND_LUT_BITS + laneCount(config) * lane;
}

export function stewLayout(config: PrismConfig): StewLayout {
  const selBits = indexBits(config.inputWidth);
  const siBits = indexBits(config.depth0 + config.depth1);
  const lutSize = 1 << config.lutInputs;
  const fields: StewField[] = [];
  let offset = 0;
  const add = (name: string, width: number) => {
    fields.push({ name, offset, width });
    offset += width;
  };

  add('increment', 1);
  add('staticOut', config.outputWidth);
  for (let c = 0; c < config.condOutputs; c++) add(`cond${c}.lut`, COND_LUT_BITS);
  for (let l = 0; l < laneCount(config); l++) {
    for (let k = 0; k < config.lutInputs; k++) add(`lane${l}.sel${k}`, selBits);
    add(`lane${l}.lut`, lutSize);
    add(`lane${l}.target`, siBits);
    add(`lane${l}.jumpOut`, config.outputWidth);
  }

  return {
    fields,
    width: offset,
    lsbBits: Math.max(0, offset - 32),
    selBits,
    siBits,
    lutSize,
    laneCount: laneCount(config),
  };
}

// ============================================================================
// Bit packing
// ============================================================================

class BitWriter {
  private bits = 0n;
  private offset = 0;

  put(value: number, width: number): void {
    const masked = BigInt(value >>> 0) & ((1n << BigInt(width)) - 1n);
    this.bits |= masked << BigInt(this.offset);
    this.offset += width;
  }

  get value(): StewBits {
    return this.bits;
  }
}

class BitReader {
  private offset = 0;

  constructor(private readonly bits: StewBits) {}

  take(width: number): number {
    const field = (this.bits >> BigInt(this.offset)) & ((1n << BigInt(width)) - 1n);
    this.offset += width;
    return Number(field);
  }
}

export function blankStew(config: PrismConfig): Stew {
  const lanes: CompareLane[] = [];
  for (let l = 0; l < laneCount(config); l++) {
    lanes.push({ selects: new Array(config.lutInputs).fill(0), lut: 0, target: 0, jumpOut: 0 });
  }
  return {
    increment: false,
    staticOut: 0,
    condLuts: new Array(config.condOutputs).fill(0),
    lanes,
  };
}

/** Pack a row. Fields wider than their slot are truncated; missing lanes/LUTs pack as zero. */
export function encodeStew(stew: Stew, config: PrismConfig): StewBits {
  const layout = stewLayout(config);
  const w = new BitWriter();

  w.put(stew.increment ? 1 : 0, 1);
  w.put(stew.staticOut, config.outputWidth);
  for (let c = 0; c < config.condOutputs; c++) {
    w.put(stew.condLuts[c] ?? 0, COND_LUT_BITS);
  }
  for (let l = 0; l < layout.laneCount; l++) {
    const lane = stew.lanes[l];
    for (let k = 0; k < config.lutInputs; k++) {
      w.put(lane?.selects[k] ?? 0, layout.selBits);
    }
    w.put(lane?.lut ?? 0, layout.lutSize);
    w.put(lane?.target ?? 0, layout.siBits);
    w.put(lane?.jumpOut ?? 0, config.outputWidth);
  }
  return w.value;
}

/** Unpack a row. Every bit pattern is a legal row. */
export function decodeStew(bits: StewBits, config: PrismConfig): Stew {
  const layout = stewLayout(config);
  const r = new BitReader(bits);

  const increment = r.take(1) === 1;
  const staticOut = r.take(config.outputWidth);
  const condLuts: number[] = [];
  for (let c = 0; c < config.condOutputs; c++) condLuts.push(r.take(COND_LUT_BITS));

  const lanes: CompareLane[] = [];
  for (let l = 0; l < layout.laneCount; l++) {
    const selects: number[] = [];
    for (let k = 0; k < config.lutInputs; k++) selects.push(r.take(layout.selBits));
    const lut = r.take(layout.lutSize);
    const target = r.take(layout.siBits);
    const jumpOut = r.take(config.outputWidth);
    lanes.push({ selects, lut, target, jumpOut });
  }

  return { increment, staticOut, condLuts, lanes };
}

// ============================================================================
// Host windows
// ============================================================================

export function splitWindows(bits: StewBits, config: PrismConfig): { lsb: number; msb: number } {
  const { lsbBits } = stewLayout(config);
  const shift = BigInt(lsbBits);
  return {
    lsb: Number(bits & ((1n << shift) - 1n)),
    msb: Number((bits >> shift) & 0xFFFFFFFFn),
  };
}

export function joinWindows(lsb: number, msb: number, config: PrismConfig): StewBits {
  const { lsbBits, width } = stewLayout(config);
  const lsbPart = BigInt((lsb & bitMask(lsbBits)) >>> 0);
  const row = (BigInt(msb >>> 0) << BigInt(lsbBits)) | lsbPart;
  return row & ((1n << BigInt(width)) - 1n);
}

/**
 * Host writes that program `rows` (forward order) into one table instance.
 * The chain shifts every row down one slot per load, so the deepest row goes
 * first and each row's LSB beat precedes the MSB beat that triggers it.
 */
export function loadSequence(rows: (Stew | StewBits)[], config: PrismConfig, table: number = 0): WindowWrite[] {
  const { lsbBits } = stewLayout(config);
  const writes: WindowWrite[] = [];
  for (let i = rows.length - 1; i >= 0; i--) {
    const row = rows[i];
    const bits = typeof row === 'bigint' ? row : encodeStew(row, config);
    const { lsb, msb } = splitWindows(bits, config);
    if (lsbBits > 0) writes.push({ table, window: 'lsb', value: lsb });
    writes.push({ table, window: 'msb', value: msb });
  }
  return writes;
}

/** Parse a program-file row: `0x` hex or decimal digits. */
export function parseStewBits(text: string): StewBits {
  const t = text.trim().toLowerCase().replace(/_/g, '');
  if (/^0x[0-9a-f]+$/.test(t)) return BigInt(t);
  if (/^[0-9]+$/.test(t)) return BigInt(t);
  throw new Error(`Invalid STEW row: '${text}'`);
}
