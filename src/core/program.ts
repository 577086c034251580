/**
 * Program files: table contents plus the control configuration a
 * personality needs, loaded through the peripheral's register windows.
 *
 * {
 *   "config":      { "depth0": 4, ... },          // optional build shape
 *   "control":     { "fracture": false, "mode": 0 },
 *   "outputMasks": [63, 0], "condMasks": [1, 0],  // optional
 *   "table0":      ["0x...", ...],                // forward order
 *   "table1":      ["0x...", ...],                // optional
 *   "inputs":      ["0x05", 3, ...]               // optional stimulus
 * }
 */
import type { PrismPeripheral } from './periph';
import { loadSequence, parseStewBits } from './stew';
import { CTRL_BITS, REG } from './constants';
import type { PrismConfig, StewBits } from './types';

export interface PrismProgram {
  config: Partial<PrismConfig>;
  fracture: boolean;
  mode: number;
  outputMasks: [number, number];
  condMasks: [number, number];
  table0: StewBits[];
  table1: StewBits[];
  inputs: number[];
}

const CONFIG_KEYS: (keyof PrismConfig)[] = [
  'depth0', 'depth1', 'inputWidth', 'outputWidth', 'lutInputs', 'dualCompare', 'condOutputs',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A 32-bit register value: a safe integer, or a `0x` hex or decimal string. */
export function parseWord(value: unknown, where: string): number {
  let n: bigint | null = null;
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    n = BigInt(value);
  } else if (typeof value === 'string') {
    const t = value.trim().toLowerCase();
    if (/^(0x[0-9a-f]+|[0-9]+)$/.test(t)) n = BigInt(t);
  }
  if (n === null) throw new Error(`${where}: expected an integer, got ${JSON.stringify(value)}`);
  if (n < 0n || n > 0xFFFFFFFFn) throw new Error(`${where}: ${String(value).trim()} is outside 0..0xFFFFFFFF`);
  return Number(n);
}

function toRows(value: unknown, where: string): StewBits[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new Error(`${where}: expected an array of rows`);
  return value.map((row: unknown, i: number) => {
    if (typeof row === 'string') return parseStewBits(row);
    if (typeof row === 'number' && Number.isSafeInteger(row) && row >= 0) return BigInt(row);
    throw new Error(`${where}[${i}]: expected a hex string or integer`);
  });
}

function toPair(value: unknown, where: string): [number, number] {
  if (value === undefined) return [0, 0];
  if (!Array.isArray(value) || value.length > 2) throw new Error(`${where}: expected [shard0, shard1]`);
  return [
    value[0] === undefined ? 0 : parseWord(value[0], `${where}[0]`),
    value[1] === undefined ? 0 : parseWord(value[1], `${where}[1]`),
  ];
}

function toConfig(value: unknown): Partial<PrismConfig> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new Error('config: expected an object');
  const config: Partial<PrismConfig> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (!CONFIG_KEYS.some(k => k === key)) throw new Error(`config: unknown key '${key}'`);
    if (key === 'dualCompare') {
      if (typeof raw !== 'boolean') throw new Error('config.dualCompare: expected a boolean');
      config.dualCompare = raw;
    } else if (typeof raw !== 'number') {
      throw new Error(`config.${key}: expected a number`);
    } else {
      switch (key) {
        case 'depth0': config.depth0 = raw; break;
        case 'depth1': config.depth1 = raw; break;
        case 'inputWidth': config.inputWidth = raw; break;
        case 'outputWidth': config.outputWidth = raw; break;
        case 'lutInputs': config.lutInputs = raw; break;
        case 'condOutputs': config.condOutputs = raw; break;
      }
    }
  }
  return config;
}

/** Validate a parsed program file. Throws on the first malformed field. */
export function parseProgram(data: unknown): PrismProgram {
  if (!isRecord(data)) throw new Error('program: expected a JSON object');

  const control = data.control === undefined ? {} : data.control;
  if (!isRecord(control)) throw new Error('control: expected an object');
  if (control.fracture !== undefined && typeof control.fracture !== 'boolean') {
    throw new Error('control.fracture: expected a boolean');
  }

  const table0 = toRows(data.table0, 'table0');
  if (table0.length === 0) throw new Error('table0: at least one row is required');

  const inputs = data.inputs === undefined ? [] : data.inputs;
  if (!Array.isArray(inputs)) throw new Error('inputs: expected an array');

  return {
    config: toConfig(data.config),
    fracture: control.fracture === true,
    mode: control.mode === undefined ? 0 : parseWord(control.mode, 'control.mode') & 0xFFFF,
    outputMasks: toPair(data.outputMasks, 'outputMasks'),
    condMasks: toPair(data.condMasks, 'condMasks'),
    table0,
    table1: toRows(data.table1, 'table1'),
    inputs: inputs.map((v: unknown, i: number) => parseWord(v, `inputs[${i}]`)),
  };
}

/**
 * Program the tables with the FSM held in reset, set the masks, then release
 * reset with the program's control bits.
 */
export function loadProgram(periph: PrismPeripheral, program: PrismProgram): void {
  const { engine } = periph;
  const tables = [program.table0, program.table1];
  tables.forEach((rows, t) => {
    const depth = engine.tables[t]?.depth ?? 0;
    if (rows.length > depth) {
      throw new Error(`table${t}: ${rows.length} rows exceed depth ${depth}`);
    }
  });

  const mode = program.mode << CTRL_BITS.MODE_SHIFT;
  periph.write(REG.CTRL, CTRL_BITS.ENABLE | CTRL_BITS.FSM_RESET | CTRL_BITS.PROGRAM | mode);
  tables.forEach((rows, t) => {
    if (rows.length > 0) periph.program(loadSequence(rows, periph.config, t));
  });

  periph.write(REG.OUT_MASK0, program.outputMasks[0]);
  periph.write(REG.OUT_MASK1, program.outputMasks[1]);
  periph.write(REG.COND_MASK0, program.condMasks[0]);
  periph.write(REG.COND_MASK1, program.condMasks[1]);
  periph.setInputs(program.inputs[0] ?? 0);

  periph.write(REG.CTRL, CTRL_BITS.ENABLE | (program.fracture ? CTRL_BITS.FRACTURE : 0) | mode);
}
