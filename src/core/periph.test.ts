import { describe, it, expect } from 'vitest';
import { PrismPeripheral } from './periph';
import { resolveConfig } from './config';
import { loadSequence, splitWindows } from './stew';
import {
  REG, CTRL_BITS, DBG_CTRL_BITS, DBG_STATUS_BITS, FORCE_LOAD_STROBE, OVERRIDE_ENABLE,
} from './constants';
import type { PrismConfig, StewBits } from './types';

const cfg = resolveConfig();

// Increment rows with static outputs 1..4
const COUNT = [0x3n, 0x5n, 0x7n, 0x9n];
const TOGGLE = [0x301n, 0x88000300n];

/** Load table 0 under FSM reset, then leave the engine running. */
function booted(rows: StewBits[] = [], config: Partial<PrismConfig> = {}): PrismPeripheral {
  const periph = new PrismPeripheral(config);
  periph.write(REG.CTRL, CTRL_BITS.ENABLE | CTRL_BITS.FSM_RESET);
  if (rows.length > 0) periph.program(loadSequence(rows, periph.config, 0));
  periph.write(REG.CTRL, CTRL_BITS.ENABLE);
  return periph;
}

describe('PrismPeripheral control registers', () => {
  it('reads back CTRL without the self-clearing IRQ bit', () => {
    const periph = new PrismPeripheral();
    const mode = 0xABCD << CTRL_BITS.MODE_SHIFT;
    periph.write(REG.CTRL, mode | CTRL_BITS.ENABLE | CTRL_BITS.FRACTURE | CTRL_BITS.PROGRAM | CTRL_BITS.IRQ_CLEAR);
    expect(periph.read(REG.CTRL)).toBe(0xABCD0015);
    expect(periph.engine.enabled).toBe(true);
    expect(periph.engine.fracture).toBe(true);
  });

  it('packs debug control and breakpoint values per shard', () => {
    const periph = new PrismPeripheral();
    periph.write(REG.DBG_CTRL, DBG_CTRL_BITS.HALT_REQ | (DBG_CTRL_BITS.BP0_EN << DBG_CTRL_BITS.SHARD_STRIDE));
    expect(periph.read(REG.DBG_CTRL)).toBe(0x401);
    expect(periph.engine.getDebug(0).haltRequest).toBe(true);
    expect(periph.engine.getDebug(1).breakpoints[0].enabled).toBe(true);

    periph.write(REG.DBG_BP, 0x01050302);
    expect(periph.read(REG.DBG_BP)).toBe(0x01050302);
    expect(periph.engine.getDebug(0).breakpoints.map(bp => bp.value)).toEqual([2, 3]);
    expect(periph.engine.getDebug(1).breakpoints.map(bp => bp.value)).toEqual([5, 1]);
  });

  it('masks output and conditional masks to their widths', () => {
    const periph = new PrismPeripheral();
    periph.write(REG.OUT_MASK0, 0xFFFFFFFF);
    periph.write(REG.COND_MASK1, 0xFF);
    expect(periph.read(REG.OUT_MASK0)).toBe(0x3F);
    expect(periph.read(REG.COND_MASK1)).toBe(0x1);
  });

  it('reads back the override register with its enable bit', () => {
    const periph = new PrismPeripheral();
    periph.write(REG.DBG_OVR0, OVERRIDE_ENABLE | 0x15);
    expect(periph.read(REG.DBG_OVR0)).toBe(0x80000015);
    periph.write(REG.DBG_OVR0, 0x15);
    expect(periph.read(REG.DBG_OVR0)).toBe(0);
  });

  it('reads zero from unmapped offsets', () => {
    const periph = new PrismPeripheral();
    periph.write(0x4C, 0xFFFFFFFF);
    expect(periph.read(0x4C)).toBe(0);
    expect(periph.read(0x100)).toBe(0);
  });
});

describe('PrismPeripheral table windows', () => {
  const A = 0x1n;
  const B = 0x80000001n;
  const C = (1n << 63n) - 1n;
  const D = 0x123456789n;

  it('takes DEPTH + 2 cycles per load', () => {
    expect(new PrismPeripheral().loadCycles(0)).toBe(6);
    expect(new PrismPeripheral({ depth1: 0 }).loadCycles(1)).toBe(0);
  });

  it('flags the loader busy from the MSB write until the load completes', () => {
    const periph = booted();
    periph.write(REG.SIT0_LSB, 0);
    periph.write(REG.SIT0_MSB, 1);
    expect(periph.read(REG.DBG_STATUS) & DBG_STATUS_BITS.LOADER0_BUSY).toBe(DBG_STATUS_BITS.LOADER0_BUSY);
    periph.clock(5);
    expect(periph.read(REG.DBG_STATUS) & DBG_STATUS_BITS.LOADER0_BUSY).toBe(DBG_STATUS_BITS.LOADER0_BUSY);
    periph.clock();
    expect(periph.read(REG.DBG_STATUS) & DBG_STATUS_BITS.LOADER0_BUSY).toBe(0);
  });

  it('shows the tail row in the read windows', () => {
    const periph = booted([A, B, C, D]);
    const { lsb, msb } = splitWindows(D, cfg);
    expect(periph.read(REG.SIT0_LSB)).toBe(lsb);
    expect(periph.read(REG.SIT0_MSB)).toBe(msb);
  });

  it('leaves the first row written in the tail of a full table', () => {
    const rows = Array.from({ length: 8 }, (_, i) => BigInt(i + 1) * 0x100000001n);
    const periph = booted(rows, { depth0: 8, depth1: 0 });
    // rows[7] = 0x800000008
    expect(periph.read(REG.SIT0_LSB)).toBe(0x8);
    expect(periph.read(REG.SIT0_MSB)).toBe(0x10);
  });

  it('reads a table back by rotation and leaves it unchanged', () => {
    const periph = booted([A, B, C, D]);
    expect(periph.readBack(0)).toEqual([A, B, C, D]);
    expect(periph.engine.tables[0].toArray()).toEqual([A, B, C, D]);
  });

  it('reaches the same table when a sequence is replayed', () => {
    const periph = booted([A, B, C, D]);
    periph.program(loadSequence([A, B, C, D], cfg, 0));
    expect(periph.engine.tables[0].toArray()).toEqual([A, B, C, D]);
  });

  it('refuses to program a disabled engine', () => {
    const periph = new PrismPeripheral();
    expect(() => periph.program(loadSequence([A], cfg, 0))).toThrow('program: the engine must be enabled');
    expect(periph.engine.tables[0].toArray()).toEqual([0n, 0n, 0n, 0n]);
  });

  it('refuses to read back a disabled engine and leaves the table intact', () => {
    const periph = booted([A, B, C, D]);
    periph.write(REG.CTRL, 0);
    expect(() => periph.readBack(0)).toThrow('readBack: the engine must be enabled');
    expect(periph.engine.tables[0].toArray()).toEqual([A, B, C, D]);
  });

  it('ignores the second table window on a single-instance build', () => {
    const periph = booted([], { depth1: 0 });
    periph.write(REG.SIT1_LSB, 5);
    periph.write(REG.SIT1_MSB, 5);
    periph.clock(6);
    expect(periph.read(REG.SIT1_MSB)).toBe(0);
    expect(periph.readBack(1)).toEqual([]);
  });
});

describe('PrismPeripheral status and telemetry', () => {
  it('reports index, halt and anchor per shard', () => {
    const periph = booted(COUNT);
    periph.clock(2);
    expect(periph.read(REG.DBG_NEXT)).toBe(3);

    periph.write(REG.DBG_CTRL, DBG_CTRL_BITS.HALT_REQ);
    periph.clock();
    expect(periph.read(REG.DBG_STATUS)).toBe(2 | DBG_STATUS_BITS.HALTED | DBG_STATUS_BITS.ANCHOR_VALID);
  });

  it('raises and clears the interrupt on a breakpoint', () => {
    const periph = booted(COUNT);
    periph.write(REG.DBG_BP, 3);
    periph.write(REG.DBG_CTRL, DBG_CTRL_BITS.BP0_EN);
    periph.clock(3);

    const status = periph.read(REG.DBG_STATUS);
    expect(status & 0xFF).toBe(3);
    expect(status & DBG_STATUS_BITS.BP0_ACTIVE).toBe(DBG_STATUS_BITS.BP0_ACTIVE);
    expect(status & DBG_STATUS_BITS.IRQ_PENDING).toBe(DBG_STATUS_BITS.IRQ_PENDING);

    periph.write(REG.CTRL, CTRL_BITS.ENABLE | CTRL_BITS.IRQ_CLEAR);
    expect(periph.read(REG.DBG_STATUS) & DBG_STATUS_BITS.IRQ_PENDING).toBe(0);
  });

  it('loads a forced index written through DBG_FORCE', () => {
    const periph = booted(COUNT);
    periph.write(REG.DBG_FORCE, FORCE_LOAD_STROBE | 6);
    periph.clock(3);
    expect(periph.read(REG.DBG_STATUS) & 0xFF).toBe(6);
  });

  it('flags overlapping output masks', () => {
    const periph = new PrismPeripheral();
    periph.write(REG.OUT_MASK0, 0b01);
    periph.write(REG.OUT_MASK1, 0b11);
    expect(periph.read(REG.DBG_STATUS) & DBG_STATUS_BITS.MASK_OVERLAP).toBe(DBG_STATUS_BITS.MASK_OVERLAP);
  });

  it('reads the masked input vector and the output pins', () => {
    const periph = booted(TOGGLE);
    periph.setInputs(0x1FF);
    expect(periph.read(REG.TLM_INPUT)).toBe(0xFF);

    periph.setInputs(1);
    periph.clock();
    expect(periph.read(REG.TLM_OUTPUT)).toBe(64);
    // row 1 carries the same XOR conditional LUT as row 0
    periph.clock();
    expect(periph.read(REG.TLM_OUTPUT)).toBe(1 | (1 << 6));
  });

  it('packs the lane trace of the last decision', () => {
    const periph = booted(TOGGLE);
    periph.setInputs(1);
    expect(periph.read(REG.TLM_TRACE)).toBe(0);
    periph.clock();
    // both lanes address 0b111; neither LUT has bit 7 set on row 0
    expect(periph.read(REG.TLM_TRACE)).toBe(0x77);
    periph.clock();
    expect(periph.read(REG.TLM_TRACE)).toBe(0x7F);
  });
});
