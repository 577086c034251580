/**
 * Register-mapped host interface to a PrismEngine.
 * Single-beat 32-bit reads and writes, no backpressure; unmapped offsets read 0.
 */
import { PrismEngine } from './prism';
import {
  REG, CTRL_BITS, DBG_CTRL_BITS, DBG_STATUS_BITS, FORCE_LOAD_STROBE,
  OVERRIDE_ENABLE, SHARD_FIELD_STRIDE, bitMask,
} from './constants';
import { stewLayout } from './stew';
import type { PrismConfig, ShardIndex, StewBits, WindowWrite } from './types';

const SHARDS: ShardIndex[] = [0, 1];

export class PrismPeripheral {
  readonly engine: PrismEngine;

  // CTRL bits the engine does not interpret, kept for read-back
  private programMode = false;
  private mode = 0;

  constructor(engineOrConfig: PrismEngine | Partial<PrismConfig> = {}) {
    this.engine = engineOrConfig instanceof PrismEngine ? engineOrConfig : new PrismEngine(engineOrConfig);
  }

  get config(): PrismConfig {
    return this.engine.config;
  }

  // ========================================================================
  // Bus
  // ========================================================================

  write(offset: number, value: number): void {
    const v = value >>> 0;
    const e = this.engine;
    switch (offset) {
      case REG.CTRL:
        e.setEnabled((v & CTRL_BITS.ENABLE) !== 0);
        e.setFsmReset((v & CTRL_BITS.FSM_RESET) !== 0);
        e.setFracture((v & CTRL_BITS.FRACTURE) !== 0);
        if (v & CTRL_BITS.IRQ_CLEAR) e.clearIrq();
        this.programMode = (v & CTRL_BITS.PROGRAM) !== 0;
        this.mode = v >>> CTRL_BITS.MODE_SHIFT;
        break;
      case REG.DBG_CTRL:
        for (const s of SHARDS) {
          const field = v >>> (s * DBG_CTRL_BITS.SHARD_STRIDE);
          e.setHaltRequest(s, (field & DBG_CTRL_BITS.HALT_REQ) !== 0);
          e.setStepToggle(s, (field & DBG_CTRL_BITS.STEP) !== 0);
          e.setBreakpoint(s, 0, { enabled: (field & DBG_CTRL_BITS.BP0_EN) !== 0 });
          e.setBreakpoint(s, 1, { enabled: (field & DBG_CTRL_BITS.BP1_EN) !== 0 });
        }
        break;
      case REG.DBG_BP:
        for (const s of SHARDS) {
          const field = v >>> (s * SHARD_FIELD_STRIDE);
          e.setBreakpoint(s, 0, { value: field & 0xFF });
          e.setBreakpoint(s, 1, { value: (field >>> 8) & 0xFF });
        }
        break;
      case REG.DBG_FORCE:
        for (const s of SHARDS) {
          const field = v >>> (s * SHARD_FIELD_STRIDE);
          if (field & FORCE_LOAD_STROBE) e.forceIndex(s, field & 0xFF);
        }
        break;
      case REG.DBG_OVR0:
      case REG.DBG_OVR1: {
        const s: ShardIndex = offset === REG.DBG_OVR0 ? 0 : 1;
        e.setOutputOverride(s, (v & OVERRIDE_ENABLE) !== 0 ? v & 0x7FFFFFFF : null);
        break;
      }
      case REG.SIT0_LSB: this.tableWrite(0, 'lsb', v); break;
      case REG.SIT0_MSB: this.tableWrite(0, 'msb', v); break;
      case REG.SIT1_LSB: this.tableWrite(1, 'lsb', v); break;
      case REG.SIT1_MSB: this.tableWrite(1, 'msb', v); break;
      case REG.OUT_MASK0: e.setOutputMask(0, v); break;
      case REG.OUT_MASK1: e.setOutputMask(1, v); break;
      case REG.COND_MASK0: e.setCondMask(0, v); break;
      case REG.COND_MASK1: e.setCondMask(1, v); break;
      default:
        break;
    }
  }

  read(offset: number): number {
    const e = this.engine;
    switch (offset) {
      case REG.CTRL:
        return (
          (e.enabled ? CTRL_BITS.ENABLE : 0) |
          (e.fsmReset ? CTRL_BITS.FSM_RESET : 0) |
          (e.fracture ? CTRL_BITS.FRACTURE : 0) |
          (this.programMode ? CTRL_BITS.PROGRAM : 0) |
          (this.mode << CTRL_BITS.MODE_SHIFT)
        ) >>> 0;
      case REG.DBG_CTRL: {
        let v = 0;
        for (const s of SHARDS) {
          const dbg = e.getDebug(s);
          const field =
            (dbg.haltRequest ? DBG_CTRL_BITS.HALT_REQ : 0) |
            (dbg.stepToggle ? DBG_CTRL_BITS.STEP : 0) |
            (dbg.breakpoints[0].enabled ? DBG_CTRL_BITS.BP0_EN : 0) |
            (dbg.breakpoints[1].enabled ? DBG_CTRL_BITS.BP1_EN : 0);
          v |= field << (s * DBG_CTRL_BITS.SHARD_STRIDE);
        }
        return v >>> 0;
      }
      case REG.DBG_BP: {
        let v = 0;
        for (const s of SHARDS) {
          const [bp0, bp1] = e.getDebug(s).breakpoints;
          v |= (bp0.value | (bp1.value << 8)) << (s * SHARD_FIELD_STRIDE);
        }
        return v >>> 0;
      }
      case REG.DBG_STATUS:
        return this.readStatus();
      case REG.DBG_NEXT: {
        let v = 0;
        for (const s of SHARDS) {
          const status = e.getShardStatus(s);
          v |= ((status.nextIndex & 0xFF) | ((status.anchor & 0xFF) << 8)) << (s * SHARD_FIELD_STRIDE);
        }
        return v >>> 0;
      }
      case REG.DBG_OVR0:
      case REG.DBG_OVR1: {
        const reg = e.getDebug(offset === REG.DBG_OVR0 ? 0 : 1).overrideRegister;
        return reg === null ? 0 : (reg | OVERRIDE_ENABLE) >>> 0;
      }
      case REG.SIT0_LSB: return this.tableRead(0, 'lsb');
      case REG.SIT0_MSB: return this.tableRead(0, 'msb');
      case REG.SIT1_LSB: return this.tableRead(1, 'lsb');
      case REG.SIT1_MSB: return this.tableRead(1, 'msb');
      case REG.OUT_MASK0: return e.getOutputMask(0);
      case REG.OUT_MASK1: return e.getOutputMask(1);
      case REG.COND_MASK0: return e.getCondMask(0);
      case REG.COND_MASK1: return e.getCondMask(1);
      case REG.TLM_OUTPUT: return e.pins >>> 0;
      case REG.TLM_INPUT: return e.inputVector;
      case REG.TLM_TRACE: return this.readTrace();
      default:
        return 0;
    }
  }

  private readStatus(): number {
    const e = this.engine;
    let v = 0;
    for (const s of SHARDS) {
      const status = e.getShardStatus(s);
      const field =
        (status.index & 0xFF) |
        (status.halted ? DBG_STATUS_BITS.HALTED : 0) |
        (status.bpActive[0] ? DBG_STATUS_BITS.BP0_ACTIVE : 0) |
        (status.bpActive[1] ? DBG_STATUS_BITS.BP1_ACTIVE : 0) |
        (status.anchorValid ? DBG_STATUS_BITS.ANCHOR_VALID : 0);
      v |= field << (s * DBG_STATUS_BITS.SHARD_STRIDE);
    }
    if (e.tables[0].busy) v |= DBG_STATUS_BITS.LOADER0_BUSY;
    if (e.tables[1]?.busy) v |= DBG_STATUS_BITS.LOADER1_BUSY;
    if (e.irqPending) v |= DBG_STATUS_BITS.IRQ_PENDING;
    const overlap = e.maskOverlap();
    if (overlap.outputs !== 0 || overlap.cond !== 0) v |= DBG_STATUS_BITS.MASK_OVERLAP;
    return v >>> 0;
  }

  private readTrace(): number {
    const k = this.config.lutInputs;
    let v = 0;
    this.engine.trace.forEach((lanes, s) => {
      let field = 0;
      lanes.forEach((lane, l) => {
        const base = l * (k + 1);
        field |= (lane.bits & bitMask(k)) << base;
        if (lane.match) field |= 1 << (base + k);
      });
      v |= field << (s * SHARD_FIELD_STRIDE);
    });
    return v >>> 0;
  }

  private tableWrite(table: number, window: 'lsb' | 'msb', value: number): void {
    const chain = this.engine.tables[table];
    if (!chain) return;
    if (window === 'lsb') chain.writeLsb(value);
    else chain.writeMsb(value);
  }

  private tableRead(table: number, window: 'lsb' | 'msb'): number {
    const chain = this.engine.tables[table];
    if (!chain) return 0;
    return (window === 'lsb' ? chain.readLsb() : chain.readMsb()) >>> 0;
  }

  // ========================================================================
  // Host-side helpers
  // ========================================================================

  clock(cycles: number = 1): void {
    this.engine.clock(cycles);
  }

  setInputs(value: number): void {
    this.engine.setInputs(value);
  }

  private requireEnabled(op: string): void {
    if (!this.engine.enabled) throw new Error(`${op}: the engine must be enabled`);
  }

  /** Cycles one load occupies the loader of `table`, trigger and WAIT included. */
  loadCycles(table: number): number {
    const chain = this.engine.tables[table];
    return chain ? chain.depth + 2 : 0;
  }

  /**
   * Issue a write sequence (see `loadSequence`), clocking after each MSB beat
   * until that load has rippled through. Throws while the engine is disabled,
   * since a disabled clock aborts every load.
   */
  program(writes: WindowWrite[]): void {
    this.requireEnabled('program');
    for (const w of writes) {
      const base = w.table === 0 ? REG.SIT0_LSB : REG.SIT1_LSB;
      this.write(w.window === 'lsb' ? base : base + 4, w.value);
      if (w.window === 'msb') this.clock(this.loadCycles(w.table));
    }
  }

  /**
   * Read a whole table through the tail window by rotating it once: each tail
   * row is read and written straight back. Returns rows in forward order and
   * leaves the table as it was.
   */
  readBack(table: number): StewBits[] {
    this.requireEnabled('readBack');
    const chain = this.engine.tables[table];
    if (!chain) return [];
    const { lsbBits } = stewLayout(this.config);
    const base = table === 0 ? REG.SIT0_LSB : REG.SIT1_LSB;
    const rows: StewBits[] = [];
    for (let i = 0; i < chain.depth; i++) {
      const lsb = this.read(base);
      const msb = this.read(base + 4);
      rows.unshift((BigInt(msb) << BigInt(lsbBits)) | BigInt(lsb));
      this.write(base, lsb);
      this.write(base + 4, msb);
      this.clock(this.loadCycles(table));
    }
    return rows;
  }
}
