/**
 * PRISM engine - state table, up to two FSM shards, fracture composition
 * and the debug controller, advanced one enabled clock edge at a time.
 */
import { LatchShiftChain } from './shift-chain';
import { DebugController } from './debug';
import { decide } from './decision';
import type { ExecutionState } from './decision';
import { evalCondOutputs } from './cond-output';
import { resolveConfig, supportsFracture, totalDepth } from './config';
import { bitMask } from './constants';
import type {
  Breakpoint, Decision, LaneTrace, PrismConfig, PrismSnapshot, ShardIndex,
  ShardStatus, Stew,
} from './types';

interface Shard {
  readonly id: ShardIndex;
  exec: ExecutionState;
  readonly debug: DebugController;
  /** Registered output vector, before masking */
  out: number;
  /** Registered conditional outputs, before masking */
  cond: number;
  outMask: number;
  condMask: number;
  lastDecision: Decision | null;
}

function createShard(id: ShardIndex): Shard {
  return {
    id,
    exec: { index: 0, anchor: 0, anchorValid: false },
    debug: new DebugController(),
    out: 0,
    cond: 0,
    outMask: 0,
    condMask: 0,
    lastDecision: null,
  };
}

export interface MaskOverlap {
  outputs: number;
  cond: number;
}

export class PrismEngine {
  readonly config: PrismConfig;
  readonly tables: LatchShiftChain[];
  private shards: [Shard, Shard];

  // Global control
  private _enabled = false;
  private _fsmReset = false;
  private _fracture = false;
  private _irqPending = false;

  private inputs = 0;
  private cycle = 0;

  constructor(config: Partial<PrismConfig> = {}) {
    this.config = resolveConfig(config);
    this.tables = [new LatchShiftChain(this.config.depth0, this.config)];
    if (supportsFracture(this.config)) {
      this.tables.push(new LatchShiftChain(this.config.depth1, this.config));
    }
    this.shards = [createShard(0), createShard(1)];
  }

  // ========================================================================
  // Clock
  // ========================================================================

  clock(cycles: number = 1): void {
    for (let i = 0; i < cycles; i++) this.tick();
  }

  private tick(): void {
    this.cycle++;

    if (!this._enabled) {
      for (const table of this.tables) table.abort();
      for (const shard of this.shards) shard.debug.clearPipelines();
      return;
    }

    // Shards sample the table before the loader latches this edge
    if (this._fsmReset) {
      for (const shard of this.shards) this.resetShard(shard);
    } else {
      this.stepShard(this.shards[0]);
      if (this._fracture) {
        this.stepShard(this.shards[1]);
      } else {
        this.resetShard(this.shards[1]);
      }
    }

    for (const table of this.tables) table.tick();
  }

  private stepShard(shard: Shard): void {
    const dbg = shard.debug;
    const { forced, stepEdge } = dbg.advance();
    const capacity = this.capacity(shard.id);
    const row = this.rowFor(shard.id, shard.exec.index);

    shard.cond = evalCondOutputs(row, this.inputs, this.config);

    if (forced !== null) {
      const index = forced % capacity;
      shard.exec = { index, anchor: 0, anchorValid: false };
      dbg.debugIndex = index;
      dbg.settle(index);
      return;
    }

    if (dbg.halted) {
      if (stepEdge) {
        const d = decide(row, this.inputs, shard.exec, { capacity, halted: false, debugIndex: dbg.debugIndex });
        const k = dbg.breakpointHit(d.next);
        this.commit(shard, d);
        if (k >= 0) dbg.bpActive[k] = true;
        dbg.snapshot = d.out;
        dbg.debugIndex = d.next;
        dbg.settle(d.next);
        return;
      }
      if (dbg.haltRequest || dbg.anyBpActive) {
        const d = decide(row, this.inputs, shard.exec, { capacity, halted: true, debugIndex: dbg.debugIndex });
        shard.exec = { index: d.next, anchor: d.anchor, anchorValid: d.anchorValid };
        shard.lastDecision = d;
        dbg.settle(d.next);
        return;
      }
      dbg.halted = false;
    }

    if (dbg.haltRequest) {
      dbg.halted = true;
      dbg.snapshot = shard.out;
      dbg.debugIndex = shard.exec.index;
      return;
    }

    const d = decide(row, this.inputs, shard.exec, { capacity, halted: false, debugIndex: dbg.debugIndex });
    const k = dbg.breakpointHit(d.next);
    this.commit(shard, d);
    if (k >= 0) {
      dbg.bpActive[k] = true;
      dbg.halted = true;
      dbg.snapshot = d.out;
      dbg.debugIndex = d.next;
      this._irqPending = true;
    }
    dbg.settle(d.next);
  }

  private commit(shard: Shard, d: Decision): void {
    shard.exec = { index: d.next, anchor: d.anchor, anchorValid: d.anchorValid };
    shard.out = d.out;
    shard.lastDecision = d;
  }

  private resetShard(shard: Shard): void {
    shard.exec = { index: 0, anchor: 0, anchorValid: false };
    shard.out = 0;
    shard.cond = 0;
    shard.lastDecision = null;
    shard.debug.resetExecution();
  }

  // ========================================================================
  // Table addressing
  // ========================================================================

  /** Rows addressable by a shard in the current mode. */
  capacity(shard: ShardIndex): number {
    if (!this._fracture) return shard === 0 ? totalDepth(this.config) : 0;
    return shard === 0 ? this.config.depth0 : this.config.depth1;
  }

  /** Concatenated view when unfractured: the upper rows live in instance 1. */
  private rowFor(shard: ShardIndex, index: number): Stew {
    if (this._fracture) return this.tables[shard].row(index);
    if (index < this.config.depth0) return this.tables[0].row(index);
    return this.tables[1].row(index - this.config.depth0);
  }

  // ========================================================================
  // Control
  // ========================================================================

  /** System reset. Table latches keep their contents. */
  reset(): void {
    this._enabled = false;
    this._fsmReset = false;
    this._fracture = false;
    this._irqPending = false;
    this.inputs = 0;
    this.cycle = 0;
    for (const table of this.tables) table.abort();
    for (const shard of this.shards) {
      this.resetShard(shard);
      shard.debug.resetSession();
      shard.outMask = 0;
      shard.condMask = 0;
    }
  }

  setEnabled(on: boolean): void {
    this._enabled = on;
  }

  setFsmReset(on: boolean): void {
    this._fsmReset = on;
  }

  /** Ignored when the build has no second table instance. Switching mode restarts both shards at index 0. */
  setFracture(on: boolean): void {
    const next = on && supportsFracture(this.config);
    if (next === this._fracture) return;
    this._fracture = next;
    for (const shard of this.shards) this.resetShard(shard);
  }

  setInputs(value: number): void {
    this.inputs = (value & bitMask(this.config.inputWidth)) >>> 0;
  }

  clearIrq(): void {
    this._irqPending = false;
  }

  setOutputMask(shard: ShardIndex, mask: number): void {
    this.shards[shard].outMask = (mask & bitMask(this.config.outputWidth)) >>> 0;
  }

  setCondMask(shard: ShardIndex, mask: number): void {
    this.shards[shard].condMask = (mask & bitMask(this.config.condOutputs)) >>> 0;
  }

  get enabled(): boolean { return this._enabled; }
  get fsmReset(): boolean { return this._fsmReset; }
  get fracture(): boolean { return this._fracture; }
  get irqPending(): boolean { return this._irqPending; }
  get inputVector(): number { return this.inputs; }
  get cycleCount(): number { return this.cycle; }

  getOutputMask(shard: ShardIndex): number { return this.shards[shard].outMask; }
  getCondMask(shard: ShardIndex): number { return this.shards[shard].condMask; }

  // ========================================================================
  // Debug session
  // ========================================================================

  setHaltRequest(shard: ShardIndex, on: boolean): void {
    this.shards[shard].debug.haltRequest = on;
  }

  setStepToggle(shard: ShardIndex, on: boolean): void {
    this.shards[shard].debug.stepToggle = on;
  }

  setBreakpoint(shard: ShardIndex, comparator: 0 | 1, bp: Partial<Breakpoint>): void {
    const target = this.shards[shard].debug.breakpoints[comparator];
    if (bp.value !== undefined) target.value = bp.value & 0xFF;
    if (bp.enabled !== undefined) target.enabled = bp.enabled;
  }

  /** Load the state index after the synchronisation pipeline, in RUN or HALTED alike. */
  forceIndex(shard: ShardIndex, index: number): void {
    this.shards[shard].debug.requestForce(index & 0xFF);
  }

  /** Explicit output bits driven while halted; `null` releases the override. */
  setOutputOverride(shard: ShardIndex, value: number | null): void {
    const masked = value === null ? null : (value & bitMask(this.config.outputWidth)) >>> 0;
    this.shards[shard].debug.writeOverride(masked);
  }

  getDebug(shard: ShardIndex): DebugController {
    return this.shards[shard].debug;
  }

  // ========================================================================
  // Outputs
  // ========================================================================

  private driven(shard: Shard): number {
    const dbg = shard.debug;
    if (!dbg.halted) return shard.out;
    return dbg.override ?? dbg.snapshot;
  }

  private get live(): boolean {
    return this._enabled && !this._fsmReset;
  }

  /** Composite FSM output vector. */
  get outputs(): number {
    if (!this.live) return 0;
    const [s0, s1] = this.shards;
    if (!this._fracture) return this.driven(s0);
    return ((this.driven(s0) & s0.outMask) | (this.driven(s1) & s1.outMask)) >>> 0;
  }

  get condOutputs(): number {
    if (!this.live) return 0;
    const [s0, s1] = this.shards;
    if (!this._fracture) return s0.cond;
    return ((s0.cond & s0.condMask) | (s1.cond & s1.condMask)) >>> 0;
  }

  /** Output pins: FSM outputs with the conditional outputs above them. */
  get pins(): number {
    return this.outputs + this.condOutputs * 2 ** this.config.outputWidth;
  }

  /** Lane trace of each shard's last evaluated decision. */
  get trace(): LaneTrace[][] {
    return this.shards.map(s => s.lastDecision?.lanes ?? []);
  }

  /** Bits claimed by both shards; composition ORs them rather than rejecting. */
  maskOverlap(): MaskOverlap {
    const [s0, s1] = this.shards;
    return {
      outputs: (s0.outMask & s1.outMask) >>> 0,
      cond: (s0.condMask & s1.condMask) >>> 0,
    };
  }

  // ========================================================================
  // Queries
  // ========================================================================

  /** The decision the next edge would take, without committing it. */
  peekNext(shard: ShardIndex): Decision {
    const s = this.shards[shard];
    const capacity = Math.max(1, this.capacity(shard));
    const index = s.exec.index % capacity;
    return decide(this.rowFor(this._fracture ? shard : 0, index), this.inputs, s.exec, {
      capacity,
      halted: s.debug.halted,
      debugIndex: s.debug.debugIndex,
    });
  }

  getShardStatus(shard: ShardIndex): ShardStatus {
    const s = this.shards[shard];
    return {
      index: s.exec.index,
      nextIndex: this.peekNext(shard).next,
      anchor: s.exec.anchor,
      anchorValid: s.exec.anchorValid,
      halted: s.debug.halted,
      bpActive: [s.debug.bpActive[0], s.debug.bpActive[1]],
      out: this.driven(s),
      cond: s.cond,
      lastRule: s.lastDecision?.rule ?? null,
    };
  }

  getSnapshot(): PrismSnapshot {
    return {
      cycle: this.cycle,
      enabled: this._enabled,
      fsmReset: this._fsmReset,
      fracture: this._fracture,
      inputs: this.inputs,
      outputs: this.outputs,
      condOutputs: this.condOutputs,
      pins: this.pins,
      irqPending: this._irqPending,
      loaderBusy: this.tables.map(t => t.busy),
      shards: [this.getShardStatus(0), this.getShardStatus(1)],
    };
  }
}
