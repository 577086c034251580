/**
 * State Information Table instance: a chain of latched STEW rows.
 *
 * The write path is a shift chain driven by a 3-state loader
 * (IDLE → SHIFT × depth → WAIT → IDLE). Each load ripples every row one slot
 * deeper and drops the row in the last slot. The execution read path
 * (`row(i)`) is array-style.
 */
import { stewLayout, decodeStew, joinWindows, splitWindows } from './stew';
import type { StewLayout } from './stew';
import { bitMask } from './constants';
import { LoaderState } from './types';
import type { PrismConfig, Stew, StewBits } from './types';

function freezeStew(stew: Stew): Stew {
  for (const lane of stew.lanes) {
    Object.freeze(lane.selects);
    Object.freeze(lane);
  }
  Object.freeze(stew.lanes);
  Object.freeze(stew.condLuts);
  return Object.freeze(stew);
}

export class LatchShiftChain {
  readonly depth: number;
  private readonly config: PrismConfig;
  private readonly layout: StewLayout;

  // Latches survive every reset
  private latches: StewBits[];
  private decoded: (Stew | null)[];

  // Staging register, filled by the LSB/MSB windows
  private stagedLsb = 0;
  private staged: StewBits = 0n;

  // Loader controller
  private state: LoaderState = LoaderState.IDLE;
  private shiftIndex = 0;
  private triggerPending = false;

  /** Completed loads since construction */
  loadCount = 0;

  constructor(depth: number, config: PrismConfig) {
    this.depth = depth;
    this.config = config;
    this.layout = stewLayout(config);
    this.latches = new Array<StewBits>(depth).fill(0n);
    this.decoded = new Array<Stew | null>(depth).fill(null);
  }

  // ========================================================================
  // Host windows
  // ========================================================================

  writeLsb(value: number): void {
    this.stagedLsb = (value & bitMask(this.layout.lsbBits)) >>> 0;
  }

  /** Completes the staged row and requests a load. Ignored by the controller unless IDLE. */
  writeMsb(value: number): void {
    this.staged = joinWindows(this.stagedLsb, value, this.config);
    this.triggerPending = true;
  }

  readLsb(): number {
    return splitWindows(this.tail(), this.config).lsb;
  }

  readMsb(): number {
    return splitWindows(this.tail(), this.config).msb;
  }

  // ========================================================================
  // Loader controller
  // ========================================================================

  /** One enabled clock edge of the loader. */
  tick(): void {
    switch (this.state) {
      case LoaderState.IDLE:
        if (this.triggerPending) {
          this.state = LoaderState.SHIFT;
          this.shiftIndex = this.depth - 1;
        }
        break;
      case LoaderState.SHIFT: {
        const i = this.shiftIndex;
        this.latch(i, i > 0 ? this.latches[i - 1] : this.staged);
        if (i === 0) {
          this.state = LoaderState.WAIT;
        } else {
          this.shiftIndex--;
        }
        break;
      }
      case LoaderState.WAIT:
        this.state = LoaderState.IDLE;
        this.loadCount++;
        break;
    }
    this.triggerPending = false;
  }

  /** Stop mid-ripple. Rows already shifted stay shifted; the staged row is lost. */
  abort(): void {
    this.state = LoaderState.IDLE;
    this.shiftIndex = 0;
    this.triggerPending = false;
  }

  get busy(): boolean {
    return this.state !== LoaderState.IDLE || this.triggerPending;
  }

  get loaderState(): LoaderState {
    return this.state;
  }

  // ========================================================================
  // Execution read path
  // ========================================================================

  /** Decoded row, frozen: table contents change only through the loader. */
  row(index: number): Stew {
    const cached = this.decoded[index];
    if (cached) return cached;
    const stew = freezeStew(decodeStew(this.latches[index], this.config));
    this.decoded[index] = stew;
    return stew;
  }

  rawRow(index: number): StewBits {
    return this.latches[index];
  }

  tail(): StewBits {
    return this.latches[this.depth - 1];
  }

  toArray(): StewBits[] {
    return [...this.latches];
  }

  private latch(index: number, value: StewBits): void {
    this.latches[index] = value;
    this.decoded[index] = null;
  }
}
