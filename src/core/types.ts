// Packed STEW rows travel as bigint (up to 64 bits); everything else fits a JS number.
export type StewBits = bigint;

export const LoaderState = {
  IDLE: 'idle',
  SHIFT: 'shift',
  WAIT: 'wait',
} as const;
export type LoaderState = typeof LoaderState[keyof typeof LoaderState];

export const ShardIndex = {
  SHARD0: 0,
  SHARD1: 1,
} as const;
export type ShardIndex = typeof ShardIndex[keyof typeof ShardIndex];

/** Which rule of the priority chain picked the next state. */
export type TransitionRule = 'halt' | 'lane0' | 'lane1' | 'increment' | 'loop' | 'hold';

export interface PrismConfig {
  depth0: number;
  depth1: number;
  inputWidth: number;
  outputWidth: number;
  lutInputs: number;
  dualCompare: boolean;
  condOutputs: number;
}

export interface CompareLane {
  /** Input bit index feeding LUT address bit k */
  selects: number[];
  lut: number;
  target: number;
  jumpOut: number;
}

/** State Execution Word: the full configuration of one state. */
export interface Stew {
  increment: boolean;
  staticOut: number;
  condLuts: number[];
  lanes: CompareLane[];
}

export interface LaneTrace {
  bits: number;
  match: boolean;
}

export interface Decision {
  next: number;
  out: number;
  rule: TransitionRule;
  anchor: number;
  anchorValid: boolean;
  lanes: LaneTrace[];
}

export interface Breakpoint {
  value: number;
  enabled: boolean;
}

export interface ShardStatus {
  index: number;
  nextIndex: number;
  anchor: number;
  anchorValid: boolean;
  halted: boolean;
  bpActive: [boolean, boolean];
  out: number;
  cond: number;
  lastRule: TransitionRule | null;
}

export interface PrismSnapshot {
  cycle: number;
  enabled: boolean;
  fsmReset: boolean;
  fracture: boolean;
  inputs: number;
  outputs: number;
  condOutputs: number;
  pins: number;
  irqPending: boolean;
  loaderBusy: boolean[];
  shards: ShardStatus[];
}

export interface WindowWrite {
  /** Table instance (0 or 1) */
  table: number;
  window: 'lsb' | 'msb';
  value: number;
}
