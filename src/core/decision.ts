/**
 * Per-shard transition logic. One pure function evaluated for each active
 * shard every cycle; the engine commits its result on the clock edge.
 */
import { bit } from './constants';
import type { CompareLane, Decision, LaneTrace, Stew } from './types';

export interface ExecutionState {
  index: number;
  anchor: number;
  anchorValid: boolean;
}

export interface DecisionContext {
  /** Rows addressable by this shard */
  capacity: number;
  /** Halt override in force; next state is `debugIndex` */
  halted: boolean;
  debugIndex: number;
}

/** Address the lane LUT with its selected input bits. */
export function evalLane(lane: CompareLane, inputs: number): LaneTrace {
  let bits = 0;
  for (let k = 0; k < lane.selects.length; k++) {
    bits |= bit(inputs, lane.selects[k]) << k;
  }
  return { bits, match: bit(lane.lut, bits) === 1 };
}

export function decide(row: Stew, inputs: number, state: ExecutionState, ctx: DecisionContext): Decision {
  const lanes = row.lanes.map(lane => evalLane(lane, inputs));
  const { index, anchor, anchorValid } = state;

  if (ctx.halted) {
    return { next: ctx.debugIndex % ctx.capacity, out: row.staticOut, rule: 'halt', anchor, anchorValid, lanes };
  }

  // Lane priority: lane 0 wins over lane 1
  for (let l = 0; l < lanes.length; l++) {
    if (lanes[l].match) {
      const lane = row.lanes[l];
      return {
        next: lane.target % ctx.capacity,
        out: lane.jumpOut,
        rule: l === 0 ? 'lane0' : 'lane1',
        anchor,
        anchorValid: false,
        lanes,
      };
    }
  }

  if (row.increment) {
    // First anchor wins: an increment inside a run keeps the run's start
    return {
      next: (index + 1) % ctx.capacity,
      out: row.staticOut,
      rule: 'increment',
      anchor: anchorValid ? anchor : index,
      anchorValid: true,
      lanes,
    };
  }

  if (anchorValid) {
    return { next: anchor, out: row.staticOut, rule: 'loop', anchor, anchorValid, lanes };
  }

  return { next: index, out: row.staticOut, rule: 'hold', anchor, anchorValid, lanes };
}
