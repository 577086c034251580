/**
 * Zustand store for a host-side debugger session.
 * Keeps a bounded per-cycle history, breakpoint hits and the run status.
 */
import { createStore } from 'zustand/vanilla';
import type { ShardIndex, TransitionRule } from '../core/types';

export const MAX_HISTORY = 1024;

export type RunStatus = 'idle' | 'running' | 'halted';

export interface CycleRecord {
  cycle: number;
  inputs: number;
  indices: [number, number];
  outputs: number;
  condOutputs: number;
  rules: [TransitionRule | null, TransitionRule | null];
}

export interface HaltRecord {
  shard: ShardIndex;
  index: number;
  cycle: number;
}

export interface SessionState {
  status: RunStatus;
  history: CycleRecord[];
  /** Records dropped off the front of `history` */
  dropped: number;
  halts: HaltRecord[];

  /** Append one cycle, dropping the oldest record past MAX_HISTORY. */
  record: (entry: CycleRecord) => void;

  /** Note a shard halting; moves the session to 'halted'. */
  noteHalt: (shard: ShardIndex, index: number, cycle: number) => void;

  setStatus: (status: RunStatus) => void;

  clear: () => void;
}

export function createSessionStore() {
  return createStore<SessionState>((set, get) => ({
    status: 'idle',
    history: [],
    dropped: 0,
    halts: [],

    record: (entry) => {
      const { history, dropped } = get();
      const next = [...history, entry];
      const drop = Math.max(0, next.length - MAX_HISTORY);
      set({
        history: drop > 0 ? next.slice(drop) : next,
        dropped: dropped + drop,
      });
    },

    noteHalt: (shard, index, cycle) => {
      set({ halts: [...get().halts, { shard, index, cycle }], status: 'halted' });
    },

    setStatus: (status) => set({ status }),

    clear: () => set({ status: 'idle', history: [], dropped: 0, halts: [] }),
  }));
}

export type SessionStore = ReturnType<typeof createSessionStore>;
