// PRISM - reconfigurable FSM engine emulator

export { PrismEngine, type MaskOverlap } from './core/prism';
export { PrismPeripheral } from './core/periph';
export { LatchShiftChain } from './core/shift-chain';
export { DebugController, type DebugEvents } from './core/debug';
export { DelayLine } from './core/pipeline';
export { decide, evalLane, type ExecutionState, type DecisionContext } from './core/decision';
export { evalCondOutputs, condInputPair } from './core/cond-output';
export { resolveConfig, totalDepth, supportsFracture } from './core/config';
export {
  stewLayout,
  stewWidth,
  encodeStew,
  decodeStew,
  blankStew,
  splitWindows,
  joinWindows,
  loadSequence,
  parseStewBits,
  type StewLayout,
  type StewField,
} from './core/stew';
export { formatStew, disassembleTable } from './core/disassembler';
export { parseProgram, loadProgram, parseWord, type PrismProgram } from './core/program';
export * from './core/constants';
export * from './core/types';
export { createSessionStore, MAX_HISTORY, type SessionState, type SessionStore } from './stores/sessionStore';
