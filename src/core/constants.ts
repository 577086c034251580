import type { PrismConfig } from './types';

export const MAX_DEPTH = 128;     // per table instance; indices must fit the 8-bit debug fields
export const MAX_STEW_WIDTH = 64; // two 32-bit windows
export const COND_LUT_BITS = 4;   // 2-input LUT per conditional output

export const DEFAULT_CONFIG: PrismConfig = {
  depth0: 4,
  depth1: 4,
  inputWidth: 8,
  outputWidth: 6,
  lutInputs: 3,
  dualCompare: true,
  condOutputs: 1,
};

// Debug pipeline latencies, in clock edges counting the capturing edge
export const FORCE_LOAD_LATENCY = 3;
export const OVERRIDE_LATENCY = 4;
export const STEP_EDGE_LATENCY = 3;

// Register offsets (byte addresses on the host bus)
export const REG = {
  CTRL:       0x00,
  DBG_CTRL:   0x04,
  DBG_BP:     0x08,
  DBG_STATUS: 0x0C,
  DBG_NEXT:   0x10,
  DBG_FORCE:  0x14,
  DBG_OVR0:   0x18,
  DBG_OVR1:   0x1C,
  SIT0_LSB:   0x20,
  SIT0_MSB:   0x24,
  SIT1_LSB:   0x28,
  SIT1_MSB:   0x2C,
  OUT_MASK0:  0x30,
  OUT_MASK1:  0x34,
  COND_MASK0: 0x38,
  COND_MASK1: 0x3C,
  TLM_OUTPUT: 0x40,
  TLM_INPUT:  0x44,
  TLM_TRACE:  0x48,
} as const;

export const CTRL_BITS = {
  ENABLE:    1 << 0,
  FSM_RESET: 1 << 1,
  FRACTURE:  1 << 2,
  IRQ_CLEAR: 1 << 3,
  PROGRAM:   1 << 4,
  MODE_SHIFT: 16,
};

// DBG_CTRL: one byte per shard
export const DBG_CTRL_BITS = {
  HALT_REQ: 1 << 0,
  STEP:     1 << 1,
  BP0_EN:   1 << 2,
  BP1_EN:   1 << 3,
  SHARD_STRIDE: 8,
};

// DBG_STATUS: 12 bits per shard, global flags above
export const DBG_STATUS_BITS = {
  HALTED:     1 << 8,
  BP0_ACTIVE: 1 << 9,
  BP1_ACTIVE: 1 << 10,
  ANCHOR_VALID: 1 << 11,
  SHARD_STRIDE: 12,
  LOADER0_BUSY: 1 << 24,
  LOADER1_BUSY: 1 << 25,
  IRQ_PENDING:  1 << 26,
  MASK_OVERLAP: 1 << 27,
};

export const FORCE_LOAD_STROBE = 1 << 15;
export const OVERRIDE_ENABLE = 0x80000000;
export const SHARD_FIELD_STRIDE = 16;

/** Low `bits` bits set, for widths up to 32. */
export function bitMask(bits: number): number {
  return bits >= 32 ? 0xFFFFFFFF : (1 << bits) - 1;
}

/** Bits needed to address `count` distinct values (at least 1). */
export function indexBits(count: number): number {
  let bits = 1;
  while ((1 << bits) < count) bits++;
  return bits;
}

export function bit(value: number, index: number): number {
  return (value >>> index) & 1;
}

export function hex(value: number, digits: number = 8): string {
  return '0x' + (value >>> 0).toString(16).padStart(digits, '0');
}
