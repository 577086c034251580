import { describe, it, expect } from 'vitest';
import { formatStew, disassembleTable } from './disassembler';
import { resolveConfig } from './config';
import { blankStew, decodeStew } from './stew';

const cfg = resolveConfig();

describe('formatStew', () => {
  it('formats an increment row', () => {
    expect(formatStew(decodeStew(0x301n, cfg), cfg)).toBe(
      'INC out=000000 | L0 [i0 i0 i0] lut=00 ->0 jmp=000000 | L1 [i0 i0 i0] lut=00 ->0 jmp=000000 | C0=6',
    );
  });

  it('lists selectors most significant address bit first', () => {
    const single = resolveConfig({ dualCompare: false, condOutputs: 0 });
    const stew = blankStew(single);
    stew.staticOut = 1;
    stew.lanes[0] = { selects: [0, 1, 3], lut: 0x80, target: 2, jumpOut: 1 };
    expect(formatStew(stew, single)).toBe('    out=000001 | L0 [i3 i1 i0] lut=80 ->2 jmp=000001');
  });
});

describe('disassembleTable', () => {
  it('prefixes each row with its index', () => {
    const lines = disassembleTable([0x301n, 0x88000300n], cfg);
    expect(lines).toEqual([
      '0: INC out=000000 | L0 [i0 i0 i0] lut=00 ->0 jmp=000000 | L1 [i0 i0 i0] lut=00 ->0 jmp=000000 | C0=6',
      '1:     out=000000 | L0 [i0 i0 i0] lut=80 ->0 jmp=000001 | L1 [i0 i0 i0] lut=00 ->0 jmp=000000 | C0=6',
    ]);
  });

  it('pads indices to the widest', () => {
    const lines = disassembleTable(new Array<bigint>(12).fill(0n), cfg);
    expect(lines[0].startsWith(' 0: ')).toBe(true);
    expect(lines[11].startsWith('11: ')).toBe(true);
  });
});
