import { describe, it, expect } from 'vitest';
import { ILEngine } from '@core/il/engine';
import type { ILOp } from '@core/il/ops';
import { EngineFault } from '@core/cpu/errors';
import { FakeState } from '../helpers/fakeState';

const run = (program: ILOp[], st = new FakeState(), engine = new ILEngine({ trace: false })) => {
  const res = engine.execute(program, st);
  return { res, st, engine };
};

describe('IL engine: arithmetic contracts', () => {
  it('add wraps modulo 256 without a flag', () => {
    const { st, res } = run([{ op: 'pushByte', value: 0xF0 }, { op: 'pushByte', value: 0x20 }, { op: 'add' }, { op: 'writeReg', reg: 3 }]);
    expect(st.v[3]).toBe(0x10);
    expect(st.v[0xF]).toBe(0);
    expect(res).toEqual({ status: 'done', redirected: false });
  });

  it('addCarry pushes the wrapped sum then the carry', () => {
    const { st } = run([
      { op: 'pushByte', value: 0xFF }, { op: 'pushByte', value: 0x02 }, { op: 'addCarry' },
      { op: 'writeReg', reg: 1 }, // carry (top)
      { op: 'writeReg', reg: 2 }, // sum
    ]);
    expect(st.v[1]).toBe(1);
    expect(st.v[2]).toBe(0x01);
  });

  it('subBorrow pushes a-b and 1 when no borrow', () => {
    const { st } = run([
      { op: 'pushByte', value: 0x05 }, { op: 'pushByte', value: 0x07 }, { op: 'subBorrow' },
      { op: 'writeReg', reg: 1 }, { op: 'writeReg', reg: 2 },
    ]);
    expect(st.v[1]).toBe(0);
    expect(st.v[2]).toBe(0xFE);
  });

  it('shr/shl report the shifted-out bit', () => {
    const { st } = run([
      { op: 'pushByte', value: 0x81 }, { op: 'shr' }, { op: 'writeReg', reg: 1 }, { op: 'writeReg', reg: 2 },
      { op: 'pushByte', value: 0x81 }, { op: 'shl' }, { op: 'writeReg', reg: 3 }, { op: 'writeReg', reg: 4 },
    ]);
    expect([st.v[2], st.v[1]]).toEqual([0x40, 1]);
    expect([st.v[4], st.v[3]]).toEqual([0x02, 1]);
  });

  it('addOffset wraps addresses modulo 4096', () => {
    const { st } = run([{ op: 'pushAddr', value: 0xFFE }, { op: 'pushByte', value: 5 }, { op: 'addOffset' }, { op: 'writeI' }]);
    expect(st.i).toBe(0x003);
  });

  it('addOffsetCarry flags leaving the 12-bit space', () => {
    const { st } = run([
      { op: 'pushAddr', value: 0xFFF }, { op: 'pushByte', value: 1 }, { op: 'addOffsetCarry' },
      { op: 'writeReg', reg: 0xF }, { op: 'writeI' },
    ]);
    expect(st.i).toBe(0);
    expect(st.v[0xF]).toBe(1);
  });

  it('div and mod operate on bytes and fault on zero', () => {
    const { st } = run([
      { op: 'pushByte', value: 254 }, { op: 'pushByte', value: 100 }, { op: 'div' }, { op: 'writeReg', reg: 0 },
      { op: 'pushByte', value: 254 }, { op: 'pushByte', value: 10 }, { op: 'mod' }, { op: 'writeReg', reg: 1 },
    ]);
    expect(st.v[0]).toBe(2);
    expect(st.v[1]).toBe(4);
    expect(() => run([{ op: 'pushByte', value: 1 }, { op: 'pushByte', value: 0 }, { op: 'div' }, { op: 'writeReg', reg: 0 }]))
      .toThrow('div by zero');
  });

  it('logic ops work on bools and bytes but not mixed tags', () => {
    const { st } = run([
      { op: 'pushBool', value: false }, { op: 'pushBool', value: true }, { op: 'or' }, { op: 'boolToByte' }, { op: 'writeReg', reg: 0 },
      { op: 'pushByte', value: 0x0F }, { op: 'pushByte', value: 0x3C }, { op: 'xor' }, { op: 'writeReg', reg: 1 },
    ]);
    expect(st.v[0]).toBe(1);
    expect(st.v[1]).toBe(0x33);
    expect(() => run([{ op: 'pushBool', value: true }, { op: 'pushByte', value: 1 }, { op: 'and' }])).toThrow(EngineFault);
    expect(() => run([{ op: 'pushAddr', value: 1 }, { op: 'pushAddr', value: 1 }, { op: 'or' }])).toThrow('or is not defined for addr operands');
  });

  it('eq compares same-tagged operands only', () => {
    const { st } = run([{ op: 'pushAddr', value: 0x123 }, { op: 'pushAddr', value: 0x123 }, { op: 'eq' }, { op: 'boolToByte' }, { op: 'writeReg', reg: 5 }]);
    expect(st.v[5]).toBe(1);
    expect(() => run([{ op: 'pushByte', value: 1 }, { op: 'pushBool', value: true }, { op: 'eq' }])).toThrow('Operand tag mismatch: byte vs bool');
  });

  it('random masks the host byte', () => {
    const st = new FakeState();
    st.randomValue = 0xAB;
    run([{ op: 'pushByte', value: 0x0F }, { op: 'random' }, { op: 'writeReg', reg: 2 }], st);
    expect(st.v[2]).toBe(0x0B);
  });
});

describe('IL engine: control flow', () => {
  it('jump redirects the PC', () => {
    const { st, res } = run([{ op: 'pushAddr', value: 0x345 }, { op: 'jump' }]);
    expect(st.pc).toBe(0x345);
    expect(res).toEqual({ status: 'done', redirected: true });
  });

  it('skipIf adds 4 when true and 2 when false, redirecting either way', () => {
    const t = run([{ op: 'pushBool', value: true }, { op: 'skipIf' }]);
    expect(t.st.pc).toBe(0x204);
    expect(t.res).toEqual({ status: 'done', redirected: true });
    const f = run([{ op: 'pushBool', value: false }, { op: 'skipIf' }]);
    expect(f.st.pc).toBe(0x202);
    expect(f.res).toEqual({ status: 'done', redirected: true });
  });

  it('callPop faults on an empty call stack', () => {
    expect(() => run([{ op: 'callPop' }, { op: 'jump' }])).toThrow(EngineFault);
  });

  it('leftover operands fault', () => {
    expect(() => run([{ op: 'pushByte', value: 1 }])).toThrow('Operand stack not empty after 1-op program (depth=1)');
  });

  it('waitKey blocks without side effects when no key is available', () => {
    const st = new FakeState();
    st.v[4] = 0x77;
    const { res } = run([{ op: 'waitKey' }, { op: 'writeReg', reg: 4 }], st);
    expect(res).toEqual({ status: 'blocked' });
    expect(st.v[4]).toBe(0x77);
    st.nextKey = 0xB;
    const again = run([{ op: 'waitKey' }, { op: 'writeReg', reg: 4 }], st);
    expect(again.res).toEqual({ status: 'done', redirected: false });
    expect(st.v[4]).toBe(0xB);
  });

  it('waitKey anywhere but first is an engine fault', () => {
    const st = new FakeState();
    st.nextKey = 1;
    expect(() => run([{ op: 'pushByte', value: 1 }, { op: 'waitKey' }, { op: 'writeReg', reg: 0 }, { op: 'writeReg', reg: 1 }], st))
      .toThrow('waitKey must be the first operation of its program');
  });
});

describe('IL engine: drawRow wrap policy', () => {
  const drawAt = (x: number, y: number, row: number, bits: number, engine: ILEngine) => {
    const st = new FakeState();
    engine.execute([
      { op: 'pushByte', value: x }, { op: 'pushByte', value: y }, { op: 'pushByte', value: bits },
      { op: 'drawRow', row }, { op: 'boolToByte' }, { op: 'writeReg', reg: 0xF },
    ], st);
    return st;
  };

  it('wraps the origin onto the screen', () => {
    const st = drawAt(64 + 3, 32 + 1, 0, 0x80, new ILEngine({ spriteWrap: 'clip', trace: false }));
    expect(st.xorCalls).toEqual([{ x: 3, y: 1, bits: 0x80 }]);
  });

  it('clip drops rows below the screen', () => {
    const st = drawAt(0, 30, 2, 0xFF, new ILEngine({ spriteWrap: 'clip', trace: false }));
    expect(st.xorCalls).toEqual([]);
  });

  it('wrap folds rows to the top and splits at the right edge', () => {
    const st = drawAt(60, 30, 2, 0xFF, new ILEngine({ spriteWrap: 'wrap', trace: false }));
    expect(st.xorCalls).toEqual([
      { x: 60, y: 0, bits: 0xFF },
      { x: 0, y: 0, bits: 0xF0 },
    ]);
    expect(Array.from(st.pixels.subarray(0, 4))).toEqual([1, 1, 1, 1]);
    expect(Array.from(st.pixels.subarray(60, 64))).toEqual([1, 1, 1, 1]);
    expect(st.pixels[4]).toBe(0);
  });
});
