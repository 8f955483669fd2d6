import type { Word } from '@core/cpu/types';
import { FLAG_REGISTER } from '@core/cpu/types';
import type { IllegalReason } from '@core/cpu/errors';
import { DEFAULT_QUIRKS, type Chip8Quirks } from '@core/cpu/quirks';
import type { ILOp, MicroProgram } from '@core/il/ops';

export type DecodeResult =
  | { ok: true; program: MicroProgram }
  | { ok: false; opcode: Word; reason: IllegalReason };

type DecodeQuirks = Pick<Chip8Quirks, 'shiftSource' | 'indexOverflowFlag' | 'loadStoreIncrementsIndex' | 'flagRegisterOperand'>;

const VF = FLAG_REGISTER;

const ok = (program: ILOp[]): DecodeResult => ({ ok: true, program });
const illegal = (opcode: Word, reason: IllegalReason = 'unknown'): DecodeResult => ({ ok: false, opcode: opcode & 0xFFFF, reason });

// Small builders for recurring fragments
const readReg = (reg: number): ILOp => ({ op: 'readReg', reg });
const writeReg = (reg: number): ILOp => ({ op: 'writeReg', reg });
const pushByte = (value: number): ILOp => ({ op: 'pushByte', value: value & 0xFF });
const pushAddr = (value: number): ILOp => ({ op: 'pushAddr', value: value & 0xFFF });

// I + offset on the operand stack
const indexPlus = (offset: number): ILOp[] => offset === 0
  ? [{ op: 'readI' }]
  : [{ op: 'readI' }, pushByte(offset), { op: 'addOffset' }];

const incrementIndex: ILOp[] = [{ op: 'readI' }, pushByte(1), { op: 'addOffset' }, { op: 'writeI' }];

// Stack holds [result, flag]; write Vx first so VF ends up holding the flag even when x = F
const writeResultThenFlag = (x: number): ILOp[] => [{ op: 'swap' }, writeReg(x), writeReg(VF)];

const skip = (cond: ILOp[], negate: boolean): ILOp[] => negate
  ? [...cond, { op: 'eq' }, { op: 'not' }, { op: 'skipIf' }]
  : [...cond, { op: 'eq' }, { op: 'skipIf' }];

function decodeAlu(opcode: Word, x: number, y: number, n4: number, q: DecodeQuirks): DecodeResult {
  switch (n4) {
    case 0x0: return ok([readReg(y), writeReg(x)]);
    case 0x1: return ok([readReg(x), readReg(y), { op: 'or' }, writeReg(x)]);
    case 0x2: return ok([readReg(x), readReg(y), { op: 'and' }, writeReg(x)]);
    case 0x3: return ok([readReg(x), readReg(y), { op: 'xor' }, writeReg(x)]);
    case 0x4:
      if (x === VF && q.flagRegisterOperand === 'illegal') return illegal(opcode);
      return ok([readReg(x), readReg(y), { op: 'addCarry' }, ...writeResultThenFlag(x)]);
    case 0x5:
      if (x === VF && q.flagRegisterOperand === 'illegal') return illegal(opcode);
      return ok([readReg(x), readReg(y), { op: 'subBorrow' }, ...writeResultThenFlag(x)]);
    case 0x6: return ok([readReg(q.shiftSource === 'vy' ? y : x), { op: 'shr' }, ...writeResultThenFlag(x)]);
    case 0x7: return ok([readReg(y), readReg(x), { op: 'subBorrow' }, ...writeResultThenFlag(x)]);
    case 0xE: return ok([readReg(q.shiftSource === 'vy' ? y : x), { op: 'shl' }, ...writeResultThenFlag(x)]);
    default: return illegal(opcode);
  }
}

function decodeDraw(x: number, y: number, n: number): DecodeResult {
  // Dxy0 draws 16 rows (the extended-mode convention)
  const rows = n === 0 ? 16 : n;
  const program: ILOp[] = [{ op: 'pushBool', value: false }];
  for (let row = 0; row < rows; row++) {
    program.push(readReg(x), readReg(y), ...indexPlus(row), { op: 'readMem' }, { op: 'drawRow', row }, { op: 'or' });
  }
  program.push({ op: 'boolToByte' }, writeReg(VF));
  return ok(program);
}

function decodeMisc(opcode: Word, x: number, lo: number, q: DecodeQuirks): DecodeResult {
  switch (lo) {
    case 0x07: return ok([{ op: 'readDelay' }, writeReg(x)]);
    case 0x0A: return ok([{ op: 'waitKey' }, writeReg(x)]);
    case 0x15: return ok([readReg(x), { op: 'writeDelay' }]);
    case 0x18: return ok([readReg(x), { op: 'writeSound' }]);
    case 0x1E:
      return q.indexOverflowFlag
        ? ok([{ op: 'readI' }, readReg(x), { op: 'addOffsetCarry' }, writeReg(VF), { op: 'writeI' }])
        : ok([{ op: 'readI' }, readReg(x), { op: 'addOffset' }, { op: 'writeI' }]);
    case 0x29: return ok([readReg(x), { op: 'hexGlyph' }, { op: 'writeI' }]);
    case 0x33: return ok([
      ...indexPlus(0), readReg(x), pushByte(100), { op: 'div' }, { op: 'writeMem' },
      ...indexPlus(1), readReg(x), pushByte(10), { op: 'div' }, pushByte(10), { op: 'mod' }, { op: 'writeMem' },
      ...indexPlus(2), readReg(x), pushByte(10), { op: 'mod' }, { op: 'writeMem' },
    ]);
    case 0x55:
    case 0x65: {
      const program: ILOp[] = [];
      for (let r = 0; r <= x; r++) {
        const addr = q.loadStoreIncrementsIndex ? indexPlus(0) : indexPlus(r);
        const body: ILOp[] = lo === 0x55
          ? [...addr, readReg(r), { op: 'writeMem' }]
          : [...addr, { op: 'readMem' }, writeReg(r)];
        program.push(...body);
        if (q.loadStoreIncrementsIndex) program.push(...incrementIndex);
      }
      return ok(program);
    }
    case 0x30: case 0x75: case 0x85: return illegal(opcode, 'superchip');
    default: return illegal(opcode);
  }
}

// Decode one 16-bit opcode into its micro-program. Pure: no machine access.
export function decode(opcode: Word, quirks: DecodeQuirks = DEFAULT_QUIRKS): DecodeResult {
  const op = opcode & 0xFFFF;
  const n1 = (op >>> 12) & 0xF;
  const x = (op >>> 8) & 0xF;
  const y = (op >>> 4) & 0xF;
  const n4 = op & 0xF;
  const kk = op & 0xFF;
  const nnn = op & 0xFFF;

  switch (n1) {
    case 0x0:
      if (op === 0x00E0) return ok([{ op: 'clearScreen' }]);
      if (op === 0x00EE) return ok([{ op: 'callPop' }, { op: 'jump' }]);
      // 00Cn scroll down, 00FB..00FF scroll/exit/resolution
      if ((op & 0xFFF0) === 0x00C0 || (op >= 0x00FB && op <= 0x00FF)) return illegal(op, 'superchip');
      return illegal(op);
    case 0x1: return ok([pushAddr(nnn), { op: 'jump' }]);
    case 0x2: return ok([{ op: 'readPC' }, pushByte(2), { op: 'addOffset' }, { op: 'callPush' }, pushAddr(nnn), { op: 'jump' }]);
    case 0x3: return ok(skip([readReg(x), pushByte(kk)], false));
    case 0x4: return ok(skip([readReg(x), pushByte(kk)], true));
    case 0x5: return n4 === 0 ? ok(skip([readReg(x), readReg(y)], false)) : illegal(op);
    case 0x6: return ok([pushByte(kk), writeReg(x)]);
    case 0x7: return ok([readReg(x), pushByte(kk), { op: 'add' }, writeReg(x)]);
    case 0x8: return decodeAlu(op, x, y, n4, quirks);
    case 0x9: return n4 === 0 ? ok(skip([readReg(x), readReg(y)], true)) : illegal(op);
    case 0xA: return ok([pushAddr(nnn), { op: 'writeI' }]);
    case 0xB: return ok([pushAddr(nnn), readReg(0), { op: 'addOffset' }, { op: 'jump' }]);
    case 0xC: return ok([pushByte(kk), { op: 'random' }, writeReg(x)]);
    case 0xD: return decodeDraw(x, y, n4);
    case 0xE:
      if (kk === 0x9E) return ok([readReg(x), { op: 'keyPressed' }, { op: 'skipIf' }]);
      if (kk === 0xA1) return ok([readReg(x), { op: 'keyPressed' }, { op: 'not' }, { op: 'skipIf' }]);
      return illegal(op);
    case 0xF: return decodeMisc(op, x, kk, quirks);
    default: return illegal(op);
  }
}
