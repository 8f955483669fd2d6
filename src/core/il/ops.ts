import type { Addr, Byte } from '@core/cpu/types';

// Micro-operations a CHIP-8 opcode decodes into. Operand-stack effects are noted as
// (popped -- pushed), rightmost is top of stack.
export type ILOp =
  | { op: 'pushByte'; value: Byte } //  -- byte
  | { op: 'pushAddr'; value: Addr } //  -- addr
  | { op: 'pushBool'; value: boolean } //  -- bool
  | { op: 'readReg'; reg: number } //  -- byte
  | { op: 'writeReg'; reg: number } // byte --
  | { op: 'readI' } //  -- addr
  | { op: 'writeI' } // addr --
  | { op: 'readPC' } //  -- addr
  | { op: 'jump' } // addr --   (redirects PC)
  | { op: 'skipIf' } // bool --  (PC += 4 when true, else += 2; always redirects)
  | { op: 'callPush' } // addr --
  | { op: 'callPop' } //  -- addr
  | { op: 'readMem' } // addr -- byte
  | { op: 'writeMem' } // addr byte --
  | { op: 'readDelay' } //  -- byte
  | { op: 'writeDelay' } // byte --
  | { op: 'writeSound' } // byte --
  | { op: 'or' } // a b -- a|b     (byte or bool, same tag)
  | { op: 'and' } // a b -- a&b
  | { op: 'xor' } // a b -- a^b
  | { op: 'add' } // byte byte -- byte
  | { op: 'addCarry' } // byte byte -- sum carry
  | { op: 'subBorrow' } // a b -- (a-b) notBorrow
  | { op: 'shr' } // byte -- result lsb
  | { op: 'shl' } // byte -- result msb
  | { op: 'div' } // byte byte -- byte
  | { op: 'mod' } // byte byte -- byte
  | { op: 'addOffset' } // addr byte -- addr
  | { op: 'addOffsetCarry' } // addr byte -- addr overflow
  | { op: 'eq' } // a a -- bool
  | { op: 'not' } // bool -- bool
  | { op: 'swap' } // a b -- b a
  | { op: 'boolToByte' } // bool -- byte
  | { op: 'random' } // mask -- byte
  | { op: 'clearScreen' }
  | { op: 'drawRow'; row: number } // x y bits -- collided
  | { op: 'keyPressed' } // byte -- bool
  | { op: 'waitKey' } //  -- byte  (suspends when no key yet; must come first)
  | { op: 'hexGlyph' }; // byte -- addr

export type ILOpName = ILOp['op'];

export type MicroProgram = readonly ILOp[];

export const formatOp = (op: ILOp): string => {
  switch (op.op) {
    case 'pushByte': return `pushByte $${op.value.toString(16).padStart(2, '0')}`;
    case 'pushAddr': return `pushAddr $${op.value.toString(16).padStart(3, '0')}`;
    case 'pushBool': return `pushBool ${op.value}`;
    case 'readReg':
    case 'writeReg': return `${op.op} V${op.reg.toString(16).toUpperCase()}`;
    case 'drawRow': return `drawRow ${op.row}`;
    default: return op.op;
  }
};
