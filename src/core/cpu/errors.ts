import type { Word } from './types';

const hex4 = (v: number): string => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');
const hex3 = (v: number): string => (v & 0xFFF).toString(16).toUpperCase().padStart(3, '0');

export type IllegalReason = 'unknown' | 'superchip';

// Raised for opcodes the interpreter does not recognise. The offending instruction is not executed
// and PC stays on it.
export class IllegalOpcodeError extends Error {
  readonly opcode: Word;
  readonly pc: number;
  readonly reason: IllegalReason;

  constructor(opcode: Word, pc: number, reason: IllegalReason) {
    const what = reason === 'superchip' ? 'Unsupported Super-CHIP opcode' : 'Illegal opcode';
    super(`${what} $${hex4(opcode)} at $${hex3(pc)}`);
    this.name = 'IllegalOpcodeError';
    this.opcode = opcode & 0xFFFF;
    this.pc = pc & 0xFFF;
    this.reason = reason;
  }
}

// Broken decoder/engine contract (operand stack misuse, call stack underflow). Not recoverable.
export class EngineFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineFault';
  }
}

export class RomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RomError';
  }
}
