import type { Byte, Chip8Registers, Word } from "@core/cpu/types";

export type ReadByteFn = (addr: number) => Byte;

export interface Disasm {
  opcode: Word;
  mnemonic: string;
  operands: string;
  text: string;
}

const hex = (v: number, width: number): string => v.toString(16).toUpperCase().padStart(width, "0");
const reg = (r: number): string => `V${hex(r & 0xF, 1)}`;

const make = (opcode: Word, mnemonic: string, operands = ""): Disasm => ({
  opcode,
  mnemonic,
  operands,
  text: operands ? `${mnemonic} ${operands}` : mnemonic,
});

// Conventional CHIP-8 assembler mnemonics; Super-CHIP words are named even though the core rejects them
export function disasmOpcode(opcode: Word): Disasm {
  const op = opcode & 0xFFFF;
  const x = (op >>> 8) & 0xF;
  const y = (op >>> 4) & 0xF;
  const n = op & 0xF;
  const kk = `$${hex(op & 0xFF, 2)}`;
  const nnn = `$${hex(op & 0xFFF, 3)}`;
  const xy = `${reg(x)}, ${reg(y)}`;

  switch (op >>> 12) {
    case 0x0:
      if (op === 0x00E0) return make(op, "CLS");
      if (op === 0x00EE) return make(op, "RET");
      if ((op & 0xFFF0) === 0x00C0) return make(op, "SCD", String(n));
      if (op === 0x00FB) return make(op, "SCR");
      if (op === 0x00FC) return make(op, "SCL");
      if (op === 0x00FD) return make(op, "EXIT");
      if (op === 0x00FE) return make(op, "LOW");
      if (op === 0x00FF) return make(op, "HIGH");
      return make(op, "SYS", nnn);
    case 0x1: return make(op, "JP", nnn);
    case 0x2: return make(op, "CALL", nnn);
    case 0x3: return make(op, "SE", `${reg(x)}, ${kk}`);
    case 0x4: return make(op, "SNE", `${reg(x)}, ${kk}`);
    case 0x5: return n === 0 ? make(op, "SE", xy) : dw(op);
    case 0x6: return make(op, "LD", `${reg(x)}, ${kk}`);
    case 0x7: return make(op, "ADD", `${reg(x)}, ${kk}`);
    case 0x8:
      switch (n) {
        case 0x0: return make(op, "LD", xy);
        case 0x1: return make(op, "OR", xy);
        case 0x2: return make(op, "AND", xy);
        case 0x3: return make(op, "XOR", xy);
        case 0x4: return make(op, "ADD", xy);
        case 0x5: return make(op, "SUB", xy);
        case 0x6: return make(op, "SHR", xy);
        case 0x7: return make(op, "SUBN", xy);
        case 0xE: return make(op, "SHL", xy);
        default: return dw(op);
      }
    case 0x9: return n === 0 ? make(op, "SNE", xy) : dw(op);
    case 0xA: return make(op, "LD", `I, ${nnn}`);
    case 0xB: return make(op, "JP", `V0, ${nnn}`);
    case 0xC: return make(op, "RND", `${reg(x)}, ${kk}`);
    case 0xD: return make(op, "DRW", `${xy}, ${n}`);
    case 0xE:
      if ((op & 0xFF) === 0x9E) return make(op, "SKP", reg(x));
      if ((op & 0xFF) === 0xA1) return make(op, "SKNP", reg(x));
      return dw(op);
    default:
      switch (op & 0xFF) {
        case 0x07: return make(op, "LD", `${reg(x)}, DT`);
        case 0x0A: return make(op, "LD", `${reg(x)}, K`);
        case 0x15: return make(op, "LD", `DT, ${reg(x)}`);
        case 0x18: return make(op, "LD", `ST, ${reg(x)}`);
        case 0x1E: return make(op, "ADD", `I, ${reg(x)}`);
        case 0x29: return make(op, "LD", `F, ${reg(x)}`);
        case 0x30: return make(op, "LD", `HF, ${reg(x)}`);
        case 0x33: return make(op, "LD", `B, ${reg(x)}`);
        case 0x55: return make(op, "LD", `[I], ${reg(x)}`);
        case 0x65: return make(op, "LD", `${reg(x)}, [I]`);
        case 0x75: return make(op, "LD", `R, ${reg(x)}`);
        case 0x85: return make(op, "LD", `${reg(x)}, R`);
        default: return dw(op);
      }
  }
}

function dw(op: Word): Disasm {
  return make(op, "DW", `$${hex(op, 4)}`);
}

// Disassemble the big-endian word at pc
export function disasmAt(read: ReadByteFn, pc: number): Disasm & { pc: number } {
  const opcode = (((read(pc & 0xFFF) & 0xFF) << 8) | (read((pc + 1) & 0xFFF) & 0xFF)) & 0xFFFF;
  return { pc: pc & 0xFFF, ...disasmOpcode(opcode) };
}

// Listing for a program image loaded at base; an odd trailing byte is emitted as DB
export function disasmProgram(bytes: Uint8Array, base = 0x200): string[] {
  const lines: string[] = [];
  for (let off = 0; off < bytes.length; off += 2) {
    const addr = (base + off) & 0xFFF;
    if (off + 1 >= bytes.length) {
      lines.push(`${hex(addr, 3)}  ${hex(bytes[off], 2)}    DB $${hex(bytes[off], 2)}`);
      break;
    }
    const d = disasmOpcode((bytes[off] << 8) | bytes[off + 1]);
    lines.push(`${hex(addr, 3)}  ${hex(d.opcode, 4)}  ${d.text}`);
  }
  return lines;
}

// "200  6A02  LD VA, $02            I:000 DT:00 ST:00 SP:0 V:00 00 ..."
export function formatTraceLine(pc: number, d: Disasm, regs: Chip8Registers): string {
  const v = regs.v.map((b) => hex(b & 0xFF, 2)).join(" ");
  return `${hex(pc & 0xFFF, 3)}  ${hex(d.opcode, 4)}  ${d.text.padEnd(20, " ")}  I:${hex(regs.i, 3)} DT:${hex(regs.delay, 2)} ST:${hex(regs.sound, 2)} SP:${regs.sp} V:${v}`;
}
