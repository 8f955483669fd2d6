import type { Chip8State, Word } from './types';
import { IllegalOpcodeError } from './errors';
import { resolveQuirks, type Chip8Quirks } from './quirks';
import { decode } from '@core/decoder/decoder';
import { ILEngine } from '@core/il/engine';
import { disasmOpcode } from '@utils/disasm';
import { envFlag } from '@utils/env';

export type StepResult =
  | { kind: 'executed'; opcode: Word; pc: number }
  | { kind: 'waiting'; opcode: Word; pc: number }; // Fx0A found no key; PC unchanged

// Fetch-decode-execute driver. Owns no machine state of its own beyond counters and trace.
export class Chip8CPU {
  private engine: ILEngine;
  private quirks: Chip8Quirks;
  private executed = 0;
  // ring of the last 64 instruction addresses
  private tracePC: number[] = new Array(64).fill(0);
  private traceIdx = 0;
  private traceHook: ((pc: number, opcode: Word) => void) | null = null;
  private tracePc: boolean;

  constructor(private state: Chip8State, quirks?: Partial<Chip8Quirks>) {
    this.quirks = resolveQuirks(quirks);
    this.engine = new ILEngine({ spriteWrap: this.quirks.spriteWrap });
    this.tracePc = envFlag('TRACE_PC');
  }

  getQuirks(): Readonly<Chip8Quirks> { return this.quirks; }

  setQuirks(quirks: Partial<Chip8Quirks>): void {
    this.quirks = resolveQuirks({ ...this.quirks, ...quirks });
    this.engine.setSpriteWrap(this.quirks.spriteWrap);
  }

  setTraceHook(fn: ((pc: number, opcode: Word) => void) | null): void { this.traceHook = fn; }

  get instructionCount(): number { return this.executed; }

  resetCounters(): void {
    this.executed = 0;
    this.traceIdx = 0;
    this.tracePC.fill(0);
  }

  // Oldest to newest, up to count entries
  getRecentPCs(count = 16): number[] {
    const n = Math.min(count, this.tracePC.length, this.traceIdx);
    const out: number[] = [];
    for (let i = this.traceIdx - n; i < this.traceIdx; i++) out.push(this.tracePC[i & 63]);
    return out;
  }

  fetch(pc: number): Word {
    return ((this.state.readMemory(pc & 0xFFF) << 8) | this.state.readMemory((pc + 1) & 0xFFF)) & 0xFFFF;
  }

  step(): StepResult {
    const pc = this.state.getPC() & 0xFFF;
    const opcode = this.fetch(pc);
    if (this.traceHook) this.traceHook(pc, opcode);
    if (this.tracePc) {
      // eslint-disable-next-line no-console
      console.log(`[cpu] $${pc.toString(16).toUpperCase().padStart(3, '0')} ${opcode.toString(16).toUpperCase().padStart(4, '0')} ${disasmOpcode(opcode).text}`);
    }

    const decoded = decode(opcode, this.quirks);
    if (!decoded.ok) throw new IllegalOpcodeError(opcode, pc, decoded.reason);

    const res = this.engine.execute(decoded.program, this.state);
    if (res.status === 'blocked') return { kind: 'waiting', opcode, pc };
    if (!res.redirected) this.state.setPC((pc + 2) & 0xFFF);

    this.tracePC[this.traceIdx & 63] = pc;
    this.traceIdx++;
    this.executed++;
    return { kind: 'executed', opcode, pc };
  }
}
