import { EngineFault } from '@core/cpu/errors';
import type { Addr, Byte } from '@core/cpu/types';

export type StackValue =
  | { tag: 'bool'; value: boolean }
  | { tag: 'addr'; value: Addr }
  | { tag: 'byte'; value: Byte };

export type StackTag = StackValue['tag'];

export const boolValue = (value: boolean): StackValue => ({ tag: 'bool', value });
export const addrValue = (value: number): StackValue => ({ tag: 'addr', value: value & 0xFFF });
export const byteValue = (value: number): StackValue => ({ tag: 'byte', value: value & 0xFF });

// Transient operand stack for a single micro-program. Any misuse is an engine bug and faults.
export class OperandStack {
  private items: StackValue[] = [];

  get depth(): number { return this.items.length; }

  push(v: StackValue): void { this.items.push(v); }

  pop(): StackValue {
    const v = this.items.pop();
    if (v === undefined) throw new EngineFault('Operand stack underflow');
    return v;
  }

  popByte(): Byte {
    const v = this.pop();
    if (v.tag !== 'byte') throw new EngineFault(`Expected byte operand, got ${v.tag}`);
    return v.value;
  }

  popAddr(): Addr {
    const v = this.pop();
    if (v.tag !== 'addr') throw new EngineFault(`Expected addr operand, got ${v.tag}`);
    return v.value;
  }

  popBool(): boolean {
    const v = this.pop();
    if (v.tag !== 'bool') throw new EngineFault(`Expected bool operand, got ${v.tag}`);
    return v.value;
  }

  // Pops two operands that must carry the same tag; returns [below, top]
  popPair(): [StackValue, StackValue] {
    const b = this.pop();
    const a = this.pop();
    if (a.tag !== b.tag) throw new EngineFault(`Operand tag mismatch: ${a.tag} vs ${b.tag}`);
    return [a, b];
  }

  clear(): void { this.items = []; }

  // Non-empty after a full micro-program means the decoder emitted an unbalanced program
  assertEmpty(context: string): void {
    if (this.items.length !== 0) {
      throw new EngineFault(`Operand stack not empty after ${context} (depth=${this.items.length})`);
    }
  }
}
