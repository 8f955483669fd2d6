import type { Addr, Byte } from '@core/cpu/types';
import { ADDR_MASK, MEMORY_SIZE } from '@core/cpu/types';

// 4KB flat address space. Every access is truncated to 12 bits.
export class Chip8Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  read(addr: Addr): Byte {
    return this.ram[addr & ADDR_MASK];
  }

  write(addr: Addr, value: Byte): void {
    this.ram[addr & ADDR_MASK] = value & 0xFF;
  }

  // Copy bytes in starting at offset; anything past 0xFFF is dropped
  load(data: Uint8Array, offset = 0): void {
    const start = offset & ADDR_MASK;
    const n = Math.min(MEMORY_SIZE - start, data.length);
    if (n > 0) this.ram.set(data.subarray(0, n), start);
  }

  clear(): void { this.ram.fill(0); }

  snapshot(): Uint8Array { return this.ram.slice(); }
}
