import { Chip8System, type SystemOptions } from '@core/system/system';
import { DEFAULT_QUIRKS } from '@core/cpu/quirks';

// System with `words` (16-bit opcodes) placed at 0x200 and PC at 0x200. Quirks start from the
// defaults, not the CHIP8_* environment.
export function systemWithProgram(words: number[], opts: SystemOptions = {}): Chip8System {
  const sys = new Chip8System({ seed: 1, ...opts, quirks: { ...DEFAULT_QUIRKS, ...opts.quirks } });
  const bytes: number[] = [];
  for (const w of words) bytes.push((w >>> 8) & 0xFF, w & 0xFF);
  sys.loadRom(Uint8Array.from(bytes));
  return sys;
}

// Step n instructions, failing loudly if a key wait blocks
export function stepN(sys: Chip8System, n: number): void {
  for (let k = 0; k < n; k++) {
    const r = sys.stepInstruction();
    if (r.kind !== 'executed') throw new Error(`blocked at $${r.pc.toString(16)}`);
  }
}
