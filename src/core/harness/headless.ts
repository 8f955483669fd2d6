import { Chip8System } from '@core/system/system';
import { EngineFault, IllegalOpcodeError } from '@core/cpu/errors';
import type { Chip8Quirks } from '@core/cpu/quirks';
import { crc32 } from '@utils/crc32';

export interface KeyEvent {
  frame: number; // applied before this frame runs
  key: number;
  down: boolean;
}

export interface RunOptions {
  maxFrames: number;
  cyclesPerFrame?: number;
  quirks?: Partial<Chip8Quirks>;
  seed?: number;
  keys?: KeyEvent[];
  signal?: AbortSignal;
}

export interface RunResult {
  frames: number;
  instructions: number;
  reason: 'frames' | 'illegal' | 'fault' | 'aborted';
  displayCrc: number;
  pc: number;
  message?: string;
  system: Chip8System;
}

export function runRom(buffer: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System({ quirks: opts.quirks, seed: opts.seed ?? 1 });
  sys.loadRom(buffer);
  return runSystem(sys, opts);
}

// Drive an already-loaded system frame by frame until maxFrames, an error or an abort
export function runSystem(sys: Chip8System, opts: RunOptions): RunResult {
  const keys = [...(opts.keys ?? [])].sort((a, b) => a.frame - b.frame);
  let k = 0;
  const done = (reason: RunResult['reason'], message?: string): RunResult => ({
    frames: sys.frame,
    instructions: sys.cpu.instructionCount,
    reason,
    displayCrc: crc32(sys.display.getFrameBuffer()),
    pc: sys.getPC(),
    message,
    system: sys,
  });

  while (sys.frame < opts.maxFrames) {
    while (k < keys.length && keys[k].frame <= sys.frame) {
      sys.keypad.setKey(keys[k].key, keys[k].down);
      k++;
    }
    try {
      const r = sys.runFrame({ cyclesPerFrame: opts.cyclesPerFrame, signal: opts.signal });
      if (r.aborted) return done('aborted');
    } catch (e) {
      if (e instanceof IllegalOpcodeError) return done('illegal', e.message);
      if (e instanceof EngineFault) return done('fault', e.message);
      throw e;
    }
  }
  return done('frames');
}
