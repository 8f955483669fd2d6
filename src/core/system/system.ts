import { Chip8Memory } from '@core/bus/memory';
import { Chip8CPU, type StepResult } from '@core/cpu/cpu';
import { EngineFault } from '@core/cpu/errors';
import type { Chip8Quirks } from '@core/cpu/quirks';
import { quirksFromEnv } from '@core/cpu/quirks';
import type { Addr, Byte, Chip8Registers, Chip8State } from '@core/cpu/types';
import { PROGRAM_START, REGISTER_COUNT } from '@core/cpu/types';
import { parseRom, type Chip8Rom } from '@core/cart/rom';
import { Display } from '@core/display/display';
import { DEFAULT_FONT_BASE, HEX_FONT, glyphAddress } from '@core/font/font';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';
import { envInt, readEnv } from '@utils/env';
import { createXorShift32, mathRandomByte, type ByteSource } from '@utils/random';

export const DEFAULT_CYCLES_PER_FRAME = 10;

export interface SystemOptions {
  quirks?: Partial<Chip8Quirks>;
  fontBase?: Addr;
  // Seed for Cxkk; falls back to CHIP8_SEED, then Math.random
  seed?: number;
  random?: ByteSource;
}

export interface FrameOptions {
  cyclesPerFrame?: number;
  signal?: AbortSignal;
}

export interface FrameResult {
  instructions: number;
  waitingForKey: boolean;
  aborted: boolean;
}

// The concrete machine: owns all CHIP-8 state and exposes it to the core through Chip8State.
export class Chip8System implements Chip8State {
  public memory: Chip8Memory;
  public display: Display;
  public keypad: Keypad;
  public timers: Timers;
  public cpu: Chip8CPU;
  public frame = 0;
  private v = new Uint8Array(REGISTER_COUNT);
  private i: Addr = 0;
  private pc: Addr = PROGRAM_START;
  private callStack: Addr[] = [];
  private fontBase: Addr;
  private random: ByteSource;
  private rom: Chip8Rom | null = null;

  constructor(opts: SystemOptions = {}) {
    this.memory = new Chip8Memory();
    this.display = new Display();
    this.keypad = new Keypad();
    this.timers = new Timers();
    this.fontBase = (opts.fontBase ?? DEFAULT_FONT_BASE) & 0xFFF;
    const envSeed = readEnv('CHIP8_SEED');
    const seed = opts.seed ?? (envSeed !== null ? envInt('CHIP8_SEED', 0) : null);
    this.random = opts.random ?? (seed !== null ? createXorShift32(seed) : mathRandomByte);
    this.cpu = new Chip8CPU(this, quirksFromEnv(opts.quirks));
    this.memory.load(HEX_FONT, this.fontBase);
  }

  // Registers, memory, display and timers are cleared; the loaded ROM (if any) is copied back in
  reset(): void {
    this.memory.clear();
    this.memory.load(HEX_FONT, this.fontBase);
    if (this.rom) this.memory.load(this.rom.data, PROGRAM_START);
    this.v.fill(0);
    this.i = 0;
    this.pc = PROGRAM_START;
    this.callStack = [];
    this.display.clear();
    this.keypad.reset();
    this.timers.reset();
    this.cpu.resetCounters();
    this.frame = 0;
  }

  loadRom(buffer: Uint8Array): Chip8Rom {
    this.rom = parseRom(buffer);
    this.reset();
    return this.rom;
  }

  // Place raw bytes at an address without validation (tests, debugger pokes)
  loadProgram(bytes: Uint8Array | number[], at: Addr = PROGRAM_START): void {
    this.memory.load(bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes), at);
  }

  stepInstruction(): StepResult {
    return this.cpu.step();
  }

  // Run up to cyclesPerFrame instructions, then one 60Hz timer tick. A pending key wait ends the
  // frame early; the timers still tick.
  runFrame(opts: FrameOptions = {}): FrameResult {
    const requested = opts.cyclesPerFrame ?? envInt('CHIP8_CYCLES_PER_FRAME', DEFAULT_CYCLES_PER_FRAME);
    // Non-finite or negative budgets fall back to the default
    const budget = Number.isFinite(requested) && requested >= 0 ? Math.floor(requested) : DEFAULT_CYCLES_PER_FRAME;
    let instructions = 0;
    let waitingForKey = false;
    for (let n = 0; n < budget; n++) {
      if (opts.signal?.aborted) return { instructions, waitingForKey, aborted: true };
      const r = this.cpu.step();
      if (r.kind === 'waiting') { waitingForKey = true; break; }
      instructions++;
    }
    this.timers.tick();
    this.frame++;
    return { instructions, waitingForKey, aborted: false };
  }

  getRegisters(): Chip8Registers {
    return {
      v: Array.from(this.v),
      i: this.i,
      pc: this.pc,
      delay: this.timers.delay,
      sound: this.timers.sound,
      sp: this.callStack.length,
    };
  }

  getSoundTimer(): Byte { return this.timers.sound; }

  // --- Chip8State ---
  readRegister(r: number): Byte { return this.v[r & 0xF]; }
  writeRegister(r: number, value: Byte): void { this.v[r & 0xF] = value & 0xFF; }
  getPC(): Addr { return this.pc; }
  setPC(addr: Addr): void { this.pc = addr & 0xFFF; }
  getI(): Addr { return this.i; }
  setI(addr: Addr): void { this.i = addr & 0xFFF; }
  stackPush(addr: Addr): void { this.callStack.push(addr & 0xFFF); }
  stackPop(): Addr {
    const a = this.callStack.pop();
    if (a === undefined) throw new EngineFault(`Call stack underflow at $${this.pc.toString(16).padStart(3, '0')}`);
    return a;
  }
  readMemory(addr: Addr): Byte { return this.memory.read(addr); }
  writeMemory(addr: Addr, value: Byte): void { this.memory.write(addr, value); }
  getDelayTimer(): Byte { return this.timers.delay; }
  setDelayTimer(value: Byte): void { this.timers.delay = value & 0xFF; }
  setSoundTimer(value: Byte): void { this.timers.sound = value & 0xFF; }
  clearScreen(): void { this.display.clear(); }
  xorRow(x: number, y: number, bits: Byte): boolean { return this.display.xorRow(x, y, bits); }
  isKeyPressed(key: number): boolean { return this.keypad.isPressed(key); }
  waitForKey(): number | null { return this.keypad.takeKeyPress(); }
  getHexCharAddr(digit: number): Addr { return glyphAddress(this.fontBase, digit); }
  randomByte(): Byte { return this.random() & 0xFF; }
}
