import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { EngineFault } from '@core/cpu/errors';
import { systemWithProgram, stepN } from '../helpers/chip8h';

describe('jumps, calls and skips', () => {
  it('1nnn jumps', () => {
    const sys = systemWithProgram([0x1ABC]);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0xABC);
  });

  it('2nnn pushes the return address and 00EE returns past the call', () => {
    const sys = systemWithProgram([0x2206, 0x0000, 0x0000, 0x00EE]);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x206);
    expect(sys.getRegisters().sp).toBe(1);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x202);
    expect(sys.getRegisters().sp).toBe(0);
  });

  it('00EE on an empty call stack is a fatal fault', () => {
    const sys = systemWithProgram([0x00EE]);
    expect(() => sys.stepInstruction()).toThrow(EngineFault);
  });

  it('3xkk skips by 4 when Vx == kk and advances by 2 otherwise', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 15 }), fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (x, v, kk) => {
        const sys = systemWithProgram([0x3000 | (x << 8) | kk]);
        sys.writeRegister(x, v);
        stepN(sys, 1);
        expect(sys.getPC()).toBe(v === kk ? 0x204 : 0x202);
      }),
      { numRuns: 300 },
    );
  });

  it('3xkk skips when the register matches exactly', () => {
    const sys = systemWithProgram([0x3542]);
    sys.writeRegister(5, 0x42);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x204);
  });

  it('4xkk skips when Vx != kk', () => {
    const sys = systemWithProgram([0x4542, 0x0000, 0x4542]);
    sys.writeRegister(5, 0x41);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x204);
    sys.writeRegister(5, 0x42);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x206);
  });

  it('5xy0 / 9xy0 compare registers', () => {
    const sys = systemWithProgram([0x5120, 0x0000, 0x9120]);
    sys.writeRegister(1, 9); sys.writeRegister(2, 9);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x204);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x206);
  });

  it('Bnnn jumps to nnn + V0, wrapping at 12 bits', () => {
    const sys = systemWithProgram([0xBFF0]);
    sys.writeRegister(0, 0x20);
    stepN(sys, 1);
    expect(sys.getPC()).toBe(0x010);
  });

  it('PC wraps from 0xFFE to 0x000', () => {
    const sys = systemWithProgram([0x1FFE]);
    sys.writeMemory(0xFFE, 0x60);
    sys.writeMemory(0xFFF, 0x01);
    stepN(sys, 2);
    expect(sys.readRegister(0)).toBe(1);
    expect(sys.getPC()).toBe(0x000);
  });
});
