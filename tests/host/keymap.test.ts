import { describe, it, expect } from 'vitest';
import { KEYMAP, PAD_ROWS, PadPointers, keyForCode } from '@host/browser/keymap';

describe('browser keymap', () => {
  it('maps the left-hand 4x4 block onto the hex pad', () => {
    expect(keyForCode('Digit1')).toBe(0x1);
    expect(keyForCode('Digit4')).toBe(0xC);
    expect(keyForCode('KeyX')).toBe(0x0);
    expect(keyForCode('KeyV')).toBe(0xF);
    expect(keyForCode('KeyP')).toBeNull();
  });

  it('covers every key once', () => {
    expect([...KEYMAP.values()].sort((a, b) => a - b)).toEqual([...Array(16).keys()]);
    expect(PAD_ROWS.flat().sort((a, b) => a - b)).toEqual([...Array(16).keys()]);
  });
});

describe('pad pointer tracking', () => {
  it('a release frees the key its pointer pressed, whatever the release target', () => {
    const p = new PadPointers();
    expect(p.press(1, 0xA)).toBeNull();
    expect(p.isHeld(0xA)).toBe(true);
    expect(p.release(1)).toBe(0xA);
    expect(p.isHeld(0xA)).toBe(false);
    expect(p.release(1)).toBeNull();
  });

  it('a cancel for an unknown pointer releases nothing', () => {
    const p = new PadPointers();
    p.press(1, 3);
    expect(p.release(2)).toBeNull();
    expect(p.isHeld(3)).toBe(true);
  });

  it('pressing a new key with the same pointer hands back the old one', () => {
    const p = new PadPointers();
    p.press(1, 3);
    expect(p.press(1, 4)).toBe(3);
    expect(p.press(1, 4)).toBeNull();
    expect(p.isHeld(3)).toBe(false);
  });

  it('a key held by two pointers stays held until both let go', () => {
    const p = new PadPointers();
    p.press(1, 5);
    p.press(2, 5);
    expect(p.release(1)).toBe(5);
    expect(p.isHeld(5)).toBe(true);
    expect(p.release(2)).toBe(5);
    expect(p.isHeld(5)).toBe(false);
  });
});
