// Physical keyboard layout onto the hex keypad, by KeyboardEvent.code:
//   1 2 3 4      1 2 3 C
//   Q W E R  ->  4 5 6 D
//   A S D F      7 8 9 E
//   Z X C V      A 0 B F
const LAYOUT: ReadonlyArray<readonly [string, number]> = [
  ['Digit1', 0x1], ['Digit2', 0x2], ['Digit3', 0x3], ['Digit4', 0xC],
  ['KeyQ', 0x4], ['KeyW', 0x5], ['KeyE', 0x6], ['KeyR', 0xD],
  ['KeyA', 0x7], ['KeyS', 0x8], ['KeyD', 0x9], ['KeyF', 0xE],
  ['KeyZ', 0xA], ['KeyX', 0x0], ['KeyC', 0xB], ['KeyV', 0xF],
]

export const KEYMAP: ReadonlyMap<string, number> = new Map(LAYOUT)

export const keyForCode = (code: string): number | null => KEYMAP.get(code) ?? null

// Label shown on the on-screen pad, row by row
export const PAD_ROWS: ReadonlyArray<ReadonlyArray<number>> = [
  [0x1, 0x2, 0x3, 0xC],
  [0x4, 0x5, 0x6, 0xD],
  [0x7, 0x8, 0x9, 0xE],
  [0xA, 0x0, 0xB, 0xF],
]

// Which pad key each active pointer holds. A release, cancel or lost capture for a pointer frees
// the key it pressed, wherever the pointer is when it happens.
export class PadPointers {
  private held = new Map<number, number>();

  // Returns the key to release first when the same pointer was already holding one
  press(pointerId: number, key: number): number | null {
    const prev = this.held.get(pointerId) ?? null;
    this.held.set(pointerId, key & 0xF);
    return prev !== null && prev !== (key & 0xF) ? prev : null;
  }

  release(pointerId: number): number | null {
    const key = this.held.get(pointerId);
    if (key === undefined) return null;
    this.held.delete(pointerId);
    return key;
  }

  // Another pointer may still hold the same key
  isHeld(key: number): boolean {
    for (const k of this.held.values()) if (k === (key & 0xF)) return true;
    return false;
  }
}
