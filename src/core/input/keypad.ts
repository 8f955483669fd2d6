// 16-key hex keypad:
//   1 2 3 C
//   4 5 6 D
//   7 8 9 E
//   A 0 B F
export class Keypad {
  private down = new Array<boolean>(16).fill(false);
  // Keys that went down since the current Fx0A wait began (bit per key)
  private pressedSinceWait = 0;
  private waiting = false;

  setKey(key: number, isDown: boolean): void {
    const k = key & 0xF;
    if (isDown && !this.down[k] && this.waiting) this.pressedSinceWait |= (1 << k);
    this.down[k] = isDown;
  }

  isPressed(key: number): boolean { return this.down[key & 0xF]; }

  // Cooperative Fx0A: the first call arms the wait, later calls return the lowest key pressed
  // after arming. A key already held when the wait started does not count.
  takeKeyPress(): number | null {
    if (!this.waiting) {
      this.waiting = true;
      this.pressedSinceWait = 0;
      return null;
    }
    if (this.pressedSinceWait === 0) return null;
    let k = 0;
    while (((this.pressedSinceWait >>> k) & 1) === 0) k++;
    this.waiting = false;
    this.pressedSinceWait = 0;
    return k;
  }

  isWaiting(): boolean { return this.waiting; }

  reset(): void {
    this.down.fill(false);
    this.pressedSinceWait = 0;
    this.waiting = false;
  }
}
