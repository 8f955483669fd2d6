import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/cpu/types';

export type RGB = [number, number, number];

export const PIXEL_ON: RGB = [0xE0, 0xF0, 0xD8];
export const PIXEL_OFF: RGB = [0x10, 0x18, 0x10];

// 64x32 monochrome framebuffer, one byte per pixel (0 or 1)
export class Display {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private fb = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  // Set on every change; hosts clear it after presenting a frame
  dirty = true;

  clear(): void {
    this.fb.fill(0);
    this.dirty = true;
  }

  // XOR the 8 bits of `bits` (bit7 leftmost) onto row y starting at column x.
  // Columns >= 64 and rows >= 32 are clipped. Returns true if any lit pixel was turned off.
  xorRow(x: number, y: number, bits: number): boolean {
    if (y < 0 || y >= SCREEN_HEIGHT || x < 0) return false;
    let collided = false;
    const rowBase = y * SCREEN_WIDTH;
    for (let b = 0; b < 8; b++) {
      if ((bits & (0x80 >>> b)) === 0) continue;
      const px = x + b;
      if (px >= SCREEN_WIDTH) break;
      const idx = rowBase + px;
      if (this.fb[idx] === 1) collided = true;
      this.fb[idx] ^= 1;
    }
    if (bits & 0xFF) this.dirty = true;
    return collided;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= SCREEN_WIDTH || y >= SCREEN_HEIGHT) return false;
    return this.fb[y * SCREEN_WIDTH + x] === 1;
  }

  getFrameBuffer(): Uint8Array { return this.fb; }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.fb.length; i++) n += this.fb[i];
    return n;
  }

  // RGBA8888, optionally scaled by an integer factor
  toRGBA(scale = 1, on: RGB = PIXEL_ON, off: RGB = PIXEL_OFF): Uint8Array {
    const s = Math.max(1, scale | 0);
    const W = SCREEN_WIDTH * s, H = SCREEN_HEIGHT * s;
    const out = new Uint8Array(W * H * 4);
    for (let y = 0; y < H; y++) {
      for (let x = 0; x < W; x++) {
        const lit = this.fb[((y / s) | 0) * SCREEN_WIDTH + ((x / s) | 0)] === 1;
        const [r, g, b] = lit ? on : off;
        const o = (y * W + x) << 2;
        out[o] = r; out[o + 1] = g; out[o + 2] = b; out[o + 3] = 255;
      }
    }
    return out;
  }

  // One line per row, '#' lit and '.' unlit
  toAscii(): string {
    const lines: string[] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      let line = '';
      for (let x = 0; x < SCREEN_WIDTH; x++) line += this.fb[y * SCREEN_WIDTH + x] ? '#' : '.';
      lines.push(line);
    }
    return lines.join('\n');
  }
}
