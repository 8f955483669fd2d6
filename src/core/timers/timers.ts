import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;

export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;

  // One 60Hz tick
  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }

  get beeping(): boolean { return this.sound > 0; }

  reset(): void { this.delay = 0; this.sound = 0; }
}

// Converts elapsed wall-clock milliseconds into whole 60Hz ticks, carrying the remainder.
// Works in ms*hz units so integer inputs never drift.
export class TimerPacer {
  private accum = 0;

  constructor(private readonly hz = TIMER_HZ, private readonly maxTicksPerAdvance = Number.POSITIVE_INFINITY) {}

  // Returns how many ticks are due. Gaps longer than the cap (a backgrounded tab) are dropped.
  advance(elapsedMs: number): number {
    if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) return 0;
    this.accum += elapsedMs * this.hz;
    let ticks = Math.floor(this.accum / 1000);
    this.accum -= ticks * 1000;
    if (ticks > this.maxTicksPerAdvance) {
      ticks = this.maxTicksPerAdvance;
      this.accum = 0;
    }
    return ticks;
  }

  reset(): void { this.accum = 0; }
}
