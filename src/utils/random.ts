// Seedable xorshift32 byte source, so Cxkk is reproducible in tests and headless runs
export type ByteSource = () => number;

export const createXorShift32 = (seed: number): ByteSource => {
  let s = (seed >>> 0) || 0x2545F491; // the generator is stuck at zero
  return () => {
    s ^= s << 13; s >>>= 0;
    s ^= s >>> 17;
    s ^= s << 5; s >>>= 0;
    return s & 0xFF;
  };
};

export const mathRandomByte: ByteSource = () => Math.floor(Math.random() * 256) & 0xFF;
