// CRC-32/ISO-HDLC over bytes. crc32Update continues a running value, so a ROM image and a
// framebuffer (or a framebuffer delivered in slices) can be folded into one checksum.
const POLY = 0xEDB88320;

const TABLE: readonly number[] = Array.from({ length: 256 }, (_, byte) => {
  let c = byte;
  for (let bit = 0; bit < 8; bit++) c = c & 1 ? (c >>> 1) ^ POLY : c >>> 1;
  return c >>> 0;
});

export function crc32Update(running: number, bytes: ArrayLike<number>): number {
  let c = (running ^ 0xFFFFFFFF) >>> 0;
  for (let n = 0; n < bytes.length; n++) c = TABLE[(c ^ bytes[n]) & 0xFF] ^ (c >>> 8);
  return (c ^ 0xFFFFFFFF) >>> 0;
}

export const crc32 = (bytes: ArrayLike<number>): number => crc32Update(0, bytes);

export const crc32Hex = (bytes: ArrayLike<number>): string => crc32(bytes).toString(16).padStart(8, '0');
