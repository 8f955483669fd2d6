import { describe, it, expect } from 'vitest';
import { crc32, crc32Hex, crc32Update } from '@utils/crc32';

const ascii = (s: string) => Array.from(s, (c) => c.charCodeAt(0));

describe('crc32', () => {
  it('matches the IEEE check value', () => {
    expect(crc32(ascii('123456789'))).toBe(0xCBF43926);
    expect(crc32Hex(ascii('123456789'))).toBe('cbf43926');
  });

  it('is zero for no input', () => {
    expect(crc32Hex(new Uint8Array(0))).toBe('00000000');
  });

  it('continues a running value across slices', () => {
    const whole = crc32(ascii('123456789'));
    expect(crc32Update(crc32(ascii('1234')), ascii('56789'))).toBe(whole);
    expect(crc32Update(crc32Update(0, ascii('12345678')), ascii('9'))).toBe(whole);
    expect(crc32Update(whole, [])).toBe(whole);
  });
});
