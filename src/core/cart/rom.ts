import { RomError } from '@core/cpu/errors';
import { MEMORY_SIZE, PROGRAM_START } from '@core/cpu/types';
import { crc32 } from '@utils/crc32';

export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START; // 0xE00

export interface Chip8Rom {
  data: Uint8Array;
  size: number;
  crc32: number;
}

// Raw CHIP-8 images have no header; all we can check is that the image fits above 0x200
export function parseRom(buffer: Uint8Array): Chip8Rom {
  if (buffer.length === 0) throw new RomError('Empty ROM image');
  if (buffer.length > MAX_ROM_SIZE) {
    throw new RomError(`ROM image is ${buffer.length} bytes; at most ${MAX_ROM_SIZE} fit above $${PROGRAM_START.toString(16)}`);
  }
  const data = buffer.slice();
  return { data, size: data.length, crc32: crc32(data) };
}
