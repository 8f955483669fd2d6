import type { Addr } from '@core/cpu/types';
import HEX_GLYPHS from './hexfont.json';

export const GLYPH_BYTES = 5;
export const DEFAULT_FONT_BASE = 0x000;

// Flattened 16 x 5 byte glyph table for digits 0..F
export const HEX_FONT: Uint8Array = Uint8Array.from(HEX_GLYPHS.flat());

export const glyphAddress = (base: Addr, digit: number): Addr => (base + (digit & 0xF) * GLYPH_BYTES) & 0xFFF;
