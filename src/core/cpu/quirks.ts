import { readEnv } from '@utils/env';

// Behaviours where CHIP-8 interpreters historically disagree.
export interface Chip8Quirks {
  // 8xy6/8xyE: shift Vx in place ('vx') or shift Vy into Vx ('vy', COSMAC VIP)
  shiftSource: 'vx' | 'vy';
  // Dxyn: drop pixels past the screen edge ('clip') or wrap them around ('wrap')
  spriteWrap: 'clip' | 'wrap';
  // Fx1E: set VF when I + Vx leaves the 12-bit address space
  indexOverflowFlag: boolean;
  // Fx55/Fx65: leave I at I + x + 1 (true) or unchanged (false)
  loadStoreIncrementsIndex: boolean;
  // 8Fy4/8Fy5 would overwrite their own result with the flag
  flagRegisterOperand: 'illegal' | 'allow';
}

export const DEFAULT_QUIRKS: Readonly<Chip8Quirks> = {
  shiftSource: 'vx',
  spriteWrap: 'clip',
  indexOverflowFlag: false,
  loadStoreIncrementsIndex: true,
  flagRegisterOperand: 'illegal',
};

export const resolveQuirks = (overrides?: Partial<Chip8Quirks>): Chip8Quirks => ({ ...DEFAULT_QUIRKS, ...overrides });

// Quirks named by CHIP8_SHIFT_SOURCE / CHIP8_SPRITE_WRAP / CHIP8_INDEX_OVERFLOW / CHIP8_LOADSTORE_INC
export const envQuirks = (): Partial<Chip8Quirks> => {
  const q: Partial<Chip8Quirks> = {};
  const shift = readEnv('CHIP8_SHIFT_SOURCE');
  if (shift === 'vx' || shift === 'vy') q.shiftSource = shift;
  const wrap = readEnv('CHIP8_SPRITE_WRAP');
  if (wrap === 'clip' || wrap === 'wrap') q.spriteWrap = wrap;
  const ovf = readEnv('CHIP8_INDEX_OVERFLOW');
  if (ovf === '0' || ovf === '1') q.indexOverflowFlag = ovf === '1';
  const inc = readEnv('CHIP8_LOADSTORE_INC');
  if (inc === '0' || inc === '1') q.loadStoreIncrementsIndex = inc === '1';
  return q;
};

// Defaults, then the environment, then explicit options; an option left undefined falls through
export const quirksFromEnv = (base: Partial<Chip8Quirks> = {}): Chip8Quirks => {
  const q = resolveQuirks(envQuirks());
  if (base.shiftSource !== undefined) q.shiftSource = base.shiftSource;
  if (base.spriteWrap !== undefined) q.spriteWrap = base.spriteWrap;
  if (base.indexOverflowFlag !== undefined) q.indexOverflowFlag = base.indexOverflowFlag;
  if (base.loadStoreIncrementsIndex !== undefined) q.loadStoreIncrementsIndex = base.loadStoreIncrementsIndex;
  if (base.flagRegisterOperand !== undefined) q.flagRegisterOperand = base.flagRegisterOperand;
  return q;
};
