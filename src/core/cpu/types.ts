export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Addr = number; // 0..0xFFF

export const ADDR_MASK = 0xFFF;
export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const REGISTER_COUNT = 16;
export const FLAG_REGISTER = 0xF;
export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// Capability set the decoder/engine use to touch the machine. Any host (the concrete
// Chip8System, a test double, a debugger proxy) implements it.
export interface Chip8State {
  readRegister(r: number): Byte;
  writeRegister(r: number, v: Byte): void;
  getPC(): Addr;
  setPC(addr: Addr): void;
  getI(): Addr;
  setI(addr: Addr): void;
  stackPush(addr: Addr): void;
  // Throws EngineFault on an empty call stack
  stackPop(): Addr;
  readMemory(addr: Addr): Byte;
  writeMemory(addr: Addr, v: Byte): void;
  getDelayTimer(): Byte;
  setDelayTimer(v: Byte): void;
  setSoundTimer(v: Byte): void;
  clearScreen(): void;
  // XOR up to 8 pixels (bit7 leftmost) at (x, y); pixels past the right edge are dropped.
  // Returns true when a set pixel was turned off.
  xorRow(x: number, y: number, bits: Byte): boolean;
  isKeyPressed(key: number): boolean;
  // Cooperative key wait: null means no key yet and the instruction is retried.
  waitForKey(): number | null;
  getHexCharAddr(digit: number): Addr;
  randomByte(): Byte;
}

export interface Chip8Registers {
  v: Byte[];
  i: Addr;
  pc: Addr;
  delay: Byte;
  sound: Byte;
  sp: number; // call stack depth
}
