import { EngineFault } from '@core/cpu/errors';
import type { Chip8State } from '@core/cpu/types';
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/cpu/types';
import type { Chip8Quirks } from '@core/cpu/quirks';
import { envFlag } from '@utils/env';
import { formatOp, type MicroProgram } from './ops';
import { OperandStack, addrValue, boolValue, byteValue } from './stack';

export type ExecResult =
  | { status: 'done'; redirected: boolean }
  | { status: 'blocked' }; // waitKey found no key; nothing was changed

export interface EngineOptions {
  spriteWrap?: Chip8Quirks['spriteWrap'];
  // Log every IL op with an [il] prefix (defaults to TRACE_IL=1)
  trace?: boolean;
}

export class ILEngine {
  private spriteWrap: Chip8Quirks['spriteWrap'];
  private trace: boolean;

  constructor(opts: EngineOptions = {}) {
    this.spriteWrap = opts.spriteWrap ?? 'clip';
    this.trace = opts.trace ?? envFlag('TRACE_IL');
  }

  setSpriteWrap(mode: Chip8Quirks['spriteWrap']): void { this.spriteWrap = mode; }

  execute(program: MicroProgram, state: Chip8State): ExecResult {
    const stack = new OperandStack();
    let redirected = false;

    for (let idx = 0; idx < program.length; idx++) {
      const ins = program[idx];
      if (this.trace) {
        // eslint-disable-next-line no-console
        console.log(`[il] ${idx.toString().padStart(2, ' ')} ${formatOp(ins)} depth=${stack.depth}`);
      }
      switch (ins.op) {
        case 'pushByte': stack.push(byteValue(ins.value)); break;
        case 'pushAddr': stack.push(addrValue(ins.value)); break;
        case 'pushBool': stack.push(boolValue(ins.value)); break;
        case 'readReg': stack.push(byteValue(state.readRegister(ins.reg & 0xF))); break;
        case 'writeReg': state.writeRegister(ins.reg & 0xF, stack.popByte()); break;
        case 'readI': stack.push(addrValue(state.getI())); break;
        case 'writeI': state.setI(stack.popAddr()); break;
        case 'readPC': stack.push(addrValue(state.getPC())); break;
        case 'jump':
          state.setPC(stack.popAddr());
          redirected = true;
          break;
        case 'skipIf': {
          const cond = stack.popBool();
          state.setPC((state.getPC() + (cond ? 4 : 2)) & 0xFFF);
          redirected = true;
          break;
        }
        case 'callPush': state.stackPush(stack.popAddr()); break;
        case 'callPop': stack.push(addrValue(state.stackPop())); break;
        case 'readMem': stack.push(byteValue(state.readMemory(stack.popAddr()))); break;
        case 'writeMem': {
          const v = stack.popByte();
          const a = stack.popAddr();
          state.writeMemory(a, v);
          break;
        }
        case 'readDelay': stack.push(byteValue(state.getDelayTimer())); break;
        case 'writeDelay': state.setDelayTimer(stack.popByte()); break;
        case 'writeSound': state.setSoundTimer(stack.popByte()); break;
        case 'or':
        case 'and':
        case 'xor': {
          const [a, b] = stack.popPair();
          if (a.tag === 'bool' && b.tag === 'bool') {
            const r = ins.op === 'or' ? (a.value || b.value) : ins.op === 'and' ? (a.value && b.value) : (a.value !== b.value);
            stack.push(boolValue(r));
          } else if (a.tag === 'byte' && b.tag === 'byte') {
            const r = ins.op === 'or' ? (a.value | b.value) : ins.op === 'and' ? (a.value & b.value) : (a.value ^ b.value);
            stack.push(byteValue(r));
          } else {
            throw new EngineFault(`${ins.op} is not defined for ${a.tag} operands`);
          }
          break;
        }
        case 'add': {
          const b = stack.popByte();
          const a = stack.popByte();
          stack.push(byteValue(a + b));
          break;
        }
        case 'addCarry': {
          const b = stack.popByte();
          const a = stack.popByte();
          const sum = a + b;
          stack.push(byteValue(sum));
          stack.push(byteValue(sum > 0xFF ? 1 : 0));
          break;
        }
        case 'subBorrow': {
          const b = stack.popByte();
          const a = stack.popByte();
          stack.push(byteValue(a - b));
          stack.push(byteValue(a >= b ? 1 : 0));
          break;
        }
        case 'shr': {
          const v = stack.popByte();
          stack.push(byteValue(v >>> 1));
          stack.push(byteValue(v & 1));
          break;
        }
        case 'shl': {
          const v = stack.popByte();
          stack.push(byteValue(v << 1));
          stack.push(byteValue((v >>> 7) & 1));
          break;
        }
        case 'div':
        case 'mod': {
          const b = stack.popByte();
          const a = stack.popByte();
          if (b === 0) throw new EngineFault(`${ins.op} by zero`);
          stack.push(byteValue(ins.op === 'div' ? Math.floor(a / b) : a % b));
          break;
        }
        case 'addOffset': {
          const off = stack.popByte();
          const base = stack.popAddr();
          stack.push(addrValue(base + off));
          break;
        }
        case 'addOffsetCarry': {
          const off = stack.popByte();
          const base = stack.popAddr();
          const sum = base + off;
          stack.push(addrValue(sum));
          stack.push(byteValue(sum > 0xFFF ? 1 : 0));
          break;
        }
        case 'eq': {
          const [a, b] = stack.popPair();
          stack.push(boolValue(a.value === b.value));
          break;
        }
        case 'not': stack.push(boolValue(!stack.popBool())); break;
        case 'swap': {
          const b = stack.pop();
          const a = stack.pop();
          stack.push(b);
          stack.push(a);
          break;
        }
        case 'boolToByte': stack.push(byteValue(stack.popBool() ? 1 : 0)); break;
        case 'random': {
          const mask = stack.popByte();
          stack.push(byteValue(state.randomByte() & mask));
          break;
        }
        case 'clearScreen': state.clearScreen(); break;
        case 'drawRow': {
          const bits = stack.popByte();
          const y = stack.popByte();
          const x = stack.popByte();
          stack.push(boolValue(this.drawRow(state, x, y, ins.row, bits)));
          break;
        }
        case 'keyPressed': stack.push(boolValue(state.isKeyPressed(stack.popByte() & 0xF))); break;
        case 'waitKey': {
          if (idx !== 0) throw new EngineFault('waitKey must be the first operation of its program');
          const key = state.waitForKey();
          if (key === null) {
            stack.clear();
            return { status: 'blocked' };
          }
          stack.push(byteValue(key & 0xF));
          break;
        }
        case 'hexGlyph': stack.push(addrValue(state.getHexCharAddr(stack.popByte() & 0xF))); break;
        default: {
          const never: never = ins;
          throw new EngineFault(`Unknown IL op ${JSON.stringify(never)}`);
        }
      }
    }

    stack.assertEmpty(`${program.length}-op program`);
    return { status: 'done', redirected };
  }

  // The sprite origin always wraps onto the screen; the policy decides what happens to the
  // part of the sprite that runs past the bottom or right edge.
  private drawRow(state: Chip8State, x: number, y: number, row: number, bits: number): boolean {
    const ox = x % SCREEN_WIDTH;
    let ry = (y % SCREEN_HEIGHT) + row;
    if (this.spriteWrap === 'clip') {
      if (ry >= SCREEN_HEIGHT) return false;
      return state.xorRow(ox, ry, bits);
    }
    ry %= SCREEN_HEIGHT;
    let collided = state.xorRow(ox, ry, bits);
    if (ox + 8 > SCREEN_WIDTH) {
      const spill = (bits << (SCREEN_WIDTH - ox)) & 0xFF;
      if (spill !== 0 && state.xorRow(0, ry, spill)) collided = true;
    }
    return collided;
  }
}
