#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8System } from '@core/system/system'
import { IllegalOpcodeError } from '@core/cpu/errors'
import { disasmAt, formatTraceLine } from '@utils/disasm'
import { readEnv } from '@utils/env'

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = readEnv('ROM') || ''
  let max = parseInt(readEnv('TRACE_MAX') || '1000', 10)
  let seed = 1
  let key = -1
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a.startsWith('--seed=')) seed = parseInt(a.slice(7), 10)
    // hold a key down for the whole trace so Fx0A/Ex9E paths can be followed
    else if (a.startsWith('--key=')) key = parseInt(a.slice(6), 16)
    else if (!a.startsWith('--') && !rom) rom = a
  }
  return { rom, max, seed, key }
}

async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none)'}`); process.exit(2) }
  const sys = new Chip8System({ seed: args.seed })
  sys.loadRom(new Uint8Array(fs.readFileSync(args.rom)))
  if (args.key >= 0) sys.keypad.setKey(args.key, true)

  const maxInst = args.max > 0 ? args.max : Number.MAX_SAFE_INTEGER
  let i = 0
  let waits = 0
  while (i < maxInst) {
    const pc = sys.getPC()
    const dis = disasmAt((addr: number) => sys.readMemory(addr), pc)
    const regs = sys.getRegisters()
    try {
      const r = sys.stepInstruction()
      if (r.kind === 'waiting') {
        // Fx0A is edge-triggered: release then press so the next poll sees a new key
        if (args.key >= 0 && waits++ > 0) { sys.keypad.setKey(args.key, false); sys.keypad.setKey(args.key, true) }
        if (args.key < 0) { console.log(`${formatTraceLine(pc, dis, regs)}  ; waiting for key`); break }
        continue
      }
    } catch (e) {
      if (e instanceof IllegalOpcodeError) { console.log(`${formatTraceLine(pc, dis, regs)}  ; ${e.message}`); process.exit(1) }
      throw e
    }
    waits = 0
    console.log(formatTraceLine(pc, dis, regs))
    i++
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
