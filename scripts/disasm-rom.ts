#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { parseRom } from '@core/cart/rom'
import { disasmProgram } from '@utils/disasm'

const pathArg = process.argv[2]
if (!pathArg) {
  console.error('Usage: tsx scripts/disasm-rom.ts <rom> [baseHex]')
  process.exit(2)
}
if (!fs.existsSync(pathArg)) {
  console.error(`File not found: ${pathArg}`)
  process.exit(2)
}

const base = process.argv[3] ? parseInt(process.argv[3], 16) & 0xFFF : 0x200
const rom = parseRom(new Uint8Array(fs.readFileSync(pathArg)))
console.log(`; ${pathArg}  ${rom.size} bytes  crc32 ${rom.crc32.toString(16).padStart(8, '0')}`)
for (const line of disasmProgram(rom.data, base)) console.log(line)
