#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { runRom, type KeyEvent } from '@core/harness/headless'
import { readEnv } from '@utils/env'

function usage(): never {
  console.error('Usage: tsx scripts/run-rom.ts --rom=<file> [--frames=N] [--cycles=N] [--seed=N] [--keys=frame:key,...] [--png=out.png] [--scale=N] [--ascii]')
  process.exit(2)
}

// --keys=30:5,45:-5 presses key 5 before frame 30 and releases it before frame 45
function parseKeys(spec: string): KeyEvent[] {
  const out: KeyEvent[] = []
  for (const part of spec.split(',').filter(Boolean)) {
    const [f, k = ''] = part.split(':')
    const frame = parseInt(f, 10)
    const down = !k.startsWith('-')
    const key = parseInt(down ? k : k.slice(1), 16)
    if (!Number.isFinite(frame) || !Number.isFinite(key)) throw new Error(`Bad key event: ${part}`)
    out.push({ frame, key: key & 0xF, down })
  }
  return out
}

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = readEnv('ROM') || ''
  let frames = parseInt(readEnv('FRAMES') || '600', 10)
  let cycles: number | undefined
  let seed = 1
  let keys: KeyEvent[] = []
  let png = ''
  let scale = 8
  let ascii = false
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--frames=')) {
      frames = parseInt(a.slice(9), 10)
      if (!Number.isFinite(frames) || frames < 1) { console.error(`Bad --frames value: ${a.slice(9)}`); usage() }
    }
    else if (a.startsWith('--cycles=')) {
      cycles = parseInt(a.slice(9), 10)
      if (!Number.isFinite(cycles) || cycles < 1) { console.error(`Bad --cycles value: ${a.slice(9)}`); usage() }
    }
    else if (a.startsWith('--seed=')) seed = parseInt(a.slice(7), 10) || 1
    else if (a.startsWith('--keys=')) keys = parseKeys(a.slice(7))
    else if (a.startsWith('--png=')) png = a.slice(6)
    else if (a.startsWith('--scale=')) scale = Math.max(1, parseInt(a.slice(8), 10) || 1)
    else if (a === '--ascii') ascii = true
    else if (!a.startsWith('--') && !rom) rom = a
  }
  if (!rom) usage()
  if (!Number.isFinite(frames) || frames < 1) frames = 600
  return { rom, frames, cycles, seed, keys, png, scale, ascii }
}

async function main() {
  const args = parseArgs()
  if (!fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom}`); process.exit(2) }
  const buf = new Uint8Array(fs.readFileSync(args.rom))

  const t0 = Date.now()
  const res = runRom(buf, { maxFrames: args.frames, cyclesPerFrame: args.cycles, seed: args.seed, keys: args.keys })
  const ms = Date.now() - t0

  if (args.png) {
    const rgba = res.system.display.toRGBA(args.scale)
    const png = new PNG({ width: res.system.display.width * args.scale, height: res.system.display.height * args.scale })
    png.data.set(rgba)
    const out = path.resolve(args.png)
    fs.mkdirSync(path.dirname(out), { recursive: true })
    const stream = fs.createWriteStream(out)
    await new Promise<void>((resolve, reject) => {
      stream.on('finish', () => resolve())
      stream.on('error', (e) => reject(e))
      png.pack().pipe(stream)
    })
    console.log(`Wrote ${out}`)
  }
  if (args.ascii) console.log(res.system.display.toAscii())

  console.log(JSON.stringify({
    rom: path.basename(args.rom),
    frames: res.frames,
    instructions: res.instructions,
    reason: res.reason,
    message: res.message,
    pc: res.pc.toString(16).padStart(3, '0'),
    displayCrc: res.displayCrc.toString(16).padStart(8, '0'),
    ms,
  }))
  if (res.reason === 'illegal' || res.reason === 'fault') process.exit(1)
}

main().catch((e) => { console.error(e); process.exit(1) })
