import { Chip8System } from '@core/system/system'
import { EngineFault, IllegalOpcodeError, RomError } from '@core/cpu/errors'
import { TimerPacer } from '@core/timers/timers'
import { PadPointers, keyForCode } from './keymap'

const byId = <T extends HTMLElement>(id: string, ctor: new () => T): T => {
  const el = document.getElementById(id)
  if (!(el instanceof ctor)) throw new Error(`Missing #${id}`)
  return el
}

const canvas = byId('screen', HTMLCanvasElement)
const statusEl = byId('status', HTMLSpanElement)
const beepEl = byId('beep', HTMLSpanElement)
const startBtn = byId('start', HTMLButtonElement)
const pauseBtn = byId('pause', HTMLButtonElement)
const resetBtn = byId('reset', HTMLButtonElement)
const romInput = byId('rom', HTMLInputElement)
const speedSelect = byId('speed', HTMLSelectElement)
const optWrap = byId('opt-wrap', HTMLInputElement)
const optShiftVy = byId('opt-shift-vy', HTMLInputElement)
const padEl = byId('pad', HTMLDivElement)

// Query flags (read once; UI controls take precedence)
const query = new URL(window.location.href).searchParams
if (query.get('wrap') === '1') optWrap.checked = true
if (query.get('shift') === 'vy') optShiftVy.checked = true
const seedParam = query.has('seed') ? Number(query.get('seed')) : Number.NaN

const ctx = canvas.getContext('2d', { alpha: false })
if (!ctx) throw new Error('2D canvas unavailable')

const sys = new Chip8System({
  seed: Number.isFinite(seedParam) ? seedParam : undefined,
  quirks: { spriteWrap: optWrap.checked ? 'wrap' : 'clip', shiftSource: optShiftVy.checked ? 'vy' : 'vx' },
})
canvas.width = sys.display.width
canvas.height = sys.display.height
const image = ctx.createImageData(sys.display.width, sys.display.height)

// At most 6 catch-up frames after the tab was in the background
const pacer = new TimerPacer(60, 6)
let running = false
let romLoaded = false
let lastTs = 0

// Square-wave beeper gated by the sound timer
let audioCtx: AudioContext | null = null
let gainNode: GainNode | null = null
const ensureAudio = async (): Promise<void> => {
  if (audioCtx) return
  audioCtx = new AudioContext()
  const osc = new OscillatorNode(audioCtx, { type: 'square', frequency: 440 })
  gainNode = new GainNode(audioCtx, { gain: 0 })
  osc.connect(gainNode)
  gainNode.connect(audioCtx.destination)
  osc.start()
  await audioCtx.resume()
}
const setBeep = (on: boolean): void => {
  beepEl.classList.toggle('on', on)
  if (gainNode && audioCtx) gainNode.gain.setTargetAtTime(on ? 0.05 : 0, audioCtx.currentTime, 0.005)
}

const present = (): void => {
  if (!sys.display.dirty) return
  image.data.set(sys.display.toRGBA(1))
  ctx.putImageData(image, 0, 0)
  sys.display.dirty = false
}

const stop = (message: string): void => {
  running = false
  setBeep(false)
  startBtn.disabled = !romLoaded
  pauseBtn.disabled = true
  statusEl.textContent = message
}

const loop = (ts: number): void => {
  if (!running) return
  const elapsed = lastTs === 0 ? 0 : ts - lastTs
  lastTs = ts
  const frames = pacer.advance(elapsed)
  const cyclesPerFrame = parseInt(speedSelect.value, 10) || 10
  try {
    for (let f = 0; f < frames; f++) sys.runFrame({ cyclesPerFrame })
  } catch (e) {
    if (e instanceof IllegalOpcodeError || e instanceof EngineFault) {
      present()
      stop(e.message)
      console.error('[main]', e.message, 'recent PCs', sys.cpu.getRecentPCs().map((pc) => pc.toString(16)))
      return
    }
    throw e
  }
  setBeep(sys.timers.beeping)
  present()
  requestAnimationFrame(loop)
}

const resume = (): void => {
  running = true
  lastTs = 0
  pacer.reset()
  startBtn.disabled = true
  pauseBtn.disabled = false
  pauseBtn.textContent = 'Pause'
  statusEl.textContent = 'Running'
  requestAnimationFrame(loop)
}

const applyQuirks = (): void => {
  sys.cpu.setQuirks({ spriteWrap: optWrap.checked ? 'wrap' : 'clip', shiftSource: optShiftVy.checked ? 'vy' : 'vx' })
}
optWrap.addEventListener('change', applyQuirks)
optShiftVy.addEventListener('change', applyQuirks)

romInput.addEventListener('change', async (): Promise<void> => {
  const file = romInput.files?.[0]
  if (!file) return
  statusEl.textContent = `Loading ${file.name}...`
  try {
    const rom = sys.loadRom(new Uint8Array(await file.arrayBuffer()))
    romLoaded = true
    present()
    stop(`${file.name}: ${rom.size} bytes, crc ${rom.crc32.toString(16).padStart(8, '0')}. Press Start`)
    resetBtn.disabled = false
  } catch (e) {
    romLoaded = false
    stop(e instanceof RomError ? e.message : 'Failed to load ROM')
    if (!(e instanceof RomError)) console.error('[main] ROM load failed', e)
  }
})

startBtn.addEventListener('click', async (): Promise<void> => {
  if (!romLoaded) return
  try {
    await ensureAudio()
  } catch (e) {
    console.warn('[main] audio unavailable', e)
  }
  resume()
})

pauseBtn.addEventListener('click', (): void => {
  if (running) {
    stop('Paused')
    pauseBtn.disabled = false
    pauseBtn.textContent = 'Resume'
  } else {
    resume()
  }
})

resetBtn.addEventListener('click', (): void => {
  sys.reset()
  present()
  if (!running) stop('Reset. Press Start')
})

// Keyboard and on-screen pad -> keypad
const showKey = (key: number, down: boolean): void => {
  padEl.querySelector(`[data-key="${key}"]`)?.classList.toggle('down', down)
}
const setKey = (key: number, down: boolean): void => {
  sys.keypad.setKey(key, down)
  showKey(key, down)
}
window.addEventListener('keydown', (ev: KeyboardEvent): void => {
  const key = keyForCode(ev.code)
  if (key === null || ev.repeat) return
  ev.preventDefault()
  setKey(key, true)
})
window.addEventListener('keyup', (ev: KeyboardEvent): void => {
  const key = keyForCode(ev.code)
  if (key === null) return
  ev.preventDefault()
  setKey(key, false)
})
const padKey = (ev: PointerEvent): number | null => {
  const target = ev.target
  if (!(target instanceof HTMLElement) || target.dataset.key === undefined) return null
  return parseInt(target.dataset.key, 10)
}
const pointers = new PadPointers()
padEl.addEventListener('pointerdown', (ev: PointerEvent): void => {
  const key = padKey(ev)
  if (key === null) return
  // Keep this pointer's events on the pad after it leaves the cell
  padEl.setPointerCapture(ev.pointerId)
  const prev = pointers.press(ev.pointerId, key)
  if (prev !== null && !pointers.isHeld(prev)) setKey(prev, false)
  setKey(key, true)
})
const releasePointer = (ev: PointerEvent): void => {
  const key = pointers.release(ev.pointerId)
  if (key !== null && !pointers.isHeld(key)) setKey(key, false)
}
padEl.addEventListener('pointerup', releasePointer)
padEl.addEventListener('pointercancel', releasePointer)
padEl.addEventListener('lostpointercapture', releasePointer)

present()
