// UI-only script: pad layout and canvas scaling. Emulation lives in main.ts.
import { PAD_ROWS } from './keymap'

const $ = <T extends HTMLElement>(sel: string, ctor: new () => T): T | null => {
  const el = document.querySelector(sel)
  return el instanceof ctor ? el : null
}

const canvas = $('#screen', HTMLCanvasElement)
const scaleSelect = $('#scale-control', HTMLSelectElement)
const pad = $('#pad', HTMLDivElement)

// Cells carry data-key (decimal) for main.ts to light up
if (pad) {
  for (const row of PAD_ROWS) {
    for (const key of row) {
      const cell = document.createElement('div')
      cell.dataset.key = String(key)
      cell.textContent = key.toString(16).toUpperCase()
      pad.appendChild(cell)
    }
  }
}

// Integer scale (CSS only; the canvas stays 64x32)
const applyScale = (): void => {
  if (!canvas) return
  const baseW = 64, baseH = 32
  const n = Math.max(1, Math.min(16, parseInt(scaleSelect?.value || '10', 10)))
  canvas.style.width = `${baseW * n}px`
  canvas.style.height = `${baseH * n}px`
}

scaleSelect?.addEventListener('change', applyScale)
applyScale()
