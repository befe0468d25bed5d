#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { runRom, type KeyEvent } from '@core/harness/headless'
import { encodePng } from '@host/png'

// Usage: tsx scripts/screenshot.ts <rom> [--frames=120] [--scale=12] [--out=screenshots/<rom>.png] [--key=frame:key:down,...]
function parseKeys(arg: string): KeyEvent[] {
  return arg.split(',').filter(Boolean).map((part) => {
    const [f, k, d] = part.split(':')
    return { frame: parseInt(f, 10), key: parseInt(k, 16), down: d !== '0' }
  })
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2)
  let romPath = process.env.SCREENSHOT_ROM || ''
  let frames = parseInt(process.env.SCREENSHOT_FRAMES || '120', 10)
  let scale = 12
  let outPath = ''
  let keys: KeyEvent[] = []
  for (const a of argv) {
    if (a.startsWith('--frames=')) frames = parseInt(a.slice(9), 10)
    else if (a.startsWith('--scale=')) scale = Math.max(1, parseInt(a.slice(8), 10) || 12)
    else if (a.startsWith('--out=')) outPath = a.slice(6)
    else if (a.startsWith('--key=')) keys = parseKeys(a.slice(6))
    else if (!a.startsWith('-')) romPath = a
  }
  if (!romPath || !fs.existsSync(romPath)) { console.error(`ROM not found: ${romPath || '(none)'}`); process.exit(2) }
  const rom = new Uint8Array(fs.readFileSync(romPath))
  const result = runRom(rom, { frames, keys })
  console.log(`[harness] frames=${result.frames} instructions=${result.instructions} crc=0x${result.framebufferCrc.toString(16).padStart(8, '0')}`)

  const out = path.resolve(outPath || `screenshots/${path.basename(romPath).replace(/\.[^.]+$/, '')}.png`)
  fs.mkdirSync(path.dirname(out), { recursive: true })
  fs.writeFileSync(out, encodePng(result.framebuffer, result.width, result.height, scale))
  console.log('PNG written:', out)
}

main().catch((e) => { console.error(e); process.exit(1) })
