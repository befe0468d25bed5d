#!/usr/bin/env tsx
/*
  Render the beeper of a CHIP-8 program to WAV (PCM16LE mono) by running it headless.
  Usage:
    npm run dump:wav -- <rom_path> [--seconds 10] [--out out.wav]
*/
import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { basename, dirname, resolve } from 'node:path'
import { Chip8System } from '@core/system/system'
import { TIMER_HZ } from '@core/timers/timers'
import { DEFAULT_TONE, SquareTone } from '@host/tone'
import { encodeWavPCM16 } from '@host/wav'

interface CliOptions { romPath: string; seconds: number; outPath: string }

const parseArgs = (): CliOptions => {
  const argv = process.argv.slice(2)
  if (argv.length === 0) {
    console.error('Usage: dump-wav <rom_path> [--seconds 10] [--out out.wav]')
    process.exit(1)
  }
  let romPath = ''
  let seconds = 10
  let outPath = ''
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    if (a === '--seconds' || a === '-s') { seconds = Math.max(1, Number(argv[++i] || 10)) }
    else if (a === '--out' || a === '-o') { outPath = String(argv[++i] || '') }
    else if (a.startsWith('-')) { /* skip unknown flag */ }
    else { romPath = a }
  }
  if (!romPath) { console.error('Missing rom_path'); process.exit(1) }
  if (!outPath) {
    const base = basename(romPath).replace(/\.[^.]+$/, '')
    outPath = resolve(`out/${base}_${DEFAULT_TONE.sampleRate}Hz_${seconds}s.wav`)
  } else {
    outPath = resolve(outPath)
  }
  return { romPath, seconds, outPath }
}

const main = async (): Promise<void> => {
  const opts = parseArgs()
  const sys = new Chip8System(new Uint8Array(await readFile(resolve(opts.romPath))))
  const tone = new SquareTone()
  const samplesPerFrame = tone.sampleRate / TIMER_HZ
  const frames = Math.round(opts.seconds * TIMER_HZ)
  const pcm = new Int16Array(Math.ceil(frames * samplesPerFrame))
  let cursor = 0
  let target = 0
  for (let f = 0; f < frames; f++) {
    const { tone: active } = sys.runFrame()
    target += samplesPerFrame
    const end = Math.min(pcm.length, Math.round(target))
    tone.fill(pcm.subarray(cursor, end), active)
    cursor = end
  }
  await mkdir(dirname(opts.outPath), { recursive: true })
  await writeFile(opts.outPath, encodeWavPCM16(pcm.subarray(0, cursor), tone.sampleRate, 1))
  console.log(`WAV written: ${opts.outPath}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
