#!/usr/bin/env tsx
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8System } from '@core/system/system'
import { readByte } from '@core/bus/memory'
import { disasmAt, formatTraceLine } from '@utils/disasm'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let regs = (getEnv('TRACE_REGS') || '0') === '1'
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--regs') regs = true
    else if (!a.startsWith('-')) rom = a
  }
  if (!Number.isFinite(max) || max <= 0) max = 1000
  return { rom, max, regs }
}

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, '0') }

async function main() {
  const args = parseArgs()
  if (!args.rom) { console.error('Usage: tsx scripts/trace-rom.ts <rom> [--max=N] [--regs]'); process.exit(2) }
  if (!fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom}`); process.exit(2) }
  // One instruction per frame so --max is exact; timers tick every frame as usual
  const sys = new Chip8System(new Uint8Array(fs.readFileSync(args.rom)), { instructionsPerFrame: 1 })
  sys.cpu.setTraceHook((pc) => {
    const s = sys.state
    const d = disasmAt((a) => readByte(s.memory, a), pc)
    let line = formatTraceLine(pc, d)
    if (args.regs) line = `${line.padEnd(32)} ${Array.from(s.v, hex2).join(' ')} I=${s.i.toString(16).toUpperCase().padStart(3, '0')} SP=${s.sp}`
    console.log(line)
  })
  let n = 0
  while (n < args.max && sys.state.runState === 'running') {
    n += sys.runFrame().executed
  }
  for (const d of sys.getDiagnostics()) console.warn(`[trace] ${d.message}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
