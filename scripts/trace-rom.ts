#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8System } from '@core/system/system'
import { formatTraceLine } from '@utils/disasm_chip8'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('CHIP8_ROM') || ''
  let max = parseInt(getEnv('TRACE_MAX') || '1000', 10)
  let wrap = getEnv('CHIP8_WRAP') === '1'
  let registers = false
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--max=')) max = parseInt(a.slice(6), 10)
    else if (a === '--wrap') wrap = true
    else if (a === '--registers') registers = true
  }
  if (!Number.isFinite(max) || max <= 0) max = 1000
  return { rom, max, wrap, registers }
}

function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, '0') }

async function main() {
  const args = parseArgs()
  if (!args.rom || !fs.existsSync(args.rom)) { console.error(`ROM not found: ${args.rom || '(none, pass --rom=)'}`); process.exit(2) }
  const sys = new Chip8System(new Uint8Array(fs.readFileSync(args.rom)), { wrappingEnabled: args.wrap })
  const mem = sys.memory
  const cpu = sys.cpu

  for (let n = 0; n < args.max; n++) {
    const pc = cpu.state.pc
    const line = pc + 1 < 0x1000 ? formatTraceLine(pc, mem.readWord(pc)) : `$${pc.toString(16).toUpperCase()}  ????`
    console.log(args.registers ? `${line.padEnd(32)} V:${Array.from(cpu.state.v, hex2).join('')} I:${hex2(cpu.state.i >> 8)}${hex2(cpu.state.i)}` : line)
    const r = sys.step()
    if (r.fatal) { process.exitCode = 1; break }
    // Timers advance once per 9 steps, about 540Hz against 60Hz
    if (n % 9 === 8) sys.timer.tick()
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
