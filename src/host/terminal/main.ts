#!/usr/bin/env node
/* eslint-disable no-console */
import fs from 'node:fs'
import { Chip8System } from '@core/system/system'
import { parseArgs, USAGE } from './args'
import { Driver } from './driver'
import { KeyboardInput } from './input'
import { TerminalScreen } from './renderer'
import { Beeper } from './beeper'
import pkg from '../../../package.json'

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), process.env)
  switch (parsed.kind) {
    case 'help':
      process.stdout.write(USAGE)
      return 0
    case 'version':
      console.log(`${pkg.name} ${pkg.version}`)
      return 0
    case 'error':
      console.error(`chip8: ${parsed.message}\n`)
      process.stderr.write(USAGE)
      return 2
  }

  const { config } = parsed
  if (!fs.existsSync(config.romPath)) {
    console.error(`ROM not found: ${config.romPath}`)
    return 2
  }
  // The terminal draws overlay text with its own font; the path is only checked
  if (!fs.existsSync(config.fontPath)) {
    console.warn(`[chip8] font ${config.fontPath} not found, overlay uses the terminal font`)
  }

  let sys: Chip8System
  try {
    const rom = new Uint8Array(fs.readFileSync(config.romPath))
    sys = new Chip8System(rom, { wrappingEnabled: config.wrappingEnabled, fontPath: config.fontPath })
  } catch (e) {
    console.error(`cannot load ${config.romPath}: ${e instanceof Error ? e.message : String(e)}`)
    return 2
  }
  const screen = new TerminalScreen(process.stdout)
  const driver = new Driver(sys, screen, { hz: config.hz, beeper: new Beeper(process.stdout) })
  const input = new KeyboardInput({
    onKey: (index, down) => sys.setKeyPressed(index, down),
    onControl: (c) => driver.control(c),
  })

  input.attach(process.stdin)
  driver.start()
  const reason = await driver.done
  input.detach()
  screen.close()

  const fault = sys.getFault()
  if (reason === 'fault' && fault) {
    console.error(`[chip8] ${fault.message}`)
    return 1
  }
  console.log('[chip8] terminating VM...')
  return 0
}

main()
  .then((code) => { process.exitCode = code })
  .catch((e) => { console.error(e); process.exitCode = 1 })
