/* eslint-disable no-console */
import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { runRom } from '@core/harness/headless'
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/ppu/display'

const ON: [number, number, number] = [0xE0, 0xF8, 0xD0]
const OFF: [number, number, number] = [0x08, 0x18, 0x20]

export const writePngScaled = async (outPath: string, fb: Uint8Array, w = SCREEN_WIDTH, h = SCREEN_HEIGHT, scale = 8): Promise<void> => {
  const W = w * scale, H = h * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const [r, g, b] = fb[y * w + x] ? ON : OFF
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = ((oy + (x * scale + dx)) << 2)
          png.data[o + 0] = r
          png.data[o + 1] = g
          png.data[o + 2] = b
          png.data[o + 3] = 255
        }
      }
    }
  }
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}

async function main() {
  const argv = process.argv.slice(2)
  let rom = process.env.CHIP8_ROM || ''
  let out = 'screenshots/chip8.png'
  let steps = 5000
  let wrap = process.env.CHIP8_WRAP === '1'
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6)
    else if (a.startsWith('--out=')) out = a.slice(6)
    else if (a.startsWith('--steps=')) steps = parseInt(a.slice(8), 10)
    else if (a === '--wrap') wrap = true
  }
  if (!rom || !fs.existsSync(rom)) { console.error(`ROM not found: ${rom || '(none, pass --rom=)'}`); process.exit(2) }

  // Fixed random source so repeated screenshots of the same ROM match
  let seed = 1
  const random = () => { seed = (seed * 1103515245 + 12345) & 0x7FFFFFFF; return seed / 0x80000000 }
  const res = runRom(new Uint8Array(fs.readFileSync(rom)), { maxSteps: steps, wrappingEnabled: wrap, random })
  await writePngScaled(out, res.frameBuffer)
  console.log(JSON.stringify({ rom, out, steps: res.steps, reason: res.reason, crc: res.displayCrc.toString(16).padStart(8, '0') }))
  if (res.reason === 'fail') { console.error(res.message); process.exitCode = 1 }
}

main().catch((e) => { console.error(e); process.exit(1) })
