import type { Word } from '@core/cpu/types'
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/ppu/display'
import { disasm, formatDisasm } from '@utils/disasm_chip8'
import type { Chip8System } from '@core/system/system'

// Everything one presented frame shows: the screen plus the debug overlay
export interface FrameView {
  pixels: Uint8Array // 0/1, row-major, SCREEN_WIDTH x SCREEN_HEIGHT
  v: ArrayLike<number>
  i: Word
  pc: Word
  sp: number
  delay: number
  sound: number
  keys: number // bit k set while key k is down
  stack: Word[] // innermost first
  history: Word[] // newest first
  paused: boolean
  hz: number
}

export const captureView = (sys: Chip8System, status: { paused: boolean; hz: number }): FrameView => {
  const s = sys.cpu.state
  return {
    pixels: sys.getFrameBuffer(),
    v: s.v.slice(),
    i: s.i,
    pc: s.pc,
    sp: s.sp,
    delay: sys.timers.getDelay(),
    sound: sys.timers.getSound(),
    keys: sys.keypad.read(),
    stack: sys.cpu.getStack(),
    history: sys.cpu.getHistory(),
    paused: status.paused,
    hz: status.hz,
  }
}

const h2 = (v: number) => (v & 0xFF).toString(16).toUpperCase().padStart(2, '0')
const h4 = (v: number) => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0')

// Two pixel rows per text line
const cell = (top: boolean, bottom: boolean): string => {
  if (top && bottom) return '█'
  if (top) return '▀'
  if (bottom) return '▄'
  return ' '
}

export const overlayLines = (view: FrameView): string[] => {
  const regs = Array.from(view.v, h2)
  const lines = [
    `PC ${h4(view.pc)}  I ${h4(view.i)}  SP ${view.sp}`,
    `V0-V7 ${regs.slice(0, 8).join(' ')}`,
    `V8-VF ${regs.slice(8, 16).join(' ')}`,
    `DT ${h2(view.delay)}  ST ${h2(view.sound)}  KEYS ${h4(view.keys)}`,
    `STACK ${view.stack.length ? view.stack.map(h4).join(' ') : '-'}`,
    `${view.paused ? 'PAUSED' : 'RUNNING'} ${view.hz}Hz`,
  ]
  for (const op of view.history) lines.push(`${h4(op)}  ${formatDisasm(disasm(op))}`)
  return lines
}

// Screen on the left, overlay on the right. Plain text, no escape codes.
export const renderLines = (view: FrameView): string[] => {
  const panel = overlayLines(view)
  const screenRows = SCREEN_HEIGHT / 2
  const out: string[] = []
  const px = (x: number, y: number) => view.pixels[y * SCREEN_WIDTH + x] !== 0
  for (let row = 0; row < Math.max(screenRows, panel.length); row++) {
    let line = ''
    if (row < screenRows) {
      for (let x = 0; x < SCREEN_WIDTH; x++) line += cell(px(x, row * 2), px(x, row * 2 + 1))
    } else {
      line = ' '.repeat(SCREEN_WIDTH)
    }
    const info = panel[row]
    out.push(info === undefined ? line : `${line} │ ${info}`)
  }
  return out
}

export interface Screen {
  present(view: FrameView): void
  close(): void
}

export interface TextOutput {
  write(chunk: string): boolean
}

const CSI = '\x1b['

// ANSI terminal screen: cursor home, overwrite each line, clear to end of line
export class TerminalScreen implements Screen {
  private opened = false

  constructor(private readonly out: TextOutput) {}

  present(view: FrameView): void {
    if (!this.opened) {
      this.out.write(`${CSI}?25l${CSI}2J`)
      this.opened = true
    }
    this.out.write(`${CSI}H${renderLines(view).map((l) => `${l}${CSI}K`).join('\n')}\n`)
  }

  close(): void {
    if (this.opened) this.out.write(`${CSI}?25h`)
    this.opened = false
  }
}
