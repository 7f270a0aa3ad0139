import readline from 'node:readline'
import { mapKey, type Control, type KeyPress } from './keymap'

// Terminals only report presses (and auto-repeat), never releases. The first press has to
// outlast the auto-repeat delay (250-500ms on common terminals) or a held key flickers
// before repeats start; once repeating, events arrive every 30-50ms.
export const KEY_INITIAL_HOLD_MS = 550
export const KEY_REPEAT_HOLD_MS = 120

export interface KeyboardInputOptions {
  onKey: (index: number, down: boolean) => void
  onControl: (control: Control) => void
  initialHoldMs?: number
  repeatHoldMs?: number
}

export class KeyboardInput {
  private readonly initialHoldMs: number
  private readonly repeatHoldMs: number
  private releaseTimers = new Map<number, ReturnType<typeof setTimeout>>()
  private stream: NodeJS.ReadStream | null = null

  constructor(private readonly opts: KeyboardInputOptions) {
    this.initialHoldMs = opts.initialHoldMs ?? KEY_INITIAL_HOLD_MS
    this.repeatHoldMs = opts.repeatHoldMs ?? KEY_REPEAT_HOLD_MS
  }

  attach(stream: NodeJS.ReadStream): void {
    readline.emitKeypressEvents(stream)
    if (stream.isTTY) stream.setRawMode(true)
    stream.on('keypress', this.onKeypress)
    stream.resume()
    this.stream = stream
  }

  detach(): void {
    for (const [index, t] of this.releaseTimers) {
      clearTimeout(t)
      this.opts.onKey(index, false)
    }
    this.releaseTimers.clear()
    const stream = this.stream
    if (!stream) return
    stream.off('keypress', this.onKeypress)
    if (stream.isTTY) stream.setRawMode(false)
    stream.pause()
    this.stream = null
  }

  // A press holds the key for initialHoldMs; each repeat after it for repeatHoldMs
  handle(key: KeyPress): void {
    const action = mapKey(key)
    if (!action) return
    if (action.kind === 'control') {
      this.opts.onControl(action.control)
      return
    }
    const { index } = action
    const pending = this.releaseTimers.get(index)
    if (pending) clearTimeout(pending)
    else this.opts.onKey(index, true)
    this.releaseTimers.set(index, setTimeout(() => {
      this.releaseTimers.delete(index)
      this.opts.onKey(index, false)
    }, pending ? this.repeatHoldMs : this.initialHoldMs))
  }

  private onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (key) this.handle(key)
  }
}
