import type { Chip8System } from '@core/system/system'
import type { Control } from './keymap'
import { captureView, type Screen } from './renderer'
import type { Beeper } from './beeper'

export const DEFAULT_HZ = 550
export const MIN_HZ = 50
export const MAX_HZ = 5000
export const HZ_STEP = 50
export const FRAME_HZ = 60
// Overlay refresh while the screen itself is unchanged (every Nth frame)
const OVERLAY_EVERY = 6

export type ExitReason = 'quit' | 'fault'

export interface DriverOptions {
  hz?: number
  beeper?: Beeper
}

/**
 * Main execution path: steps the CPU at a user-adjustable rate, presents frames at 60Hz.
 * The step rate never affects the 60Hz timers, which run on their own interval.
 */
export class Driver {
  readonly done: Promise<ExitReason>
  private hz: number
  private paused = false
  private carry = 0
  private frame = 0
  private statusChanged = true
  private handle: ReturnType<typeof setInterval> | null = null
  private finished = false
  private resolveDone: (r: ExitReason) => void = () => {}
  private readonly beeper: Beeper | null

  constructor(private readonly sys: Chip8System, private readonly screen: Screen, opts: DriverOptions = {}) {
    this.hz = clampHz(opts.hz ?? DEFAULT_HZ)
    this.beeper = opts.beeper ?? null
    this.done = new Promise<ExitReason>((resolve) => { this.resolveDone = resolve })
  }

  getHz(): number { return this.hz }
  isPaused(): boolean { return this.paused }

  start(): void {
    if (this.handle || this.finished) return
    this.sys.startTimers()
    this.present()
    this.handle = setInterval(() => this.runFrame(), 1000 / FRAME_HZ)
  }

  // One presentation frame: hz/60 steps (fractional remainder carried over), then draw if needed
  runFrame(): void {
    if (this.finished) return
    if (!this.paused) {
      this.carry += this.hz / FRAME_HZ
      const steps = Math.floor(this.carry)
      this.carry -= steps
      for (let n = 0; n < steps; n++) {
        const r = this.sys.step()
        if (r.fatal || r.halted) {
          this.present()
          this.finish(r.fatal ? 'fault' : 'quit')
          return
        }
      }
    }
    this.beeper?.update(!this.paused && this.sys.isSoundActive())
    this.frame++
    const overlayDue = !this.paused && this.frame % OVERLAY_EVERY === 0
    if (this.sys.display.isDirty() || this.statusChanged || overlayDue) this.present()
  }

  control(c: Control): void {
    switch (c) {
      case 'quit': this.stop(); break
      case 'pause': this.togglePause(); break
      case 'faster': this.setHz(this.hz + HZ_STEP); break
      case 'slower': this.setHz(this.hz - HZ_STEP); break
    }
  }

  togglePause(): void {
    this.paused = !this.paused
    this.statusChanged = true
  }

  setHz(hz: number): void {
    const next = clampHz(hz)
    if (next !== this.hz) this.statusChanged = true
    this.hz = next
  }

  stop(): void {
    if (this.finished) return
    this.sys.stop()
    this.finish('quit')
  }

  private present(): void {
    this.screen.present(captureView(this.sys, { paused: this.paused, hz: this.hz }))
    this.sys.display.clearDirty()
    this.statusChanged = false
  }

  private finish(reason: ExitReason): void {
    this.finished = true
    if (this.handle) clearInterval(this.handle)
    this.handle = null
    this.beeper?.update(false)
    this.resolveDone(reason)
  }
}

export const clampHz = (hz: number): number => Math.min(MAX_HZ, Math.max(MIN_HZ, Math.round(hz)))
