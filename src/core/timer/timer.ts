import { TimerCell } from './timer_cell'

export const TIMER_HZ = 60

// Periods behind the clock after which pacing restarts from now
const STALL_PERIODS = 3

export interface TimerOptions {
  hz?: number
  // Monotonic millisecond clock used to pace ticks; defaults to performance.now
  now?: () => number
}

/**
 * Free-running countdown for the delay and sound timers.
 * Runs on its own interval, independent of how fast the CPU is stepped. A pump decrements at
 * most once, and only when a full period has passed on the clock. After a stall the missed
 * ticks are dropped and pacing restarts from the current time, so a stall never turns into a
 * burst of decrements.
 */
export class Timer {
  private readonly hz: number
  private readonly now: () => number
  private handle: ReturnType<typeof setInterval> | null = null
  private readonly period: number
  private lastTickAt = 0
  private ticks = 0
  private failures = 0

  constructor(private readonly cell: TimerCell, opts: TimerOptions = {}) {
    this.hz = opts.hz ?? TIMER_HZ
    this.now = opts.now ?? (() => performance.now())
    this.period = 1000 / this.hz
  }

  start(): void {
    if (this.handle) return
    this.lastTickAt = this.now()
    this.ticks = 0
    this.handle = setInterval(this.pump, this.period)
  }

  stop(): void {
    if (!this.handle) return
    clearInterval(this.handle)
    this.handle = null
  }

  isRunning(): boolean { return this.handle !== null }

  // Single 60Hz decrement; public so headless runs can drive time synchronously
  tick(): void {
    this.cell.decrement()
  }

  isSoundActive(): boolean { return this.cell.getSound() > 0 }

  // Count of ticks that threw; timing degrades but the VM keeps running
  getFailureCount(): number { return this.failures }

  private pump = (): void => {
    const now = this.now()
    const elapsed = now - this.lastTickAt
    if (elapsed < this.period) return
    // Interval jitter stays well under STALL_PERIODS; further behind, the missed ticks are dropped
    this.lastTickAt = elapsed >= STALL_PERIODS * this.period ? now : this.lastTickAt + this.period
    this.ticks++
    try {
      this.tick()
    } catch (e) {
      this.failures++
      // eslint-disable-next-line no-console
      console.warn(`[timer] tick ${this.ticks} failed: ${e instanceof Error ? e.message : String(e)}`)
    }
  }
}
