// Delay/sound timer pair shared between the CPU and the 60Hz timer.
// Backed by a SharedArrayBuffer so the same cell can be handed to a worker thread;
// every access goes through Atomics.

export const T = {
  Delay: 0,
  Sound: 1,
} as const

const CELL_INT32_COUNT = 2

export interface TimerValues { delay: number; sound: number }

export class TimerCell {
  readonly sab: SharedArrayBuffer
  private readonly cells: Int32Array

  // Pass an existing buffer to attach to a cell created elsewhere
  constructor(sab?: SharedArrayBuffer) {
    this.sab = sab ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT * CELL_INT32_COUNT)
    this.cells = new Int32Array(this.sab, 0, CELL_INT32_COUNT)
  }

  getDelay = (): number => Atomics.load(this.cells, T.Delay)
  getSound = (): number => Atomics.load(this.cells, T.Sound)
  setDelay = (v: number): void => { Atomics.store(this.cells, T.Delay, v & 0xFF) }
  setSound = (v: number): void => { Atomics.store(this.cells, T.Sound, v & 0xFF) }

  read = (): TimerValues => ({ delay: this.getDelay(), sound: this.getSound() })

  // One 60Hz tick: each non-zero timer drops by one. CAS so a concurrent set is never lost.
  decrement = (): TimerValues => ({ delay: this.decrementAt(T.Delay), sound: this.decrementAt(T.Sound) })

  reset = (): void => {
    Atomics.store(this.cells, T.Delay, 0)
    Atomics.store(this.cells, T.Sound, 0)
  }

  private decrementAt(idx: number): number {
    for (;;) {
      const cur = Atomics.load(this.cells, idx)
      if (cur <= 0) return 0
      if (Atomics.compareExchange(this.cells, idx, cur, cur - 1) === cur) return cur - 1
    }
  }
}
