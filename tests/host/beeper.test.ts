import { describe, it, expect } from 'vitest'
import { Beeper } from '@host/terminal/beeper'

describe('Beeper', () => {
  it('rings once per rising edge of the sound timer', () => {
    const written: string[] = []
    const b = new Beeper({ write: (c) => { written.push(c); return true } })
    b.update(true)
    b.update(true)
    expect(b.isBeeping()).toBe(true)
    b.update(false)
    expect(b.isBeeping()).toBe(false)
    b.update(true)
    expect(b.getRingCount()).toBe(2)
    expect(written).toEqual(['\x07', '\x07'])
  })
})
