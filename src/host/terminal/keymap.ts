// QWERTY -> COSMAC VIP hex keypad
//   1 2 3 4      1 2 3 C
//   q w e r  ->  4 5 6 D
//   a s d f      7 8 9 E
//   z x c v      A 0 B F
export const KEYMAP: Readonly<Record<string, number>> = {
  '1': 0x1, '2': 0x2, '3': 0x3, '4': 0xC,
  q: 0x4, w: 0x5, e: 0x6, r: 0xD,
  a: 0x7, s: 0x8, d: 0x9, f: 0xE,
  z: 0xA, x: 0x0, c: 0xB, v: 0xF,
}

export type Control = 'quit' | 'pause' | 'faster' | 'slower'

export type KeyAction =
  | { kind: 'key'; index: number }
  | { kind: 'control'; control: Control }

// Subset of the key object node:readline emits with 'keypress'
export interface KeyPress {
  name?: string
  sequence?: string
  ctrl?: boolean
  meta?: boolean
}

export const mapKey = (key: KeyPress): KeyAction | null => {
  const name = key.name?.toLowerCase()
  if (!name) return null
  if (key.ctrl) return name === 'c' ? { kind: 'control', control: 'quit' } : null
  switch (name) {
    case 'escape': return { kind: 'control', control: 'quit' }
    case 'space': return { kind: 'control', control: 'pause' }
    case 'up': return { kind: 'control', control: 'faster' }
    case 'down': return { kind: 'control', control: 'slower' }
  }
  return Object.prototype.hasOwnProperty.call(KEYMAP, name) ? { kind: 'key', index: KEYMAP[name] } : null
}
