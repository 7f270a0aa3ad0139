export const KEY_COUNT = 16;

// COSMAC VIP hex keypad: 16 keys, 0x0..0xF
//   1 2 3 C
//   4 5 6 D
//   7 8 9 E
//   A 0 B F
export class Keypad {
  private pressed: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  setKey(index: number, down: boolean): void {
    if (!Number.isInteger(index) || index < 0 || index >= KEY_COUNT) {
      throw new RangeError(`key index ${index} outside 0..15`);
    }
    this.pressed[index] = down;
  }

  // Out-of-range keys (a register holding 0x10+) read as not pressed
  isPressed(index: number): boolean {
    return index >= 0 && index < KEY_COUNT ? this.pressed[index] : false;
  }

  // Lowest pressed key, or null when none is down
  firstPressed(): number | null {
    const i = this.pressed.indexOf(true);
    return i >= 0 ? i : null;
  }

  // 16-bit mask, bit n = key n
  read(): number {
    let mask = 0;
    for (let i = 0; i < KEY_COUNT; i++) if (this.pressed[i]) mask |= 1 << i;
    return mask;
  }

  releaseAll(): void {
    this.pressed.fill(false);
  }
}
