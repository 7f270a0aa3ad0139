export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export type PixelResult = 'clipped' | 'set' | 'erased';

export interface SpriteResult {
  collision: boolean;
  changed: boolean;
}

export interface DisplayOptions {
  // true: coordinates wrap modulo the screen size; false: off-screen pixels are clipped
  wrapping: boolean;
}

// Monochrome frame buffer. Pixels are 0/1, row-major.
export class Display {
  readonly width = SCREEN_WIDTH;
  readonly height = SCREEN_HEIGHT;
  private readonly wrapping: boolean;
  private pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private dirty = false;

  constructor(opts: DisplayOptions = { wrapping: false }) {
    this.wrapping = opts.wrapping;
  }

  isWrapping(): boolean { return this.wrapping; }

  // Returns true if anything was lit before the clear
  clear(): boolean {
    const changed = this.pixels.some((p) => p !== 0);
    if (changed) this.dirty = true;
    this.pixels.fill(0);
    return changed;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) return false;
    return this.pixels[y * SCREEN_WIDTH + x] !== 0;
  }

  // XOR one lit sprite pixel onto the buffer
  xorPixel(x: number, y: number): PixelResult {
    let px = x, py = y;
    if (this.wrapping) {
      px = x % SCREEN_WIDTH;
      py = y % SCREEN_HEIGHT;
    } else if (x >= SCREEN_WIDTH || y >= SCREEN_HEIGHT) {
      return 'clipped';
    }
    const idx = py * SCREEN_WIDTH + px;
    const was = this.pixels[idx];
    this.pixels[idx] = was ^ 1;
    this.dirty = true;
    return was === 1 ? 'erased' : 'set';
  }

  /**
   * Draw an 8-pixel-wide sprite, one byte per row, MSB leftmost.
   * `collision` is true if any lit pixel was erased.
   */
  drawSprite(x: number, y: number, rows: ArrayLike<number>): SpriteResult {
    let collision = false;
    let changed = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xFF;
      if (bits === 0) continue;
      for (let col = 0; col < 8; col++) {
        if (((bits >> (7 - col)) & 1) === 0) continue;
        const r = this.xorPixel(x + col, y + row);
        if (r === 'clipped') continue;
        changed = true;
        if (r === 'erased') collision = true;
      }
    }
    return { collision, changed };
  }

  isDirty(): boolean { return this.dirty; }
  clearDirty(): void { this.dirty = false; }

  // Raw 0/1 bytes, row-major. Returned array is a copy.
  getFrameBuffer(): Uint8Array { return this.pixels.slice(); }

  snapshot(): boolean[][] {
    const rows: boolean[][] = [];
    for (let y = 0; y < SCREEN_HEIGHT; y++) {
      const row: boolean[] = new Array(SCREEN_WIDTH);
      for (let x = 0; x < SCREEN_WIDTH; x++) row[x] = this.pixels[y * SCREEN_WIDTH + x] !== 0;
      rows.push(row);
    }
    return rows;
  }

  reset(): void {
    this.pixels.fill(0);
    this.dirty = false;
  }
}
