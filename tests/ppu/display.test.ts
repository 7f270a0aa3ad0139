import { describe, it, expect } from 'vitest';
import { Display, SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/ppu/display';

const litCount = (d: Display) => d.getFrameBuffer().reduce((n, p) => n + p, 0);

describe('Display sprite drawing', () => {
  it('draws MSB first and reports no collision on a blank screen', () => {
    const d = new Display();
    const r = d.drawSprite(10, 5, [0x81]);
    expect(r).toEqual({ collision: false, changed: true });
    expect(d.getPixel(10, 5)).toBe(true);
    expect(d.getPixel(17, 5)).toBe(true);
    expect(d.getPixel(11, 5)).toBe(false);
    expect(d.isDirty()).toBe(true);
  });

  it('XOR drawing twice restores the buffer and collides', () => {
    const d = new Display();
    d.drawSprite(3, 3, [0x3C, 0x42]);
    const r = d.drawSprite(3, 3, [0x3C, 0x42]);
    expect(r.collision).toBe(true);
    expect(litCount(d)).toBe(0);
  });

  it('a partial overlap collides only on the shared pixel', () => {
    const d = new Display();
    d.drawSprite(0, 0, [0x80]);
    expect(d.drawSprite(0, 0, [0xC0]).collision).toBe(true);
    expect(d.getPixel(0, 0)).toBe(false);
    expect(d.getPixel(1, 0)).toBe(true);
  });

  it('clips at the right edge when wrapping is off', () => {
    const d = new Display({ wrapping: false });
    d.drawSprite(SCREEN_WIDTH - 1, 0, [0xFF]);
    expect(d.getPixel(63, 0)).toBe(true);
    expect(d.getPixel(0, 0)).toBe(false);
    expect(litCount(d)).toBe(1);
  });

  it('wraps overflow columns to x = 0 when wrapping is on', () => {
    const d = new Display({ wrapping: true });
    d.drawSprite(SCREEN_WIDTH - 1, 0, [0xFF]);
    expect(d.getPixel(63, 0)).toBe(true);
    for (let x = 0; x < 7; x++) expect(d.getPixel(x, 0)).toBe(true);
    expect(d.getPixel(7, 0)).toBe(false);
  });

  it('wraps or clips vertically', () => {
    const wrap = new Display({ wrapping: true });
    wrap.drawSprite(0, SCREEN_HEIGHT - 1, [0x80, 0x80]);
    expect(wrap.getPixel(0, 31)).toBe(true);
    expect(wrap.getPixel(0, 0)).toBe(true);
    const clip = new Display({ wrapping: false });
    clip.drawSprite(0, SCREEN_HEIGHT - 1, [0x80, 0x80]);
    expect(clip.getPixel(0, 0)).toBe(false);
  });

  it('a sprite starting off-screen is dropped when clipping and wrapped otherwise', () => {
    const clip = new Display({ wrapping: false });
    expect(clip.drawSprite(70, 0, [0xFF])).toEqual({ collision: false, changed: false });
    expect(clip.isDirty()).toBe(false);
    const wrap = new Display({ wrapping: true });
    wrap.drawSprite(70, 0, [0x80]);
    expect(wrap.getPixel(6, 0)).toBe(true);
  });
});

describe('Display buffer access', () => {
  it('clear reports whether anything was lit', () => {
    const d = new Display();
    expect(d.clear()).toBe(false);
    expect(d.isDirty()).toBe(false);
    d.drawSprite(0, 0, [0x80]);
    d.clearDirty();
    expect(d.clear()).toBe(true);
    expect(d.isDirty()).toBe(true);
    expect(litCount(d)).toBe(0);
  });

  it('snapshot is rows of columns', () => {
    const d = new Display();
    d.drawSprite(5, 2, [0x80]);
    const grid = d.snapshot();
    expect(grid.length).toBe(SCREEN_HEIGHT);
    expect(grid[0].length).toBe(SCREEN_WIDTH);
    expect(grid[2][5]).toBe(true);
    expect(grid[5][2]).toBe(false);
  });

  it('frame buffer is a copy', () => {
    const d = new Display();
    const fb = d.getFrameBuffer();
    fb[0] = 1;
    expect(d.getPixel(0, 0)).toBe(false);
  });

  it('out-of-range reads are unlit', () => {
    expect(new Display().getPixel(64, 0)).toBe(false);
    expect(new Display().getPixel(-1, 0)).toBe(false);
  });
});
