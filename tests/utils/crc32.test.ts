import { describe, it, expect } from 'vitest';
import { crc32, crc32Update, frameCrc } from '@utils/crc32';

const ascii = (s: string) => Uint8Array.from(s, (c) => c.charCodeAt(0));

describe('crc32', () => {
  it('matches the IEEE check value', () => {
    expect(crc32(ascii('123456789'))).toBe(0xCBF43926);
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('can be fed in pieces', () => {
    const partial = crc32Update(0xFFFFFFFF, ascii('1234'));
    expect((crc32Update(partial, ascii('56789')) ^ 0xFFFFFFFF) >>> 0).toBe(0xCBF43926);
  });

  it('frameCrc packs pixels MSB first', () => {
    const pixels = new Uint8Array(16);
    pixels[0] = 1;
    pixels[9] = 1;
    expect(frameCrc(pixels)).toBe(crc32([0x80, 0x40]));
  });
});
