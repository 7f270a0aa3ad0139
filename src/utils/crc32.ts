// CRC-32 (IEEE, reflected) for display-buffer fingerprints in harness runs and tests
const POLY = 0xEDB88320;

const TABLE: Uint32Array = (() => {
  const t = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) c = (c >>> 1) ^ (c & 1 ? POLY : 0);
    t[n] = c >>> 0;
  }
  return t;
})();

// Feed more bytes into a running (non-finalised) CRC
export function crc32Update(state: number, bytes: ArrayLike<number>): number {
  let crc = state >>> 0;
  for (let i = 0; i < bytes.length; i++) crc = TABLE[(crc ^ bytes[i]) & 0xFF] ^ (crc >>> 8);
  return crc >>> 0;
}

export function crc32(bytes: ArrayLike<number>): number {
  return (crc32Update(0xFFFFFFFF, bytes) ^ 0xFFFFFFFF) >>> 0;
}

// Pack a 0/1-per-pixel buffer into bits (MSB first) and hash it
export function frameCrc(pixels: Uint8Array): number {
  const packed = new Uint8Array(Math.ceil(pixels.length / 8));
  for (let i = 0; i < pixels.length; i++) {
    if (pixels[i]) packed[i >> 3] |= 0x80 >> (i & 7);
  }
  return crc32(packed);
}
