import type { Byte, Word } from '@core/cpu/types';
import { MemoryAccessError, RomTooLargeError } from '@core/cpu/errors';
import font from './font.json';

export const MEMORY_SIZE = 0x1000; // 4KB
export const PROGRAM_START = 0x200; // $000-$1FF reserved for the interpreter
export const FONT_START = 0x000;
export const FONT_GLYPH_HEIGHT: number = font.glyphHeight;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START;

export interface BusDevice {
  read(addr: Word): Byte;
  write(addr: Word, value: Byte): void;
}

// Flat 4KB address space. Accesses outside $000-$FFF throw instead of wrapping.
export class Memory implements BusDevice {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.loadFont();
  }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr);
    this.ram[addr] = value & 0xFF;
  }

  // Big-endian 16-bit read used for opcode fetch
  readWord(addr: Word): Word {
    return (this.read(addr) << 8) | this.read(addr + 1);
  }

  loadRom(rom: Uint8Array): void {
    if (rom.length > PROGRAM_CAPACITY) throw new RomTooLargeError(rom.length, PROGRAM_CAPACITY);
    this.ram.fill(0, PROGRAM_START);
    this.ram.set(rom, PROGRAM_START);
  }

  // Address of the 5-byte glyph for hex digit 0..F
  static glyphAddress(digit: number): Word {
    return FONT_START + (digit & 0xF) * FONT_GLYPH_HEIGHT;
  }

  // Copy of a memory range, for tools and tests
  dump(start: Word, length: number): Uint8Array {
    this.check(start);
    if (length > 0) this.check(start + length - 1);
    return this.ram.slice(start, start + length);
  }

  reset(): void {
    this.ram.fill(0);
    this.loadFont();
  }

  private loadFont(): void {
    let addr = FONT_START;
    for (const glyph of font.glyphs) {
      this.ram.set(glyph, addr);
      addr += FONT_GLYPH_HEIGHT;
    }
  }

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new MemoryAccessError(addr);
  }
}
