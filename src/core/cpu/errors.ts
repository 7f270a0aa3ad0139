import type { Word } from './types';

export type FaultKind =
  | 'decode_error'
  | 'stack_overflow'
  | 'stack_underflow'
  | 'memory_out_of_bounds';

const hex4 = (v: number): string => (v & 0xFFFF).toString(16).toUpperCase().padStart(4, '0');

// Fatal CPU condition. Thrown by the core, turned into a StepResult by the system.
export class Chip8Fault extends Error {
  readonly kind: FaultKind;
  readonly opcode: Word;
  readonly pc: Word;

  constructor(kind: FaultKind, pc: Word, opcode: Word, detail: string) {
    super(`${kind} at $${hex4(pc)} (opcode $${hex4(opcode)}): ${detail}`);
    this.name = 'Chip8Fault';
    this.kind = kind;
    this.pc = pc & 0xFFFF;
    this.opcode = opcode & 0xFFFF;
  }
}

export class RomTooLargeError extends Error {
  constructor(readonly size: number, readonly capacity: number) {
    super(`ROM is ${size} bytes, program space holds ${capacity}`);
    this.name = 'RomTooLargeError';
  }
}

// Raised by Memory; the CPU rethrows it as a memory_out_of_bounds fault with pc/opcode attached.
export class MemoryAccessError extends RangeError {
  constructor(readonly address: number) {
    super(`address $${hex4(address)} outside $0000-$0FFF`);
    this.name = 'MemoryAccessError';
  }
}
