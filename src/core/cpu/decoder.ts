import type { Byte, Word } from './types';

type XY = { x: number; y: number };

// One variant per CHIP-8 instruction; operand fields as extracted from the opcode.
export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'JP'; nnn: Word }
  | { op: 'CALL'; nnn: Word }
  | { op: 'SE_VX_NN'; x: number; nn: Byte }
  | { op: 'SNE_VX_NN'; x: number; nn: Byte }
  | ({ op: 'SE_VX_VY' } & XY)
  | { op: 'LD_VX_NN'; x: number; nn: Byte }
  | { op: 'ADD_VX_NN'; x: number; nn: Byte }
  | ({ op: 'LD_VX_VY' } & XY)
  | ({ op: 'OR' } & XY)
  | ({ op: 'AND' } & XY)
  | ({ op: 'XOR' } & XY)
  | ({ op: 'ADD_VX_VY' } & XY)
  | ({ op: 'SUB_VX_VY' } & XY)
  | ({ op: 'SHR' } & XY)
  | ({ op: 'SUBN' } & XY)
  | ({ op: 'SHL' } & XY)
  | ({ op: 'SNE_VX_VY' } & XY)
  | { op: 'LD_I'; nnn: Word }
  | { op: 'JP_V0'; nnn: Word }
  | { op: 'RND'; x: number; nn: Byte }
  | ({ op: 'DRW'; n: number } & XY)
  | { op: 'SKP'; x: number }
  | { op: 'SKNP'; x: number }
  | { op: 'LD_VX_DT'; x: number }
  | { op: 'LD_VX_K'; x: number }
  | { op: 'LD_DT_VX'; x: number }
  | { op: 'LD_ST_VX'; x: number }
  | { op: 'ADD_I_VX'; x: number }
  | { op: 'LD_F_VX'; x: number }
  | { op: 'LD_B_VX'; x: number }
  | { op: 'LD_MEM_VX'; x: number }
  | { op: 'LD_VX_MEM'; x: number };

/**
 * Decode a 16-bit opcode. Returns null for bit patterns that are not CHIP-8 instructions
 * (including 0NNN machine-code calls, which this interpreter does not run).
 */
export function decode(opcode: Word): Instruction | null {
  const w = opcode & 0xFFFF;
  const x = (w >> 8) & 0xF;
  const y = (w >> 4) & 0xF;
  const n = w & 0xF;
  const nn = w & 0xFF;
  const nnn = w & 0xFFF;

  switch (w >> 12) {
    case 0x0:
      if (w === 0x00E0) return { op: 'CLS' };
      if (w === 0x00EE) return { op: 'RET' };
      return null;
    case 0x1: return { op: 'JP', nnn };
    case 0x2: return { op: 'CALL', nnn };
    case 0x3: return { op: 'SE_VX_NN', x, nn };
    case 0x4: return { op: 'SNE_VX_NN', x, nn };
    case 0x5: return n === 0 ? { op: 'SE_VX_VY', x, y } : null;
    case 0x6: return { op: 'LD_VX_NN', x, nn };
    case 0x7: return { op: 'ADD_VX_NN', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_VX_VY', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_VX_VY', x, y };
        case 0x5: return { op: 'SUB_VX_VY', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xE: return { op: 'SHL', x, y };
        default: return null;
      }
    case 0x9: return n === 0 ? { op: 'SNE_VX_VY', x, y } : null;
    case 0xA: return { op: 'LD_I', nnn };
    case 0xB: return { op: 'JP_V0', nnn };
    case 0xC: return { op: 'RND', x, nn };
    case 0xD: return { op: 'DRW', x, y, n };
    case 0xE:
      if (nn === 0x9E) return { op: 'SKP', x };
      if (nn === 0xA1) return { op: 'SKNP', x };
      return null;
    case 0xF:
      switch (nn) {
        case 0x07: return { op: 'LD_VX_DT', x };
        case 0x0A: return { op: 'LD_VX_K', x };
        case 0x15: return { op: 'LD_DT_VX', x };
        case 0x18: return { op: 'LD_ST_VX', x };
        case 0x1E: return { op: 'ADD_I_VX', x };
        case 0x29: return { op: 'LD_F_VX', x };
        case 0x33: return { op: 'LD_B_VX', x };
        case 0x55: return { op: 'LD_MEM_VX', x };
        case 0x65: return { op: 'LD_VX_MEM', x };
        default: return null;
      }
    default:
      return null;
  }
}
