import type { Word } from "@core/cpu/types";
import { decode, type Instruction } from "@core/cpu/decoder";

export interface Disasm {
  opcode: Word;
  mnemonic: string;
  operand: string;
}

const hx = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, "0");
const V = (r: number) => `V${hx(r, 1)}`;
const b = (v: number) => `$${hx(v & 0xFF, 2)}`;
const a = (v: number) => `$${hx(v & 0xFFF, 3)}`;

function fmt(ins: Instruction): [string, string] {
  switch (ins.op) {
    case "CLS": return ["CLS", ""];
    case "RET": return ["RET", ""];
    case "JP": return ["JP", a(ins.nnn)];
    case "CALL": return ["CALL", a(ins.nnn)];
    case "SE_VX_NN": return ["SE", `${V(ins.x)}, ${b(ins.nn)}`];
    case "SNE_VX_NN": return ["SNE", `${V(ins.x)}, ${b(ins.nn)}`];
    case "SE_VX_VY": return ["SE", `${V(ins.x)}, ${V(ins.y)}`];
    case "LD_VX_NN": return ["LD", `${V(ins.x)}, ${b(ins.nn)}`];
    case "ADD_VX_NN": return ["ADD", `${V(ins.x)}, ${b(ins.nn)}`];
    case "LD_VX_VY": return ["LD", `${V(ins.x)}, ${V(ins.y)}`];
    case "OR": return ["OR", `${V(ins.x)}, ${V(ins.y)}`];
    case "AND": return ["AND", `${V(ins.x)}, ${V(ins.y)}`];
    case "XOR": return ["XOR", `${V(ins.x)}, ${V(ins.y)}`];
    case "ADD_VX_VY": return ["ADD", `${V(ins.x)}, ${V(ins.y)}`];
    case "SUB_VX_VY": return ["SUB", `${V(ins.x)}, ${V(ins.y)}`];
    case "SHR": return ["SHR", V(ins.x)];
    case "SUBN": return ["SUBN", `${V(ins.x)}, ${V(ins.y)}`];
    case "SHL": return ["SHL", V(ins.x)];
    case "SNE_VX_VY": return ["SNE", `${V(ins.x)}, ${V(ins.y)}`];
    case "LD_I": return ["LD", `I, ${a(ins.nnn)}`];
    case "JP_V0": return ["JP", `V0, ${a(ins.nnn)}`];
    case "RND": return ["RND", `${V(ins.x)}, ${b(ins.nn)}`];
    case "DRW": return ["DRW", `${V(ins.x)}, ${V(ins.y)}, ${ins.n}`];
    case "SKP": return ["SKP", V(ins.x)];
    case "SKNP": return ["SKNP", V(ins.x)];
    case "LD_VX_DT": return ["LD", `${V(ins.x)}, DT`];
    case "LD_VX_K": return ["LD", `${V(ins.x)}, K`];
    case "LD_DT_VX": return ["LD", `DT, ${V(ins.x)}`];
    case "LD_ST_VX": return ["LD", `ST, ${V(ins.x)}`];
    case "ADD_I_VX": return ["ADD", `I, ${V(ins.x)}`];
    case "LD_F_VX": return ["LD", `F, ${V(ins.x)}`];
    case "LD_B_VX": return ["LD", `B, ${V(ins.x)}`];
    case "LD_MEM_VX": return ["LD", `[I], ${V(ins.x)}`];
    case "LD_VX_MEM": return ["LD", `${V(ins.x)}, [I]`];
  }
}

// Unknown words disassemble as data
export function disasm(opcode: Word): Disasm {
  const ins = decode(opcode);
  if (!ins) return { opcode, mnemonic: "DW", operand: `$${hx(opcode & 0xFFFF, 4)}` };
  const [mnemonic, operand] = fmt(ins);
  return { opcode, mnemonic, operand };
}

export function formatDisasm(d: Disasm): string {
  return d.operand ? `${d.mnemonic} ${d.operand}` : d.mnemonic;
}

// "$0200  6A02  LD VA, $02"
export function formatTraceLine(pc: Word, opcode: Word): string {
  return `$${hx(pc & 0xFFFF, 4)}  ${hx(opcode & 0xFFFF, 4)}  ${formatDisasm(disasm(opcode))}`;
}
