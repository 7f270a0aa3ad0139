import type { Byte, CPUState, Word } from './types';
import { decode, type Instruction } from './decoder';
import { Chip8Fault, MemoryAccessError } from './errors';
import { Memory, PROGRAM_START } from '@core/bus/memory';
import type { Display } from '@core/ppu/display';
import type { Keypad } from '@core/input/keypad';
import type { TimerCell } from '@core/timer/timer_cell';

export const STACK_DEPTH = 16;
export const HISTORY_LENGTH = 12;
const VF = 0xF;

export interface StepOutcome {
  displayChanged: boolean;
}

export interface CPUOptions {
  // Uniform [0, 1) source for CXNN
  random?: () => number;
}

const freshState = (): CPUState => ({
  v: new Uint8Array(16),
  i: 0,
  pc: PROGRAM_START,
  stack: new Uint16Array(STACK_DEPTH),
  sp: 0,
  keyWait: { active: false, register: 0 },
});

export class Chip8CPU {
  state: CPUState = freshState();
  private readonly random: () => number;
  // Most recent opcode first
  private history: Word[] = [];
  // optional external per-instruction trace hook
  private traceHook: ((pc: Word, opcode: Word) => void) | null = null;

  constructor(
    private readonly memory: Memory,
    private readonly display: Display,
    private readonly keypad: Keypad,
    private readonly timers: TimerCell,
    opts: CPUOptions = {},
  ) {
    this.random = opts.random ?? Math.random;
  }

  reset(): void {
    this.state = freshState();
    this.history = [];
  }

  setTraceHook(fn: ((pc: Word, opcode: Word) => void) | null): void { this.traceHook = fn; }

  getHistory(): Word[] { return this.history.slice(); }

  // Return addresses, innermost call first
  getStack(): Word[] {
    return Array.from(this.state.stack.subarray(0, this.state.sp)).reverse();
  }

  /**
   * Fetch, decode and execute one instruction.
   * @throws Chip8Fault on decode errors, stack overflow/underflow and out-of-range memory access
   */
  step(): StepOutcome {
    const pc = this.state.pc;
    let opcode = 0;
    try {
      opcode = this.memory.readWord(pc);
      this.history.unshift(opcode);
      if (this.history.length > HISTORY_LENGTH) this.history.length = HISTORY_LENGTH;
      if (this.traceHook) this.traceHook(pc, opcode);

      const ins = decode(opcode);
      if (!ins) throw new Chip8Fault('decode_error', pc, opcode, 'unknown instruction');
      this.state.pc = (pc + 2) & 0xFFFF;
      return { displayChanged: this.execute(ins, pc, opcode) };
    } catch (e) {
      if (e instanceof MemoryAccessError) {
        throw new Chip8Fault('memory_out_of_bounds', pc, opcode, e.message);
      }
      throw e;
    }
  }

  // Executes against the already-advanced pc. Returns true when the display changed.
  private execute(ins: Instruction, pc: Word, opcode: Word): boolean {
    const s = this.state;
    const v = s.v;
    switch (ins.op) {
      case 'CLS':
        return this.display.clear();
      case 'RET':
        if (s.sp === 0) throw new Chip8Fault('stack_underflow', pc, opcode, 'return with empty stack');
        s.sp--;
        s.pc = s.stack[s.sp];
        return false;
      case 'JP':
        s.pc = ins.nnn;
        return false;
      case 'CALL':
        if (s.sp >= STACK_DEPTH) throw new Chip8Fault('stack_overflow', pc, opcode, `call depth exceeds ${STACK_DEPTH}`);
        s.stack[s.sp++] = s.pc;
        s.pc = ins.nnn;
        return false;
      case 'SE_VX_NN':
        if (v[ins.x] === ins.nn) this.skip();
        return false;
      case 'SNE_VX_NN':
        if (v[ins.x] !== ins.nn) this.skip();
        return false;
      case 'SE_VX_VY':
        if (v[ins.x] === v[ins.y]) this.skip();
        return false;
      case 'LD_VX_NN':
        v[ins.x] = ins.nn;
        return false;
      case 'ADD_VX_NN':
        v[ins.x] = (v[ins.x] + ins.nn) & 0xFF;
        return false;
      case 'LD_VX_VY':
        v[ins.x] = v[ins.y];
        return false;
      case 'OR':
        v[ins.x] |= v[ins.y];
        return false;
      case 'AND':
        v[ins.x] &= v[ins.y];
        return false;
      case 'XOR':
        v[ins.x] ^= v[ins.y];
        return false;
      case 'ADD_VX_VY': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xFF;
        v[VF] = sum > 0xFF ? 1 : 0;
        return false;
      }
      case 'SUB_VX_VY': {
        const noBorrow = v[ins.x] >= v[ins.y] ? 1 : 0;
        v[ins.x] = (v[ins.x] - v[ins.y]) & 0xFF;
        v[VF] = noBorrow;
        return false;
      }
      case 'SHR': {
        const lsb = v[ins.x] & 1;
        v[ins.x] = v[ins.x] >> 1;
        v[VF] = lsb;
        return false;
      }
      case 'SUBN': {
        const noBorrow = v[ins.y] >= v[ins.x] ? 1 : 0;
        v[ins.x] = (v[ins.y] - v[ins.x]) & 0xFF;
        v[VF] = noBorrow;
        return false;
      }
      case 'SHL': {
        const msb = v[ins.x] >> 7;
        v[ins.x] = (v[ins.x] << 1) & 0xFF;
        v[VF] = msb;
        return false;
      }
      case 'SNE_VX_VY':
        if (v[ins.x] !== v[ins.y]) this.skip();
        return false;
      case 'LD_I':
        s.i = ins.nnn;
        return false;
      case 'JP_V0':
        s.pc = (ins.nnn + v[0]) & 0xFFFF;
        return false;
      case 'RND':
        v[ins.x] = this.randomByte() & ins.nn;
        return false;
      case 'DRW': {
        const rows: Byte[] = [];
        for (let r = 0; r < ins.n; r++) rows.push(this.memory.read(s.i + r));
        const { collision, changed } = this.display.drawSprite(v[ins.x], v[ins.y], rows);
        v[VF] = collision ? 1 : 0;
        return changed;
      }
      case 'SKP':
        if (this.keypad.isPressed(v[ins.x])) this.skip();
        return false;
      case 'SKNP':
        if (!this.keypad.isPressed(v[ins.x])) this.skip();
        return false;
      case 'LD_VX_DT':
        v[ins.x] = this.timers.getDelay();
        return false;
      case 'LD_VX_K': {
        const key = this.keypad.firstPressed();
        if (key === null) {
          // No key yet: latch the register and re-run this instruction next step
          s.keyWait = { active: true, register: ins.x };
          s.pc = pc;
          return false;
        }
        s.keyWait = { active: false, register: ins.x };
        v[ins.x] = key;
        return false;
      }
      case 'LD_DT_VX':
        this.timers.setDelay(v[ins.x]);
        return false;
      case 'LD_ST_VX':
        this.timers.setSound(v[ins.x]);
        return false;
      case 'ADD_I_VX':
        s.i = (s.i + v[ins.x]) & 0xFFFF;
        return false;
      case 'LD_F_VX':
        s.i = Memory.glyphAddress(v[ins.x]);
        return false;
      case 'LD_B_VX': {
        const val = v[ins.x];
        this.memory.write(s.i, Math.floor(val / 100));
        this.memory.write(s.i + 1, Math.floor(val / 10) % 10);
        this.memory.write(s.i + 2, val % 10);
        return false;
      }
      case 'LD_MEM_VX':
        for (let k = 0; k <= ins.x; k++) this.memory.write(s.i + k, v[k]);
        return false;
      case 'LD_VX_MEM':
        for (let k = 0; k <= ins.x; k++) v[k] = this.memory.read(s.i + k);
        return false;
      default: {
        const unreachable: never = ins;
        throw new Chip8Fault('decode_error', pc, opcode, `no handler for ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private skip(): void {
    this.state.pc = (this.state.pc + 2) & 0xFFFF;
  }

  private randomByte(): Byte {
    return Math.floor(this.random() * 256) & 0xFF;
  }
}
