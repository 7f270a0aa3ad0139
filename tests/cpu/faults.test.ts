import { describe, it, expect } from 'vitest';
import { Chip8Fault } from '@core/cpu/errors';
import { cpuWithProgram, stepN } from '../helpers/cpuh';

const faultOf = (fn: () => void): Chip8Fault => {
  try {
    fn();
  } catch (e) {
    if (e instanceof Chip8Fault) return e;
    throw e;
  }
  throw new Error('expected a Chip8Fault');
};

describe('CPU faults', () => {
  it('unknown opcode is a decode error carrying pc and opcode', () => {
    const { cpu } = cpuWithProgram([0x0123]);
    const f = faultOf(() => cpu.step());
    expect(f.kind).toBe('decode_error');
    expect(f.pc).toBe(0x200);
    expect(f.opcode).toBe(0x0123);
    expect(f.message).toBe('decode_error at $0200 (opcode $0123): unknown instruction');
    expect(cpu.state.pc).toBe(0x200);
  });

  it('a 17th nested CALL overflows the stack', () => {
    const { cpu } = cpuWithProgram([0x2200]);
    stepN(cpu, 16);
    expect(cpu.state.sp).toBe(16);
    const f = faultOf(() => cpu.step());
    expect(f.kind).toBe('stack_overflow');
    expect(f.opcode).toBe(0x2200);
  });

  it('RET with an empty stack underflows', () => {
    const { cpu } = cpuWithProgram([0x00EE]);
    expect(faultOf(() => cpu.step()).kind).toBe('stack_underflow');
  });

  it('BCD past the end of memory is an out-of-bounds fault', () => {
    const { cpu } = cpuWithProgram([0xAFFF, 0xF133]);
    cpu.step();
    const f = faultOf(() => cpu.step());
    expect(f.kind).toBe('memory_out_of_bounds');
    expect(f.pc).toBe(0x202);
    expect(f.message).toBe('memory_out_of_bounds at $0202 (opcode $F133): address $1000 outside $0000-$0FFF');
  });

  it('fetching across the end of memory faults', () => {
    const { cpu } = cpuWithProgram([0x1FFF]);
    cpu.step();
    const f = faultOf(() => cpu.step());
    expect(f.kind).toBe('memory_out_of_bounds');
    expect(f.pc).toBe(0xFFF);
  });

  it('a sprite read past memory faults', () => {
    const { cpu } = cpuWithProgram([0xAFFE, 0xD005]);
    cpu.step();
    expect(faultOf(() => cpu.step()).kind).toBe('memory_out_of_bounds');
  });
});
