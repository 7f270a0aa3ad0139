import { Memory } from '@core/bus/memory';
import { Chip8CPU } from '@core/cpu/cpu';
import { Display } from '@core/ppu/display';
import { Keypad } from '@core/input/keypad';
import { TimerCell } from '@core/timer/timer_cell';

// Opcodes as 16-bit words, laid out big-endian
export function romFromWords(words: number[]): Uint8Array {
  const rom = new Uint8Array(words.length * 2);
  words.forEach((w, i) => {
    rom[i * 2] = (w >> 8) & 0xFF;
    rom[i * 2 + 1] = w & 0xFF;
  });
  return rom;
}

export interface CpuRigOptions {
  wrapping?: boolean;
  random?: () => number;
}

export function cpuWithProgram(words: number[], opts: CpuRigOptions = {}) {
  const memory = new Memory();
  memory.loadRom(romFromWords(words));
  const display = new Display({ wrapping: opts.wrapping ?? false });
  const keypad = new Keypad();
  const timers = new TimerCell();
  const cpu = new Chip8CPU(memory, display, keypad, timers, { random: opts.random });
  return { cpu, memory, display, keypad, timers };
}

export function stepN(cpu: Chip8CPU, n: number): void {
  for (let i = 0; i < n; i++) cpu.step();
}
