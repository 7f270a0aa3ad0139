import { Memory } from '@core/bus/memory';
import { Chip8CPU } from '@core/cpu/cpu';
import { Chip8Fault } from '@core/cpu/errors';
import { Display } from '@core/ppu/display';
import { Keypad } from '@core/input/keypad';
import { TimerCell } from '@core/timer/timer_cell';
import { Timer } from '@core/timer/timer';
import { formatTraceLine } from '@utils/disasm_chip8';

export const DEFAULT_FONT_PATH = 'font.ttf';

export interface SystemOptions {
  wrappingEnabled?: boolean;
  // Consumed by the host's overlay renderer, never by the core
  fontPath?: string;
  random?: () => number;
  // Monotonic clock for the 60Hz timer (ms); defaults to performance.now
  timerNow?: () => number;
}

export interface SystemConfig {
  wrappingEnabled: boolean;
  fontPath: string;
}

export interface StepResult {
  displayChanged: boolean;
  halted: boolean;
  fatal: Chip8Fault | null;
}

export class Chip8System {
  public readonly memory: Memory;
  public readonly display: Display;
  public readonly keypad: Keypad;
  public readonly timers: TimerCell;
  public readonly timer: Timer;
  public readonly cpu: Chip8CPU;
  public readonly config: Readonly<SystemConfig>;
  private readonly rom: Uint8Array;
  private halted = false;
  private fault: Chip8Fault | null = null;

  constructor(rom: Uint8Array, opts: SystemOptions = {}) {
    this.config = {
      wrappingEnabled: opts.wrappingEnabled ?? false,
      fontPath: opts.fontPath ?? DEFAULT_FONT_PATH,
    };
    this.rom = rom.slice();
    this.memory = new Memory();
    this.memory.loadRom(this.rom);
    this.display = new Display({ wrapping: this.config.wrappingEnabled });
    this.keypad = new Keypad();
    this.timers = new TimerCell();
    this.timer = new Timer(this.timers, { now: opts.timerNow });
    this.cpu = new Chip8CPU(this.memory, this.display, this.keypad, this.timers, { random: opts.random });

    // Opt-in per-instruction trace, read once
    const env = process.env;
    if (env.CHIP8_TRACE === '1') {
      const max = parseInt(env.CHIP8_TRACE_MAX || '0', 10);
      let printed = 0;
      this.cpu.setTraceHook((pc, opcode) => {
        if (max > 0 && printed >= max) return;
        printed++;
        // eslint-disable-next-line no-console
        console.log(`[trace] ${formatTraceLine(pc, opcode)}`);
      });
    }
  }

  // Power-cycle: reload font and ROM, clear screen, keys, timers and registers
  reset(): void {
    this.memory.reset();
    this.memory.loadRom(this.rom);
    this.display.reset();
    this.keypad.releaseAll();
    this.timers.reset();
    this.cpu.reset();
    this.halted = false;
    this.fault = null;
  }

  /**
   * Execute one instruction. A fault halts the machine and stops the timer;
   * later calls keep reporting the same halted result without executing.
   */
  step(): StepResult {
    if (this.halted) return { displayChanged: false, halted: true, fatal: this.fault };
    try {
      const { displayChanged } = this.cpu.step();
      return { displayChanged, halted: false, fatal: null };
    } catch (e) {
      if (!(e instanceof Chip8Fault)) throw e;
      this.fault = e;
      this.halted = true;
      this.timer.stop();
      // eslint-disable-next-line no-console
      console.error(`[chip8] halted: ${e.message}`);
      return { displayChanged: false, halted: true, fatal: e };
    }
  }

  setKeyPressed(index: number, pressed: boolean): void {
    this.keypad.setKey(index, pressed);
  }

  // Rows of columns; reflects the last completed step
  getDisplay(): boolean[][] { return this.display.snapshot(); }
  getFrameBuffer(): Uint8Array { return this.display.getFrameBuffer(); }

  startTimers(): void {
    if (!this.halted) this.timer.start();
  }

  // Explicit stop: halts the CPU and the timer together. Idempotent.
  stop(): void {
    this.halted = true;
    this.timer.stop();
  }

  isHalted(): boolean { return this.halted; }
  getFault(): Chip8Fault | null { return this.fault; }
  isSoundActive(): boolean { return this.timer.isSoundActive(); }
}
