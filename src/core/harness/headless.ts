import { Chip8System } from '@core/system/system';
import { frameCrc } from '@utils/crc32';

export interface RunResult {
  steps: number;
  reason: 'fail' | 'timeout';
  message?: string;
  displayCrc: number;
  // 0/1 pixels at the end of the run
  frameBuffer: Uint8Array;
}

export interface RunOptions {
  maxSteps: number;
  wrappingEnabled?: boolean;
  // CPU steps per 60Hz timer tick; 9 approximates a 540Hz CPU
  stepsPerTick?: number;
  random?: () => number;
  // Key indices held down for the whole run
  keys?: number[];
}

const finalFrame = (sys: Chip8System) => {
  const frameBuffer = sys.getFrameBuffer();
  return { displayCrc: frameCrc(frameBuffer), frameBuffer };
};

// Deterministic run: timers are ticked synchronously from the step count, never from wall time.
export function runRom(rom: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(rom, { wrappingEnabled: opts.wrappingEnabled, random: opts.random });
  for (const k of opts.keys ?? []) sys.setKeyPressed(k, true);
  const perTick = Math.max(1, opts.stepsPerTick ?? 9);

  let steps = 0;
  while (steps < opts.maxSteps) {
    const r = sys.step();
    if (r.fatal) {
      return { steps, reason: 'fail', message: r.fatal.message, ...finalFrame(sys) };
    }
    steps++;
    if (steps % perTick === 0) sys.timer.tick();
  }
  return { steps, reason: 'timeout', ...finalFrame(sys) };
}
