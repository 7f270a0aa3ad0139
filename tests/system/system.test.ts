import { describe, it, expect, vi, afterEach } from 'vitest';
import { Chip8System, DEFAULT_FONT_PATH } from '@core/system/system';
import { RomTooLargeError } from '@core/cpu/errors';
import { romFromWords } from '../helpers/cpuh';

const quietErrors = () => vi.spyOn(console, 'error').mockImplementation(() => {});

describe('Chip8System', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    delete process.env.CHIP8_TRACE;
    delete process.env.CHIP8_TRACE_MAX;
  });

  it('defaults to clipping and the stock font path', () => {
    const sys = new Chip8System(romFromWords([0x1200]));
    expect(sys.config).toEqual({ wrappingEnabled: false, fontPath: DEFAULT_FONT_PATH });
    expect(sys.display.isWrapping()).toBe(false);
    expect(new Chip8System(romFromWords([0x1200]), { wrappingEnabled: true }).display.isWrapping()).toBe(true);
  });

  it('step reports display changes', () => {
    const sys = new Chip8System(romFromWords([0x6000, 0xF029, 0xD005]));
    expect(sys.step()).toEqual({ displayChanged: false, halted: false, fatal: null });
    sys.step();
    expect(sys.step()).toEqual({ displayChanged: true, halted: false, fatal: null });
    expect(sys.getDisplay()[0][0]).toBe(true);
  });

  it('a fault halts the machine and is reported on every later step', () => {
    const err = quietErrors();
    const sys = new Chip8System(romFromWords([0x6001, 0x0000]));
    sys.step();
    const r = sys.step();
    expect(r.halted).toBe(true);
    expect(r.fatal?.kind).toBe('decode_error');
    expect(r.fatal?.pc).toBe(0x202);
    expect(sys.isHalted()).toBe(true);
    expect(sys.getFault()).toBe(r.fatal);
    expect(err).toHaveBeenCalledWith('[chip8] halted: decode_error at $0202 (opcode $0000): unknown instruction');
    const again = sys.step();
    expect(again).toEqual({ displayChanged: false, halted: true, fatal: r.fatal });
    expect(sys.cpu.state.v[0]).toBe(1);
  });

  it('a fault stops the timer', () => {
    vi.useFakeTimers();
    quietErrors();
    const sys = new Chip8System(romFromWords([0x0000]));
    sys.startTimers();
    expect(sys.timer.isRunning()).toBe(true);
    sys.step();
    expect(sys.timer.isRunning()).toBe(false);
  });

  it('stop halts the CPU and the timer together', () => {
    vi.useFakeTimers();
    const sys = new Chip8System(romFromWords([0x7001, 0x1200]));
    sys.startTimers();
    sys.stop();
    expect(sys.timer.isRunning()).toBe(false);
    expect(sys.step()).toEqual({ displayChanged: false, halted: true, fatal: null });
    expect(sys.cpu.state.v[0]).toBe(0);
    sys.startTimers();
    expect(sys.timer.isRunning()).toBe(false);
  });

  it('timers run at 60Hz while the CPU sits in a loop', () => {
    vi.useFakeTimers();
    const sys = new Chip8System(romFromWords([0x603C, 0xF015, 0x1204]), { timerNow: () => Date.now() });
    sys.step();
    sys.step();
    expect(sys.timers.getDelay()).toBe(60);
    sys.startTimers();
    vi.advanceTimersByTime(900);
    expect(sys.timers.getDelay()).toBeGreaterThan(0);
    vi.advanceTimersByTime(200);
    expect(sys.timers.getDelay()).toBe(0);
    sys.stop();
  });

  it('setKeyPressed feeds the key-wait instruction', () => {
    const sys = new Chip8System(romFromWords([0xF50A]));
    sys.step();
    expect(sys.cpu.state.pc).toBe(0x200);
    sys.setKeyPressed(0xE, true);
    sys.step();
    expect(sys.cpu.state.v[5]).toBe(0xE);
  });

  it('reset reloads the ROM and clears state', () => {
    const sys = new Chip8System(romFromWords([0x6A07, 0xA300, 0xFA55, 0x6000, 0xF029, 0xD005]));
    for (let n = 0; n < 6; n++) sys.step();
    expect(sys.memory.read(0x30A)).toBe(7);
    sys.setKeyPressed(3, true);
    sys.reset();
    expect(sys.cpu.state.pc).toBe(0x200);
    expect(sys.cpu.state.v[0xA]).toBe(0);
    expect(sys.memory.read(0x30A)).toBe(0);
    expect(sys.memory.readWord(0x200)).toBe(0x6A07);
    expect(sys.getFrameBuffer().every((p) => p === 0)).toBe(true);
    expect(sys.keypad.read()).toBe(0);
  });

  it('rejects oversized ROMs at construction', () => {
    expect(() => new Chip8System(new Uint8Array(4000))).toThrow(RomTooLargeError);
  });

  it('CHIP8_TRACE logs each executed instruction up to CHIP8_TRACE_MAX', () => {
    process.env.CHIP8_TRACE = '1';
    process.env.CHIP8_TRACE_MAX = '1';
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const sys = new Chip8System(romFromWords([0x6A02, 0x1202]));
    sys.step();
    sys.step();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[trace] $0200  6A02  LD VA, $02');
  });
});
