import { DEFAULT_FONT_PATH } from '@core/system/system'
import { DEFAULT_HZ, MAX_HZ, MIN_HZ } from './driver'

export interface CliConfig {
  romPath: string
  wrappingEnabled: boolean
  fontPath: string
  hz: number
}

export type ParseResult =
  | { kind: 'run'; config: CliConfig }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string }

export const USAGE = `Usage: chip8 <rom> [options]

Options:
  -w, --wrapping_enabled   wrap sprites around the screen edges (needed by some games, such as BLITZ)
  -f, --font_path <path>   font used by the debug overlay (default: ${DEFAULT_FONT_PATH})
      --hz <n>             CPU steps per second, ${MIN_HZ}-${MAX_HZ} (default: ${DEFAULT_HZ})
  -h, --help               show this help
  -V, --version            print the version

Keys: 1234/QWER/ASDF/ZXCV keypad, Space pause, Up/Down speed, Esc quit

Environment: CHIP8_ROM, CHIP8_HZ, CHIP8_WRAP=1, CHIP8_FONT (flags take precedence)
`

function getEnv(env: NodeJS.ProcessEnv, name: string): string | null {
  const v = env[name]
  return v && v.length > 0 ? v : null
}

function parseHz(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null
  const hz = parseInt(raw, 10)
  return hz >= MIN_HZ && hz <= MAX_HZ ? hz : null
}

// Flags win over environment; environment wins over defaults
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): ParseResult {
  let romPath = getEnv(env, 'CHIP8_ROM')
  let wrappingEnabled = getEnv(env, 'CHIP8_WRAP') === '1'
  let fontPath = getEnv(env, 'CHIP8_FONT') ?? DEFAULT_FONT_PATH
  let hzRaw = getEnv(env, 'CHIP8_HZ')
  let positional: string | null = null

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]
    const eq = a.indexOf('=')
    const flag = a.startsWith('--') && eq > 0 ? a.slice(0, eq) : a
    const inline = a.startsWith('--') && eq > 0 ? a.slice(eq + 1) : null
    const value = (): string | null => {
      if (inline !== null) return inline
      const next = argv[i + 1]
      if (next === undefined) return null
      i++
      return next
    }

    switch (flag) {
      case '-h': case '--help':
        return { kind: 'help' }
      case '-V': case '--version':
        return { kind: 'version' }
      case '-w': case '--wrapping_enabled':
        wrappingEnabled = true
        break
      case '-f': case '--font_path': {
        const v = value()
        if (v === null) return { kind: 'error', message: `${flag} needs a path` }
        fontPath = v
        break
      }
      case '--hz': {
        const v = value()
        if (v === null) return { kind: 'error', message: '--hz needs a number' }
        hzRaw = v
        break
      }
      default:
        if (a.startsWith('-')) return { kind: 'error', message: `unknown option ${a}` }
        if (positional !== null) return { kind: 'error', message: `unexpected argument ${a}` }
        positional = a
    }
  }

  romPath = positional ?? romPath
  if (!romPath) return { kind: 'error', message: 'missing ROM path' }
  let hz = DEFAULT_HZ
  if (hzRaw !== null) {
    const parsed = parseHz(hzRaw)
    if (parsed === null) return { kind: 'error', message: `hz must be an integer in ${MIN_HZ}-${MAX_HZ}, got ${hzRaw}` }
    hz = parsed
  }
  return { kind: 'run', config: { romPath, wrappingEnabled, fontPath, hz } }
}
