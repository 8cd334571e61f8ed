import { isTTY } from './colors.js'
import type { CliOptions } from './args.js'

export interface CliContext {
  /** stdin and stdout are attached to a terminal */
  terminal: boolean
  /** Ask before touching the host */
  confirm: boolean
  quiet: boolean
  json: boolean
}

export function createContext(options: Pick<CliOptions, 'quiet' | 'json' | 'yes'>): CliContext {
  const terminal = isTTY()

  return {
    terminal,
    confirm: terminal && !options.quiet && !options.json && !options.yes,
    quiet: options.quiet,
    json: options.json,
  }
}
