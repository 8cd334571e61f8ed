import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockIsTTY } = vi.hoisted(() => ({ mockIsTTY: vi.fn(() => true) }))

vi.mock('../colors.js', () => ({
  isTTY: mockIsTTY,
}))

import { createContext } from '../interactive.js'

const defaults = { quiet: false, json: false, yes: false }

describe('createContext', () => {
  beforeEach(() => {
    mockIsTTY.mockReturnValue(true)
  })

  it('confirms on a terminal', () => {
    expect(createContext(defaults)).toEqual({ terminal: true, confirm: true, quiet: false, json: false })
  })

  it('does not confirm with --yes, --quiet or --json', () => {
    expect(createContext({ ...defaults, yes: true }).confirm).toBe(false)
    expect(createContext({ ...defaults, quiet: true }).confirm).toBe(false)
    expect(createContext({ ...defaults, json: true }).confirm).toBe(false)
  })

  it('keeps the terminal flag in quiet mode', () => {
    expect(createContext({ ...defaults, quiet: true }).terminal).toBe(true)
  })

  it('never confirms without a terminal', () => {
    mockIsTTY.mockReturnValue(false)

    expect(createContext(defaults)).toEqual({ terminal: false, confirm: false, quiet: false, json: false })
  })
})
