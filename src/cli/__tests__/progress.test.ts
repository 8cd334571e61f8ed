import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockOra, spinner } = vi.hoisted(() => {
  const spinner = {
    start: vi.fn(),
    succeed: vi.fn(),
    warn: vi.fn(),
    fail: vi.fn(),
  }
  return { spinner, mockOra: vi.fn(() => spinner) }
})

vi.mock('ora', () => ({
  default: mockOra,
}))

import { SpinnerReporter, createReporter } from '../progress.js'
import { silentReporter } from '../../provision/index.js'

describe('SpinnerReporter', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    spinner.start.mockReturnValue(spinner)
  })

  it('starts a spinner on stdout labelled with the step position', () => {
    new SpinnerReporter().stepStarted('install-dependencies', 3, 4)

    expect(mockOra).toHaveBeenCalledWith({
      text: '[3/4] Installing Python dependencies...',
      stream: process.stdout,
    })
    expect(spinner.start).toHaveBeenCalled()
  })

  it('marks finished steps as succeeded', () => {
    const reporter = new SpinnerReporter()
    reporter.stepStarted('make-executable', 4, 4)
    reporter.stepFinished({ step: 'make-executable', status: 'done' })

    expect(spinner.succeed).toHaveBeenCalledWith('Making agent script executable')
  })

  it('marks warned steps with a warning', () => {
    const reporter = new SpinnerReporter()
    reporter.stepStarted('refresh-index', 1, 4)
    reporter.stepFinished({ step: 'refresh-index', status: 'warned', detail: 'offline' })

    expect(spinner.warn).toHaveBeenCalledWith(expect.stringContaining('Refreshing system package index'))
    expect(spinner.warn).toHaveBeenCalledWith(expect.stringContaining('offline'))
    expect(spinner.succeed).not.toHaveBeenCalled()
  })

  it('marks failed steps as failed', () => {
    const reporter = new SpinnerReporter()
    reporter.stepStarted('install-system-packages', 2, 4)
    reporter.stepFailed('install-system-packages')

    expect(spinner.fail).toHaveBeenCalledWith('Installing system dependencies failed')
  })
})

describe('createReporter', () => {
  it('stays silent in quiet and JSON modes', () => {
    expect(createReporter({ terminal: false, confirm: false, quiet: true, json: false })).toBe(silentReporter)
    expect(createReporter({ terminal: false, confirm: false, quiet: false, json: true })).toBe(silentReporter)
  })

  it('shows spinners otherwise', () => {
    expect(createReporter({ terminal: false, confirm: false, quiet: false, json: false })).toBeInstanceOf(SpinnerReporter)
  })
})
