import { describe, it, expect } from 'vitest'
import { parseArgs, parsePackageList } from '../args.js'

const argv = (...args: string[]) => ['node', 'url-to-pdf-provision', ...args]

describe('parseArgs', () => {
  it('leaves every config value to the config file by default', () => {
    const options = parseArgs(argv())

    expect(options.config).toBeUndefined()
    expect(options.overrides).toEqual({})
    expect(options.yes).toBe(false)
    expect(options.quiet).toBe(false)
    expect(options.json).toBe(false)
    expect(options.verbose).toBe(false)
    expect(options.status).toBe(false)
  })

  it('maps command line flags onto config overrides', () => {
    const options = parseArgs(
      argv(
        '--config', 'setup.json',
        '-m', 'deps/requirements.txt',
        '-t', 'agent.py',
        '--packages', 'wkhtmltopdf, python3-pip',
        '--interpreter', 'python3.12',
        '--pip', 'pip',
        '--no-sudo',
        '--continue-on-refresh-failure'
      )
    )

    expect(options.config).toBe('setup.json')
    expect(options.overrides).toEqual({
      manifestPath: 'deps/requirements.txt',
      targetScript: 'agent.py',
      systemPackages: ['wkhtmltopdf', 'python3-pip'],
      interpreter: 'python3.12',
      pipCommand: 'pip',
      sudo: false,
      refreshPolicy: 'continue',
    })
  })

  it('parses output and confirmation flags', () => {
    const options = parseArgs(argv('-y', '-q', '-j', '-v', '--status'))

    expect(options.yes).toBe(true)
    expect(options.quiet).toBe(true)
    expect(options.json).toBe(true)
    expect(options.verbose).toBe(true)
    expect(options.status).toBe(true)
  })
})

describe('parsePackageList', () => {
  it('trims names and drops empty entries', () => {
    expect(parsePackageList(' wkhtmltopdf,,chromium-browser , ')).toEqual(['wkhtmltopdf', 'chromium-browser'])
  })

  it('returns an empty list for an empty string', () => {
    expect(parsePackageList('')).toEqual([])
  })
})
