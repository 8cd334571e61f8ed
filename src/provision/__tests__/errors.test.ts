import { describe, it, expect } from 'vitest'
import {
  DependencyInstallError,
  PackageNotFoundError,
  PrivilegeError,
  ProvisionError,
  TargetMissingError,
  isProvisionError,
  isProvisionErrorWithCode,
} from '../errors.js'

describe('ProvisionError', () => {
  it('carries code, step and message', () => {
    const error = new ProvisionError('STEP_FAILED', 'make-executable', 'Operation not permitted')

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('ProvisionError')
    expect(error.code).toBe('STEP_FAILED')
    expect(error.step).toBe('make-executable')
    expect(error.message).toBe('Operation not permitted')
  })

  it('keeps instanceof working for subclasses', () => {
    const error = new PackageNotFoundError('wkhtmltopdf')

    expect(error).toBeInstanceOf(PackageNotFoundError)
    expect(error).toBeInstanceOf(ProvisionError)
    expect(error.name).toBe('PackageNotFoundError')
    expect(error.step).toBe('install-system-packages')
    expect(error.message).toBe('System package not found: wkhtmltopdf')
  })

  it('records the missing target path', () => {
    const error = new TargetMissingError('/opt/agent/url_to_pdf_agent.py')

    expect(error.code).toBe('TARGET_MISSING')
    expect(error.path).toBe('/opt/agent/url_to_pdf_agent.py')
    expect(error.message).toBe('Target script not found: /opt/agent/url_to_pdf_agent.py')
  })

  it('records the unresolved dependency', () => {
    const error = new DependencyInstallError("Could not resolve dependency 'nope'", 'nope')

    expect(error.step).toBe('install-dependencies')
    expect(error.dependency).toBe('nope')
  })
})

describe('type guards', () => {
  it('recognizes provisioning errors', () => {
    expect(isProvisionError(new PrivilegeError('refresh-index', 'denied'))).toBe(true)
    expect(isProvisionError(new Error('plain'))).toBe(false)
    expect(isProvisionError('denied')).toBe(false)
  })

  it('checks the error code', () => {
    const error = new PrivilegeError('refresh-index', 'denied')

    expect(isProvisionErrorWithCode(error, 'PRIVILEGE_REQUIRED')).toBe(true)
    expect(isProvisionErrorWithCode(error, 'TARGET_MISSING')).toBe(false)
  })
})
