import { describe, it, expect, vi, beforeEach } from 'vitest'

const { mockExec } = vi.hoisted(() => ({ mockExec: vi.fn() }))

vi.mock('../../utils/exec.js', () => ({
  exec: mockExec,
}))

import { PipInstaller } from '../pip.js'
import { DependencyInstallError } from '../errors.js'

describe('PipInstaller', () => {
  beforeEach(() => {
    vi.resetAllMocks()
  })

  it('installs from the manifest with the configured command', async () => {
    mockExec.mockResolvedValueOnce({ exitCode: 0, stdout: 'Successfully installed pdfkit-1.0.0', stderr: '' })

    await new PipInstaller('pip').installManifest('/srv/agent/requirements.txt')

    expect(mockExec).toHaveBeenCalledWith('pip', ['install', '-r', '/srv/agent/requirements.txt'])
  })

  it('defaults to pip3', async () => {
    mockExec.mockResolvedValueOnce({ exitCode: 0, stdout: '', stderr: '' })

    await new PipInstaller().installManifest('requirements.txt')

    expect(mockExec).toHaveBeenCalledWith('pip3', ['install', '-r', 'requirements.txt'])
  })

  it('names the dependency pip cannot resolve', async () => {
    mockExec.mockResolvedValueOnce({
      exitCode: 1,
      stdout: '',
      stderr:
        'ERROR: Could not find a version that satisfies the requirement not-a-real-dep==1.0 (from versions: none)\n' +
        'ERROR: No matching distribution found for not-a-real-dep==1.0',
    })

    const error = await new PipInstaller().installManifest('requirements.txt').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DependencyInstallError)
    expect(error).toHaveProperty('dependency', 'not-a-real-dep')
    expect(error).toHaveProperty('message', "Could not resolve dependency 'not-a-real-dep==1.0'")
  })

  it('explains an externally managed environment', async () => {
    mockExec.mockResolvedValueOnce({
      exitCode: 1,
      stdout: '',
      stderr: 'error: externally-managed-environment\n\nThis environment is externally managed',
    })

    const error = await new PipInstaller().installManifest('requirements.txt').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(DependencyInstallError)
    expect(error instanceof DependencyInstallError ? error.dependency : 'unexpected').toBeUndefined()
    expect(error).toHaveProperty(
      'message',
      'The Python environment is externally managed; activate a virtual environment or set pipCommand to its pip'
    )
  })

  it('reports the last pip error for other failures', async () => {
    mockExec.mockResolvedValueOnce({
      exitCode: 1,
      stdout: '',
      stderr: 'Collecting pdfkit\nERROR: Could not install packages due to an OSError: [Errno 28] No space left on device',
    })

    const error = await new PipInstaller().installManifest('requirements.txt').catch((e: unknown) => e)

    expect(error).toHaveProperty(
      'message',
      'pip3 install failed: ERROR: Could not install packages due to an OSError: [Errno 28] No space left on device'
    )
  })

  it('reports a pip command that could not be started', async () => {
    mockExec.mockResolvedValueOnce({ exitCode: 127, stdout: '', stderr: 'pip3: command could not be started' })

    const error = await new PipInstaller().installManifest('requirements.txt').catch((e: unknown) => e)

    expect(error).toHaveProperty('message', 'pip3 install failed: pip3: command could not be started')
  })
})
