import { exec, type ExecResult } from '../utils/exec.js'
import { logger } from '../utils/logger.js'
import { DependencyInstallError } from './errors.js'
import { requirementName } from './manifest.js'
import type { DependencyInstaller } from './types.js'

const UNRESOLVED_PATTERNS = [
  /No matching distribution found for ([^\s;]+)/,
  /Could not find a version that satisfies the requirement ([^\s;]+)/,
]

function summarizeFailure(result: ExecResult): string {
  const lines = result.stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

  const errors = lines.filter((line) => line.startsWith('ERROR:'))
  return errors[errors.length - 1] ?? lines[lines.length - 1] ?? `exit code ${result.exitCode}`
}

function findUnresolved(stderr: string): string | undefined {
  for (const pattern of UNRESOLVED_PATTERNS) {
    const match = pattern.exec(stderr)
    if (match) return match[1]
  }
  return undefined
}

/**
 * Installs manifest dependencies with pip (`pip3 install -r <manifest>`)
 */
export class PipInstaller implements DependencyInstaller {
  constructor(private readonly pipCommand = 'pip3') {}

  async installManifest(manifestPath: string): Promise<void> {
    const args = ['install', '-r', manifestPath]
    logger.debug(`Running: ${this.pipCommand} ${args.join(' ')}`)

    const result = await exec(this.pipCommand, args)
    if (result.stdout) {
      logger.debug(result.stdout)
    }
    if (result.exitCode === 0) return

    const requirement = findUnresolved(result.stderr)
    if (requirement) {
      throw new DependencyInstallError(
        `Could not resolve dependency '${requirement}'`,
        requirementName(requirement) ?? requirement
      )
    }

    if (/externally-managed-environment/.test(result.stderr)) {
      throw new DependencyInstallError(
        'The Python environment is externally managed; activate a virtual environment or set pipCommand to its pip'
      )
    }

    throw new DependencyInstallError(`${this.pipCommand} install failed: ${summarizeFailure(result)}`)
  }
}
