import { exec, execInteractive, type ExecResult } from '../utils/exec.js'
import { logger } from '../utils/logger.js'
import {
  IndexRefreshError,
  PackageInstallError,
  PackageNotFoundError,
  PrivilegeError,
} from './errors.js'
import type { PackageManager, ProvisionStepId } from './types.js'

const PRIVILEGE_PATTERNS = [
  /are you root\?/i,
  /permission denied/i,
  /could not open lock file/i,
  /a password is required/i,
  /is not in the sudoers file/i,
  /a terminal is required/i,
]

const MISSING_PACKAGE_PATTERNS = [
  /Unable to locate package (\S+)/,
  /Package '([^']+)' has no installation candidate/,
]

export interface AptOptions {
  /** Prefix apt-get with sudo */
  sudo: boolean
}

/**
 * Pick the line that best explains an apt failure
 */
export function summarizeFailure(result: ExecResult): string {
  const lines = result.stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)

  const errorLine = lines.find((line) => line.startsWith('E:'))
  return errorLine ?? lines[lines.length - 1] ?? `exit code ${result.exitCode}`
}

function isPrivilegeFailure(result: ExecResult): boolean {
  return PRIVILEGE_PATTERNS.some((pattern) => pattern.test(result.stderr))
}

function findMissingPackage(result: ExecResult): string | undefined {
  for (const pattern of MISSING_PACKAGE_PATTERNS) {
    const match = pattern.exec(result.stderr)
    if (match) return match[1]
  }
  return undefined
}

/**
 * Ask for the sudo password up front, on the terminal, so the apt-get calls
 * that follow can run with `sudo -n`
 */
export async function authorizeSudo(): Promise<boolean> {
  return (await execInteractive('sudo', ['-v'])) === 0
}

/**
 * apt-get backed package manager for Debian and Ubuntu hosts
 */
export class AptPackageManager implements PackageManager {
  constructor(private readonly options: AptOptions = { sudo: true }) {}

  private async run(args: string[]): Promise<ExecResult> {
    // -n: never prompt while a spinner owns the terminal
    const command = this.options.sudo ? 'sudo' : 'apt-get'
    const commandArgs = this.options.sudo ? ['-n', 'apt-get', ...args] : args

    logger.debug(`Running: ${command} ${commandArgs.join(' ')}`)
    const result = await exec(command, commandArgs)
    if (result.stdout) {
      logger.debug(result.stdout)
    }
    return result
  }

  private privilegeError(step: ProvisionStepId, result: ExecResult): PrivilegeError {
    const hint = this.options.sudo
      ? 'check that your user may run apt-get through sudo'
      : 'run as root or enable sudo'
    return new PrivilegeError(step, `Insufficient privileges (${summarizeFailure(result)}): ${hint}`)
  }

  async refreshIndex(): Promise<void> {
    const result = await this.run(['update'])
    if (result.exitCode === 0) return

    if (isPrivilegeFailure(result)) {
      throw this.privilegeError('refresh-index', result)
    }
    throw new IndexRefreshError(`apt-get update failed: ${summarizeFailure(result)}`)
  }

  /**
   * Install packages. apt-get treats already installed packages as a no-op.
   */
  async install(packages: string[]): Promise<void> {
    if (packages.length === 0) return

    const result = await this.run(['install', '-y', ...packages])
    if (result.exitCode === 0) return

    const missing = findMissingPackage(result)
    if (missing) {
      throw new PackageNotFoundError(missing)
    }
    if (isPrivilegeFailure(result)) {
      throw this.privilegeError('install-system-packages', result)
    }
    throw new PackageInstallError(`apt-get install failed: ${summarizeFailure(result)}`)
  }
}
