import { execa, type Options as ExecaOptions } from 'execa'

export interface ExecResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Execute a command and return the result.
 * A command that could not be spawned at all reports exit code 127.
 */
export async function exec(
  command: string,
  args: string[] = [],
  options?: ExecaOptions
): Promise<ExecResult> {
  const result = await execa(command, args, {
    reject: false,
    ...options,
  })
  const spawnFailed = result.failed && result.exitCode === undefined
  const stderr = String(result.stderr ?? '')
  return {
    stdout: String(result.stdout ?? ''),
    stderr: stderr || (spawnFailed ? `${command}: command could not be started` : ''),
    exitCode: result.exitCode ?? (result.failed ? 127 : 0),
  }
}

/**
 * Check if a command exists in PATH (cross-platform)
 */
export async function commandExists(command: string): Promise<boolean> {
  // Use 'where' on Windows, 'which' on Unix-like systems
  const checkCommand = process.platform === 'win32' ? 'where' : 'which'
  const result = await exec(checkCommand, [command])
  return result.exitCode === 0
}

/**
 * Execute a command interactively (inherits stdio)
 */
export async function execInteractive(
  command: string,
  args: string[] = [],
  options?: ExecaOptions
): Promise<number> {
  const result = await execa(command, args, {
    stdio: 'inherit',
    reject: false,
    ...options,
  })
  return result.exitCode ?? 127
}
