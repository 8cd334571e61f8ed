import { Command } from 'commander'
import type { ProvisionConfigInput } from '../config/index.js'

export interface CliOptions {
  config?: string
  overrides: ProvisionConfigInput

  yes: boolean
  quiet: boolean
  json: boolean
  verbose: boolean

  status: boolean
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('url-to-pdf-provision')
    .description('Prepare this host to run the URL to PDF agent')
    .version('0.1.0')

  program
    .option('-c, --config <path>', 'Config file (default: provision.config.json if present)')
    .option('-m, --manifest <path>', 'Dependency manifest (default: requirements.txt)')
    .option('-t, --target <path>', 'Script to make executable (default: url_to_pdf_agent.py)')
    .option('--packages <list>', 'Comma-separated system packages to install')
    .option('--interpreter <command>', 'Interpreter shown in the usage hint (default: python3)')
    .option('--pip <command>', 'Command used to install dependencies (default: pip3)')
    .option('--no-sudo', 'Run apt-get directly instead of through sudo')
    .option('--continue-on-refresh-failure', 'Keep going when the package index refresh fails', false)

  program
    .option('-y, --yes', 'Do not ask for confirmation', false)
    .option('-q, --quiet', 'Minimal output', false)
    .option('-j, --json', 'Output the result as JSON', false)
    .option('-v, --verbose', 'Show commands and their output', false)
    .option('--status', 'Show the last recorded provisioning run', false)

  return program
}

/**
 * Split "a, b,,c" into ["a", "b", "c"]
 */
export function parsePackageList(raw: string): string[] {
  return raw
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
}

export function parseArgs(argv: string[]): CliOptions {
  const program = createProgram()
  program.parse(argv)

  const opts = program.opts<{
    config?: string
    manifest?: string
    target?: string
    packages?: string
    interpreter?: string
    pip?: string
    sudo: boolean
    continueOnRefreshFailure: boolean
    yes: boolean
    quiet: boolean
    json: boolean
    verbose: boolean
    status: boolean
  }>()

  // Only options given on the command line override the config file
  const sudoFromCli = program.getOptionValueSource('sudo') === 'cli'

  return {
    config: opts.config,
    overrides: {
      manifestPath: opts.manifest,
      targetScript: opts.target,
      systemPackages: opts.packages !== undefined ? parsePackageList(opts.packages) : undefined,
      interpreter: opts.interpreter,
      pipCommand: opts.pip,
      sudo: sudoFromCli ? opts.sudo : undefined,
      refreshPolicy: opts.continueOnRefreshFailure ? 'continue' : undefined,
    },
    yes: opts.yes ?? false,
    quiet: opts.quiet ?? false,
    json: opts.json ?? false,
    verbose: opts.verbose ?? false,
    status: opts.status ?? false,
  }
}
