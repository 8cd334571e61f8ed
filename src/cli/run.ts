import { confirm } from '@inquirer/prompts'
import { parseArgs, type CliOptions } from './args.js'
import { createContext, type CliContext } from './interactive.js'
import { createReporter } from './progress.js'
import { bold, cyan, green, red, yellow } from './colors.js'
import { loadConfig, type ProvisionConfig } from '../config/index.js'
import {
  AptPackageManager,
  NodeFileSystem,
  PipInstaller,
  ProvisionHistory,
  PrivilegeError,
  Provisioner,
  authorizeSudo,
  checkPrerequisites,
  describeFailure,
  isProvisionError,
  isProvisionErrorWithCode,
  prerequisitesMet,
  type DependencyInstaller,
  type FileSystem,
  type PackageManager,
  type PrerequisiteCheck,
  type ProvisionReport,
  type ProvisionRunRecord,
} from '../provision/index.js'
import { errorJson, logger, outputJson, setQuietMode, setVerboseMode } from '../utils/logger.js'

export const COMPLETION_MESSAGE = 'Setup complete! You can now run the agent with:'

export type HistoryStore = Pick<ProvisionHistory, 'record' | 'getLastRun'>

/**
 * Collaborators of the CLI, replaceable in tests
 */
export interface CliServices {
  cwd: string
  fs: FileSystem
  createPackageManager(config: ProvisionConfig): PackageManager
  createInstaller(config: ProvisionConfig): DependencyInstaller
  checkPrerequisites(options: { sudo: boolean }): Promise<PrerequisiteCheck>
  authorizeSudo(): Promise<boolean>
  openHistory(): HistoryStore
  confirm(message: string): Promise<boolean>
}

export function defaultServices(): CliServices {
  return {
    cwd: process.cwd(),
    fs: new NodeFileSystem(),
    createPackageManager: (config) => new AptPackageManager({ sudo: config.sudo }),
    createInstaller: (config) => new PipInstaller(config.pipCommand),
    checkPrerequisites,
    authorizeSudo,
    openHistory: () => new ProvisionHistory(),
    confirm: (message) => confirm({ message, default: true }),
  }
}

function recordRun(history: HistoryStore, run: ProvisionRunRecord): void {
  try {
    history.record(run)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.warn(`Could not record provisioning run: ${message}`)
  }
}

function showStatus(history: HistoryStore, ctx: CliContext): void {
  const last = history.getLastRun()

  if (ctx.json) {
    outputJson({ lastRun: last })
    return
  }

  if (!last) {
    logger.info('No provisioning runs recorded')
    return
  }

  console.log(`Last run: ${last.finishedAt}`)
  console.log(`Result: ${last.success ? green('Success') : red('Failed')}`)
  if (last.failedStep) {
    console.log(`Failed step: ${last.failedStep}`)
  }
  if (last.error) {
    console.log(`Error: ${last.error}`)
  }
}

function printCompletion(report: ProvisionReport, ctx: CliContext): void {
  if (ctx.json) {
    outputJson({ success: true, steps: report.steps, usage: report.usage })
    return
  }

  if (!ctx.quiet) {
    console.log('')
    console.log(green(COMPLETION_MESSAGE))
  }
  console.log(report.usage)
}

async function confirmPlan(config: ProvisionConfig, services: CliServices): Promise<void> {
  const packages = config.systemPackages.join(', ') || 'none'
  const via = config.sudo ? ' using sudo' : ''
  const proceed = await services.confirm(
    `Install system packages (${bold(packages)})${via} and the dependencies in ${config.manifestPath}?`
  )

  if (!proceed) {
    throw new Error('Provisioning cancelled by user')
  }
}

async function provision(options: CliOptions, ctx: CliContext, services: CliServices): Promise<void> {
  const loaded = loadConfig({
    cwd: services.cwd,
    configPath: options.config,
    overrides: options.overrides,
  })
  const { config } = loaded

  if (loaded.source) {
    logger.info(`Using config ${loaded.source}`)
  }

  const prereqs = await services.checkPrerequisites({ sudo: config.sudo })
  if (!prerequisitesMet(prereqs, { sudo: config.sudo })) {
    throw new Error(prereqs.message)
  }

  if (ctx.confirm) {
    await confirmPlan(config, services)
  }

  // apt-get runs under `sudo -n`: ask for the password before any spinner starts
  if (config.sudo && ctx.terminal && !(await services.authorizeSudo())) {
    throw new PrivilegeError('refresh-index', 'sudo did not grant privileges to run apt-get')
  }

  if (config.refreshPolicy === 'continue') {
    logger.warn('Package index refresh failures will not stop provisioning')
  }

  const provisioner = new Provisioner(config, loaded.paths, {
    packageManager: services.createPackageManager(config),
    installer: services.createInstaller(config),
    fs: services.fs,
    reporter: createReporter(ctx),
  })

  const history = services.openHistory()
  const startedAt = new Date().toISOString()

  let report: ProvisionReport
  try {
    report = await provisioner.run()
  } catch (error) {
    recordRun(history, {
      startedAt,
      finishedAt: new Date().toISOString(),
      success: false,
      failedStep: isProvisionError(error) ? error.step : undefined,
      error: error instanceof Error ? error.message : String(error),
    })
    throw error
  }

  recordRun(history, { startedAt, finishedAt: new Date().toISOString(), success: true })

  for (const step of report.steps) {
    if (step.status === 'warned') {
      logger.warn(`${step.step}: ${step.detail ?? 'completed with warnings'}`)
    }
  }

  printCompletion(report, ctx)
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], services: CliServices = defaultServices()): Promise<number> {
  const options = parseArgs(argv)
  const ctx = createContext(options)

  setQuietMode(options.quiet || options.json)
  setVerboseMode(options.verbose)

  try {
    if (options.status) {
      showStatus(services.openHistory(), ctx)
      return 0
    }

    await provision(options, ctx, services)
    return 0
  } catch (error) {
    const message = isProvisionError(error)
      ? describeFailure(error)
      : error instanceof Error
        ? error.message
        : String(error)

    if (options.json) {
      errorJson(message)
    } else {
      logger.error(message)
      if (!options.quiet && isProvisionErrorWithCode(error, 'PRIVILEGE_REQUIRED')) {
        console.error(yellow(`Hint: run as a user allowed to use ${cyan('sudo')}, or as root with ${cyan('--no-sudo')}`))
      }
    }
    return 1
  }
}
