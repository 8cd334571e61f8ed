import { basename } from 'path'
import { formatUsage, type ProvisionConfig } from '../config/index.js'
import {
  DependencyInstallError,
  ProvisionError,
  TargetMissingError,
  isProvisionError,
} from './errors.js'
import { findEntry, manifestLines, parseManifest } from './manifest.js'
import {
  PROVISION_STEPS,
  type DependencyInstaller,
  type FileSystem,
  type PackageManager,
  type ProvisionReport,
  type ProvisionReporter,
  type ProvisionStepId,
  type StepResult,
} from './types.js'

export interface ProvisionerDeps {
  packageManager: PackageManager
  installer: DependencyInstaller
  fs: FileSystem
  reporter?: ProvisionReporter
}

/**
 * Absolute locations of the manifest and the target script
 */
export interface ProvisionPaths {
  manifest: string
  target: string
}

export const silentReporter: ProvisionReporter = {
  stepStarted: () => {},
  stepFinished: () => {},
  stepFailed: () => {},
}

function toProvisionError(step: ProvisionStepId, error: unknown): ProvisionError {
  if (isProvisionError(error)) return error
  const message = error instanceof Error ? error.message : String(error)
  return new ProvisionError('STEP_FAILED', step, message)
}

function describeManifest(dependencies: number, lines: number): string {
  if (dependencies === 0) {
    return `${lines} manifest ${lines === 1 ? 'line' : 'lines'}`
  }
  return `${dependencies} ${dependencies === 1 ? 'dependency' : 'dependencies'}`
}

/**
 * Describe a failure with the position of the step that failed,
 * e.g. "Step 3/4 (install-dependencies) failed: ..."
 */
export function describeFailure(error: ProvisionError): string {
  const position = PROVISION_STEPS.indexOf(error.step) + 1
  return `Step ${position}/${PROVISION_STEPS.length} (${error.step}) failed: ${error.message}`
}

/**
 * Prepares the host for the URL-to-PDF agent.
 *
 * Steps run strictly in order and the first failure stops the run. The only
 * exception is a failed index refresh under the `continue` refresh policy,
 * which is recorded as a warning.
 */
export class Provisioner {
  private readonly reporter: ProvisionReporter

  constructor(
    private readonly config: ProvisionConfig,
    private readonly paths: ProvisionPaths,
    private readonly deps: ProvisionerDeps
  ) {
    this.reporter = deps.reporter ?? silentReporter
  }

  async run(): Promise<ProvisionReport> {
    const results: StepResult[] = []

    for (const [index, step] of PROVISION_STEPS.entries()) {
      this.reporter.stepStarted(step, index + 1, PROVISION_STEPS.length)

      let result: StepResult
      try {
        result = await this.runStep(step)
      } catch (error) {
        const failure = toProvisionError(step, error)

        if (step !== 'refresh-index' || this.config.refreshPolicy !== 'continue') {
          this.reporter.stepFailed(step, failure)
          throw failure
        }
        result = { step, status: 'warned', detail: failure.message }
      }

      this.reporter.stepFinished(result)
      results.push(result)
    }

    return { steps: results, usage: formatUsage(this.config) }
  }

  private async runStep(step: ProvisionStepId): Promise<StepResult> {
    switch (step) {
      case 'refresh-index':
        await this.deps.packageManager.refreshIndex()
        return { step, status: 'done' }
      case 'install-system-packages':
        return await this.installSystemPackages()
      case 'install-dependencies':
        return await this.installDependencies()
      case 'make-executable':
        return await this.makeTargetExecutable()
    }
  }

  private async installSystemPackages(): Promise<StepResult> {
    const packages = this.config.systemPackages
    if (packages.length === 0) {
      return { step: 'install-system-packages', status: 'unchanged', detail: 'no system packages configured' }
    }

    await this.deps.packageManager.install(packages)
    return { step: 'install-system-packages', status: 'done', detail: packages.join(', ') }
  }

  private async installDependencies(): Promise<StepResult> {
    const manifestPath = this.paths.manifest
    if (!(await this.deps.fs.exists(manifestPath))) {
      throw new DependencyInstallError(`Dependency manifest not found: ${manifestPath}`)
    }

    const content = await this.deps.fs.readFile(manifestPath)
    const lines = manifestLines(content)
    if (lines.length === 0) {
      return { step: 'install-dependencies', status: 'unchanged', detail: 'manifest lists no dependencies' }
    }

    // Named entries only locate the line an installer error points at
    const entries = parseManifest(content)

    try {
      await this.deps.installer.installManifest(manifestPath)
    } catch (error) {
      if (error instanceof DependencyInstallError && error.dependency) {
        const entry = findEntry(entries, error.dependency)
        if (entry) {
          throw new DependencyInstallError(
            `${error.message} (${basename(manifestPath)} line ${entry.line})`,
            error.dependency
          )
        }
      }
      throw error
    }

    return { step: 'install-dependencies', status: 'done', detail: describeManifest(entries.length, lines.length) }
  }

  private async makeTargetExecutable(): Promise<StepResult> {
    const target = this.paths.target
    if (!(await this.deps.fs.exists(target))) {
      throw new TargetMissingError(target)
    }

    if (await this.deps.fs.isExecutable(target)) {
      return { step: 'make-executable', status: 'unchanged', detail: 'already executable' }
    }

    await this.deps.fs.makeExecutable(target)
    return { step: 'make-executable', status: 'done' }
  }
}
