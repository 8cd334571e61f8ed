/**
 * Provisioning steps, in the order they run
 */
export const PROVISION_STEPS = [
  'refresh-index',
  'install-system-packages',
  'install-dependencies',
  'make-executable',
] as const

export type ProvisionStepId = (typeof PROVISION_STEPS)[number]

export const STEP_LABELS: Record<ProvisionStepId, string> = {
  'refresh-index': 'Refreshing system package index',
  'install-system-packages': 'Installing system dependencies',
  'install-dependencies': 'Installing Python dependencies',
  'make-executable': 'Making agent script executable',
}

/**
 * Outcome of a step that did not fail.
 * - done: the step changed something or ran its installer
 * - unchanged: nothing needed doing
 * - warned: the step failed but the configured policy let the run continue
 */
export type StepStatus = 'done' | 'unchanged' | 'warned'

export interface StepResult {
  step: ProvisionStepId
  status: StepStatus
  detail?: string
}

export interface ProvisionReport {
  steps: StepResult[]
  /** Invocation hint for the downstream agent */
  usage: string
}

/**
 * System package manager (apt-get on Debian-based hosts)
 */
export interface PackageManager {
  refreshIndex(): Promise<void>
  install(packages: string[]): Promise<void>
}

/**
 * Installs the dependencies listed in a manifest file
 */
export interface DependencyInstaller {
  installManifest(manifestPath: string): Promise<void>
}

/**
 * File operations the provisioner needs
 */
export interface FileSystem {
  exists(path: string): Promise<boolean>
  readFile(path: string): Promise<string>
  isExecutable(path: string): Promise<boolean>
  makeExecutable(path: string): Promise<void>
}

/**
 * Receives progress notifications while steps run
 */
export interface ProvisionReporter {
  stepStarted(step: ProvisionStepId, index: number, total: number): void
  stepFinished(result: StepResult): void
  stepFailed(step: ProvisionStepId, error: Error): void
}
