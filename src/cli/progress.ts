import ora, { type Ora } from 'ora'
import { STEP_LABELS, silentReporter, type ProvisionReporter, type ProvisionStepId, type StepResult } from '../provision/index.js'
import type { CliContext } from './interactive.js'
import { dim } from './colors.js'

/**
 * Shows one spinner per provisioning step on standard output
 */
export class SpinnerReporter implements ProvisionReporter {
  private spinner: Ora | null = null

  stepStarted(step: ProvisionStepId, index: number, total: number): void {
    this.spinner = ora({
      text: `[${index}/${total}] ${STEP_LABELS[step]}...`,
      stream: process.stdout,
    }).start()
  }

  stepFinished(result: StepResult): void {
    const detail = result.detail ? dim(` (${result.detail})`) : ''
    const text = `${STEP_LABELS[result.step]}${detail}`

    if (result.status === 'warned') {
      this.spinner?.warn(text)
    } else {
      this.spinner?.succeed(text)
    }
    this.spinner = null
  }

  stepFailed(step: ProvisionStepId): void {
    this.spinner?.fail(`${STEP_LABELS[step]} failed`)
    this.spinner = null
  }
}

export function createReporter(ctx: CliContext): ProvisionReporter {
  if (ctx.quiet || ctx.json) return silentReporter
  return new SpinnerReporter()
}
