import Conf from 'conf'
import { z } from 'zod'
import { PROVISION_STEPS } from './types.js'

export const MAX_RECORDED_RUNS = 20

/**
 * Schema for a persisted provisioning run
 */
export const ProvisionRunRecordSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  success: z.boolean(),
  failedStep: z.enum(PROVISION_STEPS).optional(),
  error: z.string().optional(),
})

export type ProvisionRunRecord = z.infer<typeof ProvisionRunRecordSchema>

interface HistoryState {
  runs: ProvisionRunRecord[]
}

export interface HistoryOptions {
  storeName?: string
  /** Directory holding the store, defaults to the OS config directory */
  cwd?: string
}

/**
 * Manages the persisted record of provisioning runs.
 * Uses Conf for persistence to ~/.config/url-to-pdf-provision-history/
 */
export class ProvisionHistory {
  private store: Conf<HistoryState>

  constructor(options: HistoryOptions = {}) {
    this.store = new Conf<HistoryState>({
      projectName: options.storeName ?? 'url-to-pdf-provision-history',
      cwd: options.cwd,
      defaults: {
        runs: [],
      },
    })
  }

  /**
   * Record a run, keeping only the most recent ones
   */
  record(run: ProvisionRunRecord): void {
    const runs = [...this.getRuns(), ProvisionRunRecordSchema.parse(run)]
    this.store.set('runs', runs.slice(-MAX_RECORDED_RUNS))
  }

  /**
   * Get recorded runs, oldest first. Entries that fail validation are dropped.
   */
  getRuns(): ProvisionRunRecord[] {
    return z.array(z.unknown())
      .catch([])
      .parse(this.store.get('runs'))
      .flatMap((run) => {
        const parsed = ProvisionRunRecordSchema.safeParse(run)
        return parsed.success ? [parsed.data] : []
      })
  }

  getLastRun(): ProvisionRunRecord | null {
    const runs = this.getRuns()
    return runs[runs.length - 1] ?? null
  }

  clear(): void {
    this.store.clear()
  }

  /**
   * Get the file path of the history store
   */
  getPath(): string {
    return this.store.path
  }
}
