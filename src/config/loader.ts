import { existsSync, readFileSync } from 'fs'
import { dirname, isAbsolute, resolve } from 'path'
import { z } from 'zod'
import {
  ProvisionConfigSchema,
  type ProvisionConfig,
  type ProvisionConfigInput,
} from './schema.js'

export const DEFAULT_CONFIG_FILE = 'provision.config.json'

export interface LoadConfigOptions {
  /** Directory used for the default config file and for CLI paths */
  cwd?: string
  /** Explicit config file; it must exist */
  configPath?: string
  /** Values taken from the command line, applied last */
  overrides?: ProvisionConfigInput
}

export interface LoadedConfig {
  config: ProvisionConfig
  /** Config file the values were read from, if any */
  source?: string
  /** Absolute locations of the files the provisioner touches */
  paths: {
    manifest: string
    target: string
  }
}

const ConfigFileSchema = z.record(z.string(), z.unknown())

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n')
}

function readConfigFile(path: string): Record<string, unknown> {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Could not read config file ${path}: ${message}`)
  }

  const parsed = ConfigFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(`Config file ${path} must contain a JSON object`)
  }
  return parsed.data
}

function definedEntries(values: ProvisionConfigInput): Partial<ProvisionConfigInput> {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  )
}

/**
 * Load provisioner configuration.
 * Defaults < config file < command line overrides. Relative paths from the
 * config file resolve against its directory, those from the command line
 * against the working directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd()
  const overrides = definedEntries(options.overrides ?? {})

  let source: string | undefined
  if (options.configPath) {
    source = resolve(cwd, options.configPath)
    if (!existsSync(source)) {
      throw new Error(`Config file not found: ${source}`)
    }
  } else if (existsSync(resolve(cwd, DEFAULT_CONFIG_FILE))) {
    source = resolve(cwd, DEFAULT_CONFIG_FILE)
  }

  const fileValues = source ? readConfigFile(source) : {}
  const result = ProvisionConfigSchema.safeParse({ ...fileValues, ...overrides })

  if (!result.success) {
    const origin = source ? ` in ${source}` : ''
    throw new Error(`Invalid configuration${origin}:\n${formatIssues(result.error)}`)
  }

  const config = result.data
  const fileDir = source ? dirname(source) : cwd

  const locate = (value: string, fromCli: boolean): string => {
    if (isAbsolute(value)) return value
    return resolve(fromCli ? cwd : fileDir, value)
  }

  return {
    config,
    source,
    paths: {
      manifest: locate(config.manifestPath, overrides.manifestPath !== undefined),
      target: locate(config.targetScript, overrides.targetScript !== undefined),
    },
  }
}

/**
 * Build the invocation hint for the downstream agent
 */
export function formatUsage(config: ProvisionConfig): string {
  return [config.interpreter, config.targetScript, config.usageArgs]
    .filter((part) => part.length > 0)
    .join(' ')
}
