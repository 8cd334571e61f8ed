/**
 * Provisioning error definitions.
 *
 * Every failure the provisioner reports is a ProvisionError carrying the step
 * that failed, so the CLI can name it without parsing messages.
 */

import type { ProvisionStepId } from './types.js'

/**
 * Error codes for provisioning failures.
 */
export type ProvisionErrorCode =
  | 'INDEX_REFRESH_FAILED'
  | 'PRIVILEGE_REQUIRED'
  | 'PACKAGE_NOT_FOUND'
  | 'PACKAGE_INSTALL_FAILED'
  | 'DEPENDENCY_INSTALL_FAILED'
  | 'TARGET_MISSING'
  | 'STEP_FAILED'

/**
 * Error from a provisioning step.
 *
 * @example
 * ```typescript
 * throw new ProvisionError('STEP_FAILED', 'make-executable', 'Operation not permitted')
 * ```
 */
export class ProvisionError extends Error {
  readonly name: string = 'ProvisionError'

  constructor(
    /** Error code identifying the type of error */
    readonly code: ProvisionErrorCode,
    /** Step that was running when the error occurred */
    readonly step: ProvisionStepId,
    message: string
  ) {
    super(message)
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Refreshing the system package index failed.
 */
export class IndexRefreshError extends ProvisionError {
  readonly name = 'IndexRefreshError'

  constructor(message: string) {
    super('INDEX_REFRESH_FAILED', 'refresh-index', message)
  }
}

/**
 * The package manager refused to run without elevated rights.
 */
export class PrivilegeError extends ProvisionError {
  readonly name = 'PrivilegeError'

  constructor(step: ProvisionStepId, message: string) {
    super('PRIVILEGE_REQUIRED', step, message)
  }
}

/**
 * A named system package is not available from the package index.
 */
export class PackageNotFoundError extends ProvisionError {
  readonly name = 'PackageNotFoundError'

  constructor(readonly packageName: string) {
    super(
      'PACKAGE_NOT_FOUND',
      'install-system-packages',
      `System package not found: ${packageName}`
    )
  }
}

/**
 * Installing system packages failed for a reason other than a missing package
 * or missing privileges.
 */
export class PackageInstallError extends ProvisionError {
  readonly name = 'PackageInstallError'

  constructor(message: string) {
    super('PACKAGE_INSTALL_FAILED', 'install-system-packages', message)
  }
}

/**
 * The manifest is missing or one of its dependencies could not be installed.
 */
export class DependencyInstallError extends ProvisionError {
  readonly name = 'DependencyInstallError'

  constructor(
    message: string,
    /** Name of the dependency that could not be resolved, when the installer named one */
    readonly dependency?: string
  ) {
    super('DEPENDENCY_INSTALL_FAILED', 'install-dependencies', message)
  }
}

/**
 * The script to make executable does not exist.
 */
export class TargetMissingError extends ProvisionError {
  readonly name = 'TargetMissingError'

  constructor(readonly path: string) {
    super('TARGET_MISSING', 'make-executable', `Target script not found: ${path}`)
  }
}

/**
 * Type guard to check if an error is a ProvisionError.
 */
export function isProvisionError(error: unknown): error is ProvisionError {
  return error instanceof ProvisionError
}

/**
 * Type guard to check if an error is a ProvisionError with a specific code.
 */
export function isProvisionErrorWithCode(
  error: unknown,
  code: ProvisionErrorCode
): error is ProvisionError {
  return isProvisionError(error) && error.code === code
}
