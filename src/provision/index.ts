export { Provisioner, describeFailure, silentReporter, type ProvisionerDeps, type ProvisionPaths } from './provisioner.js'
export { AptPackageManager, authorizeSudo, type AptOptions } from './apt.js'
export { PipInstaller } from './pip.js'
export { NodeFileSystem } from './filesystem.js'
export { ProvisionHistory, MAX_RECORDED_RUNS, type ProvisionRunRecord } from './history.js'
export { checkPrerequisites, prerequisitesMet, type PrerequisiteCheck } from './detector.js'
export { parseManifest, type ManifestEntry } from './manifest.js'
export {
  ProvisionError,
  IndexRefreshError,
  PrivilegeError,
  PackageNotFoundError,
  PackageInstallError,
  DependencyInstallError,
  TargetMissingError,
  isProvisionError,
  isProvisionErrorWithCode,
  type ProvisionErrorCode,
} from './errors.js'
export * from './types.js'
