import { commandExists } from '../utils/exec.js'

export interface PrerequisiteCheck {
  aptAvailable: boolean
  sudoAvailable: boolean
  message: string
}

/**
 * Check that the host can run the system package steps.
 * pip is not checked here: installing python3-pip is one of the steps.
 */
export async function checkPrerequisites(options: { sudo: boolean }): Promise<PrerequisiteCheck> {
  const aptAvailable = await commandExists('apt-get')

  if (!aptAvailable) {
    return {
      aptAvailable: false,
      sudoAvailable: false,
      message: 'apt-get was not found. This provisioner supports Debian and Ubuntu hosts.',
    }
  }

  if (!options.sudo) {
    return {
      aptAvailable: true,
      sudoAvailable: false,
      message: 'All prerequisites met (running without sudo).',
    }
  }

  const sudoAvailable = await commandExists('sudo')

  if (!sudoAvailable) {
    return {
      aptAvailable: true,
      sudoAvailable: false,
      message: 'sudo was not found. Install sudo or run as root with --no-sudo.',
    }
  }

  return {
    aptAvailable: true,
    sudoAvailable: true,
    message: 'All prerequisites met.',
  }
}

export function prerequisitesMet(check: PrerequisiteCheck, options: { sudo: boolean }): boolean {
  return check.aptAvailable && (check.sudoAvailable || !options.sudo)
}
