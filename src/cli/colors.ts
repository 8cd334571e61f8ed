import chalk, { Chalk, type ChalkInstance } from 'chalk'

/**
 * Check if we're running in an interactive terminal
 */
export function isTTY(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}

function getChalk(): ChalkInstance {
  if (!isTTY()) {
    return new Chalk({ level: 0 })
  }
  return chalk
}

const colors = getChalk()

export const red = colors.red
export const green = colors.green
export const yellow = colors.yellow
export const blue = colors.blue
export const cyan = colors.cyan
export const bold = colors.bold
export const dim = colors.dim
