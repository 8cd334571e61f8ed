import { access, chmod, readFile, stat } from 'fs/promises'
import type { FileSystem } from './types.js'

const EXECUTE_BITS = 0o111

/**
 * FileSystem backed by the local disk
 */
export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    try {
      await access(path)
      return true
    } catch {
      return false
    }
  }

  async readFile(path: string): Promise<string> {
    return await readFile(path, 'utf-8')
  }

  async isExecutable(path: string): Promise<boolean> {
    const { mode } = await stat(path)
    return (mode & EXECUTE_BITS) === EXECUTE_BITS
  }

  /**
   * Add execute permission for user, group and others (chmod +x)
   */
  async makeExecutable(path: string): Promise<void> {
    const { mode } = await stat(path)
    await chmod(path, (mode & 0o7777) | EXECUTE_BITS)
  }
}
