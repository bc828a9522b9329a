import fs from 'node:fs'
import { fileURLToPath } from 'node:url'

/**
 * True when `moduleUrl` is the script node was started with. `argvPath` may be a
 * symlink (an npm bin link), so both sides are compared by real path.
 */
export function isMainModule(moduleUrl: string, argvPath: string | undefined): boolean {
  if (!argvPath) return false
  try {
    return fs.realpathSync(fileURLToPath(moduleUrl)) === fs.realpathSync(argvPath)
  } catch {
    return false
  }
}
