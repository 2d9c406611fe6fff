/**
 * Preflight guard: refuse to provision while a mongod is running.
 */

import { defaults } from '../config/defaults'
import {
  ProvisionError,
  ErrorCodes,
  createMongodRunningError,
} from './error-handler'
import {
  spawnAsync,
  CommandError,
  isCommandNotFound,
  type CommandRunner,
} from './spawn-utils'

/**
 * Ask pgrep for an exact process-name match.
 * pgrep exits 0 on a match and 1 when nothing matched.
 */
export async function isEngineRunning(
  runner: CommandRunner = spawnAsync,
  processName: string = defaults.engineProcessName,
): Promise<boolean> {
  try {
    // A conflict must leave the filesystem untouched, log file included.
    await runner('pgrep', ['-x', processName])
    return true
  } catch (error) {
    if (error instanceof CommandError && error.exitCode === 1) {
      return false
    }
    if (isCommandNotFound(error)) {
      throw new ProvisionError(
        ErrorCodes.DEPENDENCY_MISSING,
        'pgrep is not available, cannot check for a running MongoDB',
        'fatal',
        'Install procps (pgrep) and run the installer again',
      )
    }
    throw ProvisionError.from(error)
  }
}

/**
 * @throws ProvisionError (MONGOD_RUNNING) when an instance is running
 */
export async function assertEngineStopped(
  runner: CommandRunner = spawnAsync,
): Promise<void> {
  if (await isEngineRunning(runner)) {
    throw createMongodRunningError()
  }
}
