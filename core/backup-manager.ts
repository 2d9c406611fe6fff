/**
 * Backup-and-Reset
 *
 * Archives an existing data directory on request, then clears it. The
 * directory is only cleared once the archive is known to exist on disk.
 */

import { existsSync } from 'fs'
import { stat, rm } from 'fs/promises'
import { basename, dirname } from 'path'
import { getBackupPath, type ProvisionPaths } from '../config/paths'
import { emptyDirectory } from './fs-utils'
import { ProvisionError, ErrorCodes, logDebug, logInfo } from './error-handler'
import { spawnAsync, type CommandRunner } from './spawn-utils'
import type { BackupResult, ResetResult } from '../types'

export type BackupManagerOptions = {
  runner?: CommandRunner
  now?: () => Date
}

export class BackupManager {
  private runner: CommandRunner
  private now: () => Date

  constructor(options: BackupManagerOptions = {}) {
    this.runner = options.runner ?? spawnAsync
    this.now = options.now ?? (() => new Date())
  }

  hasExistingDatabase(paths: ProvisionPaths): boolean {
    return existsSync(paths.db)
  }

  /**
   * Write <home>/mongodb_backup_<timestamp>.tar.gz holding the data directory.
   * @throws ProvisionError (BACKUP_FAILED) if the archive cannot be written
   */
  async createBackup(paths: ProvisionPaths): Promise<BackupResult> {
    const archivePath = getBackupPath(paths, this.now())
    const parent = dirname(paths.db)
    const entry = basename(paths.db)

    logDebug('Creating data directory backup', { archivePath })

    try {
      await this.runner('tar', ['-czf', archivePath, '-C', parent, entry])
      const { size } = await stat(archivePath)
      if (size === 0) {
        throw new Error('archive is empty')
      }
      logInfo('Backup created', { archivePath, size })
      return { path: archivePath, size }
    } catch (error) {
      // A partial archive is worse than none: it looks like a backup
      await rm(archivePath, { force: true })
      throw new ProvisionError(
        ErrorCodes.BACKUP_FAILED,
        `Backup failed, existing database left untouched: ${error instanceof Error ? error.message : String(error)}`,
        'fatal',
        'Free disk space in the home directory or decline the backup',
        { archivePath },
      )
    }
  }

  /**
   * Optionally back up, then empty the data directory.
   * Does nothing when no data directory exists.
   */
  async backupAndReset(
    paths: ProvisionPaths,
    confirmBackup: () => Promise<boolean>,
  ): Promise<ResetResult> {
    if (!this.hasExistingDatabase(paths)) {
      return { existed: false, backup: null, removedEntries: 0 }
    }

    const wantsBackup = await confirmBackup()
    const backup = wantsBackup ? await this.createBackup(paths) : null

    const removedEntries = await emptyDirectory(paths.db)
    logInfo('Cleared existing database', {
      dataDir: paths.db,
      removedEntries,
      backedUp: backup !== null,
    })

    return { existed: true, backup, removedEntries }
  }
}
