/**
 * MongoDB Binary Manager
 *
 * Fetch pipeline for the engine, shell client and tools archives. Each
 * archive is downloaded and extracted into a staging directory under the
 * install root, verified, and only then moved into place. Every change to
 * the live tree is registered on the caller's transaction so a failure at
 * any point puts the previous installation back.
 */

import { createReadStream, createWriteStream } from 'fs'
import { mkdir, readdir, readlink, rm, symlink, unlink, lstat } from 'fs/promises'
import { join } from 'path'
import { createHash } from 'crypto'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import { defaults } from '../../config/defaults'
import type { ProvisionPaths } from '../../config/paths'
import {
  ProvisionError,
  ErrorCodes,
  createDownloadError,
  logDebug,
  logWarning,
} from '../../core/error-handler'
import { moveEntry, pathExists } from '../../core/fs-utils'
import {
  buildPathExport,
  ensureLinePresent,
  restoreProfile,
} from '../../core/profile-manager'
import { spawnAsync, type CommandRunner } from '../../core/spawn-utils'
import type { TransactionManager } from '../../core/transaction-manager'
import { getArtifacts, parseChecksumFile } from './binary-urls'
import type {
  Artifact,
  MongoRelease,
  ProgressCallback,
} from '../../types'

export type FetchFn = (
  url: string,
  init?: { signal?: AbortSignal },
) => Promise<Response>

export type BinaryManagerOptions = {
  runner?: CommandRunner
  fetch?: FetchFn
  requireChecksum?: boolean
  downloadTimeoutMs?: number
}

export type ChecksumStatus = 'verified' | 'unavailable'

export type StagedArtifact = {
  artifact: Artifact
  // extracted top-level directory inside the staging area
  stagedDir: string
  checksum: ChecksumStatus
}

export type InstalledArtifact = {
  artifact: Artifact
  installDir: string
  checksum: ChecksumStatus
}

export type InstallResult = {
  artifacts: InstalledArtifact[]
  engineDir: string
  profileLinesAdded: string[]
}

export class MongoBinaryManager {
  private runner: CommandRunner
  private fetchFn: FetchFn
  private requireChecksum: boolean
  private downloadTimeoutMs: number

  constructor(options: BinaryManagerOptions = {}) {
    this.runner = options.runner ?? spawnAsync
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
    this.requireChecksum = options.requireChecksum ?? false
    this.downloadTimeoutMs =
      options.downloadTimeoutMs ?? defaults.downloadTimeoutMs
  }

  /**
   * Stream an archive to disk.
   * @throws ProvisionError (DOWNLOAD_FAILED) on network errors or non-2xx
   */
  async downloadArchive(artifact: Artifact, destFile: string): Promise<void> {
    const controller = new AbortController()
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.downloadTimeoutMs,
    )

    let response: Response
    try {
      response = await this.fetchFn(artifact.url, { signal: controller.signal })
    } catch (error) {
      clearTimeout(timeoutId)
      const reason =
        error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${this.downloadTimeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error)
      throw createDownloadError(artifact.displayName, artifact.url, reason)
    }

    try {
      if (!response.ok) {
        throw createDownloadError(
          artifact.displayName,
          artifact.url,
          `${response.status} ${response.statusText}`.trim(),
        )
      }
      if (!response.body) {
        throw createDownloadError(
          artifact.displayName,
          artifact.url,
          'response has no body',
        )
      }

      const fileStream = createWriteStream(destFile)
      try {
        await pipeline(Readable.fromWeb(response.body), fileStream)
      } catch (error) {
        fileStream.destroy()
        throw createDownloadError(
          artifact.displayName,
          artifact.url,
          error instanceof Error ? error.message : String(error),
        )
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Compare the archive against its published SHA-256.
   * A missing checksum is tolerated with a warning unless checksums are required.
   */
  async verifyChecksum(
    artifact: Artifact,
    archiveFile: string,
  ): Promise<ChecksumStatus> {
    const expected = artifact.checksumUrl
      ? await this.fetchChecksum(artifact.checksumUrl)
      : null

    if (!expected) {
      if (this.requireChecksum) {
        throw new ProvisionError(
          ErrorCodes.CHECKSUM_UNAVAILABLE,
          `No published checksum for ${artifact.displayName}`,
          'fatal',
          'Run without --require-checksum to accept unverified archives',
          { url: artifact.url },
        )
      }
      logWarning(
        `No published checksum for ${artifact.displayName}, archive not verified`,
        { url: artifact.url },
      )
      return 'unavailable'
    }

    const actual = await sha256File(archiveFile)
    if (actual !== expected) {
      throw new ProvisionError(
        ErrorCodes.CHECKSUM_MISMATCH,
        `Checksum mismatch for ${artifact.displayName}`,
        'fatal',
        'The download may be corrupt or tampered with; try again later',
        { url: artifact.url, expected, actual },
      )
    }

    logDebug('Checksum verified', { url: artifact.url, sha256: actual })
    return 'verified'
  }

  /**
   * Fetch and parse a `.sha256` file. Unreachable, slow or malformed
   * checksum files all count as unavailable.
   */
  private async fetchChecksum(url: string): Promise<string | null> {
    const controller = new AbortController()
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.downloadTimeoutMs,
    )
    try {
      const response = await this.fetchFn(url, { signal: controller.signal })
      if (!response.ok) {
        logDebug('Checksum file not available', { url, status: response.status })
        return null
      }
      return parseChecksumFile(await response.text())
    } catch (error) {
      logDebug('Checksum fetch failed', {
        url,
        error:
          error instanceof Error && error.name === 'AbortError'
            ? `timed out after ${this.downloadTimeoutMs}ms`
            : error instanceof Error
              ? error.message
              : String(error),
      })
      return null
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Extract an archive and locate its top-level directory.
   * @throws ProvisionError (EXTRACT_FAILED)
   */
  async extract(
    artifact: Artifact,
    archiveFile: string,
    extractDir: string,
  ): Promise<string> {
    await mkdir(extractDir, { recursive: true })
    try {
      await this.runner('tar', ['-xzf', archiveFile, '-C', extractDir])
    } catch (error) {
      throw new ProvisionError(
        ErrorCodes.EXTRACT_FAILED,
        `Failed to extract ${artifact.displayName}: ${error instanceof Error ? error.message : String(error)}`,
        'fatal',
      )
    }

    const entries = await readdir(extractDir, { withFileTypes: true })
    const dirs = entries.filter((entry) => entry.isDirectory())
    const match =
      dirs.find((entry) => entry.name === artifact.directoryName) ??
      (dirs.length === 1 ? dirs[0] : undefined)

    if (!match) {
      throw new ProvisionError(
        ErrorCodes.EXTRACT_FAILED,
        `Archive for ${artifact.displayName} does not contain ${artifact.directoryName}/`,
        'fatal',
        undefined,
        { found: entries.map((entry) => entry.name) },
      )
    }
    return join(extractDir, match.name)
  }

  /**
   * Download, verify and extract one artifact into the staging area.
   */
  async stageArtifact(
    artifact: Artifact,
    stagingDir: string,
    onProgress?: ProgressCallback,
  ): Promise<StagedArtifact> {
    const workDir = join(stagingDir, artifact.kind)
    await mkdir(workDir, { recursive: true })
    const archiveFile = join(workDir, `${artifact.kind}.tgz`)

    onProgress?.({
      stage: 'downloading',
      message: `Downloading ${artifact.displayName}...`,
    })
    await this.downloadArchive(artifact, archiveFile)

    onProgress?.({
      stage: 'verifying',
      message: `Verifying ${artifact.displayName}...`,
    })
    const checksum = await this.verifyChecksum(artifact, archiveFile)

    onProgress?.({
      stage: 'extracting',
      message: `Extracting ${artifact.displayName}...`,
    })
    const stagedDir = await this.extract(
      artifact,
      archiveFile,
      join(workDir, 'extract'),
    )
    await rm(archiveFile, { force: true })

    return { artifact, stagedDir, checksum }
  }

  /**
   * Move a staged directory to <root>/<directoryName>. An existing install
   * is moved aside, restored on rollback and deleted on commit.
   */
  async promote(
    staged: StagedArtifact,
    paths: ProvisionPaths,
    tx: TransactionManager,
    stamp: string,
  ): Promise<string> {
    const target = join(paths.root, staged.artifact.directoryName)
    const previous = (await pathExists(target))
      ? `${target}.previous-${stamp}`
      : null

    if (previous) {
      await moveEntry(target, previous)
      tx.onCommit({
        description: `Remove replaced ${staged.artifact.directoryName}`,
        execute: () => rm(previous, { recursive: true, force: true }),
      })
    }

    tx.addRollback({
      description: `Remove installed ${staged.artifact.directoryName}`,
      execute: async () => {
        await rm(target, { recursive: true, force: true })
        if (previous) {
          await moveEntry(previous, target)
        }
      },
    })

    await moveEntry(staged.stagedDir, target)
    logDebug('Promoted artifact', { target, replaced: previous !== null })
    return target
  }

  /**
   * Point <root>/mongodb-binary at the engine directory
   */
  async linkEngine(
    paths: ProvisionPaths,
    engineDir: string,
    tx: TransactionManager,
    stamp: string,
  ): Promise<void> {
    const link = paths.binaryLink
    let previousTarget: string | null = null
    let movedAside: string | null = null

    if (await pathExists(link)) {
      const info = await lstat(link)
      if (info.isSymbolicLink()) {
        previousTarget = await readlink(link)
        await unlink(link)
      } else {
        movedAside = `${link}.previous-${stamp}`
        await moveEntry(link, movedAside)
      }
    }

    tx.addRollback({
      description: 'Restore engine symlink',
      execute: async () => {
        await rm(link, { recursive: true, force: true })
        if (previousTarget) {
          await symlink(previousTarget, link)
        } else if (movedAside) {
          await moveEntry(movedAside, link)
        }
      },
    })
    if (movedAside) {
      const aside = movedAside
      tx.onCommit({
        description: 'Remove replaced mongodb-binary',
        execute: () => rm(aside, { recursive: true, force: true }),
      })
    }

    await symlink(engineDir, link)
  }

  /**
   * Add PATH exports for the shell client and tools to the profile
   */
  async exportPaths(
    paths: ProvisionPaths,
    installed: InstalledArtifact[],
    tx: TransactionManager,
  ): Promise<string[]> {
    const added: string[] = []
    for (const { artifact, installDir } of installed) {
      if (!artifact.exportPath) continue
      const line = buildPathExport(paths.home, join(installDir, 'bin'))
      const result = await ensureLinePresent(paths.profile, line)
      if (result.added) {
        added.push(line)
        tx.addRollback({
          description: `Remove PATH export for ${artifact.displayName}`,
          execute: () => restoreProfile(paths.profile, result.previous),
        })
      }
    }
    return added
  }

  /**
   * Stage all artifacts, then promote them into the live tree, link the
   * engine and update the profile.
   */
  async install(
    release: MongoRelease,
    paths: ProvisionPaths,
    tx: TransactionManager,
    onProgress?: ProgressCallback,
  ): Promise<InstallResult> {
    const stamp = String(Date.now())
    const stagingDir = join(paths.root, `.staging-${stamp}`)
    await mkdir(stagingDir, { recursive: true })

    try {
      const staged: StagedArtifact[] = []
      for (const artifact of getArtifacts(release)) {
        staged.push(await this.stageArtifact(artifact, stagingDir, onProgress))
      }

      onProgress?.({ stage: 'installing', message: 'Installing binaries...' })
      const installed: InstalledArtifact[] = []
      for (const item of staged) {
        const installDir = await this.promote(item, paths, tx, stamp)
        installed.push({
          artifact: item.artifact,
          installDir,
          checksum: item.checksum,
        })
      }

      const engine = installed.find((item) => item.artifact.kind === 'engine')
      if (!engine) {
        throw new ProvisionError(
          ErrorCodes.EXTRACT_FAILED,
          'Engine archive was not installed',
          'fatal',
        )
      }
      await this.linkEngine(paths, engine.installDir, tx, stamp)

      const profileLinesAdded = await this.exportPaths(paths, installed, tx)

      return { artifacts: installed, engineDir: engine.installDir, profileLinesAdded }
    } finally {
      await rm(stagingDir, { recursive: true, force: true })
    }
  }
}

export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  await pipeline(createReadStream(filePath), hash)
  return hash.digest('hex')
}
