/**
 * Filesystem helpers shared by the install steps.
 */

import { randomBytes } from 'crypto'
import { dirname, basename, join } from 'path'
import { rename, cp, rm, writeFile, readdir, lstat } from 'fs/promises'
import { logDebug, getErrnoCode } from './error-handler'

/**
 * Errors for which rename() should fall back to copy + remove
 * - EXDEV: cross-device link
 * - EPERM: permission error on some filesystems
 * - ENOTEMPTY: target exists with content
 */
export function isRenameFallbackError(error: unknown): boolean {
  const code = getErrnoCode(error)
  return code !== undefined && ['EXDEV', 'EPERM', 'ENOTEMPTY'].includes(code)
}

/**
 * Move a file or directory, falling back to cp() + rm() where rename fails.
 */
export async function moveEntry(
  sourcePath: string,
  destPath: string,
): Promise<void> {
  try {
    await rename(sourcePath, destPath)
  } catch (error) {
    if (!isRenameFallbackError(error)) {
      throw error
    }
    await cp(sourcePath, destPath, { recursive: true, force: true })
    try {
      await rm(sourcePath, { recursive: true, force: true })
    } catch (cleanupError) {
      logDebug('Failed to clean up source after copy', {
        sourcePath,
        destPath,
        error:
          cleanupError instanceof Error
            ? cleanupError.message
            : String(cleanupError),
      })
    }
  }
}

/**
 * Write a file in full by writing a sibling temp file and renaming it over
 * the target. Readers never observe a partially written file.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const tempPath = join(
    dirname(filePath),
    `.${basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`,
  )
  try {
    await writeFile(tempPath, content, 'utf8')
    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * Remove everything inside a directory, keeping the directory itself.
 * Returns the number of top-level entries removed.
 */
export async function emptyDirectory(dir: string): Promise<number> {
  const entries = await readdir(dir)
  for (const entry of entries) {
    await rm(join(dir, entry), { recursive: true, force: true })
  }
  return entries.length
}

/**
 * lstat-based existence check, so dangling symlinks count as present
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch (error) {
    if (getErrnoCode(error) === 'ENOENT') return false
    throw error
  }
}
