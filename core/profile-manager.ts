import { existsSync } from 'fs'
import { readFile, rm } from 'fs/promises'
import { relative, isAbsolute, join } from 'path'
import { writeFileAtomic } from './fs-utils'
import { logDebug } from './error-handler'

export type EnsureLineResult = {
  added: boolean
  // profile content before the change, null when the file did not exist
  previous: string | null
}

/**
 * Append `line` to a text file unless an identical line is already there.
 * Creates the file when it is missing.
 */
export async function ensureLinePresent(
  filePath: string,
  line: string,
): Promise<EnsureLineResult> {
  const previous = existsSync(filePath) ? await readFile(filePath, 'utf8') : null
  const existing = previous ?? ''

  if (existing.split(/\r?\n/).some((current) => current.trim() === line)) {
    return { added: false, previous }
  }

  const separator = existing === '' || existing.endsWith('\n') ? '' : '\n'
  await writeFileAtomic(filePath, `${existing}${separator}${line}\n`)
  logDebug('Added line to profile', { filePath, line })
  return { added: true, previous }
}

/**
 * Put a file back the way ensureLinePresent found it
 */
export async function restoreProfile(
  filePath: string,
  previous: string | null,
): Promise<void> {
  if (previous === null) {
    await rm(filePath, { force: true })
    return
  }
  await writeFileAtomic(filePath, previous)
}

/**
 * Render a directory for the profile, as $HOME/... when it sits under home
 */
export function toProfilePath(home: string, dir: string): string {
  const rel = relative(home, dir)
  if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
    return join('$HOME', rel)
  }
  return dir
}

export function buildPathExport(home: string, binDir: string): string {
  return `export PATH=$PATH:${toProfilePath(home, binDir)}`
}
