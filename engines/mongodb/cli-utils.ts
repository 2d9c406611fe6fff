/**
 * mongosh helpers
 *
 * Builds argument arrays for mongosh invocations. Arguments are passed to
 * spawn directly, so scripts need no shell quoting.
 */

import { join } from 'path'
import { shellRelease } from '../../config/defaults'
import type { ProvisionPaths } from '../../config/paths'
import type { Credentials, UserRole } from '../../types'

export type MongoshTarget = {
  host: string
  port: number
  database: string
}

/**
 * Absolute path of the installed mongosh; the installer does not rely on the
 * PATH lines it writes to the profile, which only take effect in new shells.
 */
export function getMongoshPath(paths: ProvisionPaths): string {
  return join(
    paths.root,
    `mongosh-${shellRelease.version}-${shellRelease.platform}`,
    'bin',
    'mongosh',
  )
}

function buildBaseArgs(
  target: MongoshTarget,
  options?: { quiet?: boolean },
): string[] {
  const args = [
    '--host',
    target.host,
    '--port',
    String(target.port),
    target.database,
  ]
  if (options?.quiet) {
    args.push('--quiet')
  }
  return args
}

export function buildMongoshArgs(
  target: MongoshTarget,
  script: string,
  options?: { quiet?: boolean },
): string[] {
  return [...buildBaseArgs(target, options), '--eval', script]
}

/**
 * Args running a script file. Used for anything carrying a password, which
 * would otherwise be visible in the process table.
 */
export function buildMongoshFileArgs(
  target: MongoshTarget,
  scriptFile: string,
  options?: { quiet?: boolean },
): string[] {
  return [...buildBaseArgs(target, options), scriptFile]
}

/**
 * db.createUser script. JSON encoding keeps quotes and backslashes in
 * usernames or passwords from breaking out of the string literals.
 */
export function buildCreateUserScript(
  credentials: Credentials,
  role: UserRole,
): string {
  const document = {
    user: credentials.username,
    pwd: credentials.password,
    roles: [{ role: role.role, db: role.db }],
  }
  return `db.createUser(${JSON.stringify(document)})`
}

export const PING_SCRIPT = 'db.runCommand({ping:1})'

