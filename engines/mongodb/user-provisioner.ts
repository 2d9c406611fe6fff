/**
 * Creates database users through mongosh against the loopback address.
 *
 * The database is the only judge of a createUser call: a rejected user is
 * reported and logged, and provisioning carries on.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { ProvisionPaths } from '../../config/paths'
import { ErrorCodes, logDebug, logError } from '../../core/error-handler'
import { spawnAsync, CommandError, type CommandRunner } from '../../core/spawn-utils'
import {
  PING_SCRIPT,
  buildCreateUserScript,
  buildMongoshArgs,
  buildMongoshFileArgs,
  getMongoshPath,
  type MongoshTarget,
} from './cli-utils'
import type { Credentials, UserProvisionResult, UserRole } from '../../types'

export type UserProvisionerOptions = {
  paths: ProvisionPaths
  host: string
  port: number
  runner?: CommandRunner
}

export const ADMIN_ROLE: UserRole = { role: 'root', db: 'admin' }

export function limitedRole(database: string): UserRole {
  return { role: 'readWrite', db: database }
}

export class UserProvisioner {
  private runner: CommandRunner
  private mongosh: string
  private target: MongoshTarget

  constructor(options: UserProvisionerOptions) {
    this.runner = options.runner ?? spawnAsync
    this.mongosh = getMongoshPath(options.paths)
    this.target = { host: options.host, port: options.port, database: 'admin' }
  }

  /**
   * Whether the server answers a ping
   */
  async isReady(): Promise<boolean> {
    try {
      await this.runner(
        this.mongosh,
        buildMongoshArgs(this.target, PING_SCRIPT, { quiet: true }),
        { timeout: 5000 },
      )
      return true
    } catch {
      return false
    }
  }

  async createUser(
    credentials: Credentials,
    role: UserRole,
  ): Promise<UserProvisionResult> {
    logDebug('Creating database user', {
      username: credentials.username,
      role: `${role.role}@${role.db}`,
    })

    // The script holds the password: it goes through a file only this
    // account can read, never through argv
    const scriptDir = await mkdtemp(join(tmpdir(), 'mongo-provision-'))
    const scriptFile = join(scriptDir, 'create-user.js')

    try {
      await writeFile(scriptFile, buildCreateUserScript(credentials, role), {
        encoding: 'utf8',
        mode: 0o600,
      })
      await this.runner(
        this.mongosh,
        buildMongoshFileArgs(this.target, scriptFile, { quiet: true }),
      )
      return { username: credentials.username, role, created: true }
    } catch (error) {
      const detail =
        error instanceof CommandError
          ? (error.stderr || error.stdout || error.message).trim()
          : error instanceof Error
            ? error.message
            : String(error)
      logError({
        code: ErrorCodes.USER_CREATE_FAILED,
        message: `Could not create user "${credentials.username}": ${detail}`,
        severity: 'warning',
        context: { role: `${role.role}@${role.db}` },
      })
      return {
        username: credentials.username,
        role,
        created: false,
        error: detail,
      }
    } finally {
      await rm(scriptDir, { recursive: true, force: true })
    }
  }
}
