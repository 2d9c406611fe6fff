import { existsSync } from 'fs'
import { readFile, mkdir } from 'fs/promises'
import { dirname } from 'path'
import { writeFileAtomic } from './fs-utils'
import { logDebug, logWarning } from './error-handler'
import { isMemoryLimit } from '../engines/mongodb/version-maps'
import type { InstallRecord } from '../types'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseInstallRecord(value: unknown): InstallRecord | null {
  if (!isRecord(value)) return null
  const {
    version,
    series,
    memory,
    appName,
    bindIp,
    port,
    descriptorPath,
    configPath,
    installedAt,
    started,
    users,
  } = value
  if (
    typeof version !== 'string' ||
    typeof series !== 'string' ||
    typeof memory !== 'string' ||
    !isMemoryLimit(memory) ||
    typeof appName !== 'string' ||
    typeof bindIp !== 'string' ||
    typeof port !== 'number' ||
    typeof descriptorPath !== 'string' ||
    typeof configPath !== 'string' ||
    typeof installedAt !== 'string' ||
    typeof started !== 'boolean' ||
    !Array.isArray(users)
  ) {
    return null
  }

  const parsedUsers: InstallRecord['users'] = []
  for (const user of users) {
    if (
      isRecord(user) &&
      typeof user.username === 'string' &&
      typeof user.role === 'string' &&
      typeof user.created === 'boolean'
    ) {
      parsedUsers.push({
        username: user.username,
        role: user.role,
        created: user.created,
      })
    }
  }

  return {
    version,
    series,
    memory,
    appName,
    bindIp,
    port,
    descriptorPath,
    configPath,
    installedAt,
    started,
    users: parsedUsers,
    backupPath:
      typeof value.backupPath === 'string' ? value.backupPath : undefined,
    updatedAt: typeof value.updatedAt === 'string' ? value.updatedAt : undefined,
  }
}

/**
 * Persists a summary of the last successful installation next to it.
 * Never holds credentials.
 */
export class ConfigManager {
  private recordPath: string
  private record: InstallRecord | null = null
  private loaded = false

  constructor(recordPath: string) {
    this.recordPath = recordPath
  }

  /**
   * Load the record from disk (cached). A missing file yields null; a
   * corrupt one is discarded with a warning.
   */
  async load(): Promise<InstallRecord | null> {
    if (this.loaded) {
      return this.record
    }

    this.loaded = true
    if (!existsSync(this.recordPath)) {
      return null
    }

    try {
      const content = await readFile(this.recordPath, 'utf8')
      this.record = parseInstallRecord(JSON.parse(content))
    } catch (error) {
      logDebug('Install record unreadable', {
        recordPath: this.recordPath,
        error: error instanceof Error ? error.message : String(error),
      })
      this.record = null
    }

    if (!this.record) {
      logWarning('Install record is corrupted, ignoring it', {
        recordPath: this.recordPath,
      })
    }
    return this.record
  }

  async save(record: InstallRecord): Promise<void> {
    await mkdir(dirname(this.recordPath), { recursive: true })
    this.record = { ...record, updatedAt: new Date().toISOString() }
    this.loaded = true
    await writeFileAtomic(
      this.recordPath,
      JSON.stringify(this.record, null, 2) + '\n',
    )
  }

  getPath(): string {
    return this.recordPath
  }
}
