/**
 * Generated files: the mongod configuration and the pm2 descriptor.
 *
 * Both are rendered from fixed templates and rewritten in full on every run.
 */

import { defaults } from '../../config/defaults'
import { getMongodPath, type ProvisionPaths } from '../../config/paths'
import { supportsJournalOption } from './version-maps'
import type { MemoryLimit, MongoRelease } from '../../types'

export type MongodConfigOptions = {
  paths: ProvisionPaths
  bindIp: string
  port?: number
  release: MongoRelease
}

export type Pm2App = {
  name: string
  script: string
  args: string
  cwd: string
  max_memory_restart: MemoryLimit
}

export type Pm2Descriptor = {
  apps: Pm2App[]
}

export function renderMongodConfig(options: MongodConfigOptions): string {
  const { paths, bindIp, release } = options
  const port = options.port ?? defaults.port

  const journal = supportsJournalOption(release.version)
    ? ['    journal:', '        enabled: true']
    : []

  return [
    'processManagement:',
    '    fork: false',
    `    pidFilePath: "${paths.pidFile}"`,
    'net:',
    `    bindIp: ${bindIp}`,
    `    port: ${port}`,
    '    unixDomainSocket:',
    '        enabled: false',
    'systemLog:',
    '    verbosity: 0',
    '    quiet: true',
    '    destination: file',
    `    path: "${paths.logFile}"`,
    '    logRotate: reopen',
    '    logAppend: true',
    'storage:',
    `    dbPath: "${paths.db}/"`,
    ...journal,
    '    directoryPerDB: true',
    '    engine: wiredTiger',
    '    wiredTiger:',
    '        engineConfig:',
    '            journalCompressor: snappy',
    '            cacheSizeGB: 1',
    '        collectionConfig:',
    '            blockCompressor: snappy',
    '',
  ].join('\n')
}

export function buildPm2Descriptor(options: {
  paths: ProvisionPaths
  appName: string
  memory: MemoryLimit
}): Pm2Descriptor {
  const { paths, appName, memory } = options
  return {
    apps: [
      {
        name: appName,
        script: getMongodPath(paths),
        args: `--config ${paths.config} --auth`,
        cwd: paths.root,
        max_memory_restart: memory,
      },
    ],
  }
}

export function renderPm2Descriptor(descriptor: Pm2Descriptor): string {
  return JSON.stringify(descriptor, null, 2) + '\n'
}

const APP_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/

/**
 * The app name becomes part of a file name, so keep it to a safe alphabet.
 * Returns an error message, or null when the name is usable.
 */
export function validateAppName(name: string): string | null {
  if (!name) return 'App name is required'
  if (!APP_NAME_PATTERN.test(name)) {
    return 'App name must start with a letter or digit and contain only letters, digits, ".", "-" and "_"'
  }
  return null
}
