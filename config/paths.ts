import { join } from 'path'
import { defaults } from './defaults'

export type ProvisionPaths = {
  home: string
  // <home>/mongodb
  root: string
  log: string
  run: string
  db: string
  config: string
  installRecord: string
  binaryLink: string
  profile: string
  logFile: string
  pidFile: string
}

/**
 * Derive every path the provisioner touches from a single home directory.
 */
export function buildPaths(home: string): ProvisionPaths {
  const root = join(home, defaults.rootDirName)
  return {
    home,
    root,
    log: join(root, 'log'),
    run: join(root, 'run'),
    db: join(root, 'db'),
    config: join(root, defaults.configFileName),
    installRecord: join(root, defaults.installRecordFileName),
    binaryLink: join(root, defaults.binaryLinkName),
    profile: join(home, defaults.profileFileName),
    logFile: join(root, 'log', 'mongodb.log'),
    pidFile: join(root, 'run', `mongodb-${defaults.port}.pid`),
  }
}

/**
 * Path of the pm2 descriptor for an app name
 */
export function getDescriptorPath(
  paths: ProvisionPaths,
  appName: string,
): string {
  return join(paths.root, `${appName}.pm2.json`)
}

/**
 * Path of the engine binary as seen through the version-independent symlink
 */
export function getMongodPath(paths: ProvisionPaths): string {
  return join(paths.binaryLink, 'bin', 'mongod')
}

/**
 * Timestamped backup archive path: <home>/mongodb_backup_YYYYMMDD_HHMMSS.tar.gz
 */
export function getBackupPath(paths: ProvisionPaths, now: Date): string {
  return join(paths.home, `mongodb_backup_${formatBackupTimestamp(now)}.tar.gz`)
}

export const BACKUP_FILE_PATTERN = /^mongodb_backup_\d{8}_\d{6}\.tar\.gz$/

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

export function formatBackupTimestamp(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${date}_${time}`
}
