export type ProgressCallback = (progress: {
  stage: string
  message: string
}) => void

/**
 * Menu entry mapping a single-key choice to a concrete value
 */
export type MenuOption<T> = {
  key: string
  label: string
  value: T
}

export type MongoRelease = {
  // major.minor shown to the operator, e.g. "7.0"
  series: string
  // full version used in artifact names, e.g. "7.0.0"
  version: string
  // download artifact file name
  artifact: string
}

export type MemoryLimit = '256M' | '512M' | '1G' | '2G' | '3G'

export type ArtifactKind = 'engine' | 'shell' | 'tools'

export type Artifact = {
  kind: ArtifactKind
  displayName: string
  url: string
  // checksum file published next to the archive, when the host has one
  checksumUrl?: string
  // top-level directory inside the archive
  directoryName: string
  // whether the artifact's bin/ directory is exported on PATH
  exportPath: boolean
}

export type Credentials = {
  username: string
  password: string
}

export type UserRole = {
  role: 'root' | 'readWrite'
  db: string
}

export type UserProvisionResult = {
  username: string
  role: UserRole
  created: boolean
  error?: string
}

export type ProcessState = 'stopped' | 'starting' | 'running' | 'stopping'

export type InstallRecord = {
  version: string
  series: string
  memory: MemoryLimit
  appName: string
  bindIp: string
  port: number
  descriptorPath: string
  configPath: string
  backupPath?: string
  users: { username: string; role: string; created: boolean }[]
  started: boolean
  installedAt: string
  updatedAt?: string
}

export type BackupResult = {
  path: string
  size: number
}

export type ResetResult = {
  existed: boolean
  backup: BackupResult | null
  removedEntries: number
}
