/**
 * Download artifacts for a MongoDB installation
 *
 * The engine archive depends on the chosen release; the shell and tools
 * archives are pinned.
 */

import { hosts, shellRelease, toolsRelease } from '../../config/defaults'
import type { Artifact, MongoRelease } from '../../types'

const ARCHIVE_SUFFIX = '.tgz'

function stripArchiveSuffix(fileName: string): string {
  return fileName.endsWith(ARCHIVE_SUFFIX)
    ? fileName.slice(0, -ARCHIVE_SUFFIX.length)
    : fileName
}

export function getEngineArtifact(release: MongoRelease): Artifact {
  const url = `${hosts.engine}/${release.artifact}`
  return {
    kind: 'engine',
    displayName: `MongoDB ${release.series}`,
    url,
    checksumUrl: `${url}.sha256`,
    directoryName: stripArchiveSuffix(release.artifact),
    exportPath: false,
  }
}

export function getShellArtifact(): Artifact {
  const directoryName = `mongosh-${shellRelease.version}-${shellRelease.platform}`
  const url = `${hosts.shell}/${directoryName}${ARCHIVE_SUFFIX}`
  return {
    kind: 'shell',
    displayName: `mongosh ${shellRelease.version}`,
    url,
    checksumUrl: `${url}.sha256`,
    directoryName,
    exportPath: true,
  }
}

export function getToolsArtifact(): Artifact {
  const directoryName = `mongodb-database-tools-${toolsRelease.platform}-${toolsRelease.version}`
  const url = `${hosts.tools}/${directoryName}${ARCHIVE_SUFFIX}`
  return {
    kind: 'tools',
    displayName: `MongoDB Database Tools ${toolsRelease.version}`,
    url,
    checksumUrl: `${url}.sha256`,
    directoryName,
    exportPath: true,
  }
}

/**
 * Artifacts in install order: engine, shell client, tools
 */
export function getArtifacts(release: MongoRelease): Artifact[] {
  return [getEngineArtifact(release), getShellArtifact(), getToolsArtifact()]
}

/**
 * Parse a `.sha256` file. Accepts both `<hash>` and `<hash>  <file>` forms.
 */
export function parseChecksumFile(content: string): string | null {
  const token = content.trim().split(/\s+/)[0]
  if (!token || !/^[a-fA-F0-9]{64}$/.test(token)) {
    return null
  }
  return token.toLowerCase()
}
