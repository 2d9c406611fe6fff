import { homedir } from 'os'
import { resolve } from 'path'
import { defaults, envVars } from '../config/defaults'
import { buildPaths, type ProvisionPaths } from '../config/paths'

/**
 * Everything a provisioning run needs to know about where and how to
 * install, resolved once and passed to each step. Nothing reads process
 * state behind its back.
 */
export type ProvisionContext = {
  paths: ProvisionPaths
  port: number
  // explicit bind address; when absent the loopback helper is asked
  bindIp?: string
  limitedDatabase: string
  requireChecksum: boolean
  startAfterInstall: boolean
}

export type ProvisionContextOptions = {
  home?: string
  bindIp?: string
  database?: string
  requireChecksum?: boolean
  start?: boolean
}

/**
 * Merge flags, environment and defaults. Flags win over environment.
 */
export function createProvisionContext(
  options: ProvisionContextOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ProvisionContext {
  const home = resolve(options.home || env[envVars.home] || homedir())
  const bindIp = options.bindIp || env[envVars.bindIp] || undefined

  return {
    paths: buildPaths(home),
    port: defaults.port,
    bindIp,
    limitedDatabase: options.database || defaults.limitedDatabase,
    requireChecksum: options.requireChecksum ?? false,
    startAfterInstall: options.start ?? true,
  }
}
