/**
 * Install workflow
 *
 * Sequences the provisioning steps:
 *   preflight -> backup/reset -> menus -> fetch & configure (transactional)
 *   -> user provisioning on a forked mongod -> hand-over to pm2
 *
 * Every menu is answered before anything is downloaded, so an invalid
 * choice never leaves more behind than the reset that preceded it.
 */

import { existsSync } from 'fs'
import { mkdir, readFile, rm } from 'fs/promises'
import { getDescriptorPath } from '../config/paths'
import {
  MongoBinaryManager,
  type FetchFn,
  type InstallResult,
} from '../engines/mongodb/binary-manager'
import {
  buildPm2Descriptor,
  renderMongodConfig,
  renderPm2Descriptor,
  validateAppName,
} from '../engines/mongodb/config-templates'
import {
  ADMIN_ROLE,
  UserProvisioner,
  limitedRole,
} from '../engines/mongodb/user-provisioner'
import {
  resolveMemoryChoice,
  resolveVersionChoice,
} from '../engines/mongodb/version-maps'
import { BackupManager } from './backup-manager'
import { ConfigManager } from './config-manager'
import { ProvisionError, ErrorCodes, logDebug, logInfo } from './error-handler'
import { writeFileAtomic } from './fs-utils'
import { resolveLoopbackAddress } from './loopback'
import { assertEngineStopped } from './preflight'
import {
  ForkSupervisor,
  ManagedProcess,
  Pm2Supervisor,
} from './process-manager'
import type { ProvisionContext } from './provision-context'
import { spawnAsync, type CommandRunner } from './spawn-utils'
import { withTransaction, type TransactionManager } from './transaction-manager'
import type {
  Credentials,
  InstallRecord,
  ProcessState,
  ProgressCallback,
  ResetResult,
  UserProvisionResult,
} from '../types'

export type InstallPrompter = {
  confirmBackup(): Promise<boolean>
  selectVersion(): Promise<string>
  selectMemory(): Promise<string>
  appName(): Promise<string>
  adminCredentials(): Promise<Credentials>
  confirmLimitedUser(): Promise<boolean>
  limitedCredentials(): Promise<Credentials>
}

export type InstallWorkflowDeps = {
  prompter: InstallPrompter
  runner?: CommandRunner
  fetch?: FetchFn
  now?: () => Date
  sleep?: (ms: number) => Promise<void>
  readyTimeoutMs?: number
  onProgress?: ProgressCallback
  onStateChange?: (from: ProcessState, to: ProcessState) => void
}

export type InstallSummary = {
  record: InstallRecord
  reset: ResetResult
  install: InstallResult
  users: UserProvisionResult[]
  processState: ProcessState
}

/**
 * Write a generated file in full, restoring what was there on rollback
 */
async function writeGeneratedFile(
  filePath: string,
  content: string,
  tx: TransactionManager,
): Promise<void> {
  const previous = existsSync(filePath) ? await readFile(filePath, 'utf8') : null
  tx.addRollback({
    description: `Restore ${filePath}`,
    execute: async () => {
      if (previous === null) {
        await rm(filePath, { force: true })
      } else {
        await writeFileAtomic(filePath, previous)
      }
    },
  })
  await writeFileAtomic(filePath, content)
}

async function createDirectories(ctx: ProvisionContext): Promise<void> {
  const { paths } = ctx
  try {
    for (const dir of [paths.log, paths.run, paths.db]) {
      await mkdir(dir, { recursive: true })
    }
  } catch (error) {
    throw new ProvisionError(
      ErrorCodes.DIRECTORY_FAILED,
      `Failed to create ${paths.root}: ${error instanceof Error ? error.message : String(error)}`,
      'fatal',
    )
  }
}

async function collectCredentials(
  prompter: InstallPrompter,
): Promise<{ admin: Credentials; limited: Credentials | null }> {
  const admin = await prompter.adminCredentials()
  const limited = (await prompter.confirmLimitedUser())
    ? await prompter.limitedCredentials()
    : null
  return { admin, limited }
}

export async function runInstall(
  ctx: ProvisionContext,
  deps: InstallWorkflowDeps,
): Promise<InstallSummary> {
  const { prompter, onProgress } = deps
  const runner = deps.runner ?? spawnAsync
  const { paths } = ctx

  await assertEngineStopped(runner)

  const backupManager = new BackupManager({ runner, now: deps.now })
  const reset = await backupManager.backupAndReset(paths, () =>
    prompter.confirmBackup(),
  )

  const release = resolveVersionChoice(await prompter.selectVersion())
  const memory = resolveMemoryChoice(await prompter.selectMemory())
  const appName = (await prompter.appName()).trim()
  const appNameError = validateAppName(appName)
  if (appNameError) {
    throw new ProvisionError(
      ErrorCodes.INVALID_APP_NAME,
      appNameError,
      'fatal',
      undefined,
      { appName },
    )
  }

  const bindIp = await resolveLoopbackAddress(runner, ctx.bindIp)

  await createDirectories(ctx)

  const descriptorPath = getDescriptorPath(paths, appName)
  const binaryManager = new MongoBinaryManager({
    runner,
    fetch: deps.fetch,
    requireChecksum: ctx.requireChecksum,
  })

  const install = await withTransaction(async (tx) => {
    const result = await binaryManager.install(release, paths, tx, onProgress)

    onProgress?.({ stage: 'configuring', message: 'Writing mongo.cfg...' })
    await writeGeneratedFile(
      paths.config,
      renderMongodConfig({ paths, bindIp, port: ctx.port, release }),
      tx,
    )

    onProgress?.({
      stage: 'configuring',
      message: `Writing ${appName}.pm2.json...`,
    })
    await writeGeneratedFile(
      descriptorPath,
      renderPm2Descriptor(buildPm2Descriptor({ paths, appName, memory })),
      tx,
    )
    return result
  })

  const { admin, limited } = await collectCredentials(prompter)

  const provisioner = new UserProvisioner({
    paths,
    host: bindIp,
    port: ctx.port,
    runner,
  })
  const managed = new ManagedProcess({
    supervisor: new ForkSupervisor(runner, paths),
    isReady: () => provisioner.isReady(),
    sleep: deps.sleep,
    readyTimeoutMs: deps.readyTimeoutMs,
    onTransition: deps.onStateChange,
  })

  onProgress?.({ stage: 'starting', message: 'Starting MongoDB for user setup...' })
  await managed.start()

  const users: UserProvisionResult[] = []
  try {
    users.push(await provisioner.createUser(admin, ADMIN_ROLE))
    if (limited) {
      users.push(
        await provisioner.createUser(limited, limitedRole(ctx.limitedDatabase)),
      )
    }
  } finally {
    onProgress?.({ stage: 'stopping', message: 'Shutting down MongoDB...' })
    await managed.stop()
  }

  if (ctx.startAfterInstall) {
    managed.useSupervisor(new Pm2Supervisor(runner, descriptorPath, appName))
    onProgress?.({ stage: 'starting', message: `Starting ${appName} with pm2...` })
    await managed.start()
  }

  const record: InstallRecord = {
    version: release.version,
    series: release.series,
    memory,
    appName,
    bindIp,
    port: ctx.port,
    descriptorPath,
    configPath: paths.config,
    backupPath: reset.backup?.path,
    users: users.map((user) => ({
      username: user.username,
      role: `${user.role.role}@${user.role.db}`,
      created: user.created,
    })),
    started: managed.getState() === 'running',
    installedAt: (deps.now ?? (() => new Date()))().toISOString(),
  }
  await new ConfigManager(paths.installRecord).save(record)

  logInfo('Provisioning complete', {
    version: release.version,
    appName,
    memory,
    started: record.started,
  })
  logDebug('Install summary', { artifacts: install.artifacts.length })

  return {
    record,
    reset,
    install,
    users,
    processState: managed.getState(),
  }
}
