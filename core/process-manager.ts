/**
 * Managed mongod process
 *
 * One state machine tracks the database process through its whole
 * lifetime, whichever supervisor is currently responsible for it:
 *
 *   stopped -> starting -> running -> stopping -> stopped
 *
 * The supervisor can only be swapped while the process is stopped, which
 * is how user provisioning (a directly forked mongod) hands the instance
 * over to pm2 without the two ever running side by side.
 */

import { defaults } from '../config/defaults'
import { getMongodPath, type ProvisionPaths } from '../config/paths'
import { ProvisionError, ErrorCodes, logDebug } from './error-handler'
import type { CommandRunner } from './spawn-utils'
import type { ProcessState } from '../types'

export type ProcessSupervisor = {
  readonly name: string
  launch(): Promise<void>
  halt(): Promise<void>
}

export type ReadinessCheck = () => Promise<boolean>

export type ManagedProcessOptions = {
  supervisor: ProcessSupervisor
  isReady?: ReadinessCheck
  readyTimeoutMs?: number
  readyIntervalMs?: number
  sleep?: (ms: number) => Promise<void>
  onTransition?: (from: ProcessState, to: ProcessState) => void
}

const ALLOWED_TRANSITIONS: Record<ProcessState, ProcessState[]> = {
  stopped: ['starting'],
  starting: ['running', 'stopped'],
  running: ['stopping'],
  stopping: ['stopped', 'running'],
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

export class ManagedProcess {
  private state: ProcessState = 'stopped'
  private supervisor: ProcessSupervisor
  private isReady?: ReadinessCheck
  private readyTimeoutMs: number
  private readyIntervalMs: number
  private sleep: (ms: number) => Promise<void>
  private onTransition?: (from: ProcessState, to: ProcessState) => void

  constructor(options: ManagedProcessOptions) {
    this.supervisor = options.supervisor
    this.isReady = options.isReady
    this.readyTimeoutMs = options.readyTimeoutMs ?? defaults.readyTimeoutMs
    this.readyIntervalMs = options.readyIntervalMs ?? defaults.readyIntervalMs
    this.sleep = options.sleep ?? defaultSleep
    this.onTransition = options.onTransition
  }

  getState(): ProcessState {
    return this.state
  }

  getSupervisorName(): string {
    return this.supervisor.name
  }

  /**
   * Hand the process to a different supervisor. Only valid while stopped.
   */
  useSupervisor(supervisor: ProcessSupervisor): void {
    if (this.state !== 'stopped') {
      throw new ProvisionError(
        ErrorCodes.INVALID_STATE_TRANSITION,
        `Cannot switch supervisor from ${this.supervisor.name} to ${supervisor.name} while ${this.state}`,
      )
    }
    logDebug('Switching supervisor', {
      from: this.supervisor.name,
      to: supervisor.name,
    })
    this.supervisor = supervisor
  }

  async start(): Promise<void> {
    this.transition('starting')
    let launched = false
    try {
      await this.supervisor.launch()
      launched = true
      await this.waitForReady()
    } catch (error) {
      if (launched) {
        await this.haltAfterFailedStart()
      }
      this.transition('stopped')
      throw ProvisionError.from(error, ErrorCodes.PROCESS_START_FAILED)
    }
    this.transition('running')
  }

  async stop(): Promise<void> {
    this.transition('stopping')
    try {
      await this.supervisor.halt()
    } catch (error) {
      // Still up as far as we know
      this.transition('running')
      throw ProvisionError.from(error, ErrorCodes.PROCESS_STOP_FAILED)
    }
    this.transition('stopped')
  }

  private async haltAfterFailedStart(): Promise<void> {
    try {
      await this.supervisor.halt()
    } catch (error) {
      logDebug('Halt after failed start did not succeed', {
        supervisor: this.supervisor.name,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  private async waitForReady(): Promise<void> {
    const check = this.isReady
    if (!check) return

    const deadline = Date.now() + this.readyTimeoutMs
    for (;;) {
      if (await check()) return
      if (Date.now() >= deadline) {
        throw new ProvisionError(
          ErrorCodes.PROCESS_START_FAILED,
          `MongoDB did not accept connections within ${this.readyTimeoutMs}ms`,
          'fatal',
        )
      }
      await this.sleep(this.readyIntervalMs)
    }
  }

  private transition(next: ProcessState): void {
    const from = this.state
    if (!ALLOWED_TRANSITIONS[from].includes(next)) {
      throw new ProvisionError(
        ErrorCodes.INVALID_STATE_TRANSITION,
        `Invalid process state transition: ${from} -> ${next}`,
      )
    }
    this.state = next
    logDebug('Process state transition', {
      from,
      to: next,
      supervisor: this.supervisor.name,
    })
    this.onTransition?.(from, next)
  }
}

/**
 * mongod started directly: `mongod -f <cfg> --fork`, stopped with
 * `mongod -f <cfg> --shutdown`.
 */
export class ForkSupervisor implements ProcessSupervisor {
  readonly name = 'mongod --fork'
  private runner: CommandRunner
  private paths: ProvisionPaths

  constructor(runner: CommandRunner, paths: ProvisionPaths) {
    this.runner = runner
    this.paths = paths
  }

  async launch(): Promise<void> {
    await this.runner(getMongodPath(this.paths), [
      '-f',
      this.paths.config,
      '--fork',
    ])
  }

  async halt(): Promise<void> {
    await this.runner(getMongodPath(this.paths), [
      '-f',
      this.paths.config,
      '--shutdown',
    ])
  }
}

/**
 * mongod supervised by pm2 through its generated descriptor
 */
export class Pm2Supervisor implements ProcessSupervisor {
  readonly name = 'pm2'
  private runner: CommandRunner
  private descriptorPath: string
  private appName: string

  constructor(runner: CommandRunner, descriptorPath: string, appName: string) {
    this.runner = runner
    this.descriptorPath = descriptorPath
    this.appName = appName
  }

  async launch(): Promise<void> {
    await this.runner(defaults.processManagerCommand, [
      'start',
      this.descriptorPath,
    ])
  }

  async halt(): Promise<void> {
    await this.runner(defaults.processManagerCommand, ['stop', this.appName])
  }
}
