/**
 * Shared spawn utilities for executing commands safely
 *
 * Every external program the provisioner drives (tar, pgrep, mongod, mongosh,
 * pm2, the loopback helper) goes through a CommandRunner, so the workflow
 * can be exercised with an in-process fake.
 */

import { spawn } from 'child_process'

export type SpawnOptions = {
  timeout?: number
}

export type SpawnResult = {
  stdout: string
  stderr: string
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: SpawnOptions,
) => Promise<SpawnResult>

/**
 * A command that could not run or exited non-zero.
 * `exitCode` is null when the process never started or was killed.
 */
export class CommandError extends Error {
  public readonly command: string
  public readonly args: string[]
  public readonly exitCode: number | null
  public readonly stdout: string
  public readonly stderr: string
  public readonly errno?: string

  constructor(options: {
    command: string
    args: string[]
    message: string
    exitCode: number | null
    stdout?: string
    stderr?: string
    errno?: string
  }) {
    super(options.message)
    this.name = 'CommandError'
    this.command = options.command
    this.args = options.args
    this.exitCode = options.exitCode
    this.stdout = options.stdout ?? ''
    this.stderr = options.stderr ?? ''
    this.errno = options.errno
  }
}

/**
 * Execute a command using spawn with argument array (no shell interpolation)
 *
 * @throws CommandError if the command fails, times out, or cannot be executed
 */
export function spawnAsync(
  command: string,
  args: string[],
  options?: SpawnOptions,
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let timer: ReturnType<typeof setTimeout> | undefined

    if (options?.timeout && options.timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true
        proc.kill('SIGKILL')
        reject(
          new CommandError({
            command,
            args,
            message: `Command "${command}" timed out after ${options.timeout}ms`,
            exitCode: null,
            stdout,
            stderr,
          }),
        )
      }, options.timeout)
    }

    const cleanup = () => {
      if (timer) clearTimeout(timer)
    }

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString()
    })
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on('close', (code) => {
      cleanup()
      if (timedOut) return
      if (code === 0) {
        resolve({ stdout, stderr })
      } else {
        reject(
          new CommandError({
            command,
            args,
            message: `Command "${command}" failed with code ${code}: ${(stderr || stdout).trim()}`,
            exitCode: code,
            stdout,
            stderr,
          }),
        )
      }
    })

    proc.on('error', (err: NodeJS.ErrnoException) => {
      cleanup()
      if (timedOut) return
      reject(
        new CommandError({
          command,
          args,
          message: `Failed to execute "${command}": ${err.message}`,
          exitCode: null,
          errno: err.code,
        }),
      )
    })
  })
}

export function isCommandNotFound(error: unknown): boolean {
  return error instanceof CommandError && error.errno === 'ENOENT'
}
