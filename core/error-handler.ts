/**
 * Error Handler
 *
 * Centralized error handling with logging and user feedback.
 * - Commands log the error and exit with status 1
 * - Every entry is also appended to ~/.mongo-provision/provision.log
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs'
import { dirname, join } from 'path'
import { homedir } from 'os'
import chalk from 'chalk'
import { defaults, envVars } from '../config/defaults'

// Resolved per call so a --home override set at startup is honoured
function getLogRoot(): string {
  const home = process.env[envVars.home] || homedir()
  return join(home, defaults.logDirName)
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

export type ProvisionErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Conflict errors
  MONGOD_RUNNING: 'MONGOD_RUNNING',

  // Input errors
  INVALID_CHOICE: 'INVALID_CHOICE',
  INVALID_APP_NAME: 'INVALID_APP_NAME',

  // External command errors
  DOWNLOAD_FAILED: 'DOWNLOAD_FAILED',
  CHECKSUM_MISMATCH: 'CHECKSUM_MISMATCH',
  CHECKSUM_UNAVAILABLE: 'CHECKSUM_UNAVAILABLE',
  EXTRACT_FAILED: 'EXTRACT_FAILED',
  DIRECTORY_FAILED: 'DIRECTORY_FAILED',
  BACKUP_FAILED: 'BACKUP_FAILED',
  LOOPBACK_UNAVAILABLE: 'LOOPBACK_UNAVAILABLE',
  DEPENDENCY_MISSING: 'DEPENDENCY_MISSING',

  // Process errors
  PROCESS_START_FAILED: 'PROCESS_START_FAILED',
  PROCESS_STOP_FAILED: 'PROCESS_STOP_FAILED',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',

  // Database command errors
  USER_CREATE_FAILED: 'USER_CREATE_FAILED',

  // Rollback errors
  ROLLBACK_FAILED: 'ROLLBACK_FAILED',

  // General errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class ProvisionError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity = 'error',
    suggestion?: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'ProvisionError'
    this.code = code
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, ProvisionError)
  }

  /**
   * Wrap an unknown thrown value, keeping ProvisionErrors as they are
   */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): ProvisionError {
    if (error instanceof ProvisionError) {
      return error
    }

    const message = error instanceof Error ? error.message : String(error)

    return new ProvisionError(code, message, 'error', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

export function getLogPath(): string {
  return join(getLogRoot(), 'provision.log')
}

function ensureLogDirectory(): void {
  const logDir = dirname(getLogPath())
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true })
  }
}

function appendToLogFile(entry: ProvisionErrorInfo): void {
  try {
    ensureLogDirectory()
    const logEntry = {
      timestamp: new Date().toISOString(),
      ...entry,
    }
    appendFileSync(getLogPath(), JSON.stringify(logEntry) + '\n')
  } catch (err) {
    // The log file is a debugging aid; a read-only home must not abort a run
    if (process.env.DEBUG) {
      console.error(chalk.gray(`  log write failed: ${String(err)}`))
    }
  }
}

function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

/**
 * Log an error to console and log file
 */
export function logError(error: ProvisionErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  appendToLogFile(error)
}

export function logProvisionError(error: ProvisionError): void {
  logError({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: error.context,
  })
}

export function logWarning(
  message: string,
  context?: Record<string, unknown>,
): void {
  console.warn(chalk.yellow(`  ⚠ ${message}`))

  appendToLogFile({
    code: 'WARNING',
    message,
    severity: 'warning',
    context,
  })
}

export function logInfo(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'INFO',
    message,
    severity: 'info',
    context,
  })
}

/**
 * Log a debug message (file only)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  appendToLogFile({
    code: 'DEBUG',
    message,
    severity: 'info',
    context,
  })
}

export function createInvalidChoiceError(
  menu: string,
  input: string,
  validKeys: readonly string[],
): ProvisionError {
  return new ProvisionError(
    ErrorCodes.INVALID_CHOICE,
    `Invalid ${menu} choice "${input}". Exiting.`,
    'fatal',
    `Valid choices: ${validKeys.join(', ')}`,
    { menu, input },
  )
}

export function createMongodRunningError(): ProvisionError {
  return new ProvisionError(
    ErrorCodes.MONGOD_RUNNING,
    'MongoDB is currently running. Exiting to avoid conflicts.',
    'fatal',
    'Stop the running mongod (e.g. "pm2 stop <app>") and run the installer again',
  )
}

export function createDownloadError(
  name: string,
  url: string,
  reason: string,
): ProvisionError {
  return new ProvisionError(
    ErrorCodes.DOWNLOAD_FAILED,
    `Download failed for ${name}: ${reason}`,
    'fatal',
    'Check network access to the download host and try again',
    { url },
  )
}

/**
 * Node errno code of an error, if it has one
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    const { code } = error
    return typeof code === 'string' ? code : undefined
  }
  return undefined
}
