import { isIPv4 } from 'net'
import { defaults } from '../config/defaults'
import { ProvisionError, ErrorCodes, logDebug } from './error-handler'
import { spawnAsync, type CommandRunner } from './spawn-utils'

/**
 * Resolve the account's loopback address.
 *
 * An explicit override wins; otherwise the hosting platform's helper is
 * asked for its IPv4 loopback address.
 */
export async function resolveLoopbackAddress(
  runner: CommandRunner = spawnAsync,
  override?: string,
): Promise<string> {
  if (override) {
    if (!isIPv4(override)) {
      throw new ProvisionError(
        ErrorCodes.LOOPBACK_UNAVAILABLE,
        `Bind address "${override}" is not an IPv4 address`,
        'fatal',
      )
    }
    return override
  }

  let stdout: string
  try {
    const result = await runner(defaults.loopbackCommand, [
      ...defaults.loopbackArgs,
    ])
    stdout = result.stdout
  } catch (error) {
    throw new ProvisionError(
      ErrorCodes.LOOPBACK_UNAVAILABLE,
      `Could not determine the loopback address: ${error instanceof Error ? error.message : String(error)}`,
      'fatal',
      `Pass --bind-ip <address> if ${defaults.loopbackCommand} is not available on this host`,
    )
  }

  const address = stdout.trim()
  if (!isIPv4(address)) {
    throw new ProvisionError(
      ErrorCodes.LOOPBACK_UNAVAILABLE,
      `${defaults.loopbackCommand} returned "${address}", which is not an IPv4 address`,
      'fatal',
    )
  }

  logDebug('Resolved loopback address', { address })
  return address
}
