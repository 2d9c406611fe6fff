/**
 * MongoDB release and memory menus
 *
 * Each menu maps a single-key choice to a concrete value. Lookups are
 * exhaustive: a key that is not listed here is an input error, never a
 * fallback to some default.
 */

import { createInvalidChoiceError } from '../../core/error-handler'
import type { MemoryLimit, MenuOption, MongoRelease } from '../../types'

function releaseArtifact(version: string): string {
  return `mongodb-linux-x86_64-rhel80-${version}.tgz`
}

export const VERSION_MENU: readonly MenuOption<MongoRelease>[] = [
  {
    key: '1',
    label: '6.0',
    value: { series: '6.0', version: '6.0.0', artifact: releaseArtifact('6.0.0') },
  },
  {
    key: '2',
    label: '7.0',
    value: { series: '7.0', version: '7.0.0', artifact: releaseArtifact('7.0.0') },
  },
]

export const MEMORY_MENU: readonly MenuOption<MemoryLimit>[] = [
  { key: '1', label: '256M', value: '256M' },
  { key: '2', label: '512M', value: '512M' },
  { key: '3', label: '1G', value: '1G' },
  { key: '4', label: '2G', value: '2G' },
  { key: '5', label: '3G', value: '3G' },
]

export const MEMORY_LIMITS: readonly MemoryLimit[] = MEMORY_MENU.map(
  (option) => option.value,
)

/**
 * Resolve a menu key to its value.
 * @throws ProvisionError (INVALID_CHOICE) for anything outside the menu
 */
export function resolveChoice<T>(
  menuName: string,
  menu: readonly MenuOption<T>[],
  input: string,
): T {
  const key = input.trim()
  const match = menu.find((option) => option.key === key)
  if (!match) {
    throw createInvalidChoiceError(
      menuName,
      input,
      menu.map((option) => option.key),
    )
  }
  return match.value
}

export function resolveVersionChoice(input: string): MongoRelease {
  return resolveChoice('version', VERSION_MENU, input)
}

export function resolveMemoryChoice(input: string): MemoryLimit {
  return resolveChoice('memory', MEMORY_MENU, input)
}

export function isMemoryLimit(value: string): value is MemoryLimit {
  return MEMORY_LIMITS.some((limit) => limit === value)
}

/**
 * storage.journal.enabled was removed in 6.1; later releases refuse to
 * start when the option is present.
 */
export function supportsJournalOption(version: string): boolean {
  const [major, minor] = version.split('.').map((part) => parseInt(part, 10))
  if (isNaN(major) || isNaN(minor)) return false
  return major < 6 || (major === 6 && minor < 1)
}
