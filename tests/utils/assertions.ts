/**
 * Shared test assertion utilities
 */

import { readdirSync } from 'fs'

// Assert helper that throws with descriptive message
export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`)
  }
}

// Assert two values are equal
export function assertEqual<T>(actual: T, expected: T, message: string): void {
  if (actual !== expected) {
    throw new Error(`${message}\n  Expected: ${String(expected)}\n  Actual: ${String(actual)}`)
  }
}

// Assert a directory holds exactly these entries (order-insensitive)
export function assertDirEntries(
  dir: string,
  expected: string[],
  message: string,
): void {
  const actual = readdirSync(dir).sort()
  const wanted = [...expected].sort()
  if (actual.join('\n') !== wanted.join('\n')) {
    throw new Error(
      `${message}\n  Expected: [${wanted.join(', ')}]\n  Actual: [${actual.join(', ')}]`,
    )
  }
}
