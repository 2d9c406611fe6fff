import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import { CommandError, spawnAsync } from '../../core/spawn-utils'

describe('spawnAsync', () => {
  it('passes the parent environment through to the child', async () => {
    process.env.MONGO_PROVISION_SPAWN_CHECK = 'inherited'
    try {
      const { stdout } = await spawnAsync(process.execPath, [
        '-e',
        'process.stdout.write(process.env.MONGO_PROVISION_SPAWN_CHECK ?? "")',
      ])
      assert.equal(stdout, 'inherited')
    } finally {
      delete process.env.MONGO_PROVISION_SPAWN_CHECK
    }
  })

  it('kills a command that outlives its timeout', async () => {
    await assert.rejects(
      spawnAsync(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
        timeout: 50,
      }),
      (error: unknown) =>
        error instanceof CommandError &&
        error.exitCode === null &&
        error.message.endsWith('timed out after 50ms'),
    )
  })

  it('reports the exit code and stderr of a failed command', async () => {
    await assert.rejects(
      spawnAsync(process.execPath, ['-e', 'process.stderr.write("boom"); process.exit(3)']),
      (error: unknown) =>
        error instanceof CommandError && error.exitCode === 3 && error.stderr === 'boom',
    )
  })
})
