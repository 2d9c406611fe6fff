import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { assertEngineStopped, isEngineRunning } from '../../core/preflight'
import { resolveLoopbackAddress } from '../../core/loopback'
import { ProvisionError } from '../../core/error-handler'
import { FakeRunner } from '../utils/fakes'
import { isolateLogDirectory, removeTempHome } from '../utils/temp'

function hasCode(code: string) {
  return (error: unknown) => error instanceof ProvisionError && error.code === code
}

describe('preflight', () => {
  let logHome = ''

  before(() => {
    logHome = isolateLogDirectory('preflight')
  })

  after(() => {
    removeTempHome(logHome)
  })

  it('asks pgrep for an exact mongod match', async () => {
    const runner = new FakeRunner().fail('pgrep', 1)

    assert.equal(await isEngineRunning(runner.run), false)
    assert.deepEqual(runner.calls, [{ command: 'pgrep', args: ['-x', 'mongod'] }])
  })

  it('reports a running engine when pgrep matches', async () => {
    const runner = new FakeRunner().on('pgrep', () => ({
      stdout: '4242\n',
      stderr: '',
    }))

    assert.equal(await isEngineRunning(runner.run), true)
    await assert.rejects(assertEngineStopped(runner.run), hasCode('MONGOD_RUNNING'))
  })

  it('passes when nothing is running', async () => {
    const runner = new FakeRunner().fail('pgrep', 1)
    await assertEngineStopped(runner.run)
  })

  it('reports a missing pgrep as a missing dependency', async () => {
    const runner = new FakeRunner().missing('pgrep')
    await assert.rejects(isEngineRunning(runner.run), hasCode('DEPENDENCY_MISSING'))
  })

  it('does not treat other pgrep failures as "not running"', async () => {
    const runner = new FakeRunner().fail('pgrep', 2, 'syntax error')
    await assert.rejects(isEngineRunning(runner.run), hasCode('UNKNOWN_ERROR'))
  })
})

describe('resolveLoopbackAddress', () => {
  it('trims the helper output', async () => {
    const runner = new FakeRunner().on('vs-loopback-ip', () => ({
      stdout: '127.0.0.5\n',
      stderr: '',
    }))

    assert.equal(await resolveLoopbackAddress(runner.run), '127.0.0.5')
    assert.deepEqual(runner.calls, [{ command: 'vs-loopback-ip', args: ['-4'] }])
  })

  it('uses an override without running the helper', async () => {
    const runner = new FakeRunner()

    assert.equal(await resolveLoopbackAddress(runner.run, '127.0.0.9'), '127.0.0.9')
    assert.equal(runner.calls.length, 0)
  })

  it('rejects an invalid override', async () => {
    await assert.rejects(
      resolveLoopbackAddress(new FakeRunner().run, 'localhost'),
      hasCode('LOOPBACK_UNAVAILABLE'),
    )
  })

  it('fails when the helper is missing', async () => {
    const runner = new FakeRunner().missing('vs-loopback-ip')
    await assert.rejects(
      resolveLoopbackAddress(runner.run),
      hasCode('LOOPBACK_UNAVAILABLE'),
    )
  })

  it('fails when the helper prints something that is not an address', async () => {
    const runner = new FakeRunner().on('vs-loopback-ip', () => ({
      stdout: '',
      stderr: '',
    }))
    await assert.rejects(
      resolveLoopbackAddress(runner.run),
      hasCode('LOOPBACK_UNAVAILABLE'),
    )
  })
})
