import { describe, it, before, after, beforeEach } from 'node:test'
import assert from 'node:assert/strict'
import { createHash } from 'crypto'
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  readlinkSync,
  symlinkSync,
  writeFileSync,
} from 'fs'
import { join } from 'path'
import {
  MongoBinaryManager,
  type FetchFn,
} from '../../engines/mongodb/binary-manager'
import { getArtifacts } from '../../engines/mongodb/binary-urls'
import { resolveVersionChoice } from '../../engines/mongodb/version-maps'
import { buildPaths, type ProvisionPaths } from '../../config/paths'
import { ProvisionError } from '../../core/error-handler'
import {
  TransactionManager,
  withTransaction,
} from '../../core/transaction-manager'
import {
  FakeRunner,
  createFakeFetch,
  fakeArchive,
  fakeTar,
  type FakeRoute,
} from '../utils/fakes'
import { assertDirEntries } from '../utils/assertions'
import {
  createTempHome,
  isolateLogDirectory,
  removeTempHome,
} from '../utils/temp'
import type { ProgressCallback } from '../../types'

const release = resolveVersionChoice('1')
const [engine, shell, tools] = getArtifacts(release)

const ENGINE_DIR = 'mongodb-linux-x86_64-rhel80-6.0.0'
const SHELL_DIR = 'mongosh-1.5.2-linux-x64'
const TOOLS_DIR = 'mongodb-database-tools-rhel80-x86_64-100.5.4'

function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex')
}

function archiveRoutes(): Record<string, FakeRoute> {
  return {
    [engine.url]: { body: fakeArchive(ENGINE_DIR, ['mongod']) },
    [shell.url]: { body: fakeArchive(SHELL_DIR, ['mongosh']) },
    [tools.url]: { body: fakeArchive(TOOLS_DIR, ['mongodump']) },
  }
}

function withChecksums(routes: Record<string, FakeRoute>): Record<string, FakeRoute> {
  const result = { ...routes }
  for (const [url, route] of Object.entries(routes)) {
    result[`${url}.sha256`] = { body: `${sha256(route.body ?? '')}  archive.tgz\n` }
  }
  return result
}

// Settles only once the caller aborts the request
const stalledFetch: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal
    if (!signal) {
      reject(new Error('request made without an abort signal'))
      return
    }
    signal.addEventListener('abort', () => {
      reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
    })
  })

function hasCode(code: string) {
  return (error: unknown) => error instanceof ProvisionError && error.code === code
}

describe('MongoBinaryManager', () => {
  let logHome = ''
  let home = ''
  let paths: ProvisionPaths

  before(() => {
    logHome = isolateLogDirectory('binaries')
  })

  beforeEach(() => {
    if (home) removeTempHome(home)
    home = createTempHome('binaries')
    paths = buildPaths(home)
    mkdirSync(paths.root, { recursive: true })
  })

  after(() => {
    removeTempHome(home)
    removeTempHome(logHome)
  })

  function createManager(
    routes: Record<string, FakeRoute>,
    requireChecksum = false,
  ) {
    const runner = new FakeRunner().on('tar', fakeTar)
    const fake = createFakeFetch(routes)
    const manager = new MongoBinaryManager({
      runner: runner.run,
      fetch: fake.fetch,
      requireChecksum,
    })
    return { manager, runner, requested: fake.requested }
  }

  it('installs engine, shell and tools and links the engine', async () => {
    const { manager } = createManager(archiveRoutes())
    const stages: string[] = []
    const onProgress: ProgressCallback = ({ stage }) => {
      stages.push(stage)
    }

    const result = await withTransaction((tx) =>
      manager.install(release, paths, tx, onProgress),
    )

    assertDirEntries(
      paths.root,
      [ENGINE_DIR, SHELL_DIR, TOOLS_DIR, 'mongodb-binary'],
      'install root should hold the three installs and the link',
    )
    assert.equal(result.engineDir, join(paths.root, ENGINE_DIR))
    assert.equal(readlinkSync(paths.binaryLink), join(paths.root, ENGINE_DIR))
    assert.equal(
      readFileSync(join(paths.binaryLink, 'bin', 'mongod'), 'utf8'),
      'binary',
    )
    assert.deepEqual(stages, [
      'downloading',
      'verifying',
      'extracting',
      'downloading',
      'verifying',
      'extracting',
      'downloading',
      'verifying',
      'extracting',
      'installing',
    ])
  })

  it('exports PATH for the shell and tools once', async () => {
    const { manager } = createManager(archiveRoutes())

    const first = await withTransaction((tx) => manager.install(release, paths, tx))
    const second = await withTransaction((tx) => manager.install(release, paths, tx))

    const expected = [
      'export PATH=$PATH:$HOME/mongodb/mongosh-1.5.2-linux-x64/bin',
      'export PATH=$PATH:$HOME/mongodb/mongodb-database-tools-rhel80-x86_64-100.5.4/bin',
    ]
    assert.deepEqual(first.profileLinesAdded, expected)
    assert.deepEqual(second.profileLinesAdded, [])
    assert.equal(readFileSync(paths.profile, 'utf8'), `${expected.join('\n')}\n`)
  })

  it('replaces a previous install and removes it on commit', async () => {
    const { manager } = createManager(archiveRoutes())
    await withTransaction((tx) => manager.install(release, paths, tx))
    writeFileSync(join(paths.root, SHELL_DIR, 'bin', 'stale'), 'old')

    await withTransaction((tx) => manager.install(release, paths, tx))

    assertDirEntries(
      paths.root,
      [ENGINE_DIR, SHELL_DIR, TOOLS_DIR, 'mongodb-binary'],
      'replaced installs should be cleaned up',
    )
    assertDirEntries(join(paths.root, SHELL_DIR, 'bin'), ['mongosh'], 'fresh shell install')
  })

  it('restores the previous tree when a later step fails', async () => {
    const oldShell = join(paths.root, SHELL_DIR, 'bin')
    mkdirSync(oldShell, { recursive: true })
    writeFileSync(join(oldShell, 'mongosh'), 'old')
    mkdirSync(join(paths.root, 'old-engine'))
    symlinkSync(join(paths.root, 'old-engine'), paths.binaryLink)
    writeFileSync(paths.profile, 'export EDITOR=vi\n')

    const { manager } = createManager(archiveRoutes())
    await assert.rejects(
      withTransaction(async (tx) => {
        await manager.install(release, paths, tx)
        throw new Error('config write failed')
      }),
      { message: 'config write failed' },
    )

    assertDirEntries(
      paths.root,
      [SHELL_DIR, 'old-engine', 'mongodb-binary'],
      'only the previous tree should remain',
    )
    assert.equal(readFileSync(join(oldShell, 'mongosh'), 'utf8'), 'old')
    assert.equal(readlinkSync(paths.binaryLink), join(paths.root, 'old-engine'))
    assert.equal(readFileSync(paths.profile, 'utf8'), 'export EDITOR=vi\n')
  })

  it('warns and continues when no checksum is published', async () => {
    const { manager, requested } = createManager(archiveRoutes())

    const result = await withTransaction((tx) => manager.install(release, paths, tx))

    assert.deepEqual(
      result.artifacts.map((item) => item.checksum),
      ['unavailable', 'unavailable', 'unavailable'],
    )
    assert.ok(requested.includes(`${engine.url}.sha256`))
  })

  it('verifies published checksums', async () => {
    const { manager } = createManager(withChecksums(archiveRoutes()), true)

    const result = await withTransaction((tx) => manager.install(release, paths, tx))

    assert.deepEqual(
      result.artifacts.map((item) => item.checksum),
      ['verified', 'verified', 'verified'],
    )
  })

  it('rejects a checksum mismatch before touching the install root', async () => {
    const routes = withChecksums(archiveRoutes())
    routes[`${engine.url}.sha256`] = { body: 'f'.repeat(64) }
    const { manager } = createManager(routes)
    const tx = new TransactionManager()

    await assert.rejects(
      manager.install(release, paths, tx),
      hasCode('CHECKSUM_MISMATCH'),
    )
    await tx.rollback()

    assertDirEntries(paths.root, [], 'nothing should be installed or left staged')
  })

  it('requires checksums when asked to', async () => {
    const { manager } = createManager(archiveRoutes(), true)

    await assert.rejects(
      withTransaction((tx) => manager.install(release, paths, tx)),
      (error: unknown) =>
        hasCode('CHECKSUM_UNAVAILABLE')(error) &&
        error instanceof Error &&
        error.message === 'No published checksum for MongoDB 6.0',
    )
  })

  it('reports the failing download', async () => {
    const routes = archiveRoutes()
    delete routes[shell.url]
    const { manager } = createManager(routes)

    await assert.rejects(
      withTransaction((tx) => manager.install(release, paths, tx)),
      {
        code: 'DOWNLOAD_FAILED',
        message: 'Download failed for mongosh 1.5.2: 404 Not Found',
      },
    )
    assertDirEntries(paths.root, [], 'a failed download should leave nothing')
  })

  it('reports an archive tar cannot read', async () => {
    const routes = archiveRoutes()
    routes[tools.url] = { body: 'not an archive' }
    const { manager } = createManager(routes)

    await assert.rejects(
      withTransaction((tx) => manager.install(release, paths, tx)),
      hasCode('EXTRACT_FAILED'),
    )
    assert.equal(existsSync(join(paths.root, ENGINE_DIR)), false)
  })

  it('accepts an archive whose single directory has another name', async () => {
    const routes = archiveRoutes()
    routes[shell.url] = { body: fakeArchive('mongosh-build', ['mongosh']) }
    const { manager } = createManager(routes)

    await withTransaction((tx) => manager.install(release, paths, tx))

    assert.ok(existsSync(join(paths.root, SHELL_DIR, 'bin', 'mongosh')))
  })

  it('runs tar against the staged archive', async () => {
    const { manager, runner } = createManager(archiveRoutes())

    await withTransaction((tx) => manager.install(release, paths, tx))

    const extractions = runner.callsTo('tar')
    assert.equal(extractions.length, 3)
    assert.equal(extractions[0].args[0], '-xzf')
    assert.match(extractions[0].args[1], /\/\.staging-\d+\/engine\/engine\.tgz$/)
    assert.equal(readdirSync(paths.root).some((entry) => entry.startsWith('.staging-')), false)
  })

  it('gives up on a checksum host that never answers', async () => {
    const manager = new MongoBinaryManager({
      fetch: stalledFetch,
      downloadTimeoutMs: 50,
    })

    assert.equal(
      await manager.verifyChecksum(shell, join(home, 'unused.tgz')),
      'unavailable',
    )
  })

  it('fails a stalled checksum fetch when checksums are required', async () => {
    const manager = new MongoBinaryManager({
      fetch: stalledFetch,
      downloadTimeoutMs: 50,
      requireChecksum: true,
    })

    await assert.rejects(
      manager.verifyChecksum(shell, join(home, 'unused.tgz')),
      hasCode('CHECKSUM_UNAVAILABLE'),
    )
  })
})
