import { describe, it, before, after, beforeEach } from 'node:test'
import assert from 'node:assert/strict'
import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs'
import { basename, join } from 'path'
import { BackupManager } from '../../core/backup-manager'
import { BACKUP_FILE_PATTERN, buildPaths, formatBackupTimestamp } from '../../config/paths'
import { ProvisionError } from '../../core/error-handler'
import { FakeRunner, fakeTar } from '../utils/fakes'
import { assertDirEntries } from '../utils/assertions'
import {
  createTempHome,
  isolateLogDirectory,
  removeTempHome,
} from '../utils/temp'

const fixedNow = () => new Date(2024, 0, 2, 3, 4, 5)

describe('formatBackupTimestamp', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    assert.equal(formatBackupTimestamp(fixedNow()), '20240102_030405')
    assert.equal(formatBackupTimestamp(new Date(2023, 10, 25, 17, 45, 9)), '20231125_174509')
  })
})

describe('BackupManager', () => {
  let logHome = ''
  let home = ''

  before(() => {
    logHome = isolateLogDirectory('backup')
  })

  beforeEach(() => {
    if (home) removeTempHome(home)
    home = createTempHome('backup')
  })

  after(() => {
    removeTempHome(home)
    removeTempHome(logHome)
  })

  function seedDatabase(): string {
    const db = join(home, 'mongodb', 'db')
    mkdirSync(join(db, 'sub'), { recursive: true })
    writeFileSync(join(db, 'a.wt'), 'data')
    writeFileSync(join(db, 'sub', 'b.wt'), 'data')
    return db
  }

  it('does nothing when there is no data directory', async () => {
    const runner = new FakeRunner()
    let asked = false
    const result = await new BackupManager({ runner: runner.run }).backupAndReset(
      buildPaths(home),
      async () => {
        asked = true
        return true
      },
    )

    assert.deepEqual(result, { existed: false, backup: null, removedEntries: 0 })
    assert.equal(asked, false)
    assert.equal(runner.calls.length, 0)
  })

  it('empties the data directory without a backup when declined', async () => {
    const db = seedDatabase()
    const runner = new FakeRunner().on('tar', fakeTar)

    const result = await new BackupManager({ runner: runner.run }).backupAndReset(
      buildPaths(home),
      async () => false,
    )

    assert.deepEqual(result, { existed: true, backup: null, removedEntries: 2 })
    assertDirEntries(db, [], 'data directory should be empty')
    assert.equal(runner.callsTo('tar').length, 0)
    assert.equal(
      readdirSync(home).some((entry) => BACKUP_FILE_PATTERN.test(entry)),
      false,
    )
  })

  it('archives the data directory before emptying it', async () => {
    const db = seedDatabase()
    const runner = new FakeRunner().on('tar', fakeTar)

    const result = await new BackupManager({
      runner: runner.run,
      now: fixedNow,
    }).backupAndReset(buildPaths(home), async () => true)

    const archive = join(home, 'mongodb_backup_20240102_030405.tar.gz')
    assert.equal(result.backup?.path, archive)
    assert.match(basename(archive), BACKUP_FILE_PATTERN)
    assert.deepEqual(JSON.parse(readFileSync(archive, 'utf8')), {
      files: ['db/a.wt', 'db/sub/b.wt'],
    })
    assert.deepEqual(runner.callsTo('tar')[0].args, [
      '-czf',
      archive,
      '-C',
      join(home, 'mongodb'),
      'db',
    ])
    assertDirEntries(db, [], 'data directory should be empty')
    assert.equal(result.removedEntries, 2)
  })

  it('leaves the database untouched when tar fails', async () => {
    const db = seedDatabase()
    const runner = new FakeRunner().fail('tar', 2, 'No space left on device')

    await assert.rejects(
      new BackupManager({ runner: runner.run, now: fixedNow }).backupAndReset(
        buildPaths(home),
        async () => true,
      ),
      (error: unknown) =>
        error instanceof ProvisionError &&
        error.code === 'BACKUP_FAILED' &&
        error.message.startsWith('Backup failed, existing database left untouched'),
    )

    assertDirEntries(db, ['a.wt', 'sub'], 'data directory should be intact')
    assert.equal(existsSync(join(home, 'mongodb_backup_20240102_030405.tar.gz')), false)
  })

  it('treats a missing archive as a failed backup', async () => {
    const db = seedDatabase()
    // tar "succeeds" without writing anything
    const runner = new FakeRunner()

    await assert.rejects(
      new BackupManager({ runner: runner.run, now: fixedNow }).createBackup(
        buildPaths(home),
      ),
      (error: unknown) => error instanceof ProvisionError && error.code === 'BACKUP_FAILED',
    )
    assertDirEntries(db, ['a.wt', 'sub'], 'data directory should be intact')
  })

  it('removes an empty archive', async () => {
    seedDatabase()
    const archive = join(home, 'mongodb_backup_20240102_030405.tar.gz')
    const runner = new FakeRunner().on('tar', () => {
      writeFileSync(archive, '')
      return { stdout: '', stderr: '' }
    })

    await assert.rejects(
      new BackupManager({ runner: runner.run, now: fixedNow }).createBackup(
        buildPaths(home),
      ),
      { message: 'Backup failed, existing database left untouched: archive is empty' },
    )
    assert.equal(existsSync(archive), false)
  })
})
