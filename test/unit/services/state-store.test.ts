import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { FileStateStore } from '@services/state-store.service.js'
import { PersistenceError, StateReadError } from '@utils/errors.js'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('FileStateStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sentinel-state-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('load', () => {
    it('should return an empty ledger on cold start', async () => {
      const log = createMockLogger()
      const store = new FileStateStore(log, join(dir, 'missing.state'))

      const ledger = await store.load()

      expect(ledger.connected.size).toBe(0)
      expect(ledger.lastHandshake.size).toBe(0)
      expect(log.info).toHaveBeenCalledWith(
        `State file '${join(dir, 'missing.state')}' not found. Starting fresh.`,
      )
    })

    it('should return an empty ledger when the parent directory does not exist', async () => {
      const store = new FileStateStore(
        createMockLogger(),
        join(dir, 'nested', 'deeper', 'sentinel.state'),
      )
      const ledger = await store.load()
      expect(ledger.connected.size).toBe(0)
    })

    it('should load records and warn about malformed lines', async () => {
      const file = join(dir, 'sentinel.state')
      await writeFile(
        file,
        'connected:alice:1\nhandshake:alice:1700000000\ngarbage\n',
      )
      const log = createMockLogger()
      const store = new FileStateStore(log, file)

      const ledger = await store.load()

      expect([...ledger.connected]).toEqual(['alice'])
      expect(ledger.lastHandshake.get('alice')).toBe(1700000000)
      expect(log.warn).toHaveBeenCalledWith(
        { line: 'garbage' },
        'Skipping malformed line in state file',
      )
      expect(log.info).toHaveBeenCalledWith(
        'Loaded state: 1 previously connected peers, 1 known handshakes',
      )
    })

    it('should throw StateReadError when the state path cannot be read', async () => {
      const file = join(dir, 'is-a-directory')
      await mkdir(file)
      const store = new FileStateStore(createMockLogger(), file)

      await expect(store.load()).rejects.toBeInstanceOf(StateReadError)
    })
  })

  describe('save', () => {
    it('should write the serialized ledger and leave no temporary file', async () => {
      const file = join(dir, 'sentinel.state')
      const store = new FileStateStore(createMockLogger(), file)

      await store.save({
        connected: new Set(['alice']),
        lastHandshake: new Map([
          ['alice', 1700000000],
          ['bob', 1600000000],
        ]),
      })

      expect(await readFile(file, 'utf8')).toBe(
        'connected:alice:1\nhandshake:alice:1700000000\nhandshake:bob:1600000000\n',
      )
      expect(await readdir(dir)).toEqual(['sentinel.state'])
    })

    it('should create missing parent directories', async () => {
      const file = join(dir, 'data', 'sentinel.state')
      const store = new FileStateStore(createMockLogger(), file)

      await store.save({ connected: new Set(['a']), lastHandshake: new Map() })

      expect(await readFile(file, 'utf8')).toBe('connected:a:1\n')
    })

    it('should replace the previous ledger wholesale', async () => {
      const file = join(dir, 'sentinel.state')
      await writeFile(file, 'connected:old:1\nhandshake:old:5\n')
      const store = new FileStateStore(createMockLogger(), file)

      await store.save({
        connected: new Set(),
        lastHandshake: new Map([['new', 9]]),
      })

      expect(await readFile(file, 'utf8')).toBe('handshake:new:9\n')
    })

    it('should round-trip through load', async () => {
      const file = join(dir, 'sentinel.state')
      await writeFile(file, 'handshake:b:2\nconnected:a:1\nhandshake:a:1\n')
      const store = new FileStateStore(createMockLogger(), file)

      await store.save(await store.load())
      const reloaded = await store.load()

      expect(reloaded.connected).toEqual(new Set(['a']))
      expect(reloaded.lastHandshake).toEqual(
        new Map([
          ['a', 1],
          ['b', 2],
        ]),
      )
    })

    it('should throw PersistenceError and keep the old ledger when the rename fails', async () => {
      // A directory in place of the state file makes the rename fail
      const file = join(dir, 'sentinel.state')
      await mkdir(file)
      await writeFile(join(file, 'keep'), 'x')
      const store = new FileStateStore(createMockLogger(), file)

      await expect(
        store.save({ connected: new Set(['a']), lastHandshake: new Map() }),
      ).rejects.toBeInstanceOf(PersistenceError)

      expect((await readdir(dir)).sort()).toEqual(['sentinel.state'])
      expect(await readdir(file)).toEqual(['keep'])
    })
  })
})
