/**
 * Tests for DatabaseWrapper and DatabaseServiceImpl.
 *
 * Uses :memory: databases for speed and zero cleanup.
 * Validates:
 *  - open/close lifecycle
 *  - PRAGMA application (busy_timeout, synchronous)
 *  - DatabaseService lifecycle methods (initialize / shutdown) and migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync } from 'node:fs'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DatabaseWrapper, DatabaseServiceImpl, createDatabaseService } from '../../src/persistence/database.js'

// ---------------------------------------------------------------------------
// DatabaseWrapper tests
// ---------------------------------------------------------------------------

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:')
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('should start in a closed state', () => {
    expect(wrapper.isOpen).toBe(false)
  })

  it('should open successfully', () => {
    wrapper.open()
    expect(wrapper.isOpen).toBe(true)
  })

  it('should throw when accessing db before open', () => {
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('should be idempotent on repeated open calls', () => {
    wrapper.open()
    const db1 = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(db1)
  })

  it('should be idempotent on repeated close calls', () => {
    wrapper.open()
    wrapper.close()
    expect(() => { wrapper.close() }).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  describe('PRAGMA verification', () => {
    it('should set busy_timeout to 5000', () => {
      wrapper.open()
      expect(wrapper.db.pragma('busy_timeout', { simple: true })).toBe(5000)
    })

    it('should set synchronous to NORMAL (1)', () => {
      wrapper.open()
      expect(wrapper.db.pragma('synchronous', { simple: true })).toBe(1)
    })
  })

  it('creates the parent directory of a file database', async () => {
    const dir = join(tmpdir(), `lattice-db-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
    const fileWrapper = new DatabaseWrapper(join(dir, 'state', 'history.db'))
    try {
      fileWrapper.open()
      expect(existsSync(join(dir, 'state', 'history.db'))).toBe(true)
    } finally {
      fileWrapper.close()
      await rm(dir, { recursive: true, force: true })
    }
  })
})

// ---------------------------------------------------------------------------
// DatabaseServiceImpl tests
// ---------------------------------------------------------------------------

describe('DatabaseServiceImpl', () => {
  let service: DatabaseServiceImpl

  beforeEach(() => {
    service = new DatabaseServiceImpl(':memory:')
  })

  afterEach(async () => {
    if (service.isOpen) await service.shutdown()
  })

  it('should start closed', () => {
    expect(service.isOpen).toBe(false)
  })

  it('should open and migrate on initialize()', async () => {
    await service.initialize()
    expect(service.isOpen).toBe(true)
    const tables = service.db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all()
      .map((row) => row.name)
    expect(tables).toEqual(['run_summaries', 'schema_migrations', 'skip_history'])
  })

  it('should close on shutdown()', async () => {
    await service.initialize()
    await service.shutdown()
    expect(service.isOpen).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// createDatabaseService factory tests
// ---------------------------------------------------------------------------

describe('createDatabaseService', () => {
  it('should fully initialize and shut down', async () => {
    const svc = createDatabaseService(':memory:')
    expect(svc.isOpen).toBe(false)
    await svc.initialize()
    expect(svc.isOpen).toBe(true)
    await svc.shutdown()
    expect(svc.isOpen).toBe(false)
  })
})
