/**
 * Unit tests for the ServiceRegistry DI container.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Mock } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface FakeService extends BaseService {
  initialize: Mock<() => Promise<void>>
  shutdown: Mock<() => Promise<void>>
}

function makeService(calls: string[] = [], name = 'svc'): FakeService {
  return {
    initialize: vi.fn(async () => {
      calls.push(`init:${name}`)
    }),
    shutdown: vi.fn(async () => {
      calls.push(`shutdown:${name}`)
    }),
  }
}

async function shutdownError(registry: ServiceRegistry): Promise<AggregateError> {
  try {
    await registry.shutdownAll()
  } catch (err) {
    if (err instanceof AggregateError) return err
    throw err
  }
  throw new Error('expected shutdownAll to reject')
}

// ---------------------------------------------------------------------------
// ServiceRegistry tests
// ---------------------------------------------------------------------------

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry

  beforeEach(() => {
    registry = new ServiceRegistry()
  })

  it('registers and retrieves a service by name', () => {
    const database = makeService()
    registry.register('database', database)

    expect(registry.get('database')).toBe(database)
    expect(registry.has('database')).toBe(true)
    expect(registry.has('history')).toBe(false)
  })

  it('rejects a duplicate registration', () => {
    registry.register('database', makeService())
    expect(() => {
      registry.register('database', makeService())
    }).toThrow('Service "database" is already registered')
  })

  it('throws for an unknown service', () => {
    expect(() => registry.get('history')).toThrow('Service "history" is not registered')
  })

  it('lists service names in registration order', () => {
    registry.register('database', makeService())
    registry.register('dispatcher', makeService())
    expect(registry.serviceNames).toEqual(['database', 'dispatcher'])
  })

  it('initializes in registration order and shuts down in reverse', async () => {
    const calls: string[] = []
    registry.register('database', makeService(calls, 'database'))
    registry.register('dispatcher', makeService(calls, 'dispatcher'))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(calls).toEqual(['init:database', 'init:dispatcher', 'shutdown:dispatcher', 'shutdown:database'])
  })

  it('stops initializing at the first failure', async () => {
    const database = makeService()
    const dispatcher = makeService()
    database.initialize.mockRejectedValue(new Error('disk full'))
    registry.register('database', database)
    registry.register('dispatcher', dispatcher)

    await expect(registry.initializeAll()).rejects.toThrow('disk full')
    expect(dispatcher.initialize).not.toHaveBeenCalled()
  })

  it('shuts every service down and reports all failures together', async () => {
    const database = makeService()
    const history = makeService()
    const dispatcher = makeService()
    const closeError = new Error('close failed')
    database.shutdown.mockRejectedValue(closeError)
    dispatcher.shutdown.mockRejectedValue('still running')
    registry.register('database', database)
    registry.register('history', history)
    registry.register('dispatcher', dispatcher)

    const error = await shutdownError(registry)

    expect(history.shutdown).toHaveBeenCalledOnce()
    expect(error.message).toBe('Shutdown errors in 2 service(s)')
    expect(error.errors).toHaveLength(2)
    expect(error.errors[1]).toBe(closeError)
    expect(String(error.errors[0])).toBe('Error: still running')
  })
})
