/**
 * Service registry for the orchestrator's resource-owning services.
 *
 * The history database registers here so the orchestrator can open it
 * before the first run and close it on shutdown.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for services that own resources.
 */
export interface BaseService {
  /** Acquire resources; called once before the first pipeline run */
  initialize(): Promise<void>

  /** Release resources; called in reverse registration order */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/** Map of service name to registered service instance */
type ServiceMap = Map<string, BaseService>

/**
 * Named services, initialized in registration order and shut down in reverse.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', createDatabaseService(path))
 * await registry.initializeAll()
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services: ServiceMap = new Map()
  private readonly _order: string[] = []

  /**
   * Register a named service. Registration order is preserved for lifecycle calls.
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * Retrieve a registered service by name.
   * @throws {Error} if no service with the given name is registered.
   */
  get(name: string): BaseService {
    const service = this._services.get(name)
    if (service === undefined) {
      throw new Error(`Service "${name}" is not registered`)
    }
    return service
  }

  /**
   * Returns true if a service with the given name is registered.
   */
  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize all registered services in registration order.
   * @throws the first initialization error; later services are not initialized
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut down all registered services in reverse registration order.
   * Errors are collected and re-thrown as an AggregateError after all services
   * have had a chance to shut down.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    const reversed = [...this._order].reverse()

    for (const name of reversed) {
      const service = this._services.get(name)
      if (service !== undefined) {
        try {
          await service.shutdown()
        } catch (err) {
          errors.push(err instanceof Error ? err : new Error(String(err)))
        }
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${errors.length} service(s)`)
    }
  }

  /** Return names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
