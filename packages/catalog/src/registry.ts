import {
  detailedImpact,
  detectCycles,
  findImpact,
  criticalImpact,
  resolveOrder,
  ServiceNotFoundError,
  type CycleInfo,
  type DependencyGraph,
  type ImpactInfo,
  type ServiceName,
} from '@svc-catalog/graph'
import { makeLogger } from '@svc-catalog/logger'
import { ZodStructuralValidator, type StructuralValidator } from '@svc-catalog/schema'
import {
  ReadWriteLock,
  deepClone,
  paginate,
  type ListOptions,
  type ListResult,
} from '@svc-catalog/utils'
import { buildGraph } from './builder.js'
import { validateDependencies, type DependencyFindings } from './dependencyValidator.js'
import { CatalogError } from './errors.js'
import { planDeletion, startOrder, stopOrder } from './lifecycle.js'
import { runCatalogValidation } from './orchestrator.js'
import { parseConfigText, toServiceRecord } from './record.js'
import { transition } from './status.js'
import type { ConfigStore } from './store/configStore.js'
import { ServiceState, type ServiceRecord, type ValidationSummary } from './types.js'

export interface ServiceRegistryOptions {
  structuralValidator?: StructuralValidator
}

/**
 * Owns the set of registered services. The map sits behind one ReadWriteLock; every analysis
 * works on a snapshot taken under the read lock, so graph algorithms never run while it is held.
 */
export class ServiceRegistry {
  private readonly services = new Map<ServiceName, ServiceRecord>()
  private readonly lock = new ReadWriteLock()
  private readonly logger = makeLogger('ServiceRegistry')
  private readonly structuralValidator: StructuralValidator

  constructor(
    private readonly store: ConfigStore,
    options: ServiceRegistryOptions = {},
  ) {
    this.structuralValidator = options.structuralValidator ?? new ZodStructuralValidator()
  }

  // -------------------------------------------------------------------------
  // registration
  // -------------------------------------------------------------------------

  /** Adds the service and stores its config; an existing service is treated as an update. */
  public async registerService(name: ServiceName, text: string): Promise<ServiceRecord> {
    return this.write(name, text, false)
  }

  /** @throws CatalogError `NOT_FOUND` for a service that was never registered */
  public async updateService(name: ServiceName, text: string): Promise<ServiceRecord> {
    return this.write(name, text, true)
  }

  /** Registers every config in the store without writing them back. Returns the names loaded. */
  public async loadServices(): Promise<ServiceName[]> {
    let names: string[]
    try {
      names = await this.store.list()
    } catch (err) {
      throw CatalogError.wrap(err, 'Failed to list stored configs')
    }

    const loaded: ServiceName[] = []
    for (const name of names) {
      let text: string
      try {
        text = await this.store.load(name)
      } catch (err) {
        throw CatalogError.wrap(err, `Failed to load config for '${name}'`)
      }
      await this.put(name, parseConfigText(name, text), false)
      loaded.push(name)
    }
    this.logger.info('services loaded', { count: loaded.length })
    return loaded
  }

  // The map changes first; a failed save puts back what was there before.
  private async write(
    name: ServiceName,
    text: string,
    expectExisting: boolean,
  ): Promise<ServiceRecord> {
    const payload = parseConfigText(name, text)
    const { record, previous } = await this.put(name, payload, expectExisting)
    try {
      await this.store.save(name, text)
    } catch (err) {
      await this.restore(name, record, previous)
      throw CatalogError.wrap(err, `Failed to store config for '${name}'`)
    }
    return deepClone(record)
  }

  private async put(
    name: ServiceName,
    payload: Record<string, unknown>,
    expectExisting: boolean,
  ): Promise<{ record: ServiceRecord; previous?: ServiceRecord }> {
    return this.lock.withWrite(() => {
      const existing = this.services.get(name)
      if (expectExisting && !existing) {
        throw CatalogError.wrap(new ServiceNotFoundError(name), 'update failed')
      }
      const now = Date.now()
      // strictly increasing per service so a pass started earlier never overwrites this record
      const stamp = existing ? Math.max(now, existing.lastUpdated + 1) : now
      const record = toServiceRecord(name, payload, stamp)
      if (existing) {
        record.status = transition(existing.status, ServiceState.Validating, { now })
      }
      this.services.set(name, record)
      this.logger.debug(existing ? 'service updated' : 'service registered', { service: name })
      return { record: deepClone(record), previous: existing }
    })
  }

  private async restore(
    name: ServiceName,
    written: ServiceRecord,
    previous: ServiceRecord | undefined,
  ): Promise<void> {
    await this.lock.withWrite(() => {
      // a later write owns the entry now
      if (this.services.get(name)?.lastUpdated !== written.lastUpdated) return
      if (previous) this.services.set(name, previous)
      else this.services.delete(name)
    })
  }

  // -------------------------------------------------------------------------
  // reads
  // -------------------------------------------------------------------------

  public async getService(name: ServiceName): Promise<ServiceRecord> {
    const record = await this.lock.withRead(() => {
      const found = this.services.get(name)
      return found ? deepClone(found) : undefined
    })
    if (!record) throw CatalogError.wrap(new ServiceNotFoundError(name), 'lookup failed')
    return record
  }

  public async listServices(options?: ListOptions): Promise<ListResult<ServiceName>> {
    const names = await this.lock.withRead(() => [...this.services.keys()].sort())
    return paginate(names, (n) => n, options)
  }

  /** Deep copies of every record, sorted by name. */
  public async snapshot(): Promise<ServiceRecord[]> {
    const records = await this.lock.withRead(() => deepClone([...this.services.values()]))
    return records.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  private async graph(): Promise<DependencyGraph> {
    return buildGraph(await this.snapshot())
  }

  // -------------------------------------------------------------------------
  // validation
  // -------------------------------------------------------------------------

  public async validateAll(): Promise<ValidationSummary> {
    const records = await this.snapshot()
    const summary = runCatalogValidation(records, {
      structuralValidator: this.structuralValidator,
      logger: this.logger,
    })

    await this.lock.withWrite(() => {
      for (const record of records) {
        const current = this.services.get(record.name)
        if (!current || current.lastUpdated !== record.lastUpdated) {
          this.logger.debug('skipping stale validation result', { service: record.name })
          continue
        }
        current.status = record.status
      }
    })
    return summary
  }

  public async validateDependencies(name: ServiceName): Promise<DependencyFindings> {
    const records = await this.snapshot()
    const record = records.find((r) => r.name === name)
    if (!record) throw CatalogError.wrap(new ServiceNotFoundError(name), 'validation failed')
    return validateDependencies(record, buildGraph(records))
  }

  /** Dependency errors and warnings per service; services without findings are left out. */
  public async validateAllDependencies(): Promise<Map<ServiceName, string[]>> {
    const records = await this.snapshot()
    const graph = buildGraph(records)
    const results = new Map<ServiceName, string[]>()
    for (const record of records) {
      const { errors, warnings } = validateDependencies(record, graph)
      if (errors.length + warnings.length > 0) results.set(record.name, [...errors, ...warnings])
    }
    return results
  }

  public async checkCircularDependencies(): Promise<CycleInfo | undefined> {
    return detectCycles(await this.graph())
  }

  // -------------------------------------------------------------------------
  // ordering and impact
  // -------------------------------------------------------------------------

  public async resolveDependencies(roots: readonly ServiceName[]): Promise<ServiceName[]> {
    return this.analyze((g) => resolveOrder(g, roots), 'dependency resolution failed')
  }

  public async startOrder(roots: readonly ServiceName[]): Promise<ServiceName[]> {
    return this.analyze((g) => startOrder(g, roots), 'start order failed')
  }

  public async stopOrder(roots: readonly ServiceName[]): Promise<ServiceName[]> {
    return this.analyze((g) => stopOrder(g, roots), 'stop order failed')
  }

  public async analyzeImpact(name: ServiceName): Promise<ServiceName[]> {
    return this.analyze((g) => findImpact(g, name), 'impact analysis failed')
  }

  public async analyzeImpactDetailed(name: ServiceName): Promise<ImpactInfo[]> {
    return this.analyze((g) => detailedImpact(g, name), 'impact analysis failed')
  }

  public async analyzeCriticalImpact(name: ServiceName): Promise<ServiceName[]> {
    return this.analyze((g) => criticalImpact(g, name), 'impact analysis failed')
  }

  /**
   * Removes a service and its stored config. Returns every service that depended on it.
   *
   * @throws CatalogError `DELETION_BLOCKED` when required dependents exist and `force` is off
   */
  public async deleteService(name: ServiceName, force = false): Promise<ServiceName[]> {
    const plan = await this.analyze((g) => planDeletion(g, name, force), 'deletion failed')

    try {
      await this.store.delete(name)
    } catch (err) {
      throw CatalogError.wrap(err, `Failed to remove stored config for '${name}'`)
    }
    await this.lock.withWrite(() => {
      this.services.delete(name)
    })

    if (plan.impact.length > 0) {
      this.logger.warn('service deleted with dependents', {
        service: name,
        impact: plan.impact,
        forced: force,
      })
    }
    return plan.impact
  }

  private async analyze<T>(fn: (graph: DependencyGraph) => T, failure: string): Promise<T> {
    const graph = await this.graph()
    try {
      return fn(graph)
    } catch (err) {
      throw CatalogError.wrap(err, failure)
    }
  }
}
