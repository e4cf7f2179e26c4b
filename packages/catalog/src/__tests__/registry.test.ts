import { describe, it, expect } from 'vitest'
import {
  CatalogError,
  ConfigStoreError,
  DeletionBlockedError,
  InMemoryConfigStore,
  ServiceRegistry,
  ServiceState,
} from '../index.js'
import { restConfig, type DepInput } from './helpers.js'

class FailingStore extends InMemoryConfigStore {
  public failSave = false
  public failDelete = false

  protected override async _save(name: string, content: string): Promise<void> {
    if (this.failSave) throw new Error('disk full')
    return super._save(name, content)
  }

  protected override async _delete(name: string): Promise<void> {
    if (this.failDelete) throw new Error('read-only filesystem')
    return super._delete(name)
  }
}

async function registryWith(
  services: Array<[string, string, DepInput[]?]>,
): Promise<{ registry: ServiceRegistry; store: InMemoryConfigStore }> {
  const store = new InMemoryConfigStore()
  const registry = new ServiceRegistry(store)
  for (const [name, version, deps] of services) {
    await registry.registerService(name, restConfig(name, version, deps ?? []))
  }
  return { registry, store }
}

async function catalogError(promise: Promise<unknown>): Promise<CatalogError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof CatalogError) return err
    throw err
  }
  throw new Error('expected a CatalogError')
}

describe('ServiceRegistry', () => {
  it('registers services as inactive and persists their config', async () => {
    const { registry, store } = await registryWith([['users', '1.0.0']])

    const rec = await registry.getService('users')
    expect(rec.status.state).toBe(ServiceState.Inactive)
    expect(rec.declaredVersion).toBe('1.0.0')
    expect(await store.list()).toEqual(['users'])
    expect(JSON.parse(await store.load('users'))).toMatchObject({ name: 'users' })
  })

  it('rejects invalid JSON without storing it', async () => {
    const { registry, store } = await registryWith([])
    const err = await catalogError(registry.registerService('bad', '{'))
    expect(err.code).toBe('INVALID_CONFIG')
    expect(await store.exists('bad')).toBe(false)
  })

  it('writes validation results back and resets them on update', async () => {
    const { registry } = await registryWith([
      ['x', '1.0.0', [{ service: 'missing-service', version_constraint: '1.0.0' }]],
    ])

    const summary = await registry.validateAll()
    expect(summary.failed).toEqual([['x', "Required dependency 'missing-service' not found"]])
    const failed = await registry.getService('x')
    expect(failed.status.state).toBe(ServiceState.Error)

    const updated = await registry.updateService('x', restConfig('x', '1.1.0'))
    expect(updated.status.state).toBe(ServiceState.Validating)
    expect(updated.lastUpdated).toBeGreaterThan(failed.lastUpdated)

    await registry.validateAll()
    expect((await registry.getService('x')).status.state).toBe(ServiceState.Active)
  })

  it('refuses to update an unknown service', async () => {
    const { registry, store } = await registryWith([])
    const err = await catalogError(registry.updateService('ghost', restConfig('ghost', '1.0.0')))
    expect(err.code).toBe('NOT_FOUND')
    expect(err.message).toBe("Service 'ghost' not found")
    expect(await store.exists('ghost')).toBe(false)
    expect((await registry.listServices()).items).toEqual([])
  })

  it('does not bring back a deleted service through a later update', async () => {
    const { registry, store } = await registryWith([['users', '1.0.0']])
    await registry.deleteService('users')

    const err = await catalogError(registry.updateService('users', restConfig('users', '2.0.0')))
    expect(err.code).toBe('NOT_FOUND')
    expect(await store.list()).toEqual([])
    expect((await registry.listServices()).items).toEqual([])
  })

  it('keeps a service registered when its stored config cannot be removed', async () => {
    const store = new FailingStore()
    const registry = new ServiceRegistry(store)
    await registry.registerService('D', restConfig('D', '1.0.0'))
    store.failDelete = true

    const err = await catalogError(registry.deleteService('D'))
    expect(err.code).toBe('STORE')
    expect(err.message).toBe('Failed to delete config for "D": read-only filesystem')
    expect(err.cause).toBeInstanceOf(ConfigStoreError)
    expect((await registry.listServices()).items).toEqual(['D'])
    expect(await store.list()).toEqual(['D'])
  })

  it('restores the previous record when saving a config fails', async () => {
    const store = new FailingStore()
    const registry = new ServiceRegistry(store)
    await registry.registerService('users', restConfig('users', '1.0.0'))
    store.failSave = true

    const update = await catalogError(registry.updateService('users', restConfig('users', '2.0.0')))
    expect(update.code).toBe('STORE')
    expect((await registry.getService('users')).declaredVersion).toBe('1.0.0')

    await catalogError(registry.registerService('orders', restConfig('orders', '1.0.0')))
    expect((await registry.listServices()).items).toEqual(['users'])
  })

  it('reports an unusable service name as invalid input', async () => {
    const { registry } = await registryWith([])
    const err = await catalogError(registry.registerService('../escape', restConfig('x', '1.0.0')))
    expect(err.code).toBe('INVALID_CONFIG')
    expect((await registry.listServices()).items).toEqual([])
  })

  it('orders start and stop around dependencies', async () => {
    const { registry } = await registryWith([
      ['A', '1.0.0', [{ service: 'B' }, { service: 'C', required: false }]],
      ['B', '1.0.0', [{ service: 'D' }]],
      ['C', '1.0.0'],
      ['D', '1.0.0'],
    ])

    const start = await registry.startOrder(['A'])
    expect(start).toHaveLength(4)
    expect(start.indexOf('D')).toBeLessThan(start.indexOf('B'))
    expect(start.indexOf('B')).toBeLessThan(start.indexOf('A'))
    expect(start.indexOf('C')).toBeLessThan(start.indexOf('A'))

    expect(await registry.stopOrder(['A'])).toEqual([...start].reverse())
    expect(await registry.resolveDependencies(['B'])).toEqual(['D', 'B'])
  })

  it('surfaces a cycle on ordering but not on validation', async () => {
    const { registry } = await registryWith([
      ['x', '1.0.0', [{ service: 'y' }]],
      ['y', '1.0.0', [{ service: 'x' }]],
    ])

    expect(await registry.checkCircularDependencies()).toEqual({
      path: ['x', 'y', 'x'],
      description: 'x -> y -> x',
    })
    const err = await catalogError(registry.resolveDependencies(['x']))
    expect(err.code).toBe('CYCLE')

    const summary = await registry.validateAll()
    expect(summary.isSuccessful).toBe(true)
  })

  it('analyses impact over required and optional edges', async () => {
    const { registry } = await registryWith([
      ['A', '1.0.0', [{ service: 'B' }]],
      ['B', '1.0.0', [{ service: 'D' }]],
      ['C', '1.0.0', [{ service: 'D', required: false }]],
      ['D', '1.0.0'],
    ])

    expect(await registry.analyzeImpact('D')).toEqual(['B', 'C', 'A'])
    expect(await registry.analyzeCriticalImpact('D')).toEqual(['B', 'A'])
    expect(await registry.analyzeImpactDetailed('D')).toEqual([
      {
        service: 'B',
        isRequired: true,
        critical: true,
        path: ['D', 'B'],
        description: "'B' depends on 'D' (required)",
      },
      {
        service: 'C',
        isRequired: false,
        critical: false,
        path: ['D', 'C'],
        description: "'C' depends on 'D' (optional)",
      },
      {
        service: 'A',
        isRequired: true,
        critical: true,
        path: ['D', 'B', 'A'],
        description: "'A' depends on 'D' through D <- B <- A (critical)",
      },
    ])
  })

  it('blocks deletion while required dependents exist', async () => {
    const { registry, store } = await registryWith([
      ['A', '1.0.0', [{ service: 'B' }]],
      ['B', '1.0.0', [{ service: 'D' }]],
      ['D', '1.0.0'],
    ])

    const err = await catalogError(registry.deleteService('D'))
    expect(err.code).toBe('DELETION_BLOCKED')
    expect(err.cause).toBeInstanceOf(DeletionBlockedError)
    if (err.cause instanceof DeletionBlockedError) {
      expect(err.cause.blockers).toEqual(['B', 'A'])
    }
    expect(await store.exists('D')).toBe(true)

    expect(await registry.deleteService('D', true)).toEqual(['B', 'A'])
    expect(await store.exists('D')).toBe(false)
    expect((await catalogError(registry.getService('D'))).code).toBe('NOT_FOUND')
  })

  it('deletes a service that only has optional dependents', async () => {
    const { registry } = await registryWith([
      ['C', '1.0.0', [{ service: 'D', required: false }]],
      ['D', '1.0.0'],
    ])
    expect(await registry.deleteService('D')).toEqual(['C'])
    expect((await registry.listServices()).items).toEqual(['C'])
  })

  it('reports dependency findings per service', async () => {
    const { registry } = await registryWith([
      ['a', '1.0.0', [{ service: 'gone' }, { service: 'b', version_constraint: '1.0.0' }]],
      ['b', '1.3.0'],
    ])

    const findings = await registry.validateDependencies('a')
    expect(findings.errors).toEqual(["Required dependency 'gone' not found"])
    expect(findings.warnings).toEqual([
      "Minor version incompatibility for dependency 'b': expected 1.0.0 but found 1.3.0",
    ])

    const all = await registry.validateAllDependencies()
    expect([...all.keys()]).toEqual(['a'])
    expect(all.get('a')).toEqual([...findings.errors, ...findings.warnings])
  })

  it('loads stored configs and pages through names', async () => {
    const store = new InMemoryConfigStore({
      gamma: restConfig('gamma', '1.0.0'),
      alpha: restConfig('alpha', '1.0.0'),
      beta: restConfig('beta', '1.0.0'),
    })
    const registry = new ServiceRegistry(store)

    expect(await registry.loadServices()).toEqual(['alpha', 'beta', 'gamma'])
    expect(await registry.listServices({ limit: 2 })).toEqual({
      items: ['alpha', 'beta'],
      nextCursor: 'beta',
    })
    expect(await registry.listServices({ limit: 2, cursor: 'beta' })).toEqual({
      items: ['gamma'],
      nextCursor: undefined,
    })
  })

  it('hands out copies that do not alias registry state', async () => {
    const { registry } = await registryWith([['users', '1.0.0']])
    const snapshot = await registry.snapshot()
    snapshot[0].declaredVersion = '9.9.9'
    expect((await registry.getService('users')).declaredVersion).toBe('1.0.0')
  })
})
