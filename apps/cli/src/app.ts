import { readFile } from 'node:fs/promises'
import {
  FileConfigStore,
  ServiceRegistry,
  catalogConfig,
  type ValidationSummary,
} from '@svc-catalog/catalog'
import type { ImpactInfo } from '@svc-catalog/graph'
import { makeLogger } from '@svc-catalog/logger'
import { ServiceConfig, ZodStructuralValidator } from '@svc-catalog/schema'

const logger = makeLogger('cli')

export class App {
  private constructor(private readonly registry: ServiceRegistry) {}

  /** Registry over `configDir` with every stored config already loaded. */
  public static async open(configDir: string = catalogConfig.getConfigDir()): Promise<App> {
    const registry = new ServiceRegistry(new FileConfigStore(configDir), {
      structuralValidator: new ZodStructuralValidator(ServiceConfig, catalogConfig.getSchemaVersion()),
    })
    const loaded = await registry.loadServices()
    logger.debug('catalog opened', { configDir, services: loaded.length })
    return new App(registry)
  }

  public async validate(): Promise<ValidationSummary> {
    return this.registry.validateAll()
  }

  public async register(name: string, configFile: string): Promise<void> {
    const text = await readFile(configFile, 'utf8')
    await this.registry.registerService(name, text)
    logger.info('service registered', { service: name })
  }

  public async list(): Promise<string[]> {
    const names: string[] = []
    let cursor: string | undefined
    do {
      const page = await this.registry.listServices({ cursor })
      names.push(...page.items)
      cursor = page.nextCursor
    } while (cursor)
    return names
  }

  public async order(roots: string[], stop: boolean): Promise<string[]> {
    return stop ? this.registry.stopOrder(roots) : this.registry.startOrder(roots)
  }

  public async impact(service: string, criticalOnly: boolean): Promise<ImpactInfo[]> {
    const impact = await this.registry.analyzeImpactDetailed(service)
    return criticalOnly ? impact.filter((info) => info.critical) : impact
  }

  public async delete(service: string, force: boolean): Promise<string[]> {
    return this.registry.deleteService(service, force)
  }
}
