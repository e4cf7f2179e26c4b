import { ConfigStoreError, type ConfigStoreErrorCode } from '../errors.js'

/** Persistence for raw service configuration documents, keyed by service name. */
export abstract class ConfigStore {
  private initialized = false

  /** Called exactly once before any operation. */
  protected async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.initialize()
      this.initialized = true
    }
  }

  public async load(name: string): Promise<string> {
    await this.ensureInitialized()
    this.requireName(name)
    return this.guard(() => this._load(name), `Failed to load config for "${name}"`)
  }

  public async save(name: string, content: string): Promise<void> {
    await this.ensureInitialized()
    this.requireName(name)
    return this.guard(() => this._save(name, content), `Failed to save config for "${name}"`)
  }

  public async exists(name: string): Promise<boolean> {
    await this.ensureInitialized()
    return this.guard(() => this._exists(name), `Failed to check config for "${name}"`)
  }

  public async delete(name: string): Promise<void> {
    await this.ensureInitialized()
    this.requireName(name)
    return this.guard(() => this._delete(name), `Failed to delete config for "${name}"`)
  }

  /** Stored service names, sorted. */
  public async list(): Promise<string[]> {
    await this.ensureInitialized()
    const names = await this.guard(() => this._list(), 'Failed to list configs')
    return [...names].sort()
  }

  private async guard<T>(fn: () => Promise<T>, msg: string): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw this.asStoreError(err, 'IO', msg)
    }
  }

  protected requireName(name: string): void {
    if (!name || name.includes('/') || name.includes('\\') || name.startsWith('.')) {
      throw new ConfigStoreError('VALIDATION', `invalid service name "${name}"`)
    }
  }

  protected asStoreError(
    err: unknown,
    fallbackCode: ConfigStoreErrorCode,
    msg: string,
  ): ConfigStoreError {
    if (err instanceof ConfigStoreError) return err
    const text = err instanceof Error ? err.message : String(err)
    return new ConfigStoreError(fallbackCode, `${msg}: ${text}`, err)
  }

  protected abstract initialize(): Promise<void>

  protected abstract _load(name: string): Promise<string>

  protected abstract _save(name: string, content: string): Promise<void>

  protected abstract _exists(name: string): Promise<boolean>

  protected abstract _delete(name: string): Promise<void>

  protected abstract _list(): Promise<string[]>
}
