import { ConfigStore } from './configStore.js'
import { ConfigStoreError } from '../errors.js'

export class InMemoryConfigStore extends ConfigStore {
  private readonly store = new Map<string, string>()

  constructor(seed?: Record<string, string>) {
    super()
    for (const [name, content] of Object.entries(seed ?? {})) this.store.set(name, content)
  }

  protected async initialize(): Promise<void> {
    return
  }

  protected async _load(name: string): Promise<string> {
    const content = this.store.get(name)
    if (content === undefined) {
      throw new ConfigStoreError('NOT_FOUND', `config for "${name}" not found`)
    }
    return content
  }

  protected async _save(name: string, content: string): Promise<void> {
    this.store.set(name, content)
  }

  protected async _exists(name: string): Promise<boolean> {
    return this.store.has(name)
  }

  // No-op if missing
  protected async _delete(name: string): Promise<void> {
    this.store.delete(name)
  }

  protected async _list(): Promise<string[]> {
    return [...this.store.keys()]
  }
}
