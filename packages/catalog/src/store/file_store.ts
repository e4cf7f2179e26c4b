import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { makeLogger } from '@svc-catalog/logger'
import { ConfigStore } from './configStore.js'
import { ConfigStoreError } from '../errors.js'

const EXTENSION = '.json'

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code
}

/** One `<name>.json` file per service inside a single directory. */
export class FileConfigStore extends ConfigStore {
  private readonly logger = makeLogger('FileConfigStore')

  constructor(public readonly directory: string) {
    super()
  }

  protected async initialize(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true })
    } catch (err) {
      throw this.asStoreError(err, 'IO', `Failed to prepare config directory ${this.directory}`)
    }
  }

  private fileFor(name: string): string {
    return path.join(this.directory, `${name}${EXTENSION}`)
  }

  protected async _load(name: string): Promise<string> {
    try {
      return await readFile(this.fileFor(name), 'utf8')
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) {
        throw new ConfigStoreError('NOT_FOUND', `config for "${name}" not found`)
      }
      throw this.asStoreError(err, 'IO', `Failed to read config for "${name}"`)
    }
  }

  protected async _save(name: string, content: string): Promise<void> {
    try {
      await writeFile(this.fileFor(name), content, 'utf8')
      this.logger.debug('config saved', { service: name })
    } catch (err) {
      throw this.asStoreError(err, 'IO', `Failed to write config for "${name}"`)
    }
  }

  protected async _exists(name: string): Promise<boolean> {
    try {
      await readFile(this.fileFor(name), 'utf8')
      return true
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return false
      throw this.asStoreError(err, 'IO', `Failed to check config for "${name}"`)
    }
  }

  protected async _delete(name: string): Promise<void> {
    try {
      await rm(this.fileFor(name), { force: true })
    } catch (err) {
      throw this.asStoreError(err, 'IO', `Failed to delete config for "${name}"`)
    }
  }

  protected async _list(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory, { withFileTypes: true })
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(EXTENSION))
        .map((e) => e.name.slice(0, -EXTENSION.length))
    } catch (err) {
      throw this.asStoreError(err, 'IO', `Failed to list ${this.directory}`)
    }
  }
}
