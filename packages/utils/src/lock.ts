export type Release = () => void

type Waiter = { mode: 'read' | 'write'; grant: (release: Release) => void }

/**
 * Coarse reader/writer lock for in-process shared state.
 *
 * Any number of readers may hold the lock at once; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer is not starved by readers that arrive after it. The lock is not
 * re-entrant: acquiring it again while holding it deadlocks the caller.
 */
export class ReadWriteLock {
  private readers = 0
  private writer = false
  private readonly waiters: Waiter[] = []

  public acquireRead(): Promise<Release> {
    if (!this.writer && this.waiters.length === 0) {
      this.readers++
      return Promise.resolve(this.readRelease())
    }
    return new Promise((grant) => this.waiters.push({ mode: 'read', grant }))
  }

  public acquireWrite(): Promise<Release> {
    if (!this.writer && this.readers === 0 && this.waiters.length === 0) {
      this.writer = true
      return Promise.resolve(this.writeRelease())
    }
    return new Promise((grant) => this.waiters.push({ mode: 'write', grant }))
  }

  public async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  public async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite()
    try {
      return await fn()
    } finally {
      release()
    }
  }

  public get activeReaders(): number {
    return this.readers
  }

  public get isWriteLocked(): boolean {
    return this.writer
  }

  public get pending(): number {
    return this.waiters.length
  }

  private readRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      this.readers--
      this.dispatch()
    }
  }

  private writeRelease(): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      this.writer = false
      this.dispatch()
    }
  }

  private dispatch(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0]
      if (next.mode === 'write') {
        if (this.writer || this.readers > 0) return
        this.waiters.shift()
        this.writer = true
        next.grant(this.writeRelease())
        return
      }
      if (this.writer) return
      this.waiters.shift()
      this.readers++
      next.grant(this.readRelease())
    }
  }
}
