import type { CycleInfo, ServiceName } from './types.js'

export type GraphErrorCode = 'CYCLE_DETECTED' | 'SERVICE_NOT_FOUND' | 'INTERNAL_INVARIANT'

export class GraphError extends Error {
  constructor(
    public readonly code: GraphErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'GraphError'
  }
}

export class CycleError extends GraphError {
  constructor(public readonly cycle: CycleInfo) {
    super('CYCLE_DETECTED', `Circular dependency detected: ${cycle.description}`)
    this.name = 'CycleError'
  }

  get path(): ServiceName[] {
    return this.cycle.path
  }
}

export class ServiceNotFoundError extends GraphError {
  constructor(public readonly serviceName: ServiceName) {
    super('SERVICE_NOT_FOUND', `Service '${serviceName}' not found`)
    this.name = 'ServiceNotFoundError'
  }
}

/** A broken internal guarantee. Reaching this is a bug, not bad input. */
export class InternalInvariantError extends GraphError {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super('INTERNAL_INVARIANT', message)
    this.name = 'InternalInvariantError'
  }
}
