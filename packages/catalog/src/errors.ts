import { GraphError } from '@svc-catalog/graph'
import { SchemaStructuralError } from '@svc-catalog/schema'
import type { ServiceState } from './types.js'

/** Hard failures from the dependency policy for one service. */
export class DependencyPolicyError extends Error {
  constructor(
    public readonly service: string,
    public readonly errors: string[],
    public readonly warnings: string[] = [],
  ) {
    super(errors.join('; '))
    this.name = 'DependencyPolicyError'
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: ServiceState,
    public readonly to: ServiceState,
  ) {
    super(`Invalid service state transition: ${from} -> ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

export class DeletionBlockedError extends Error {
  constructor(
    public readonly service: string,
    public readonly blockers: string[],
  ) {
    super(
      `Cannot delete service '${service}': required by ${blockers.join(', ')} (use force to override)`,
    )
    this.name = 'DeletionBlockedError'
  }
}

export type ConfigStoreErrorCode = 'NOT_FOUND' | 'VALIDATION' | 'IO' | 'UNKNOWN'

export class ConfigStoreError extends Error {
  constructor(
    public readonly code: ConfigStoreErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'ConfigStoreError'
  }
}

export type CatalogErrorCode =
  | 'INVALID_CONFIG'
  | 'NOT_FOUND'
  | 'CYCLE'
  | 'DELETION_BLOCKED'
  | 'POLICY'
  | 'STORE'
  | 'INTERNAL'

/**
 * Boundary error of the registry. Domain and store failures are wrapped here so callers can
 * branch on one `code` while `cause` keeps the original.
 */
export class CatalogError extends Error {
  constructor(
    public readonly code: CatalogErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'CatalogError'
  }

  static wrap(err: unknown, fallbackMessage: string): CatalogError {
    if (err instanceof CatalogError) return err
    if (err instanceof GraphError) {
      const code: CatalogErrorCode =
        err.code === 'CYCLE_DETECTED'
          ? 'CYCLE'
          : err.code === 'SERVICE_NOT_FOUND'
            ? 'NOT_FOUND'
            : 'INTERNAL'
      return new CatalogError(code, err.message, { cause: err })
    }
    if (err instanceof DeletionBlockedError) {
      return new CatalogError('DELETION_BLOCKED', err.message, { cause: err })
    }
    if (err instanceof DependencyPolicyError || err instanceof SchemaStructuralError) {
      return new CatalogError('POLICY', err.message, { cause: err })
    }
    if (err instanceof ConfigStoreError) {
      const code: CatalogErrorCode =
        err.code === 'NOT_FOUND'
          ? 'NOT_FOUND'
          : err.code === 'VALIDATION'
            ? 'INVALID_CONFIG'
            : 'STORE'
      return new CatalogError(code, err.message, { cause: err })
    }
    const text = err instanceof Error ? err.message : String(err)
    return new CatalogError('INTERNAL', `${fallbackMessage}: ${text}`, { cause: err })
  }
}
