import type { DependencySpec, ServiceName } from '@svc-catalog/graph'
import type { ServiceTypeTag } from '@svc-catalog/schema'

export enum ServiceState {
  Inactive = 'Inactive',
  Validating = 'Validating',
  Active = 'Active',
  Error = 'Error',
}

export interface ServiceStatus {
  state: ServiceState
  errorMessage?: string
  warnings: string[]
  /** Unix epoch, milliseconds. */
  lastChecked: number
}

export interface ServiceRecord {
  name: ServiceName
  namespace?: string
  declaredVersion: string
  dependencies: DependencySpec[]
  serviceTypeTag: ServiceTypeTag | 'unknown'
  /** Parsed configuration document as registered. */
  configPayload: unknown
  status: ServiceStatus
  /** Unix epoch, milliseconds. Changes on every registration or update. */
  lastUpdated: number
}

/** Outcome of one catalog validation pass. Built fresh every time. */
export class ValidationSummary {
  public readonly successful: ServiceName[] = []
  public readonly failed: Array<[ServiceName, string]> = []
  public readonly warnings = new Map<string, string[]>()

  constructor(public readonly timestamp: number = Date.now()) {}

  public addWarning(scope: string, warning: string): void {
    const list = this.warnings.get(scope)
    if (list) list.push(warning)
    else this.warnings.set(scope, [warning])
  }

  public get successfulCount(): number {
    return this.successful.length
  }

  public get failedCount(): number {
    return this.failed.length
  }

  /** Total number of warnings across every scope. */
  public get warningCount(): number {
    let total = 0
    for (const list of this.warnings.values()) total += list.length
    return total
  }

  public get totalCount(): number {
    return this.successfulCount + this.failedCount
  }

  public get hasWarnings(): boolean {
    return this.warnings.size > 0
  }

  public get isSuccessful(): boolean {
    return this.failed.length === 0
  }
}
