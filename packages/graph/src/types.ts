export type ServiceName = string

/** A dependency one service declares on another. */
export interface DependencySpec {
  target: ServiceName
  versionConstraint?: string
  required: boolean
}

export interface NodeAttributes {
  /** Version the service itself declares. */
  version?: string
}

export interface CycleInfo {
  /** Closed path: the first and last entries name the same service. */
  path: ServiceName[]
  description: string
}

export interface ImpactInfo {
  service: ServiceName
  /** Required flag of the edge through which the service was discovered. */
  isRequired: boolean
  /** True when some path from the service to the origin is made only of required edges. */
  critical: boolean
  /** Origin first, affected service last. */
  path: ServiceName[]
  description: string
}
