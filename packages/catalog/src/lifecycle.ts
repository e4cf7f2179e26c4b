import {
  criticalImpact,
  findImpact,
  resolveOrder,
  type DependencyGraph,
  type ServiceName,
} from '@svc-catalog/graph'
import { DeletionBlockedError } from './errors.js'

/** Dependencies first. */
export function startOrder(graph: DependencyGraph, roots: readonly ServiceName[]): ServiceName[] {
  return resolveOrder(graph, roots)
}

/** Dependents first. */
export function stopOrder(graph: DependencyGraph, roots: readonly ServiceName[]): ServiceName[] {
  return resolveOrder(graph, roots).reverse()
}

export interface DeletionPlan {
  service: ServiceName
  /** Every service that reaches the deleted one. */
  impact: ServiceName[]
  /** Services that reach it through required edges only. */
  critical: ServiceName[]
}

/**
 * @throws ServiceNotFoundError when `service` is not in the graph
 * @throws DeletionBlockedError when critical dependents exist and `force` is off
 */
export function planDeletion(
  graph: DependencyGraph,
  service: ServiceName,
  force: boolean,
): DeletionPlan {
  const critical = criticalImpact(graph, service)
  if (critical.length > 0 && !force) {
    throw new DeletionBlockedError(service, critical)
  }
  return { service, impact: findImpact(graph, service), critical }
}
