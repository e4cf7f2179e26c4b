import { makeLogger } from '@svc-catalog/logger'
import { findCycle, toCycleInfo } from './cycles.js'
import { CycleError, InternalInvariantError } from './errors.js'
import type { DependencyGraph, NodeId } from './graph.js'
import type { ServiceName } from './types.js'

const logger = makeLogger('resolve')

/** Ids reachable from `roots` along dependency edges, roots included, in depth-first preorder. */
export function closureIds(graph: DependencyGraph, roots: readonly NodeId[]): NodeId[] {
  const visited = new Uint8Array(graph.nodeCount())
  const order: NodeId[] = []
  const stack: NodeId[] = []

  for (let i = roots.length - 1; i >= 0; i--) stack.push(roots[i])

  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined || visited[id]) continue
    visited[id] = 1
    order.push(id)

    const edges = graph.outEdges(id)
    for (let i = edges.length - 1; i >= 0; i--) {
      if (!visited[edges[i].to]) stack.push(edges[i].to)
    }
  }

  return order
}

/** Transitive closure of `roots`: every service they depend on, directly or not, plus themselves. */
export function transitiveClosure(graph: DependencyGraph, roots: readonly ServiceName[]): ServiceName[] {
  const ids = roots.map((r) => graph.require(r))
  return closureIds(graph, ids).map((id) => graph.nameOf(id))
}

/**
 * Kahn's algorithm over a closed subgraph. Edges run dependent -> dependency, so the raw output
 * lists dependents first and is reversed before returning.
 */
export function topologicalOrder(graph: DependencyGraph, subgraph: readonly NodeId[]): NodeId[] {
  const inDegree = new Map<NodeId, number>()
  for (const id of subgraph) inDegree.set(id, 0)

  for (const id of subgraph) {
    for (const edge of graph.outEdges(id)) {
      const current = inDegree.get(edge.to)
      if (current !== undefined) inDegree.set(edge.to, current + 1)
    }
  }

  const queue: NodeId[] = subgraph.filter((id) => inDegree.get(id) === 0)
  const output: NodeId[] = []

  for (let head = 0; head < queue.length; head++) {
    const id = queue[head]
    output.push(id)
    for (const edge of graph.outEdges(id)) {
      const current = inDegree.get(edge.to)
      if (current === undefined) continue
      inDegree.set(edge.to, current - 1)
      if (current - 1 === 0) queue.push(edge.to)
    }
  }

  return output.reverse()
}

/**
 * Order in which the closure of `roots` can be brought up: every dependency comes before the
 * services that depend on it.
 *
 * @throws ServiceNotFoundError when a root is not in the graph
 * @throws CycleError when the closure contains a cycle
 */
export function resolveOrder(graph: DependencyGraph, roots: readonly ServiceName[]): ServiceName[] {
  if (roots.length === 0) return []

  const rootIds = roots.map((r) => graph.require(r))
  const subgraph = closureIds(graph, rootIds)

  const cycle = findCycle(graph, subgraph)
  if (cycle) {
    const info = toCycleInfo(graph, cycle)
    logger.warn('cannot resolve order over a cycle', { roots, cycle: info.path })
    throw new CycleError(info)
  }

  const order = topologicalOrder(graph, subgraph)
  if (order.length !== subgraph.length) {
    throw new InternalInvariantError(
      `topological order has ${order.length} services but the subgraph has ${subgraph.length}`,
      { roots },
    )
  }

  logger.debug('resolved order', { roots, size: order.length })
  return order.map((id) => graph.nameOf(id))
}
