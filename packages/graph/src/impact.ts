import type { DependencyGraph, NodeId, ReverseEdge } from './graph.js'
import type { ImpactInfo, ServiceName } from './types.js'

interface Reach {
  /** Discovered ids in breadth-first order, origin excluded. */
  order: NodeId[]
  /** Node each id was discovered from. */
  parent: Map<NodeId, NodeId>
  /** Required flag of the discovering edge. */
  viaRequired: Map<NodeId, boolean>
}

/**
 * Breadth-first walk against edge direction: from a service to everything that depends on it.
 * Direct dependents are found before transitive ones, so every discovered path is a shortest one.
 */
function reverseReach(
  graph: DependencyGraph,
  origin: NodeId,
  follow: (edge: ReverseEdge) => boolean = () => true,
): Reach {
  const visited = new Uint8Array(graph.nodeCount())
  const parent = new Map<NodeId, NodeId>()
  const viaRequired = new Map<NodeId, boolean>()
  const order: NodeId[] = []
  const queue: NodeId[] = [origin]
  visited[origin] = 1

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head]
    for (const edge of graph.inEdges(current)) {
      if (visited[edge.from] || !follow(edge)) continue
      visited[edge.from] = 1
      parent.set(edge.from, current)
      viaRequired.set(edge.from, edge.spec.required)
      order.push(edge.from)
      queue.push(edge.from)
    }
  }

  return { order, parent, viaRequired }
}

function pathTo(graph: DependencyGraph, reach: Reach, origin: NodeId, id: NodeId): ServiceName[] {
  const reversed: NodeId[] = [id]
  let cursor = id
  while (cursor !== origin) {
    const up = reach.parent.get(cursor)
    if (up === undefined) break
    reversed.push(up)
    cursor = up
  }
  return reversed.reverse().map((n) => graph.nameOf(n))
}

function describeImpact(path: readonly ServiceName[], isRequired: boolean, critical: boolean): string {
  const origin = path[0]
  const service = path[path.length - 1]
  if (path.length === 2) {
    return `'${service}' depends on '${origin}' (${isRequired ? 'required' : 'optional'})`
  }
  return `'${service}' depends on '${origin}' through ${path.join(' <- ')} (${
    critical ? 'critical' : 'non-critical'
  })`
}

/** Every service that depends on `target`, directly or transitively. */
export function findImpact(graph: DependencyGraph, target: ServiceName): ServiceName[] {
  const origin = graph.require(target)
  return reverseReach(graph, origin).order.map((id) => graph.nameOf(id))
}

/**
 * Services reachable from `target` through required edges only. A service that can be reached
 * solely through some optional hop is left out.
 */
export function criticalImpact(graph: DependencyGraph, target: ServiceName): ServiceName[] {
  const origin = graph.require(target)
  return reverseReach(graph, origin, (edge) => edge.spec.required).order.map((id) =>
    graph.nameOf(id),
  )
}

/**
 * Dependents in breadth-first order. A critical entry reports the all-required path that makes it
 * critical; any other entry reports its shortest path.
 */
export function detailedImpact(graph: DependencyGraph, target: ServiceName): ImpactInfo[] {
  const origin = graph.require(target)
  const reach = reverseReach(graph, origin)
  const requiredReach = reverseReach(graph, origin, (edge) => edge.spec.required)

  return reach.order.map((id) => {
    const isCritical = requiredReach.parent.has(id)
    const via = isCritical ? requiredReach : reach
    const path = pathTo(graph, via, origin, id)
    const isRequired = via.viaRequired.get(id) ?? false
    return {
      service: graph.nameOf(id),
      isRequired,
      critical: isCritical,
      path,
      description: describeImpact(path, isRequired, isCritical),
    }
  })
}
