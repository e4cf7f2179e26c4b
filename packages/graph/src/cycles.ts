import type { DependencyGraph, NodeId } from './graph.js'
import type { CycleInfo, ServiceName } from './types.js'

const WHITE = 0
const GRAY = 1
const BLACK = 2

interface Frame {
  node: NodeId
  cursor: number
}

export function describeCycle(path: readonly ServiceName[]): string {
  return path.join(' -> ')
}

/**
 * Three-colour depth-first search for a cycle, restricted to `scope` when given.
 *
 * Roots are tried in id order and edges in insertion order, so the same graph always yields the
 * same cycle. The walk keeps its own frame stack instead of recursing.
 */
export function findCycle(
  graph: DependencyGraph,
  scope?: readonly NodeId[],
): NodeId[] | undefined {
  const total = graph.nodeCount()
  const color = new Uint8Array(total)
  const roots: readonly NodeId[] = scope ?? Array.from({ length: total }, (_, id) => id)

  let inScope: (id: NodeId) => boolean = () => true
  if (scope) {
    const member = new Uint8Array(total)
    for (const id of scope) member[id] = 1
    inScope = (id) => member[id] === 1
  }

  for (const root of roots) {
    if (color[root] !== WHITE) continue

    const stack: Frame[] = [{ node: root, cursor: 0 }]
    color[root] = GRAY

    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      const edges = graph.outEdges(frame.node)

      if (frame.cursor >= edges.length) {
        color[frame.node] = BLACK
        stack.pop()
        continue
      }

      const next = edges[frame.cursor].to
      frame.cursor++
      if (!inScope(next)) continue

      if (color[next] === GRAY) {
        const start = stack.findIndex((f) => f.node === next)
        return [...stack.slice(start).map((f) => f.node), next]
      }
      if (color[next] === WHITE) {
        color[next] = GRAY
        stack.push({ node: next, cursor: 0 })
      }
    }
  }

  return undefined
}

export function toCycleInfo(graph: DependencyGraph, ids: readonly NodeId[]): CycleInfo {
  const path = ids.map((id) => graph.nameOf(id))
  return { path, description: describeCycle(path) }
}

/** First cycle in the whole graph, if any. */
export function detectCycles(graph: DependencyGraph): CycleInfo | undefined {
  const ids = findCycle(graph)
  return ids ? toCycleInfo(graph, ids) : undefined
}
