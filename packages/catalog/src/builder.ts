import { DependencyGraph } from '@svc-catalog/graph'
import type { ServiceRecord } from './types.js'

/**
 * Graph over the given records. Edges to services that are not registered are left out; the
 * dependency validator reports them instead.
 */
export function buildGraph(records: readonly ServiceRecord[]): DependencyGraph {
  const graph = new DependencyGraph()
  const known = new Set<string>()

  for (const record of records) {
    graph.addNode(record.name, { version: record.declaredVersion || undefined })
    known.add(record.name)
  }

  for (const record of records) {
    for (const dep of record.dependencies) {
      if (known.has(dep.target)) graph.addEdge(record.name, dep.target, dep)
    }
  }
  return graph
}
