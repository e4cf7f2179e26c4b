import { describe, it, expect } from 'vitest'
import { DependencyGraph, detectCycles } from '../index.js'

function chain(...pairs: Array<[string, string]>): DependencyGraph {
  const graph = new DependencyGraph()
  for (const [from, to] of pairs) graph.addEdge(from, to, { target: to, required: true })
  return graph
}

describe('detectCycles', () => {
  it('returns undefined for an acyclic graph', () => {
    const graph = chain(['a', 'b'], ['a', 'c'], ['b', 'd'], ['c', 'd'])
    expect(detectCycles(graph)).toBeUndefined()
  })

  it('returns undefined for an empty graph', () => {
    expect(detectCycles(new DependencyGraph())).toBeUndefined()
  })

  it('finds a three service cycle as a closed path', () => {
    const graph = chain(['service-x', 'service-y'], ['service-y', 'service-z'], ['service-z', 'service-x'])
    const cycle = detectCycles(graph)

    expect(cycle).toBeDefined()
    expect(cycle?.path).toEqual(['service-x', 'service-y', 'service-z', 'service-x'])
    expect(cycle?.path).toHaveLength(4)
    expect(new Set(cycle?.path)).toEqual(new Set(['service-x', 'service-y', 'service-z']))
    expect(cycle?.description).toBe('service-x -> service-y -> service-z -> service-x')
  })

  it('reports only the looping suffix of the current path', () => {
    const graph = chain(['entry', 'b'], ['b', 'c'], ['c', 'b'])
    expect(detectCycles(graph)?.path).toEqual(['b', 'c', 'b'])
  })

  it('reports a self loop', () => {
    const graph = chain(['solo', 'solo'])
    expect(detectCycles(graph)?.path).toEqual(['solo', 'solo'])
  })

  it('finds a cycle not reachable from the first node', () => {
    const graph = new DependencyGraph()
    graph.addNode('isolated')
    graph.addEdge('p', 'q', { target: 'q', required: false })
    graph.addEdge('q', 'p', { target: 'p', required: false })

    expect(detectCycles(graph)?.path).toEqual(['p', 'q', 'p'])
  })

  it('is deterministic for identical input', () => {
    const build = () => chain(['a', 'b'], ['b', 'a'], ['c', 'd'], ['d', 'c'])
    expect(detectCycles(build())).toEqual(detectCycles(build()))
    expect(detectCycles(build())?.path).toEqual(['a', 'b', 'a'])
  })

  it('handles a very deep chain without recursion', () => {
    const graph = new DependencyGraph()
    const depth = 50_000
    for (let i = 0; i < depth; i++) {
      graph.addEdge(`s${i}`, `s${i + 1}`, { target: `s${i + 1}`, required: true })
    }
    expect(detectCycles(graph)).toBeUndefined()

    graph.addEdge(`s${depth}`, 's0', { target: 's0', required: true })
    expect(detectCycles(graph)?.path).toHaveLength(depth + 2)
  })
})
