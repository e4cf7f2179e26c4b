import { describe, it, expect } from 'vitest'
import {
  DependencyGraph,
  ServiceNotFoundError,
  criticalImpact,
  detailedImpact,
  findImpact,
} from '../index.js'

function edge(graph: DependencyGraph, from: string, to: string, required: boolean): void {
  graph.addEdge(from, to, { target: to, required })
}

describe('impact analysis', () => {
  it('treats a required chain as fully critical', () => {
    // D required-by B required-by A
    const graph = new DependencyGraph()
    edge(graph, 'A', 'B', true)
    edge(graph, 'B', 'D', true)

    expect(findImpact(graph, 'D')).toEqual(['B', 'A'])
    expect(criticalImpact(graph, 'D')).toEqual(['B', 'A'])
  })

  it('drops services reachable only through an optional hop from critical impact', () => {
    const graph = new DependencyGraph()
    edge(graph, 'A', 'B', false)
    edge(graph, 'B', 'D', true)

    expect(findImpact(graph, 'D')).toEqual(['B', 'A'])
    expect(criticalImpact(graph, 'D')).toEqual(['B'])
  })

  it('keeps a service critical when any all-required path exists', () => {
    const graph = new DependencyGraph()
    edge(graph, 'top', 'mid-optional', true)
    edge(graph, 'mid-optional', 'base', false)
    edge(graph, 'top', 'mid-required', true)
    edge(graph, 'mid-required', 'base', true)

    expect(criticalImpact(graph, 'base')).toEqual(['mid-required', 'top'])

    const details = detailedImpact(graph, 'base')
    const top = details.find((d) => d.service === 'top')
    // reported through the required branch, not the first one found
    expect(top).toEqual({
      service: 'top',
      isRequired: true,
      critical: true,
      path: ['base', 'mid-required', 'top'],
      description: "'top' depends on 'base' through base <- mid-required <- top (critical)",
    })
  })

  it('lists direct dependents before transitive ones with their paths', () => {
    const graph = new DependencyGraph()
    edge(graph, 'A', 'B', true)
    edge(graph, 'A', 'C', false)
    edge(graph, 'B', 'D', true)
    edge(graph, 'C', 'D', false)

    expect(detailedImpact(graph, 'D')).toEqual([
      {
        service: 'B',
        isRequired: true,
        critical: true,
        path: ['D', 'B'],
        description: "'B' depends on 'D' (required)",
      },
      {
        service: 'C',
        isRequired: false,
        critical: false,
        path: ['D', 'C'],
        description: "'C' depends on 'D' (optional)",
      },
      {
        service: 'A',
        isRequired: true,
        critical: true,
        path: ['D', 'B', 'A'],
        description: "'A' depends on 'D' through D <- B <- A (critical)",
      },
    ])
  })

  it('returns nothing for a service without dependents', () => {
    const graph = new DependencyGraph()
    edge(graph, 'A', 'B', true)
    expect(findImpact(graph, 'A')).toEqual([])
    expect(detailedImpact(graph, 'A')).toEqual([])
    expect(criticalImpact(graph, 'A')).toEqual([])
  })

  it('terminates on cycles and never reports the target itself', () => {
    const graph = new DependencyGraph()
    edge(graph, 'x', 'y', true)
    edge(graph, 'y', 'z', true)
    edge(graph, 'z', 'x', true)

    expect(findImpact(graph, 'x')).toEqual(['z', 'y'])
    expect(criticalImpact(graph, 'x')).toEqual(['z', 'y'])
  })

  it('equals the ancestor set of the target', () => {
    const graph = new DependencyGraph()
    edge(graph, 'a', 'b', true)
    edge(graph, 'b', 'c', false)
    edge(graph, 'd', 'c', true)
    edge(graph, 'e', 'a', true)
    graph.addNode('f')

    expect(new Set(findImpact(graph, 'c'))).toEqual(new Set(['b', 'd', 'a', 'e']))
  })

  it('throws ServiceNotFoundError for an unknown target', () => {
    expect(() => findImpact(new DependencyGraph(), 'ghost')).toThrow(ServiceNotFoundError)
  })
})
