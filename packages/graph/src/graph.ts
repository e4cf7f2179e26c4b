import { ServiceNotFoundError } from './errors.js'
import type { DependencySpec, NodeAttributes, ServiceName } from './types.js'

export type NodeId = number

export interface Edge {
  to: NodeId
  spec: DependencySpec
}

export interface ReverseEdge {
  from: NodeId
  spec: DependencySpec
}

/**
 * Directed graph of services. An edge points from a dependent to its dependency.
 *
 * Names are interned to dense integer ids when first seen; traversals work on ids and only the
 * public accessors translate back to names.
 */
export class DependencyGraph {
  private readonly names: ServiceName[] = []
  private readonly ids = new Map<ServiceName, NodeId>()
  private readonly attributes: NodeAttributes[] = []
  private readonly outgoing: Edge[][] = []
  private readonly incoming: ReverseEdge[][] = []
  private edgeTotal = 0

  public addNode(name: ServiceName, attrs?: NodeAttributes): NodeId {
    const existing = this.ids.get(name)
    if (existing !== undefined) {
      if (attrs) this.attributes[existing] = { ...this.attributes[existing], ...attrs }
      return existing
    }

    const id = this.names.length
    this.names.push(name)
    this.ids.set(name, id)
    this.attributes.push({ ...attrs })
    this.outgoing.push([])
    this.incoming.push([])
    return id
  }

  public addEdge(from: ServiceName, to: ServiceName, spec: DependencySpec): void {
    const fromId = this.addNode(from)
    const toId = this.addNode(to)
    this.outgoing[fromId].push({ to: toId, spec })
    this.incoming[toId].push({ from: fromId, spec })
    this.edgeTotal++
  }

  public hasNode(name: ServiceName): boolean {
    return this.ids.has(name)
  }

  public nodes(): ServiceName[] {
    return [...this.names]
  }

  public nodeCount(): number {
    return this.names.length
  }

  public edgeCount(): number {
    return this.edgeTotal
  }

  /** Direct dependencies of `name`, in declaration order. */
  public neighbors(name: ServiceName): ServiceName[] {
    return this.outgoing[this.require(name)].map((e) => this.names[e.to])
  }

  public edges(name: ServiceName): Array<{ target: ServiceName; spec: DependencySpec }> {
    return this.outgoing[this.require(name)].map((e) => ({ target: this.names[e.to], spec: e.spec }))
  }

  /** Services declaring a direct dependency on `name`. */
  public dependents(name: ServiceName): ServiceName[] {
    return this.incoming[this.require(name)].map((e) => this.names[e.from])
  }

  public versionOf(name: ServiceName): string | undefined {
    return this.attributes[this.require(name)].version
  }

  // -------------------------------------------------------------------------
  // id-level access for the traversal code in this package
  // -------------------------------------------------------------------------

  /** @internal */
  public idOf(name: ServiceName): NodeId | undefined {
    return this.ids.get(name)
  }

  /** @internal */
  public require(name: ServiceName): NodeId {
    const id = this.ids.get(name)
    if (id === undefined) throw new ServiceNotFoundError(name)
    return id
  }

  /** @internal */
  public nameOf(id: NodeId): ServiceName {
    return this.names[id]
  }

  /** @internal */
  public outEdges(id: NodeId): readonly Edge[] {
    return this.outgoing[id]
  }

  /** @internal */
  public inEdges(id: NodeId): readonly ReverseEdge[] {
    return this.incoming[id]
  }
}
