export * from './types.js'
export * from './errors.js'
export { DependencyGraph, type NodeId, type Edge, type ReverseEdge } from './graph.js'
export { detectCycles, describeCycle } from './cycles.js'
export { resolveOrder, transitiveClosure } from './resolve.js'
export { findImpact, detailedImpact, criticalImpact } from './impact.js'
