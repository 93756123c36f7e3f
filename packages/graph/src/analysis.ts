import {
  CyclicDependencyError,
  Dependency,
  Edge,
  Graph,
  fileKey,
  isBuildStep,
} from '@buildplan/model'

export const dependencyKey = (dep: Dependency): string =>
  dep.type === 'file' ? fileKey(dep.ref) : dep.name

/**
 * What each output path or alias name directly depends on, keyed in edge
 * order. Order-only inputs count: they constrain scheduling just the same.
 */
export function keyDependencies(edges: readonly Edge[]): Map<string, string[]> {
  const deps = new Map<string, string[]>()
  for (const edge of edges) {
    if (edge.kind === 'phony') {
      deps.set(edge.alias, edge.inputs.map(dependencyKey))
      continue
    }
    const inputs = [...edge.inputs, ...edge.implicit, ...edge.orderOnly].map(fileKey)
    for (const output of edge.outputs) {
      deps.set(fileKey(output), inputs)
    }
  }
  return deps
}

/**
 * Depth-first search keeping the current path on a stack. Returns the first
 * cycle found as the path that closes it, e.g. ['a', 'b', 'a'].
 */
export function findCycle(deps: ReadonlyMap<string, readonly string[]>): string[] | undefined {
  const done = new Set<string>()
  const onStack = new Set<string>()
  const stack: string[] = []

  const visit = (key: string): string[] | undefined => {
    if (done.has(key)) return undefined
    if (onStack.has(key)) {
      return [...stack.slice(stack.indexOf(key)), key]
    }
    onStack.add(key)
    stack.push(key)
    for (const dep of deps.get(key) ?? []) {
      const cycle = visit(dep)
      if (cycle) return cycle
    }
    stack.pop()
    onStack.delete(key)
    done.add(key)
    return undefined
  }

  for (const key of deps.keys()) {
    const cycle = visit(key)
    if (cycle) return cycle
  }
  return undefined
}

export function assertAcyclic(edges: readonly Edge[]): void {
  const cycle = findCycle(keyDependencies(edges))
  if (cycle) {
    throw new CyclicDependencyError(cycle)
  }
}

/**
 * Structural checks every built graph passes: each output node has exactly
 * one producing edge, no source node has one, and no build step is without
 * outputs. Returns the violations found.
 */
export function checkInvariants(graph: Graph): string[] {
  const problems: string[] = []
  const producers = new Map<string, number[]>()

  graph.edges.forEach((edge, index) => {
    if (!isBuildStep(edge)) return
    if (edge.outputs.length === 0) {
      problems.push(`edge ${index} of '${edge.target}' has no outputs`)
    }
    for (const output of edge.outputs) {
      const key = fileKey(output)
      producers.set(key, [...(producers.get(key) ?? []), index])
    }
  })

  const known = new Set<string>()
  for (const node of graph.nodes) {
    known.add(node.key)
    const found = producers.get(node.key) ?? []
    if (node.kind === 'output' && (found.length !== 1 || found[0] !== node.producer)) {
      problems.push(`output '${node.key}' has ${found.length} producing edges`)
    }
    if (node.kind === 'source' && found.length > 0) {
      problems.push(`source '${node.key}' is produced by edge ${found[0]}`)
    }
  }
  for (const key of producers.keys()) {
    if (!known.has(key)) problems.push(`'${key}' is produced but has no node`)
  }
  return problems
}

/**
 * Edges ordered so that every edge comes after the edges producing its
 * inputs. Ties keep declaration order.
 */
export function topologicalOrder(graph: Graph): Edge[] {
  const producerOf = new Map<string, number>()
  graph.edges.forEach((edge, index) => {
    if (edge.kind === 'phony') {
      producerOf.set(edge.alias, index)
    } else {
      for (const output of edge.outputs) producerOf.set(fileKey(output), index)
    }
  })

  const inDegree = graph.edges.map(() => 0)
  const dependents = graph.edges.map((): number[] => [])
  graph.edges.forEach((edge, index) => {
    const keys =
      edge.kind === 'phony'
        ? edge.inputs.map(dependencyKey)
        : [...edge.inputs, ...edge.implicit, ...edge.orderOnly].map(fileKey)
    const upstream = new Set<number>()
    for (const key of keys) {
      const producer = producerOf.get(key)
      if (producer !== undefined) upstream.add(producer)
    }
    for (const producer of upstream) {
      dependents[producer].push(index)
      inDegree[index] += 1
    }
  })

  const ready = inDegree.flatMap((degree, index) => (degree === 0 ? [index] : []))
  const order: Edge[] = []
  while (ready.length > 0) {
    ready.sort((a, b) => a - b)
    const next = ready.shift()
    if (next === undefined) break
    order.push(graph.edges[next])
    for (const dependent of dependents[next]) {
      inDegree[dependent] -= 1
      if (inDegree[dependent] === 0) ready.push(dependent)
    }
  }

  if (order.length !== graph.edges.length) {
    assertAcyclic(graph.edges)
    throw new CyclicDependencyError([])
  }
  return order
}
