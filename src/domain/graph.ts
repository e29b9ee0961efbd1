/**
 * Dependency Graph
 *
 * Builds and validates a directed graph over registry entries. Entries are
 * addressed by id; adjacency is kept as id lists so traversals are plain
 * graph walks over a snapshot.
 *
 * Build checks, in order:
 * 1. Dangling references (one error listing every offending edge)
 * 2. Self-loops
 * 3. Cycles among `depends_on` edges (one error per strongly connected
 *    component, path through every member)
 * 4. Flow direction against the organ order (warnings unless strict)
 */

import type { Edge, EdgeKind, Entry, FlowPolicy } from '../types.js'
import {
  CycleError,
  DanglingReferenceError,
  EntryNotFoundError,
  FlowViolationError,
  OperationCancelledError,
  SelfLoopError,
  type StructuralError
} from '../lib/errors.js'

// ============================================================================
// Types
// ============================================================================

export interface BuildGraphOptions {
  /** Organ total order, upstream first */
  organOrder?: readonly string[]
  /** How flow-direction findings are reported (default: warn) */
  flowPolicy?: FlowPolicy
  /** Organs exempt from flow-direction checks */
  unrestrictedOrgans?: readonly string[]
  /** Checked between node visits; aborting throws OperationCancelledError */
  signal?: AbortSignal
}

export type GraphBuildResult =
  | {
      ok: true
      graph: DependencyGraph
      warnings: FlowViolationError[]
    }
  | {
      ok: false
      /** Partial graph over the edges that passed the reference checks */
      graph: DependencyGraph
      errors: StructuralError[]
      warnings: FlowViolationError[]
    }

export interface TraversalOptions {
  /** Restrict the walk to these edge kinds (default: all) */
  kinds?: readonly EdgeKind[]
}

/**
 * Throw if the operator aborted the running operation.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    const reason = signal.reason instanceof Error ? signal.reason : undefined
    throw new OperationCancelledError(operation, reason)
  }
}

// ============================================================================
// Graph
// ============================================================================

export class DependencyGraph {
  readonly edges: readonly Edge[]

  private readonly nodes: Map<string, Entry>
  private readonly outgoingEdges = new Map<string, Edge[]>()
  private readonly incomingEdges = new Map<string, Edge[]>()
  private readonly cyclePaths: readonly string[][]
  private readonly cycles: ReadonlySet<string>
  private readonly signal?: AbortSignal
  private topoCache: string[] | null = null

  constructor(
    entries: readonly Entry[],
    edges: readonly Edge[],
    options: { cycles?: readonly string[][]; signal?: AbortSignal } = {}
  ) {
    this.nodes = new Map(entries.map(e => [e.id, e]))
    this.edges = Object.freeze([...edges])
    this.cyclePaths = options.cycles ?? []
    this.cycles = new Set(this.cyclePaths.flat())
    this.signal = options.signal

    for (const id of this.nodes.keys()) {
      this.outgoingEdges.set(id, [])
      this.incomingEdges.set(id, [])
    }
    for (const edge of this.edges) {
      this.outgoingEdges.get(edge.source)?.push(edge)
      this.incomingEdges.get(edge.target)?.push(edge)
    }
  }

  has(id: string): boolean {
    return this.nodes.has(id)
  }

  entry(id: string): Entry | undefined {
    return this.nodes.get(id)
  }

  /** Entry ids in lexical order */
  entryIds(): string[] {
    return [...this.nodes.keys()].sort(compareIds)
  }

  entries(): Entry[] {
    return this.entryIds().map(id => this.require(id))
  }

  /** True when the entry sits on a `depends_on` cycle */
  isInCycle(id: string): boolean {
    return this.cycles.has(id)
  }

  get cycleMembers(): string[] {
    return [...this.cycles].sort(compareIds)
  }

  /** Cycle path of the `depends_on` component holding the entry */
  cycleFor(id: string): string[] | undefined {
    const path = this.cyclePaths.find(p => p.includes(id))
    return path ? [...path] : undefined
  }

  outgoing(id: string, options: TraversalOptions = {}): Edge[] {
    return filterKinds(this.outgoingEdges.get(id) ?? [], options.kinds)
  }

  incoming(id: string, options: TraversalOptions = {}): Edge[] {
    return filterKinds(this.incomingEdges.get(id) ?? [], options.kinds)
  }

  /** Ids this entry directly depends on */
  dependenciesOf(id: string): string[] {
    return uniqueSorted(this.incoming(id, { kinds: ['depends_on'] }).map(e => e.source))
  }

  /** Ids that directly depend on this entry */
  dependentsOf(id: string): string[] {
    return uniqueSorted(this.outgoing(id, { kinds: ['depends_on'] }).map(e => e.target))
  }

  /**
   * Everything the entry depends on, transitively (edges followed backward).
   */
  ancestors(id: string, options: TraversalOptions = {}): string[] {
    return this.walk(id, edge => edge.source, nodeId => this.incoming(nodeId, options))
  }

  /**
   * Everything that depends on the entry, transitively (edges followed forward).
   */
  descendants(id: string, options: TraversalOptions = {}): string[] {
    return this.walk(id, edge => edge.target, nodeId => this.outgoing(nodeId, options))
  }

  /**
   * Deterministic linearization of `depends_on` edges: every entry appears
   * after all of its dependencies, ties broken by id. Entries caught in a
   * cycle cannot be ordered and are appended in lexical order.
   */
  topologicalOrder(): string[] {
    if (this.topoCache) return [...this.topoCache]

    const inDegree = new Map<string, number>()
    for (const id of this.nodes.keys()) {
      inDegree.set(id, this.dependenciesOf(id).length)
    }

    const ready = [...inDegree.entries()]
      .filter(([, degree]) => degree === 0)
      .map(([id]) => id)
      .sort(compareIds)
    const order: string[] = []

    while (ready.length > 0) {
      throwIfCancelled(this.signal, 'topological sort')
      const current = ready.shift()
      if (current === undefined) break
      order.push(current)

      for (const dependent of this.dependentsOf(current)) {
        const degree = (inDegree.get(dependent) ?? 0) - 1
        inDegree.set(dependent, degree)
        if (degree === 0) insertSorted(ready, dependent)
      }
    }

    if (order.length < this.nodes.size) {
      const placed = new Set(order)
      order.push(...this.entryIds().filter(id => !placed.has(id)))
    }

    this.topoCache = order
    return [...order]
  }

  private walk(
    start: string,
    next: (edge: Edge) => string,
    edgesOf: (id: string) => Edge[]
  ): string[] {
    this.require(start)

    const visited = new Set<string>([start])
    const queue = [start]
    const found: string[] = []

    while (queue.length > 0) {
      throwIfCancelled(this.signal, 'graph traversal')
      const current = queue.shift()
      if (current === undefined) break

      for (const edge of edgesOf(current)) {
        const neighbor = next(edge)
        if (visited.has(neighbor)) continue
        visited.add(neighbor)
        found.push(neighbor)
        queue.push(neighbor)
      }
    }

    return found.sort(compareIds)
  }

  private require(id: string): Entry {
    const entry = this.nodes.get(id)
    if (!entry) throw new EntryNotFoundError(id)
    return entry
  }
}

// ============================================================================
// Build
// ============================================================================

/**
 * Build and validate the graph. Structural problems are collected
 * exhaustively and returned, never thrown; only cancellation throws.
 */
export function buildGraph(
  entries: readonly Entry[],
  edges: readonly Edge[],
  options: BuildGraphOptions = {}
): GraphBuildResult {
  const { signal } = options
  const known = new Set(entries.map(e => e.id))
  const errors: StructuralError[] = []

  // 1. Dangling references
  const dangling = edges.filter(e => !known.has(e.source) || !known.has(e.target))
  if (dangling.length > 0) {
    errors.push(new DanglingReferenceError(dangling))
  }

  // 2. Self-loops
  const selfLoops = edges.filter(e => e.source === e.target)
  if (selfLoops.length > 0) {
    errors.push(new SelfLoopError(selfLoops))
  }

  const valid = edges.filter(e =>
    known.has(e.source) && known.has(e.target) && e.source !== e.target
  )

  // 3. depends_on cycles
  const cycles = findDependencyCycles([...known].sort(compareIds), valid, signal)
  for (const path of cycles) {
    errors.push(new CycleError(path))
  }

  // 4. Flow direction
  const flowFindings = checkFlow(entries, valid, options)
  const warnings = flowFindings.filter(f => f.severity !== 'error')
  errors.push(...flowFindings.filter(f => f.severity === 'error'))

  const graph = new DependencyGraph(entries, valid, { cycles, signal })

  if (errors.length > 0) {
    return { ok: false, graph, errors, warnings }
  }
  return { ok: true, graph, warnings }
}

/**
 * Cycles among `depends_on` edges, one per strongly connected component.
 * Each path starts at the component's lowest id, visits every member and
 * closes on its first node. Members repeat only when the component is not
 * a simple ring.
 */
function findDependencyCycles(
  nodes: readonly string[],
  edges: readonly Edge[],
  signal: AbortSignal | undefined
): string[][] {
  const adjacency = new Map<string, string[]>()
  for (const edge of edges) {
    if (edge.kind !== 'depends_on') continue
    const list = adjacency.get(edge.source) ?? []
    list.push(edge.target)
    adjacency.set(edge.source, list)
  }
  for (const list of adjacency.values()) list.sort(compareIds)

  return stronglyConnected(nodes, adjacency, signal)
    .filter(component => component.length > 1)
    .map(component => closedWalk(component, adjacency))
    .sort((a, b) => compareIds(a[0], b[0]))
}

/**
 * Tarjan's algorithm with an explicit stack. Components come back with
 * their members sorted.
 */
function stronglyConnected(
  nodes: readonly string[],
  adjacency: ReadonlyMap<string, readonly string[]>,
  signal: AbortSignal | undefined
): string[][] {
  const index = new Map<string, number>()
  const lowLink = new Map<string, number>()
  const onStack = new Set<string>()
  const stack: string[] = []
  const components: string[][] = []
  let counter = 0

  const low = (id: string): number => lowLink.get(id) ?? 0

  for (const root of nodes) {
    if (index.has(root)) continue

    const frames: Array<{ node: string; next: number }> = []
    const enter = (node: string): void => {
      throwIfCancelled(signal, 'cycle detection')
      index.set(node, counter)
      lowLink.set(node, counter)
      counter++
      stack.push(node)
      onStack.add(node)
      frames.push({ node, next: 0 })
    }

    enter(root)
    while (frames.length > 0) {
      const frame = frames[frames.length - 1]
      const neighbors = adjacency.get(frame.node) ?? []

      if (frame.next < neighbors.length) {
        const neighbor = neighbors[frame.next]
        frame.next++
        const neighborIndex = index.get(neighbor)
        if (neighborIndex === undefined) {
          enter(neighbor)
        } else if (onStack.has(neighbor)) {
          lowLink.set(frame.node, Math.min(low(frame.node), neighborIndex))
        }
        continue
      }

      frames.pop()
      const parent = frames[frames.length - 1]
      if (parent) {
        lowLink.set(parent.node, Math.min(low(parent.node), low(frame.node)))
      }

      if (low(frame.node) === index.get(frame.node)) {
        const component: string[] = []
        for (let member = stack.pop(); member !== undefined; member = stack.pop()) {
          onStack.delete(member)
          component.push(member)
          if (member === frame.node) break
        }
        components.push(component.sort(compareIds))
      }
    }
  }

  return components
}

/**
 * Closed walk from the component's first member through every other member
 * in id order, each leg a shortest path inside the component.
 */
function closedWalk(
  component: readonly string[],
  adjacency: ReadonlyMap<string, readonly string[]>
): string[] {
  const members = new Set(component)
  const start = component[0]
  const walk = [start]
  const visited = new Set([start])
  let current = start

  for (const target of component) {
    if (visited.has(target)) continue
    const leg = shortestPath(current, target, members, adjacency)
    for (const id of leg) visited.add(id)
    walk.push(...leg)
    current = target
  }

  walk.push(...shortestPath(current, start, members, adjacency))
  return walk
}

/**
 * Breadth-first path from `from` to `to` inside `members`, excluding `from`.
 */
function shortestPath(
  from: string,
  to: string,
  members: ReadonlySet<string>,
  adjacency: ReadonlyMap<string, readonly string[]>
): string[] {
  const previous = new Map<string, string>()
  const queue = [from]
  const seen = new Set([from])

  while (queue.length > 0 && !previous.has(to)) {
    const current = queue.shift()
    if (current === undefined) break
    for (const neighbor of adjacency.get(current) ?? []) {
      if (seen.has(neighbor) || !members.has(neighbor)) continue
      seen.add(neighbor)
      previous.set(neighbor, current)
      queue.push(neighbor)
    }
  }

  const path: string[] = []
  for (let id: string | undefined = to; id !== undefined && id !== from; id = previous.get(id)) {
    path.unshift(id)
  }
  return path
}

function checkFlow(
  entries: readonly Entry[],
  edges: readonly Edge[],
  options: BuildGraphOptions
): FlowViolationError[] {
  const policy = options.flowPolicy ?? 'warn'
  const organOrder = options.organOrder ?? []
  if (policy === 'off' || organOrder.length === 0) return []

  const rank = new Map(organOrder.map((organ, index) => [organ, index]))
  const unrestricted = new Set(options.unrestrictedOrgans ?? [])
  const organOf = new Map(entries.map(e => [e.id, e.organ]))
  const severity = policy === 'strict' ? 'error' : 'warning'
  const findings: FlowViolationError[] = []

  for (const edge of edges) {
    const sourceOrgan = organOf.get(edge.source)
    const targetOrgan = organOf.get(edge.target)
    if (sourceOrgan === undefined || targetOrgan === undefined) continue
    if (unrestricted.has(sourceOrgan) || unrestricted.has(targetOrgan)) continue

    const sourceRank = rank.get(sourceOrgan)
    const targetRank = rank.get(targetOrgan)
    if (sourceRank === undefined || targetRank === undefined) continue

    if (targetRank < sourceRank) {
      findings.push(new FlowViolationError(edge, sourceOrgan, targetOrgan, severity))
    }
  }

  return findings
}

// ============================================================================
// Helpers
// ============================================================================

function filterKinds(edges: Edge[], kinds: readonly EdgeKind[] | undefined): Edge[] {
  if (!kinds) return [...edges]
  return edges.filter(e => kinds.includes(e.kind))
}

/**
 * Code-unit order for ids, independent of locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Insert into an already sorted list, keeping it sorted
 */
export function insertSorted(
  list: string[],
  value: string,
  compare: (a: string, b: string) => number = compareIds
): void {
  let low = 0
  let high = list.length
  while (low < high) {
    const mid = (low + high) >> 1
    if (compare(list[mid], value) < 0) low = mid + 1
    else high = mid
  }
  list.splice(low, 0, value)
}

function uniqueSorted(ids: string[]): string[] {
  return [...new Set(ids)].sort(compareIds)
}
