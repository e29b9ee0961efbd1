/**
 * Mutation approval at the registry boundary.
 *
 * Decisions are computed against an immutable snapshot and returned as data
 * stamped with the snapshot version. The registry store applies them under
 * its own optimistic concurrency check.
 */

import type {
  DependencyMutation,
  Entry,
  LifecycleState,
  RawEdgeDeclaration,
  RegistrySnapshot,
  TransitionMutation
} from '../types.js'
import { normalize } from './edges.js'
import { buildGraph, type BuildGraphOptions } from './graph.js'
import { canTransition, findUnreadyDependencies, type TransitionOptions } from './lifecycle.js'
import {
  CycleError,
  DanglingReferenceError,
  EntryNotFoundError,
  SelfLoopError,
  UnmetDependencyError,
  type GovernanceError
} from '../lib/errors.js'

export interface ApprovalOptions extends BuildGraphOptions, TransitionOptions {
  /** Manifest declarations merged into the graph */
  seedEdges?: readonly RawEdgeDeclaration[]
}

export type Approval<M> =
  | { approved: true; mutation: M }
  | { approved: false; entryId: string; reason: GovernanceError }

function findEntry(snapshot: RegistrySnapshot, entryId: string): Entry {
  const entry = snapshot.entries.find(e => e.id === entryId)
  if (!entry) throw new EntryNotFoundError(entryId)
  return entry
}

/**
 * Approve or deny a lifecycle transition against a snapshot.
 *
 * @throws EntryNotFoundError when the entry is not in the snapshot
 * @throws MalformedEdgeError when a declaration has an invalid endpoint
 */
export function approveTransition(
  snapshot: RegistrySnapshot,
  entryId: string,
  targetState: LifecycleState,
  options: ApprovalOptions = {}
): Approval<TransitionMutation> {
  const entry = findEntry(snapshot, entryId)
  const edges = normalize(snapshot.entries, options.seedEdges)
  const { graph } = buildGraph(snapshot.entries, edges, options)

  const decision = canTransition(entry, targetState, graph, { force: options.force })
  if (!decision.allowed) {
    return { approved: false, entryId, reason: decision.reason }
  }

  const mutation: TransitionMutation = {
    type: 'transition',
    entryId,
    from: decision.from,
    to: decision.to,
    snapshotVersion: snapshot.version,
    forced: decision.forced,
    overriddenDependents: Object.freeze([...decision.overriddenDependents])
  }
  return { approved: true, mutation: Object.freeze(mutation) }
}

/**
 * Approve or deny replacing an entry's declared dependencies.
 *
 * Denied when the new list references unknown ids, the entry itself, or
 * closes a `depends_on` cycle through the entry. Active entries may only
 * depend on active or deprecated entries.
 */
export function approveDependencyChange(
  snapshot: RegistrySnapshot,
  entryId: string,
  dependencies: readonly string[],
  options: ApprovalOptions = {}
): Approval<DependencyMutation> {
  const entry = findEntry(snapshot, entryId)
  const next = [...new Set(dependencies)]
  const updated: Entry = { ...entry, dependencies: next }
  const entries = snapshot.entries.map(e => (e.id === entryId ? updated : e))

  const edges = normalize(entries, options.seedEdges)
  const result = buildGraph(entries, edges, { ...options, flowPolicy: 'off' })

  if (!result.ok) {
    for (const error of result.errors) {
      if (error instanceof DanglingReferenceError) {
        const own = error.edges.filter(e => e.target === entryId && e.kind === 'depends_on')
        if (own.length > 0) return { approved: false, entryId, reason: new DanglingReferenceError(own) }
      }
      if (error instanceof SelfLoopError && error.entries.includes(entryId)) {
        return { approved: false, entryId, reason: error }
      }
      if (error instanceof CycleError && error.path.includes(entryId)) {
        return { approved: false, entryId, reason: error }
      }
    }
  }

  if (entry.state === 'active') {
    const blocking = findUnreadyDependencies(updated, result.graph)
    if (blocking.length > 0) {
      return { approved: false, entryId, reason: new UnmetDependencyError(entryId, blocking) }
    }
  }

  const mutation: DependencyMutation = {
    type: 'dependencies',
    entryId,
    from: Object.freeze([...entry.dependencies]),
    to: Object.freeze(next),
    snapshotVersion: snapshot.version
  }
  return { approved: true, mutation: Object.freeze(mutation) }
}
