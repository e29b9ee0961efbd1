/**
 * Lifecycle State Machine
 *
 * proposed -> active -> deprecated -> retired, plus the emergency
 * active -> retired path. `retired` is terminal.
 *
 * `canTransition` is a pure decision: it never mutates the entry or the
 * graph. Callers apply the change only after an allowed decision.
 */

import type { Entry, LifecycleState } from '../types.js'
import { compareIds, type DependencyGraph } from './graph.js'
import {
  CycleError,
  DependentsStillActiveError,
  InvalidTransitionError,
  UnmetDependencyError,
  type BlockingDependency,
  type GovernanceError
} from '../lib/errors.js'

export const INITIAL_STATE: LifecycleState = 'proposed'

export const TRANSITIONS: Readonly<Record<LifecycleState, readonly LifecycleState[]>> = {
  proposed: ['active'],
  active: ['deprecated', 'retired'],
  deprecated: ['retired'],
  retired: []
}

/** States a dependency may be in for its dependents to be active */
const READY_STATES: ReadonlySet<LifecycleState> = new Set<LifecycleState>(['active', 'deprecated'])

export interface TransitionOptions {
  /** Override active dependents when deprecating or retiring */
  force?: boolean
}

export type TransitionDecision =
  | {
      allowed: true
      entryId: string
      from: LifecycleState
      to: LifecycleState
      /** True when active dependents were overridden */
      forced: boolean
      overriddenDependents: string[]
    }
  | {
      allowed: false
      entryId: string
      from: LifecycleState
      to: LifecycleState
      reason: GovernanceError
    }

export function getValidTransitions(state: LifecycleState): LifecycleState[] {
  return [...TRANSITIONS[state]]
}

export function isTerminal(state: LifecycleState): boolean {
  return TRANSITIONS[state].length === 0
}

export function isReadyState(state: LifecycleState): boolean {
  return READY_STATES.has(state)
}

/**
 * Dependencies of an entry that are not in a ready state, including ids the
 * graph does not know.
 */
export function findUnreadyDependencies(entry: Entry, graph: DependencyGraph): BlockingDependency[] {
  const ids = new Set([...graph.dependenciesOf(entry.id), ...entry.dependencies])
  const blocking: BlockingDependency[] = []

  for (const id of [...ids].sort(compareIds)) {
    const dependency = graph.entry(id)
    if (!dependency) {
      blocking.push({ id, state: 'missing' })
    } else if (!isReadyState(dependency.state)) {
      blocking.push({ id, state: dependency.state })
    }
  }

  return blocking
}

/**
 * Active entries with a `depends_on` edge onto this one.
 */
export function findActiveDependents(entryId: string, graph: DependencyGraph): string[] {
  return graph.dependentsOf(entryId).filter(id => graph.entry(id)?.state === 'active')
}

/**
 * Decide whether `entry` may move to `targetState`.
 *
 * Rules, in order:
 * 1. The transition must be legal.
 * 2. Entries on a `depends_on` cycle cannot transition.
 * 3. proposed -> active requires every dependency to be active or deprecated.
 * 4. Leaving `active` is denied while active entries depend on this one,
 *    unless `force` is set.
 */
export function canTransition(
  entry: Entry,
  targetState: LifecycleState,
  graph: DependencyGraph,
  options: TransitionOptions = {}
): TransitionDecision {
  const from = entry.state
  const deny = (reason: GovernanceError): TransitionDecision => ({
    allowed: false,
    entryId: entry.id,
    from,
    to: targetState,
    reason
  })

  const valid = TRANSITIONS[from]
  if (!valid.includes(targetState)) {
    return deny(new InvalidTransitionError(entry.id, from, targetState, valid))
  }

  const cycle = graph.cycleFor(entry.id)
  if (cycle) {
    return deny(new CycleError(cycle))
  }

  if (from === 'proposed' && targetState === 'active') {
    const blocking = findUnreadyDependencies(entry, graph)
    if (blocking.length > 0) {
      return deny(new UnmetDependencyError(entry.id, blocking))
    }
  }

  let overriddenDependents: string[] = []
  if (from === 'active' && (targetState === 'deprecated' || targetState === 'retired')) {
    const dependents = findActiveDependents(entry.id, graph)
    if (dependents.length > 0) {
      if (!options.force) {
        return deny(new DependentsStillActiveError(entry.id, targetState, dependents))
      }
      overriddenDependents = dependents
    }
  }

  return {
    allowed: true,
    entryId: entry.id,
    from,
    to: targetState,
    forced: overriddenDependents.length > 0,
    overriddenDependents
  }
}
