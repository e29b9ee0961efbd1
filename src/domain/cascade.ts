/**
 * Cascade Planner
 *
 * Given a changed entry, computes the ordered list of downstream entries to
 * notify. Every entry appears at most once, and never before an in-plan
 * entry it transitively depends on.
 */

import { randomBytes } from 'node:crypto'
import type { DependencyGraph } from './graph.js'
import { compareIds, insertSorted, throwIfCancelled } from './graph.js'
import { EntryNotFoundError } from '../lib/errors.js'

// ============================================================================
// Types
// ============================================================================

export type ChangeKind = 'state' | 'dependencies' | 'metrics'
export type CascadeEventKind = 'reValidate' | 'reComputeMetrics'

export interface CascadeStep {
  readonly entryId: string
  readonly event: CascadeEventKind
}

export interface CascadePlan {
  readonly id: string
  /** Entry whose change triggered the cascade */
  readonly trigger: string
  readonly changeKind: ChangeKind
  readonly createdAt: string
  readonly events: readonly CascadeStep[]
}

export interface PlanCascadeOptions {
  signal?: AbortSignal
  now?: () => Date
  /** Fixed plan id (generated when omitted) */
  id?: string
}

export function eventKindFor(changeKind: ChangeKind): CascadeEventKind {
  return changeKind === 'metrics' ? 'reComputeMetrics' : 'reValidate'
}

export function generatePlanId(): string {
  return `cascade-${Date.now()}-${randomBytes(6).toString('hex')}`
}

// ============================================================================
// Planning
// ============================================================================

/**
 * Plan the cascade for a change to `changedId`.
 *
 * Algorithm:
 * 1. Affected set = descendants(changedId) over every edge kind
 * 2. Kahn's algorithm over the edges induced by the affected set
 * 3. Among ready entries pick the earliest in the graph's topological
 *    order, then by id
 * 4. If only non-`depends_on` cycles remain, release the earliest
 *    remaining entry and continue
 *
 * @throws EntryNotFoundError when `changedId` is not in the graph
 * @throws OperationCancelledError when the signal aborts
 */
export function planCascade(
  changedId: string,
  changeKind: ChangeKind,
  graph: DependencyGraph,
  options: PlanCascadeOptions = {}
): CascadePlan {
  const { signal } = options
  const affected = new Set(graph.descendants(changedId))
  affected.delete(changedId)

  const rank = new Map(graph.topologicalOrder().map((id, index) => [id, index]))
  const compare = (a: string, b: string): number =>
    (rank.get(a) ?? Infinity) - (rank.get(b) ?? Infinity) || compareIds(a, b)

  // Induced subgraph over the affected set
  const inDegree = new Map<string, number>()
  const downstream = new Map<string, Set<string>>()
  for (const id of affected) {
    inDegree.set(id, 0)
    downstream.set(id, new Set())
  }
  for (const id of affected) {
    for (const edge of graph.outgoing(id)) {
      const targets = downstream.get(id)
      if (!affected.has(edge.target) || !targets || targets.has(edge.target)) continue
      targets.add(edge.target)
      inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1)
    }
  }

  const ready = [...affected].filter(id => inDegree.get(id) === 0).sort(compare)
  const remaining = new Set(affected)
  const order: string[] = []

  while (remaining.size > 0) {
    throwIfCancelled(signal, 'cascade planning')

    const next = ready.shift() ?? [...remaining].reduce((a, b) => compare(a, b) <= 0 ? a : b)

    remaining.delete(next)
    order.push(next)
    for (const target of downstream.get(next) ?? []) {
      if (!remaining.has(target)) continue
      const degree = (inDegree.get(target) ?? 0) - 1
      inDegree.set(target, degree)
      if (degree === 0) insertSorted(ready, target, compare)
    }
  }

  const event = eventKindFor(changeKind)
  const steps = order.map((entryId): CascadeStep => Object.freeze({ entryId, event }))
  return createPlan(changedId, changeKind, steps, options)
}

/**
 * Cascade for a metrics-changed signal. An unchanged signal yields an
 * empty plan.
 */
export function planMetricsCascade(
  entryId: string,
  changed: boolean,
  graph: DependencyGraph,
  options: PlanCascadeOptions = {}
): CascadePlan {
  if (changed) {
    return planCascade(entryId, 'metrics', graph, options)
  }

  if (!graph.has(entryId)) throw new EntryNotFoundError(entryId)
  return createPlan(entryId, 'metrics', [], options)
}

function createPlan(
  trigger: string,
  changeKind: ChangeKind,
  events: CascadeStep[],
  options: PlanCascadeOptions
): CascadePlan {
  const now = options.now ? options.now() : new Date()
  const plan: CascadePlan = {
    id: options.id ?? generatePlanId(),
    trigger,
    changeKind,
    createdAt: now.toISOString(),
    events: Object.freeze(events)
  }
  return Object.freeze(plan)
}

/**
 * One line per event, in delivery order.
 */
export function formatCascadePlan(plan: CascadePlan): string {
  if (plan.events.length === 0) {
    return `Cascade from ${plan.trigger}: nothing to notify`
  }
  const lines = [`Cascade from ${plan.trigger} (${plan.changeKind}, ${plan.events.length} events):`]
  plan.events.forEach((step, index) => {
    lines.push(`  ${index + 1}. ${step.entryId} ${step.event}`)
  })
  return lines.join('\n')
}
