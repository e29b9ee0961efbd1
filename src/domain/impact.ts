/**
 * Impact analysis: what a change to one entry reaches, and how far.
 */

import type { EdgeKind } from '../types.js'
import { compareIds, throwIfCancelled, type DependencyGraph } from './graph.js'
import { EntryNotFoundError } from '../lib/errors.js'

export interface ImpactReport {
  readonly entryId: string
  /** Downstream entries in lexical order */
  readonly affected: readonly string[]
  /** Direct downstream neighbors of each reached entry (including the source) */
  readonly adjacency: Readonly<Record<string, readonly string[]>>
  /** Shortest propagation distance from the source */
  readonly depth: Readonly<Record<string, number>>
  readonly maxDepth: number
}

export interface ImpactOptions {
  kinds?: readonly EdgeKind[]
  signal?: AbortSignal
}

export function calculateImpact(
  entryId: string,
  graph: DependencyGraph,
  options: ImpactOptions = {}
): ImpactReport {
  if (!graph.has(entryId)) throw new EntryNotFoundError(entryId)

  const depth = new Map<string, number>([[entryId, 0]])
  const adjacency = new Map<string, readonly string[]>()
  const queue = [entryId]

  while (queue.length > 0) {
    throwIfCancelled(options.signal, 'impact analysis')
    const current = queue.shift()
    if (current === undefined) break

    const neighbors = [...new Set(
      graph.outgoing(current, { kinds: options.kinds }).map(e => e.target)
    )].sort(compareIds)
    adjacency.set(current, Object.freeze(neighbors))

    const level = (depth.get(current) ?? 0) + 1
    for (const neighbor of neighbors) {
      if (depth.has(neighbor)) continue
      depth.set(neighbor, level)
      queue.push(neighbor)
    }
  }

  const affected = [...depth.keys()].filter(id => id !== entryId).sort(compareIds)
  const report: ImpactReport = {
    entryId,
    affected: Object.freeze(affected),
    adjacency: Object.freeze(Object.fromEntries(adjacency)),
    depth: Object.freeze(Object.fromEntries(depth)),
    maxDepth: Math.max(0, ...depth.values())
  }
  return Object.freeze(report)
}

export function formatImpactReport(report: ImpactReport): string {
  if (report.affected.length === 0) {
    return `Impact of ${report.entryId}: no downstream entries`
  }

  const lines = [`Impact of ${report.entryId}: ${report.affected.length} affected entries`]
  for (let level = 1; level <= report.maxDepth; level++) {
    const ids = report.affected.filter(id => report.depth[id] === level)
    lines.push(`  depth ${level}: ${ids.join(', ')}`)
  }
  return lines.join('\n')
}
