/**
 * Edge Model
 *
 * Normalizes heterogeneous dependency declarations into one flow-oriented
 * edge set. Registry `dependencies` become `depends_on` edges pointing from
 * the dependency to the dependent; manifest declarations become `produces`
 * or `consumes` edges pointing from producer to consumer.
 *
 * Nothing downstream of this module looks at raw declaration shapes.
 */

import type { Edge, EdgeKind, Entry, RawEdgeDeclaration, SeedEdgeTuple } from '../types.js'
import { MalformedEdgeError } from '../lib/errors.js'

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._\-/]*$/

export function isValidIdentifier(id: unknown): id is string {
  return typeof id === 'string' && IDENTIFIER_PATTERN.test(id)
}

/**
 * Stable key for an edge triple
 */
export function edgeKey(edge: Edge): string {
  return `${edge.kind}\u0000${edge.source}\u0000${edge.target}`
}

export function makeEdge(source: string, target: string, kind: EdgeKind): Edge {
  return Object.freeze({ source, target, kind })
}

/**
 * Resolve one raw declaration to `[source, target, kind, label]`, where
 * label describes the declaration for error messages.
 */
function resolveDeclaration(decl: RawEdgeDeclaration): [unknown, unknown, EdgeKind, string] {
  if (isSeedTuple(decl)) {
    const [producer, consumer, artifact] = decl
    return [producer, consumer, 'produces', `[${producer}, ${consumer}, ${artifact}]`]
  }

  switch (decl.type) {
    case 'produces':
      return [decl.producer, decl.consumer, 'produces', `produces ${decl.producer} -> ${decl.consumer}`]
    case 'consumes':
      return [decl.producer, decl.consumer, 'consumes', `consumes ${decl.consumer} <- ${decl.producer}`]
    case 'depends_on':
      return [decl.dependency, decl.dependent, 'depends_on', `depends_on ${decl.dependent} -> ${decl.dependency}`]
  }
}

function isSeedTuple(decl: RawEdgeDeclaration): decl is SeedEdgeTuple {
  return Array.isArray(decl)
}

/**
 * Merge entry dependencies and manifest declarations into one de-duplicated
 * edge list, in first-seen order.
 *
 * @throws MalformedEdgeError listing every declaration with an empty or
 *   invalid endpoint
 */
export function normalize(
  entries: readonly Entry[],
  seedEdges: readonly RawEdgeDeclaration[] = []
): Edge[] {
  const seen = new Set<string>()
  const edges: Edge[] = []
  const malformed: string[] = []

  const add = (source: unknown, target: unknown, kind: EdgeKind, label: string): void => {
    if (!isValidIdentifier(source) || !isValidIdentifier(target)) {
      malformed.push(label)
      return
    }
    const edge = makeEdge(source, target, kind)
    const key = edgeKey(edge)
    if (seen.has(key)) return
    seen.add(key)
    edges.push(edge)
  }

  for (const entry of entries) {
    for (const dependency of entry.dependencies) {
      add(dependency, entry.id, 'depends_on', `${entry.id} depends on "${dependency}"`)
    }
  }

  for (const decl of seedEdges) {
    const [source, target, kind, label] = resolveDeclaration(decl)
    add(source, target, kind, label)
  }

  if (malformed.length > 0) {
    throw new MalformedEdgeError(malformed)
  }

  return edges
}
