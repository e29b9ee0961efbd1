/**
 * Regula Audit Engine
 *
 * Full, non-mutating consistency check over a registry snapshot:
 * - Structural findings from a fresh graph build (dangling references,
 *   self-loops, depends_on cycles, flow direction)
 * - Dependency drift: active entries resting on dependencies that are no
 *   longer active or deprecated
 * - Staleness, empty organs and per-organ minimums when configured
 *
 * The audit never throws, so it can run unattended. A cancelled audit
 * returns a failed report.
 */

import type {
  Edge,
  EdgeKind,
  Entry,
  FindingLevel,
  OrganRequirement
} from '../types.js'
import { EDGE_KINDS } from '../types.js'
import { buildGraph, compareIds, throwIfCancelled, type BuildGraphOptions } from './graph.js'
import { findUnreadyDependencies } from './lifecycle.js'
import {
  OperationCancelledError,
  wrapError,
  type Severity
} from '../lib/errors.js'

// ============================================================================
// Types
// ============================================================================

export interface Violation {
  readonly severity: Severity
  /** Stable machine-readable kind, e.g. DEPENDENCY_CYCLE */
  readonly kind: string
  readonly entries: readonly string[]
  readonly message: string
}

export interface AuditStats {
  readonly entries: number
  readonly totalEdges: number
  readonly edgesByKind: Readonly<Record<EdgeKind, number>>
  /** Edge counts per "organ -> organ" direction */
  readonly crossOrgan: Readonly<Record<string, number>>
}

export interface AuditReport {
  readonly violations: readonly Violation[]
  /** True iff no violation has error severity */
  readonly passed: boolean
  readonly timestamp: string
  readonly cancelled: boolean
  readonly stats: AuditStats
}

export interface AuditOptions extends Omit<BuildGraphOptions, 'organOrder'> {
  /** Warn when lastValidated is older than this many days */
  staleAfterDays?: number
  /** Severity for organs in the order with no entries (default: off) */
  emptyOrgan?: FindingLevel
  organRequirements?: Record<string, OrganRequirement>
  now?: () => Date
}

const SEVERITY_RANK: Record<Severity, number> = { error: 0, warning: 1, info: 2 }
const DAY_MS = 24 * 60 * 60 * 1000

// ============================================================================
// Audit
// ============================================================================

export function audit(
  entries: readonly Entry[],
  edges: readonly Edge[],
  organOrder: readonly string[],
  options: AuditOptions = {}
): AuditReport {
  const now = options.now ? options.now() : new Date()
  const stats = computeStats(entries, edges)
  const violations: Violation[] = []
  let cancelled = false

  try {
    violations.push(...runChecks(entries, edges, organOrder, options, now))
  } catch (error) {
    if (error instanceof OperationCancelledError) {
      cancelled = true
      violations.push({
        severity: 'error',
        kind: 'AUDIT_CANCELLED',
        entries: [],
        message: error.message
      })
    } else {
      const wrapped = wrapError(error, 'AUDIT_FAILED')
      violations.push({
        severity: 'error',
        kind: wrapped.code,
        entries: [],
        message: wrapped.message
      })
    }
  }

  const sorted = sortViolations(violations).map(v => Object.freeze({ ...v, entries: Object.freeze([...v.entries]) }))

  return Object.freeze({
    violations: Object.freeze(sorted),
    passed: !sorted.some(v => v.severity === 'error'),
    timestamp: now.toISOString(),
    cancelled,
    stats
  })
}

function runChecks(
  entries: readonly Entry[],
  edges: readonly Edge[],
  organOrder: readonly string[],
  options: AuditOptions,
  now: Date
): Violation[] {
  const violations: Violation[] = []
  const result = buildGraph(entries, edges, { ...options, organOrder })

  // Structural findings
  const structural = result.ok ? result.warnings : [...result.errors, ...result.warnings]
  for (const finding of structural) {
    violations.push({
      severity: finding.severity,
      kind: finding.code,
      entries: finding.entries,
      message: finding.message
    })
  }

  // Dependency drift
  const { graph } = result
  for (const entry of graph.entries()) {
    throwIfCancelled(options.signal, 'audit')
    if (entry.state !== 'active') continue

    // Unknown ids are already reported as dangling references
    const blocking = findUnreadyDependencies(entry, graph).filter(b => b.state !== 'missing')
    if (blocking.length > 0) {
      violations.push({
        severity: 'error',
        kind: 'UNMET_DEPENDENCY',
        entries: [entry.id, ...blocking.map(b => b.id)],
        message: `"${entry.id}" is active but depends on ${blocking.map(b => `${b.id} (${b.state})`).join(', ')}`
      })
    }
  }

  violations.push(...checkOrgans(entries, organOrder, options))

  if (options.staleAfterDays !== undefined) {
    violations.push(...checkStaleness(entries, options.staleAfterDays, now))
  }

  return violations
}

function checkOrgans(
  entries: readonly Entry[],
  organOrder: readonly string[],
  options: AuditOptions
): Violation[] {
  const violations: Violation[] = []
  if (organOrder.length === 0) return violations

  const known = new Set(organOrder)
  const live = new Map<string, number>()
  const total = new Map<string, number>()

  for (const entry of entries) {
    total.set(entry.organ, (total.get(entry.organ) ?? 0) + 1)
    if (entry.state !== 'retired') {
      live.set(entry.organ, (live.get(entry.organ) ?? 0) + 1)
    }
    if (!known.has(entry.organ)) {
      violations.push({
        severity: 'warning',
        kind: 'UNKNOWN_ORGAN',
        entries: [entry.id],
        message: `"${entry.id}" belongs to organ ${entry.organ}, which is not in the organ order`
      })
    }
  }

  const emptyLevel = options.emptyOrgan ?? 'off'
  for (const organ of organOrder) {
    if (emptyLevel !== 'off' && (total.get(organ) ?? 0) === 0) {
      violations.push({
        severity: emptyLevel,
        kind: 'EMPTY_ORGAN',
        entries: [],
        message: `${organ}: has zero entries`
      })
    }

    const minEntries = options.organRequirements?.[organ]?.min_entries ?? 0
    const count = live.get(organ) ?? 0
    if (count < minEntries) {
      violations.push({
        severity: 'warning',
        kind: 'ORGAN_BELOW_MINIMUM',
        entries: [],
        message: `${organ}: has ${count} live entries, requires ${minEntries}`
      })
    }
  }

  return violations
}

function checkStaleness(entries: readonly Entry[], staleAfterDays: number, now: Date): Violation[] {
  const violations: Violation[] = []

  for (const entry of entries) {
    if (entry.state === 'retired' || !entry.lastValidated) continue

    const validatedAt = new Date(entry.lastValidated).getTime()
    if (isNaN(validatedAt)) {
      violations.push({
        severity: 'warning',
        kind: 'MALFORMED_VALIDATION_DATE',
        entries: [entry.id],
        message: `"${entry.id}": malformed lastValidated date '${entry.lastValidated}'`
      })
      continue
    }

    const daysAgo = Math.floor((now.getTime() - validatedAt) / DAY_MS)
    if (daysAgo > staleAfterDays) {
      violations.push({
        severity: 'warning',
        kind: 'STALE_ENTRY',
        entries: [entry.id],
        message: `"${entry.id}": stale (${daysAgo} days since validation)`
      })
    }
  }

  return violations
}

// ============================================================================
// Helpers
// ============================================================================

function computeStats(entries: readonly Entry[], edges: readonly Edge[]): AuditStats {
  const organOf = new Map(entries.map(e => [e.id, e.organ]))
  const edgesByKind: Record<EdgeKind, number> = { produces: 0, consumes: 0, depends_on: 0 }
  const crossOrgan: Record<string, number> = {}

  for (const edge of edges) {
    edgesByKind[edge.kind]++
    const from = organOf.get(edge.source)
    const to = organOf.get(edge.target)
    if (from !== undefined && to !== undefined && from !== to) {
      const direction = `${from} -> ${to}`
      crossOrgan[direction] = (crossOrgan[direction] ?? 0) + 1
    }
  }

  return Object.freeze({
    entries: entries.length,
    totalEdges: edges.length,
    edgesByKind: Object.freeze(edgesByKind),
    crossOrgan: Object.freeze(crossOrgan)
  })
}

function sortViolations(violations: Violation[]): Violation[] {
  return [...violations].sort((a, b) =>
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
    compareIds(a.kind, b.kind) ||
    compareIds(a.entries.join(','), b.entries.join(',')) ||
    compareIds(a.message, b.message)
  )
}

/**
 * Render a report as plain text.
 */
export function formatAuditReport(report: AuditReport): string {
  const lines = ['Governance Audit Report', '='.repeat(40)]
  const groups: Array<[string, Severity]> = [
    ['ERRORS', 'error'],
    ['WARNINGS', 'warning'],
    ['INFO', 'info']
  ]

  for (const [label, severity] of groups) {
    const items = report.violations.filter(v => v.severity === severity)
    if (items.length === 0) continue
    lines.push('', `${label} (${items.length}):`)
    for (const item of items) {
      lines.push(`  [${item.kind}] ${item.message}`)
    }
  }

  const { stats } = report
  const kinds = EDGE_KINDS.map(kind => `${kind}: ${stats.edgesByKind[kind]}`).join(', ')
  lines.push(
    '',
    `Dependency graph: ${stats.entries} entries, ${stats.totalEdges} edges (${kinds}), ` +
    `${Object.keys(stats.crossOrgan).length} cross-organ directions`
  )

  if (report.violations.length === 0) {
    lines.push('All governance checks passed.')
  }
  lines.push(`Result: ${report.cancelled ? 'CANCELLED' : report.passed ? 'PASS' : 'FAIL'}`)

  return lines.join('\n')
}
