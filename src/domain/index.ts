/**
 * Regula Domain Layer
 *
 * Pure governance core over registry snapshots:
 * - edges: declaration normalization
 * - graph: build, validation and traversal
 * - lifecycle / approval: transition gating
 * - audit, cascade, impact
 */

export { isValidIdentifier, edgeKey, makeEdge, normalize } from './edges.js'

export type { BuildGraphOptions, GraphBuildResult, TraversalOptions } from './graph.js'
export { DependencyGraph, buildGraph, compareIds, throwIfCancelled } from './graph.js'

export type { TransitionDecision, TransitionOptions } from './lifecycle.js'
export {
  INITIAL_STATE,
  TRANSITIONS,
  getValidTransitions,
  isTerminal,
  isReadyState,
  findUnreadyDependencies,
  findActiveDependents,
  canTransition
} from './lifecycle.js'

export type { Approval, ApprovalOptions } from './approval.js'
export { approveTransition, approveDependencyChange } from './approval.js'

export type { AuditReport, AuditStats, AuditOptions, Violation } from './audit.js'
export { audit, formatAuditReport } from './audit.js'

export type {
  CascadePlan,
  CascadeStep,
  CascadeEventKind,
  ChangeKind,
  PlanCascadeOptions
} from './cascade.js'
export {
  planCascade,
  planMetricsCascade,
  eventKindFor,
  generatePlanId,
  formatCascadePlan
} from './cascade.js'

export type { ImpactReport, ImpactOptions } from './impact.js'
export { calculateImpact, formatImpactReport } from './impact.js'
