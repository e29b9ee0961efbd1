/**
 * Regula Types
 *
 * Shared data model for registry entries, edges and configuration.
 */

// ============================================================================
// Entries
// ============================================================================

export const LIFECYCLE_STATES = ['proposed', 'active', 'deprecated', 'retired'] as const
export type LifecycleState = typeof LIFECYCLE_STATES[number]

export const TIERS = ['flagship', 'standard', 'experimental', 'infrastructure', 'stub'] as const
export type Tier = typeof TIERS[number]

/**
 * One governed unit tracked by the registry.
 *
 * `dependencies` lists the ids this entry depends on.
 */
export interface Entry {
  id: string
  organ: string
  tier: Tier
  state: LifecycleState
  dependencies: string[]
  description?: string
  /** ISO timestamp of the last successful validation */
  lastValidated?: string
}

// ============================================================================
// Edges
// ============================================================================

export const EDGE_KINDS = ['produces', 'consumes', 'depends_on'] as const
export type EdgeKind = typeof EDGE_KINDS[number]

/**
 * Normalized directed edge. `source` is upstream (dependency or producer),
 * `target` is downstream (dependent or consumer).
 */
export interface Edge {
  readonly source: string
  readonly target: string
  readonly kind: EdgeKind
}

/** Producer declares who consumes its artifact */
export interface ProducesDeclaration {
  type: 'produces'
  producer: string
  consumer: string
  artifact?: string
}

/** Consumer declares where its artifact comes from */
export interface ConsumesDeclaration {
  type: 'consumes'
  consumer: string
  producer: string
  artifact?: string
}

/** Explicit dependency declared outside the registry */
export interface DependsOnDeclaration {
  type: 'depends_on'
  dependent: string
  dependency: string
}

/** Bare `[producer, consumer, artifact]` triple */
export type SeedEdgeTuple = readonly [string, string, string]

export type RawEdgeDeclaration =
  | ProducesDeclaration
  | ConsumesDeclaration
  | DependsOnDeclaration
  | SeedEdgeTuple

// ============================================================================
// Configuration
// ============================================================================

export type FlowPolicy = 'off' | 'warn' | 'strict'
export type FindingLevel = 'off' | 'warning' | 'error'

export interface OrganRequirement {
  min_entries?: number
}

export interface GovernanceConfig {
  version: string
  /** Path of a parent config to inherit from */
  extends?: string
  /** Organ total order, upstream first */
  organs: string[]
  flow: {
    policy: FlowPolicy
    /** Organs exempt from flow-direction checks */
    unrestricted: string[]
  }
  registry: {
    path: string
  }
  seeds: {
    workspace?: string
    pattern: string
  }
  audit: {
    stale_after_days?: number
    empty_organ: FindingLevel
    organ_requirements: Record<string, OrganRequirement>
  }
  dispatch: {
    concurrency: number
    retries: number
    retry_delay_ms: number
    timeout_ms: number
  }
}

// ============================================================================
// Snapshots and Mutations
// ============================================================================

/**
 * Point-in-time, read-only view of the registry. `version` increases with
 * every mutation the store applies.
 */
export interface RegistrySnapshot {
  readonly version: number
  readonly takenAt: string
  readonly entries: readonly Readonly<Entry>[]
}

export interface TransitionMutation {
  readonly type: 'transition'
  readonly entryId: string
  readonly from: LifecycleState
  readonly to: LifecycleState
  /** Snapshot version the approval was computed against */
  readonly snapshotVersion: number
  readonly forced: boolean
  /** Active dependents overridden by a forced transition */
  readonly overriddenDependents: readonly string[]
}

export interface DependencyMutation {
  readonly type: 'dependencies'
  readonly entryId: string
  readonly from: readonly string[]
  readonly to: readonly string[]
  readonly snapshotVersion: number
}

export type ApprovedMutation = TransitionMutation | DependencyMutation
