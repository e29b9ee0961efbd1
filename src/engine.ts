/**
 * Regula Governance Engine
 *
 * Ties the pure governance core to its collaborators: configuration, the
 * registry store, seed declarations, logging and cascade dispatch.
 *
 * Every operation takes a fresh snapshot; nothing here holds a live
 * reference into the registry.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  DependencyMutation,
  Entry,
  GovernanceConfig,
  LifecycleState,
  RawEdgeDeclaration,
  TransitionMutation
} from './types.js'
import { normalize } from './domain/edges.js'
import { buildGraph, type BuildGraphOptions, type GraphBuildResult } from './domain/graph.js'
import { approveDependencyChange, approveTransition, type Approval } from './domain/approval.js'
import { audit as runAudit, type AuditReport } from './domain/audit.js'
import {
  planCascade,
  planMetricsCascade,
  type CascadePlan,
  type ChangeKind
} from './domain/cascade.js'
import { calculateImpact, type ImpactReport } from './domain/impact.js'
import { RegistryStore } from './lib/registry-store.js'
import { loadSeedGraph, type SeedRecord } from './lib/seed-discovery.js'
import {
  CascadeDispatcher,
  routeEvent,
  type CascadeEvent,
  type DeliverFn,
  type DispatchReport,
  type RouteMatch
} from './lib/dispatch.js'
import { silentLogger, type Logger } from './lib/logger.js'
import { StaleSnapshotError, type GovernanceError } from './lib/errors.js'

const DEFAULT_STALE_RETRIES = 3

// ============================================================================
// Types
// ============================================================================

export interface GovernanceEngineOptions {
  config: GovernanceConfig
  store: RegistryStore
  /** Declarations from seed manifests */
  seedEdges?: readonly RawEdgeDeclaration[]
  /** Parsed manifests, used for event routing */
  seeds?: readonly SeedRecord[]
  logger?: Logger
  /** Delivery target for cascade events (default: debug log only) */
  deliver?: DeliverFn
  /** Re-snapshot attempts after a stale approval (default: 3) */
  staleRetries?: number
}

export interface FromConfigOptions {
  /** Directory that config paths are relative to (default: cwd) */
  rootDir?: string
  logger?: Logger
  deliver?: DeliverFn
}

export interface OperationOptions {
  signal?: AbortSignal
}

export interface CascadeResult {
  plan: CascadePlan
  dispatch: DispatchReport
}

export type MutationResult<M> =
  | { applied: true; entry: Entry; mutation: M; cascade: CascadeResult }
  | { applied: false; entryId: string; reason: GovernanceError }

// ============================================================================
// Engine
// ============================================================================

export class GovernanceEngine {
  readonly config: GovernanceConfig
  readonly store: RegistryStore
  readonly dispatcher: CascadeDispatcher

  private readonly seedEdges: readonly RawEdgeDeclaration[]
  private readonly seeds: readonly SeedRecord[]
  private readonly logger: Logger
  private readonly staleRetries: number

  constructor(options: GovernanceEngineOptions) {
    this.config = options.config
    this.store = options.store
    this.seedEdges = options.seedEdges ?? []
    this.seeds = options.seeds ?? []
    this.logger = options.logger ?? silentLogger
    this.staleRetries = options.staleRetries ?? DEFAULT_STALE_RETRIES

    const logger = this.logger
    this.dispatcher = new CascadeDispatcher({
      deliver: options.deliver ?? (async (event: CascadeEvent) => {
        logger.debug(`${event.kind} -> ${event.entryId} (from ${event.trigger})`)
      }),
      retries: this.config.dispatch.retries,
      retryDelayMs: this.config.dispatch.retry_delay_ms,
      timeoutMs: this.config.dispatch.timeout_ms,
      concurrency: this.config.dispatch.concurrency,
      logger
    })
  }

  /**
   * Build an engine from a loaded config: registry file and seed workspace
   * are resolved against `rootDir`.
   */
  static async fromConfig(
    config: GovernanceConfig,
    options: FromConfigOptions = {}
  ): Promise<GovernanceEngine> {
    const rootDir = options.rootDir ?? process.cwd()
    const logger = options.logger ?? silentLogger

    const registryPath = path.resolve(rootDir, config.registry.path)
    let store: RegistryStore
    if (fs.existsSync(registryPath)) {
      store = RegistryStore.load(registryPath)
      logger.debug(`Loaded ${store.size} entries from ${registryPath}`)
    } else {
      logger.warn(`Registry not found at ${registryPath}, starting empty`)
      store = new RegistryStore()
    }

    let seeds: SeedRecord[] = []
    let seedEdges: RawEdgeDeclaration[] = []
    if (config.seeds.workspace) {
      const workspace = path.resolve(rootDir, config.seeds.workspace)
      const seedGraph = await loadSeedGraph(workspace, { pattern: config.seeds.pattern })
      for (const error of seedGraph.errors) {
        logger.warn(`Skipping seed ${error}`)
      }
      seeds = seedGraph.seeds
      seedEdges = seedGraph.declarations
      logger.debug(`Read ${seeds.length} seeds, ${seedEdges.length} declarations`)
    }

    return new GovernanceEngine({
      config,
      store,
      seeds,
      seedEdges,
      logger,
      deliver: options.deliver
    })
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Build the graph over the current snapshot
   *
   * @throws MalformedEdgeError when a declaration has an invalid endpoint
   */
  graph(options: OperationOptions = {}): GraphBuildResult {
    const { entries } = this.store.snapshot()
    return buildGraph(entries, normalize(entries, this.seedEdges), this.graphOptions(options.signal))
  }

  /**
   * Full audit of the current snapshot. Malformed declarations throw;
   * everything else is reported.
   */
  audit(options: OperationOptions & { now?: () => Date } = {}): AuditReport {
    const { entries } = this.store.snapshot()
    const edges = normalize(entries, this.seedEdges)
    const report = runAudit(entries, edges, this.config.organs, {
      flowPolicy: this.config.flow.policy,
      unrestrictedOrgans: this.config.flow.unrestricted,
      staleAfterDays: this.config.audit.stale_after_days,
      emptyOrgan: this.config.audit.empty_organ,
      organRequirements: this.config.audit.organ_requirements,
      signal: options.signal,
      now: options.now
    })
    this.logger.debug(`Audit ${report.passed ? 'passed' : 'failed'} with ${report.violations.length} finding(s)`)
    return report
  }

  checkTransition(
    entryId: string,
    target: LifecycleState,
    options: { force?: boolean } = {}
  ): Approval<TransitionMutation> {
    return approveTransition(this.store.snapshot(), entryId, target, {
      ...this.graphOptions(),
      seedEdges: this.seedEdges,
      force: options.force
    })
  }

  impact(entryId: string, options: OperationOptions = {}): ImpactReport {
    return calculateImpact(entryId, this.graph(options).graph, { signal: options.signal })
  }

  /**
   * Seeds subscribed to an event from an organ
   */
  route(eventType: string, sourceOrgan: string): RouteMatch[] {
    return routeEvent(eventType, sourceOrgan, this.seeds)
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Approve and apply a lifecycle transition, then cascade it.
   * Stale approvals are recomputed against a fresh snapshot.
   *
   * @throws StaleSnapshotError when every retry lost the race
   */
  async requestTransition(
    entryId: string,
    target: LifecycleState,
    options: OperationOptions & { force?: boolean } = {}
  ): Promise<MutationResult<TransitionMutation>> {
    const result = this.applyWithRetry(entryId, () => this.checkTransition(entryId, target, options))
    if (!result.applied) {
      this.logger.debug(`Transition of ${entryId} to ${target} denied: ${result.reason.code}`)
      return result
    }

    const { mutation } = result
    if (mutation.forced) {
      this.logger.warn(
        `Forced ${entryId} ${mutation.from} -> ${mutation.to} over active dependents: ` +
        mutation.overriddenDependents.join(', ')
      )
    }

    const cascade = await this.notifyChange(entryId, 'state', options)
    return { ...result, cascade }
  }

  /**
   * Approve and apply a dependency rewrite, then cascade it.
   */
  async requestDependencyChange(
    entryId: string,
    dependencies: readonly string[],
    options: OperationOptions = {}
  ): Promise<MutationResult<DependencyMutation>> {
    const result = this.applyWithRetry(entryId, () =>
      approveDependencyChange(this.store.snapshot(), entryId, dependencies, {
        ...this.graphOptions(),
        seedEdges: this.seedEdges
      })
    )
    if (!result.applied) return result

    const cascade = await this.notifyChange(entryId, 'dependencies', options)
    return { ...result, cascade }
  }

  planChange(entryId: string, changeKind: ChangeKind, options: OperationOptions = {}): CascadePlan {
    return planCascade(entryId, changeKind, this.graph(options).graph, { signal: options.signal })
  }

  /**
   * Plan and deliver the cascade for a change that already happened
   */
  async notifyChange(
    entryId: string,
    changeKind: ChangeKind = 'state',
    options: OperationOptions = {}
  ): Promise<CascadeResult> {
    return this.deliver(this.planChange(entryId, changeKind, options), options)
  }

  /**
   * Metrics-changed signal. An unchanged signal plans nothing.
   */
  async notifyMetricsChanged(
    entryId: string,
    changed: boolean,
    options: OperationOptions = {}
  ): Promise<CascadeResult> {
    const plan = planMetricsCascade(entryId, changed, this.graph(options).graph, { signal: options.signal })
    return this.deliver(plan, options)
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private graphOptions(signal?: AbortSignal): BuildGraphOptions {
    return {
      organOrder: this.config.organs,
      flowPolicy: this.config.flow.policy,
      unrestrictedOrgans: this.config.flow.unrestricted,
      signal
    }
  }

  private applyWithRetry<M extends TransitionMutation | DependencyMutation>(
    entryId: string,
    approve: () => Approval<M>
  ): { applied: true; entry: Entry; mutation: M } | { applied: false; entryId: string; reason: GovernanceError } {
    for (let attempt = 0; ; attempt++) {
      const approval = approve()
      if (!approval.approved) {
        return { applied: false, entryId, reason: approval.reason }
      }

      try {
        const entry = this.store.apply(approval.mutation)
        return { applied: true, entry, mutation: approval.mutation }
      } catch (error) {
        if (!(error instanceof StaleSnapshotError) || attempt >= this.staleRetries) {
          throw error
        }
        this.logger.warn(
          `Registry moved from v${error.snapshotVersion} to v${error.currentVersion} ` +
          `while approving ${entryId}, retrying`
        )
      }
    }
  }

  private async deliver(plan: CascadePlan, options: OperationOptions): Promise<CascadeResult> {
    const dispatch = await this.dispatcher.dispatch(plan, options)
    if (!dispatch.completed) {
      this.logger.warn(
        `Cascade ${plan.id} incomplete: ${dispatch.failed} failed, ${dispatch.skipped} skipped`
      )
    }
    return { plan, dispatch }
  }
}
