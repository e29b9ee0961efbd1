/**
 * Regula - Governance graph and cascade dispatch for organ-structured registries
 *
 * Main library exports for programmatic usage
 */

// Engine
export { GovernanceEngine } from './engine.js'
export type {
  GovernanceEngineOptions,
  FromConfigOptions,
  OperationOptions,
  CascadeResult,
  MutationResult
} from './engine.js'

// Types
export type {
  Entry,
  LifecycleState,
  Tier,
  Edge,
  EdgeKind,
  ProducesDeclaration,
  ConsumesDeclaration,
  DependsOnDeclaration,
  SeedEdgeTuple,
  RawEdgeDeclaration,
  FlowPolicy,
  FindingLevel,
  OrganRequirement,
  GovernanceConfig,
  RegistrySnapshot,
  TransitionMutation,
  DependencyMutation,
  ApprovedMutation
} from './types.js'

export { LIFECYCLE_STATES, TIERS, EDGE_KINDS } from './types.js'

// Domain
export * from './domain/index.js'

// Config utilities
export {
  loadConfig,
  parseConfig,
  findConfigDir,
  configExists,
  resolveConfigPath,
  expandEnvVars,
  DEFAULT_CONFIG,
  CONFIG_DIR
} from './lib/config-loader.js'

// Registry store
export { RegistryStore } from './lib/registry-store.js'
export type { EntryFilter, NewEntry } from './lib/registry-store.js'

// Seed discovery
export {
  discoverSeeds,
  readSeed,
  seedIdentity,
  buildSeedGraph,
  loadSeedGraph,
  formatSeedGraph,
  DEFAULT_SEED_PATTERN
} from './lib/seed-discovery.js'
export type { SeedGraph, SeedRecord } from './lib/seed-discovery.js'
export type { Seed, Subscription } from './lib/schemas.js'

// Dispatch
export {
  CascadeDispatcher,
  cascadeEvents,
  createPayload,
  validatePayload,
  routeEvent,
  PRIORITIES,
  DEFAULT_TTL_SECONDS
} from './lib/dispatch.js'
export type {
  CascadeEvent,
  CreatePayloadInput,
  DeliverFn,
  DeliveryContext,
  DeliveryOutcome,
  DeliveryStatus,
  DispatcherOptions,
  DispatchPayload,
  DispatchReport,
  Endpoint,
  Priority,
  RouteMatch
} from './lib/dispatch.js'

// Logging, timeouts, output
export { createLogger, silentLogger } from './lib/logger.js'
export type { Logger, LoggerOptions } from './lib/logger.js'
export { withRetry, withTimeout } from './lib/timeout.js'
export type { RetryOptions } from './lib/timeout.js'
export {
  exitCodeFor,
  formatDecision,
  toJsonOutput,
  EXIT_OK,
  EXIT_DENIED,
  EXIT_INVALID_INPUT
} from './lib/output.js'
export type { ExitCode, Outcome } from './lib/output.js'

// Errors
export * from './lib/errors.js'
