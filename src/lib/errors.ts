/**
 * Regula Error Hierarchy
 *
 * Typed error classes shared by the governance core, the registry store and
 * the dispatch layer. Every error carries a stable machine-readable `code`
 * and a `category` so callers can pick an exit code without inspecting
 * messages.
 *
 * Hierarchy:
 *   GovernanceError (base)
 *   ├── InputError (caller-supplied data is structurally invalid)
 *   │   ├── MalformedEdgeError
 *   │   ├── InvalidRegistryError
 *   │   ├── InvalidSeedError
 *   │   ├── EntryNotFoundError
 *   │   └── DuplicateEntryError
 *   ├── ConfigError
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   └── ExtendsDepthError
 *   ├── StructuralError (the graph itself is inconsistent)
 *   │   ├── DanglingReferenceError
 *   │   ├── SelfLoopError
 *   │   ├── CycleError
 *   │   └── FlowViolationError
 *   ├── PolicyError (a requested mutation is currently disallowed)
 *   │   ├── InvalidTransitionError
 *   │   ├── InvalidInitialStateError
 *   │   ├── UnmetDependencyError
 *   │   └── DependentsStillActiveError
 *   ├── ConcurrencyError
 *   │   └── StaleSnapshotError
 *   └── OperationError
 *       ├── OperationCancelledError
 *       ├── DeliveryTimeoutError
 *       └── DispatchFailedError
 */

import type { Edge, LifecycleState } from '../types.js'

export type ErrorCategory =
  | 'input'
  | 'config'
  | 'structural'
  | 'policy'
  | 'concurrency'
  | 'operation'

export type Severity = 'error' | 'warning' | 'info'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all Regula errors
 */
export class GovernanceError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  readonly category: ErrorCategory

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    options?: ErrorOptions
  ) {
    super(message, { cause: options?.cause })
    this.name = 'GovernanceError'
    this.code = code
    this.category = category
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error [${this.code}]: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

function formatEdge(edge: Edge): string {
  return `${edge.source} -> ${edge.target} (${edge.kind})`
}

// =============================================================================
// Input Errors
// =============================================================================

export class InputError extends GovernanceError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'input', options)
    this.name = 'InputError'
  }
}

/**
 * Thrown when an edge declaration references an empty or invalid identifier
 */
export class MalformedEdgeError extends InputError {
  readonly declarations: string[]

  constructor(declarations: string[]) {
    super(
      `Malformed edge declaration(s): ${declarations.join('; ')}`,
      'MALFORMED_EDGE',
      {
        suggestion: 'Edge endpoints must be non-empty identifiers (letters, digits, ".", "_", "-", "/")',
        context: { declarations }
      }
    )
    this.name = 'MalformedEdgeError'
    this.declarations = declarations
  }
}

/**
 * Thrown when a registry document fails validation
 */
export class InvalidRegistryError extends InputError {
  constructor(message: string, registryPath?: string, cause?: Error) {
    super(
      registryPath ? `Invalid registry in ${registryPath}: ${message}` : `Invalid registry: ${message}`,
      'INVALID_REGISTRY',
      {
        suggestion: 'Check the registry JSON against the entry schema',
        context: registryPath ? { registryPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidRegistryError'
  }
}

/**
 * Thrown when a seed manifest cannot be parsed or validated
 */
export class InvalidSeedError extends InputError {
  readonly seedPath: string
  readonly reason: string

  constructor(seedPath: string, reason: string, cause?: Error) {
    super(
      `Invalid seed manifest ${seedPath}: ${reason}`,
      'INVALID_SEED',
      {
        context: { seedPath },
        cause
      }
    )
    this.name = 'InvalidSeedError'
    this.seedPath = seedPath
    this.reason = reason
  }
}

export class EntryNotFoundError extends InputError {
  constructor(entryId: string) {
    super(
      `Entry "${entryId}" not found in registry`,
      'ENTRY_NOT_FOUND',
      {
        suggestion: 'Check the entry id against the registry snapshot',
        context: { entryId }
      }
    )
    this.name = 'EntryNotFoundError'
  }
}

export class DuplicateEntryError extends InputError {
  constructor(entryId: string) {
    super(
      `Entry "${entryId}" already exists in registry`,
      'DUPLICATE_ENTRY',
      { context: { entryId } }
    )
    this.name = 'DuplicateEntryError'
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends GovernanceError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'config', options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when .regula/config.yaml is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath?: string) {
    super(
      searchedPath
        ? `Config file not found: ${searchedPath}`
        : 'No .regula/config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create .regula/config.yaml with at least an "organs" list',
        context: searchedPath ? { searchedPath } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .regula/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when config inheritance creates a loop
 */
export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(
      `Circular config inheritance detected: ${configPath}`,
      'CIRCULAR_EXTENDS',
      {
        suggestion: 'Check your "extends" fields for circular references',
        context: { configPath }
      }
    )
    this.name = 'CircularExtendsError'
  }
}

export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(
      `Config inheritance depth exceeded (max ${maxDepth})`,
      'EXTENDS_DEPTH_EXCEEDED',
      {
        suggestion: 'Reduce nesting of "extends" in your config files',
        context: { maxDepth }
      }
    )
    this.name = 'ExtendsDepthError'
  }
}

// =============================================================================
// Structural Errors
// =============================================================================

export class StructuralError extends GovernanceError {
  readonly severity: Severity
  /** Entry ids involved in the finding */
  readonly entries: string[]

  constructor(
    message: string,
    code: string,
    entries: string[],
    severity: Severity = 'error',
    options?: ErrorOptions
  ) {
    super(message, code, 'structural', options)
    this.name = 'StructuralError'
    this.entries = entries
    this.severity = severity
  }
}

/**
 * Edges whose endpoints do not resolve to a known entry. Lists all of them.
 */
export class DanglingReferenceError extends StructuralError {
  readonly edges: Edge[]

  constructor(edges: Edge[]) {
    super(
      `Dangling reference(s): ${edges.map(formatEdge).join(', ')}`,
      'DANGLING_REFERENCE',
      uniqueIds(edges),
      'error',
      {
        suggestion: 'Register the missing entries or remove the references',
        context: { edges }
      }
    )
    this.name = 'DanglingReferenceError'
    this.edges = edges
  }
}

export class SelfLoopError extends StructuralError {
  readonly edges: Edge[]

  constructor(edges: Edge[]) {
    super(
      `Self-loop(s): ${edges.map(formatEdge).join(', ')}`,
      'SELF_LOOP',
      uniqueIds(edges),
      'error',
      {
        suggestion: 'An entry cannot depend on, produce for or consume from itself',
        context: { edges }
      }
    )
    this.name = 'SelfLoopError'
    this.edges = edges
  }
}

/**
 * A `depends_on` cycle. `path` starts and ends on the same node.
 */
export class CycleError extends StructuralError {
  readonly path: string[]

  constructor(path: string[]) {
    super(
      `Dependency cycle: ${path.join(' -> ')}`,
      'DEPENDENCY_CYCLE',
      [...new Set(path.slice(0, -1))],
      'error',
      {
        suggestion: 'Break the cycle by removing one of its depends_on references',
        context: { path }
      }
    )
    this.name = 'CycleError'
    this.path = path
  }
}

export class FlowViolationError extends StructuralError {
  readonly edge: Edge
  readonly sourceOrgan: string
  readonly targetOrgan: string

  constructor(edge: Edge, sourceOrgan: string, targetOrgan: string, severity: Severity = 'warning') {
    super(
      `Flow violation: ${formatEdge(edge)} flows from ${sourceOrgan} back to ${targetOrgan}`,
      'FLOW_VIOLATION',
      [edge.source, edge.target],
      severity,
      {
        suggestion: 'Review the exception or reverse the relation so it follows the organ order',
        context: { edge, sourceOrgan, targetOrgan }
      }
    )
    this.name = 'FlowViolationError'
    this.edge = edge
    this.sourceOrgan = sourceOrgan
    this.targetOrgan = targetOrgan
  }
}

// =============================================================================
// Policy Errors
// =============================================================================

export class PolicyError extends GovernanceError {
  readonly entryId: string

  constructor(message: string, code: string, entryId: string, options?: ErrorOptions) {
    super(message, code, 'policy', options)
    this.name = 'PolicyError'
    this.entryId = entryId
  }
}

export class InvalidTransitionError extends PolicyError {
  readonly from: LifecycleState
  readonly to: LifecycleState

  constructor(entryId: string, from: LifecycleState, to: LifecycleState, validTargets: readonly LifecycleState[]) {
    super(
      `Cannot transition "${entryId}" from ${from} to ${to}. ` +
      `Valid targets: ${validTargets.length > 0 ? validTargets.join(', ') : 'none (terminal state)'}`,
      'INVALID_TRANSITION',
      entryId,
      { context: { from, to, validTargets } }
    )
    this.name = 'InvalidTransitionError'
    this.from = from
    this.to = to
  }
}

export class InvalidInitialStateError extends PolicyError {
  constructor(entryId: string, state: LifecycleState) {
    super(
      `Entry "${entryId}" cannot be created in state ${state}`,
      'INVALID_INITIAL_STATE',
      entryId,
      {
        suggestion: 'New entries start as proposed',
        context: { state }
      }
    )
    this.name = 'InvalidInitialStateError'
  }
}

export interface BlockingDependency {
  id: string
  /** Current state, or `missing` when the id is not registered */
  state: LifecycleState | 'missing'
}

export class UnmetDependencyError extends PolicyError {
  /** Ids of the dependencies that are not ready */
  readonly blocking: string[]

  constructor(entryId: string, blocking: BlockingDependency[]) {
    super(
      `"${entryId}" cannot activate: dependencies not ready: ` +
      blocking.map(b => `${b.id} (${b.state})`).join(', '),
      'UNMET_DEPENDENCY',
      entryId,
      {
        suggestion: 'Activate the blocking dependencies first',
        context: { blocking }
      }
    )
    this.name = 'UnmetDependencyError'
    this.blocking = blocking.map(b => b.id)
  }
}

export class DependentsStillActiveError extends PolicyError {
  readonly blocking: string[]

  constructor(entryId: string, target: LifecycleState, blocking: string[]) {
    super(
      `Cannot move "${entryId}" to ${target}: still depended on by active ${blocking.join(', ')}`,
      'DEPENDENTS_STILL_ACTIVE',
      entryId,
      {
        suggestion: 'Migrate the dependents first, or pass force to override',
        context: { target, blocking }
      }
    )
    this.name = 'DependentsStillActiveError'
    this.blocking = blocking
  }
}

// =============================================================================
// Concurrency Errors
// =============================================================================

export class ConcurrencyError extends GovernanceError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'concurrency', options)
    this.name = 'ConcurrencyError'
  }
}

/**
 * Thrown by the registry store when an approval was computed against an
 * older snapshot than the current registry version.
 */
export class StaleSnapshotError extends ConcurrencyError {
  readonly snapshotVersion: number
  readonly currentVersion: number

  constructor(entryId: string, snapshotVersion: number, currentVersion: number) {
    super(
      `Approval for "${entryId}" was computed against snapshot v${snapshotVersion}, registry is at v${currentVersion}`,
      'STALE_SNAPSHOT',
      {
        suggestion: 'Take a fresh snapshot and request the change again',
        context: { entryId, snapshotVersion, currentVersion }
      }
    )
    this.name = 'StaleSnapshotError'
    this.snapshotVersion = snapshotVersion
    this.currentVersion = currentVersion
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends GovernanceError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, 'operation', options)
    this.name = 'OperationError'
  }
}

export class OperationCancelledError extends OperationError {
  constructor(operation: string, cause?: Error) {
    super(
      `Operation cancelled: ${operation}`,
      'OPERATION_CANCELLED',
      { context: { operation }, cause }
    )
    this.name = 'OperationCancelledError'
  }
}

export class DeliveryTimeoutError extends OperationError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `Operation timed out after ${timeoutMs}ms: ${operation}`,
      'DELIVERY_TIMEOUT',
      { context: { operation, timeoutMs } }
    )
    this.name = 'DeliveryTimeoutError'
  }
}

export class DispatchFailedError extends OperationError {
  constructor(eventId: string, attempts: number, cause?: Error) {
    super(
      `Delivery of ${eventId} failed after ${attempts} attempt(s)${cause ? `: ${cause.message}` : ''}`,
      'DISPATCH_FAILED',
      { context: { eventId, attempts }, cause }
    )
    this.name = 'DispatchFailedError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isGovernanceError(error: unknown): error is GovernanceError {
  return error instanceof GovernanceError
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError
}

export function isStructuralError(error: unknown): error is StructuralError {
  return error instanceof StructuralError
}

export function isPolicyError(error: unknown): error is PolicyError {
  return error instanceof PolicyError
}

export function isConcurrencyError(error: unknown): error is ConcurrencyError {
  return error instanceof ConcurrencyError
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isGovernanceError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a GovernanceError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): GovernanceError {
  if (isGovernanceError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new OperationError(error.message, defaultCode, { cause: error })
  }
  return new OperationError(String(error), defaultCode)
}

/**
 * Process exit code for an error: 2 for malformed input or config,
 * 1 for everything else.
 */
export function exitCodeForError(error: unknown): 1 | 2 {
  if (isGovernanceError(error) && (error.category === 'input' || error.category === 'config')) {
    return 2
  }
  return 1
}

function uniqueIds(edges: Edge[]): string[] {
  const ids = new Set<string>()
  for (const edge of edges) {
    ids.add(edge.source)
    ids.add(edge.target)
  }
  return [...ids]
}
