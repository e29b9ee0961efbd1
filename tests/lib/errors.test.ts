/**
 * Tests for Regula Error Hierarchy
 */

import { describe, it, expect } from 'vitest'
import {
  // Base classes
  GovernanceError,
  InputError,
  ConfigError,
  StructuralError,
  PolicyError,
  ConcurrencyError,
  OperationError,
  // Input errors
  MalformedEdgeError,
  InvalidRegistryError,
  InvalidSeedError,
  EntryNotFoundError,
  // Config errors
  ConfigNotFoundError,
  InvalidConfigError,
  CircularExtendsError,
  ExtendsDepthError,
  // Structural errors
  DanglingReferenceError,
  SelfLoopError,
  CycleError,
  FlowViolationError,
  // Policy errors
  InvalidTransitionError,
  UnmetDependencyError,
  DependentsStillActiveError,
  // Concurrency and operation errors
  StaleSnapshotError,
  OperationCancelledError,
  DispatchFailedError,
  // Type guards
  isGovernanceError,
  isInputError,
  isStructuralError,
  isPolicyError,
  isConcurrencyError,
  // Helpers
  exitCodeForError,
  formatErrorForCli,
  wrapError
} from '../../src/lib/errors.js'

describe('GovernanceError (base class)', () => {
  it('should create error with message, code and category', () => {
    const error = new GovernanceError('test message', 'TEST_CODE', 'operation')
    expect(error.message).toBe('test message')
    expect(error.code).toBe('TEST_CODE')
    expect(error.category).toBe('operation')
    expect(error.name).toBe('GovernanceError')
    expect(error instanceof Error).toBe(true)
  })

  it('should support suggestion, context and cause', () => {
    const cause = new Error('original error')
    const error = new GovernanceError('wrapped', 'TEST', 'input', {
      suggestion: 'try this',
      context: { foo: 'bar' },
      cause
    })
    expect(error.suggestion).toBe('try this')
    expect(error.context).toEqual({ foo: 'bar' })
    expect(error.cause).toBe(cause)
  })

  it('should format for CLI output', () => {
    const error = new GovernanceError('test message', 'TEST', 'input', { suggestion: 'try this' })
    expect(error.toCliOutput()).toBe('Error [TEST]: test message\n  Suggestion: try this')
  })

  it('should convert to JSON', () => {
    const error = new GovernanceError('test', 'TEST', 'config', {
      suggestion: 'hint',
      context: { key: 'value' }
    })
    expect(error.toJSON()).toEqual({
      name: 'GovernanceError',
      code: 'TEST',
      category: 'config',
      message: 'test',
      suggestion: 'hint',
      context: { key: 'value' }
    })
  })
})

describe('InputError hierarchy', () => {
  it('should list every malformed declaration', () => {
    const error = new MalformedEdgeError(['B depends on ""', '[a, , x]'])
    expect(error.code).toBe('MALFORMED_EDGE')
    expect(error.message).toBe('Malformed edge declaration(s): B depends on ""; [a, , x]')
    expect(error.declarations).toEqual(['B depends on ""', '[a, , x]'])
    expect(error instanceof InputError).toBe(true)
  })

  it('should include the registry path when given', () => {
    expect(new InvalidRegistryError('bad', '/data/registry.json').message)
      .toBe('Invalid registry in /data/registry.json: bad')
    expect(new InvalidRegistryError('bad').message).toBe('Invalid registry: bad')
  })

  it('should keep the seed path and reason apart', () => {
    const error = new InvalidSeedError('org/repo/seed.yaml', 'not a YAML mapping')
    expect(error.seedPath).toBe('org/repo/seed.yaml')
    expect(error.reason).toBe('not a YAML mapping')
    expect(error.message).toBe('Invalid seed manifest org/repo/seed.yaml: not a YAML mapping')
  })

  it('should name the missing entry', () => {
    const error = new EntryNotFoundError('core/lib')
    expect(error.message).toBe('Entry "core/lib" not found in registry')
    expect(error.context).toEqual({ entryId: 'core/lib' })
  })
})

describe('ConfigError hierarchy', () => {
  it('should create ConfigNotFoundError with and without path', () => {
    expect(new ConfigNotFoundError().message).toBe('No .regula/config.yaml found')
    const error = new ConfigNotFoundError('/path/to/config.yaml')
    expect(error.message).toBe('Config file not found: /path/to/config.yaml')
    expect(error.context?.searchedPath).toBe('/path/to/config.yaml')
    expect(error instanceof ConfigError).toBe(true)
  })

  it('should include config path in InvalidConfigError', () => {
    const error = new InvalidConfigError('bad yaml', '/path/config.yaml')
    expect(error.code).toBe('INVALID_CONFIG')
    expect(error.message).toBe('Invalid config in /path/config.yaml: bad yaml')
  })

  it('should create inheritance errors', () => {
    expect(new CircularExtendsError('/a.yaml').code).toBe('CIRCULAR_EXTENDS')
    expect(new ExtendsDepthError(10).message).toBe('Config inheritance depth exceeded (max 10)')
  })
})

describe('StructuralError hierarchy', () => {
  it('should describe dangling edges', () => {
    const error = new DanglingReferenceError([{ source: 'A', target: 'X', kind: 'depends_on' }])
    expect(error.message).toBe('Dangling reference(s): A -> X (depends_on)')
    expect(error.entries).toEqual(['A', 'X'])
    expect(error.severity).toBe('error')
  })

  it('should describe self-loops', () => {
    const error = new SelfLoopError([{ source: 'A', target: 'A', kind: 'produces' }])
    expect(error.message).toBe('Self-loop(s): A -> A (produces)')
    expect(error.entries).toEqual(['A'])
  })

  it('should keep the closed cycle path', () => {
    const error = new CycleError(['A', 'B', 'C', 'A'])
    expect(error.message).toBe('Dependency cycle: A -> B -> C -> A')
    expect(error.entries).toEqual(['A', 'B', 'C'])
    expect(error instanceof StructuralError).toBe(true)
  })

  it('should list each member once when the cycle path revisits one', () => {
    const error = new CycleError(['A', 'B', 'A', 'C', 'A'])
    expect(error.entries).toEqual(['A', 'B', 'C'])
    expect(error.path).toEqual(['A', 'B', 'A', 'C', 'A'])
  })

  it('should default flow violations to warnings', () => {
    const edge = { source: 'A', target: 'B', kind: 'depends_on' as const }
    const warning = new FlowViolationError(edge, 'II', 'I')
    expect(warning.severity).toBe('warning')
    expect(warning.message).toBe('Flow violation: A -> B (depends_on) flows from II back to I')
    expect(new FlowViolationError(edge, 'II', 'I', 'error').severity).toBe('error')
  })
})

describe('PolicyError hierarchy', () => {
  it('should describe illegal transitions', () => {
    const error = new InvalidTransitionError('A', 'retired', 'active', [])
    expect(error.message).toBe('Cannot transition "A" from retired to active. Valid targets: none (terminal state)')
    expect(error.entryId).toBe('A')
    expect(error instanceof PolicyError).toBe(true)
  })

  it('should list blocking dependencies with their states', () => {
    const error = new UnmetDependencyError('C', [
      { id: 'A', state: 'proposed' },
      { id: 'B', state: 'missing' }
    ])
    expect(error.blocking).toEqual(['A', 'B'])
    expect(error.message).toBe('"C" cannot activate: dependencies not ready: A (proposed), B (missing)')
  })

  it('should list active dependents', () => {
    const error = new DependentsStillActiveError('A', 'deprecated', ['B', 'C'])
    expect(error.blocking).toEqual(['B', 'C'])
    expect(error.message).toBe('Cannot move "A" to deprecated: still depended on by active B, C')
  })
})

describe('Concurrency and operation errors', () => {
  it('should report both snapshot versions', () => {
    const error = new StaleSnapshotError('A', 3, 5)
    expect(error.snapshotVersion).toBe(3)
    expect(error.currentVersion).toBe(5)
    expect(error.message).toBe('Approval for "A" was computed against snapshot v3, registry is at v5')
    expect(error instanceof ConcurrencyError).toBe(true)
  })

  it('should name the cancelled operation', () => {
    expect(new OperationCancelledError('audit').message).toBe('Operation cancelled: audit')
  })

  it('should include the cause of a failed delivery', () => {
    const error = new DispatchFailedError('plan:0:A', 4, new Error('connection reset'))
    expect(error.message).toBe('Delivery of plan:0:A failed after 4 attempt(s): connection reset')
    expect(error instanceof OperationError).toBe(true)
  })
})

describe('Type guards', () => {
  it('should classify errors by category', () => {
    expect(isGovernanceError(new EntryNotFoundError('A'))).toBe(true)
    expect(isGovernanceError(new Error('plain'))).toBe(false)
    expect(isInputError(new MalformedEdgeError([]))).toBe(true)
    expect(isStructuralError(new CycleError(['A', 'B', 'A']))).toBe(true)
    expect(isPolicyError(new DependentsStillActiveError('A', 'retired', ['B']))).toBe(true)
    expect(isConcurrencyError(new StaleSnapshotError('A', 0, 1))).toBe(true)
    expect(isStructuralError(new EntryNotFoundError('A'))).toBe(false)
  })
})

describe('Helpers', () => {
  it('should map errors to exit codes', () => {
    expect(exitCodeForError(new MalformedEdgeError(['x']))).toBe(2)
    expect(exitCodeForError(new InvalidConfigError('bad'))).toBe(2)
    expect(exitCodeForError(new UnmetDependencyError('A', []))).toBe(1)
    expect(exitCodeForError(new CycleError(['A', 'B', 'A']))).toBe(1)
    expect(exitCodeForError(new Error('plain'))).toBe(1)
  })

  it('should format any error for CLI output', () => {
    expect(formatErrorForCli(new EntryNotFoundError('A'))).toBe(
      'Error [ENTRY_NOT_FOUND]: Entry "A" not found in registry\n' +
      '  Suggestion: Check the entry id against the registry snapshot'
    )
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('should wrap foreign errors and pass governance errors through', () => {
    const original = new EntryNotFoundError('A')
    expect(wrapError(original)).toBe(original)

    const wrapped = wrapError(new Error('boom'), 'AUDIT_FAILED')
    expect(wrapped).toBeInstanceOf(OperationError)
    expect(wrapped.code).toBe('AUDIT_FAILED')
    expect(wrapped.message).toBe('boom')

    expect(wrapError('text').code).toBe('UNKNOWN_ERROR')
  })
})
