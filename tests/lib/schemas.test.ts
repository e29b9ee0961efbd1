/**
 * Tests for schemas.ts
 */

import { describe, it, expect } from 'vitest'
import {
  EntrySchema,
  GovernanceConfigSchema,
  SeedSchema,
  formatIssues,
  issueMessages
} from '../../src/lib/schemas.js'
import { DEFAULT_CONFIG } from '../../src/lib/config-loader.js'

describe('EntrySchema', () => {
  it('should default dependencies and keep optional fields', () => {
    const parsed = EntrySchema.parse({
      id: 'core/lib',
      organ: 'I',
      tier: 'flagship',
      state: 'active',
      lastValidated: '2026-01-01T00:00:00Z'
    })
    expect(parsed.dependencies).toEqual([])
    expect(parsed.lastValidated).toBe('2026-01-01T00:00:00Z')
  })

  it('should reject invalid dependency ids with their path', () => {
    const result = EntrySchema.safeParse({
      id: 'A',
      organ: 'I',
      tier: 'standard',
      state: 'active',
      dependencies: ['B', ' C']
    })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(issueMessages(result.error)).toEqual([
        'dependencies.1: Must be a non-empty identifier (letters, digits, ".", "_", "-", "/")'
      ])
    }
  })
})

describe('GovernanceConfigSchema', () => {
  it('should accept the default config', () => {
    expect(GovernanceConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('should join issues for one-line messages', () => {
    const result = GovernanceConfigSchema.safeParse({ ...DEFAULT_CONFIG, organs: ['I', 'I'] })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(formatIssues(result.error)).toBe('organs: Organ names must be unique')
    }
  })
})

describe('SeedSchema', () => {
  it('should normalize empty sections and keep unknown keys', () => {
    const seed = SeedSchema.parse({ org: 'o', repo: 'r', produces: null, description: 'kept' })
    expect(seed.produces).toEqual([])
    expect(seed.consumes).toEqual([])
    expect(seed.subscriptions).toEqual([])
    expect(seed.description).toBe('kept')
  })

  it('should default the artifact type of object items', () => {
    const seed = SeedSchema.parse({ produces: [{ consumers: ['a/b'] }] })
    expect(seed.produces).toEqual([{ type: 'unknown', consumers: ['a/b'] }])
    expect(seed.org).toBe('unknown')
  })
})
