/**
 * Validation schemas for everything Regula reads from disk:
 * config files, registry snapshots and seed manifests.
 */

import { z } from 'zod'
import { LIFECYCLE_STATES, TIERS } from '../types.js'
import { isValidIdentifier } from '../domain/edges.js'

const identifier = z.string().refine(isValidIdentifier, {
  message: 'Must be a non-empty identifier (letters, digits, ".", "_", "-", "/")'
})

// ============================================================================
// Config
// ============================================================================

export const FlowPolicySchema = z.enum(['off', 'warn', 'strict'])
export const FindingLevelSchema = z.enum(['off', 'warning', 'error'])

export const GovernanceConfigSchema = z.object({
  version: z.string(),
  extends: z.string().optional(),
  organs: z.array(z.string().min(1)).refine(
    organs => new Set(organs).size === organs.length,
    { message: 'Organ names must be unique' }
  ),
  flow: z.object({
    policy: FlowPolicySchema,
    unrestricted: z.array(z.string())
  }),
  registry: z.object({
    path: z.string().min(1)
  }),
  seeds: z.object({
    workspace: z.string().optional(),
    pattern: z.string().min(1)
  }),
  audit: z.object({
    stale_after_days: z.number().int().positive().optional(),
    empty_organ: FindingLevelSchema,
    organ_requirements: z.record(z.string(), z.object({
      min_entries: z.number().int().min(0).optional()
    }))
  }),
  dispatch: z.object({
    concurrency: z.number().int().min(1),
    retries: z.number().int().min(0),
    retry_delay_ms: z.number().int().min(0),
    timeout_ms: z.number().int().positive()
  })
})

// ============================================================================
// Registry
// ============================================================================

export const EntrySchema = z.object({
  id: identifier,
  organ: z.string().min(1),
  tier: z.enum(TIERS),
  state: z.enum(LIFECYCLE_STATES),
  dependencies: z.array(identifier).default([]),
  description: z.string().optional(),
  lastValidated: z.string().optional()
})

export const RegistryFileSchema = z.object({
  version: z.number().int().min(0),
  entries: z.array(EntrySchema)
})

export type RegistryFile = z.infer<typeof RegistryFileSchema>

// ============================================================================
// Seed manifests
// ============================================================================

const ProducesItemSchema = z.union([
  z.string(),
  z.object({
    type: z.string().default('unknown'),
    event: z.string().optional(),
    consumers: z.array(z.string()).optional()
  })
])

const ConsumesItemSchema = z.union([
  z.string(),
  z.object({
    type: z.string().default('unknown'),
    source: z.string().optional(),
    event: z.string().optional()
  })
])

export const SubscriptionSchema = z.object({
  event: z.string(),
  source: z.string(),
  action: z.string().default('')
})

export const SeedSchema = z.object({
  org: z.string().default('unknown'),
  repo: z.string().default('unknown'),
  organ: z.string().optional(),
  produces: z.array(ProducesItemSchema).nullish().transform(v => v ?? []),
  consumes: z.array(ConsumesItemSchema).nullish().transform(v => v ?? []),
  subscriptions: z.array(SubscriptionSchema).nullish().transform(v => v ?? [])
}).passthrough()

export type Seed = z.infer<typeof SeedSchema>
export type Subscription = z.infer<typeof SubscriptionSchema>

/**
 * One message per zod issue, e.g. `organs.1: Expected string, received number`
 */
export function issueMessages(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}

export function formatIssues(error: z.ZodError): string {
  return issueMessages(error).join('; ')
}
