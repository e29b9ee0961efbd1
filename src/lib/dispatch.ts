/**
 * Regula Dispatch
 *
 * Delivery of cascade plans and organ-to-organ event envelopes.
 *
 * - One plan is an ordered queue: events go out strictly in plan order and
 *   a permanent failure halts the rest of the plan
 * - Independent plans run concurrently (p-limit)
 * - Deliveries are retried with backoff under a per-attempt timeout. A
 *   timed-out attempt is aborted through its signal and awaited before
 *   anything else is sent; if it still succeeds, no retry is made
 * - An event id is delivered at most once per dispatcher
 */

import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import { z } from 'zod'
import type { CascadeEventKind, CascadePlan } from '../domain/cascade.js'
import type { SeedRecord } from './seed-discovery.js'
import { withRetry, withTimeout } from './timeout.js'
import { silentLogger, type Logger } from './logger.js'
import {
  DeliveryTimeoutError,
  DispatchFailedError,
  OperationCancelledError,
  type GovernanceError
} from './errors.js'
import { issueMessages } from './schemas.js'

// =============================================================================
// Payloads
// =============================================================================

export const PRIORITIES = ['low', 'normal', 'high', 'critical'] as const
export type Priority = typeof PRIORITIES[number]

export const DEFAULT_TTL_SECONDS = 86400

export interface Endpoint {
  organ: string
  org?: string
  repo?: string
}

export interface DispatchPayload {
  /** Dotted event name, e.g. "theory.published" */
  event: string
  source: Endpoint
  target: Endpoint
  payload: Record<string, unknown>
  metadata: {
    dispatchId: string
    timestamp: string
    priority: Priority
    ttlSeconds: number
  }
}

export interface CreatePayloadInput {
  event: string
  source: Endpoint
  target: Endpoint
  data?: Record<string, unknown>
  priority?: Priority
  ttlSeconds?: number
}

export function createPayload(input: CreatePayloadInput): DispatchPayload {
  return {
    event: input.event,
    source: { ...input.source },
    target: { ...input.target },
    payload: { ...input.data },
    metadata: {
      dispatchId: randomUUID(),
      timestamp: new Date().toISOString(),
      priority: input.priority ?? 'normal',
      ttlSeconds: input.ttlSeconds ?? DEFAULT_TTL_SECONDS
    }
  }
}

const EndpointSchema = z.object({
  organ: z.string().min(1),
  org: z.string().optional(),
  repo: z.string().optional()
})

export const DispatchPayloadSchema = z.object({
  event: z.string().refine(
    event => event.includes('.'),
    event => ({ message: `Event '${event}' must contain a dot separator (e.g., 'theory.published')` })
  ),
  source: EndpointSchema,
  target: EndpointSchema,
  payload: z.record(z.string(), z.unknown()),
  metadata: z.object({
    dispatchId: z.string(),
    timestamp: z.string(),
    priority: z.enum(PRIORITIES),
    ttlSeconds: z.number().int().positive()
  }).partial().optional()
})

export function validatePayload(value: unknown): { valid: boolean; errors: string[] } {
  const result = DispatchPayloadSchema.safeParse(value)
  if (result.success) {
    return { valid: true, errors: [] }
  }
  return { valid: false, errors: issueMessages(result.error) }
}

// =============================================================================
// Routing
// =============================================================================

export interface RouteMatch {
  repo: string
  action: string
  event: string
}

/**
 * Seeds subscribed to `eventType` from `sourceOrgan`
 */
export function routeEvent(
  eventType: string,
  sourceOrgan: string,
  seeds: readonly SeedRecord[]
): RouteMatch[] {
  const matches: RouteMatch[] = []
  for (const { identity, seed } of seeds) {
    for (const sub of seed.subscriptions) {
      if (sub.event === eventType && sub.source === sourceOrgan) {
        matches.push({ repo: identity, action: sub.action, event: eventType })
      }
    }
  }
  return matches
}

// =============================================================================
// Cascade Dispatcher
// =============================================================================

export interface CascadeEvent {
  /** `<planId>:<index>:<entryId>` */
  id: string
  planId: string
  index: number
  entryId: string
  kind: CascadeEventKind
  trigger: string
}

export interface DeliveryContext {
  /** Aborted when the attempt times out */
  signal: AbortSignal
}

/**
 * Must settle once `signal` aborts; the dispatcher waits for it.
 */
export type DeliverFn = (event: CascadeEvent, context: DeliveryContext) => Promise<void>

export type DeliveryStatus = 'delivered' | 'duplicate' | 'failed' | 'skipped'

export interface DeliveryOutcome {
  eventId: string
  entryId: string
  status: DeliveryStatus
  attempts: number
  error?: GovernanceError
}

export interface DispatchReport {
  planId: string
  outcomes: DeliveryOutcome[]
  delivered: number
  duplicates: number
  failed: number
  skipped: number
  /** Every event delivered now or earlier */
  completed: boolean
  cancelled: boolean
}

export interface DispatcherOptions {
  deliver: DeliverFn
  /** Extra attempts after the first (default: 3) */
  retries?: number
  retryDelayMs?: number
  /** Per-attempt timeout (default: 30000) */
  timeoutMs?: number
  /** Plans delivered at once by dispatchAll (default: 4) */
  concurrency?: number
  logger?: Logger
}

export function cascadeEvents(plan: CascadePlan): CascadeEvent[] {
  return plan.events.map((step, index) => ({
    id: `${plan.id}:${index}:${step.entryId}`,
    planId: plan.id,
    index,
    entryId: step.entryId,
    kind: step.event,
    trigger: plan.trigger
  }))
}

export class CascadeDispatcher {
  private readonly deliver: DeliverFn
  private readonly retries: number
  private readonly retryDelayMs: number
  private readonly timeoutMs: number
  private readonly concurrency: number
  private readonly logger: Logger
  private readonly delivered = new Set<string>()

  constructor(options: DispatcherOptions) {
    this.deliver = options.deliver
    this.retries = options.retries ?? 3
    this.retryDelayMs = options.retryDelayMs ?? 1000
    this.timeoutMs = options.timeoutMs ?? 30000
    this.concurrency = options.concurrency ?? 4
    this.logger = options.logger ?? silentLogger
  }

  hasDelivered(eventId: string): boolean {
    return this.delivered.has(eventId)
  }

  /**
   * Deliver one plan in order. Never throws; failures are in the report.
   */
  async dispatch(plan: CascadePlan, options: { signal?: AbortSignal } = {}): Promise<DispatchReport> {
    const outcomes: DeliveryOutcome[] = []
    let halted = false
    let cancelled = false

    for (const event of cascadeEvents(plan)) {
      if (!halted && options.signal?.aborted) {
        halted = true
        cancelled = true
        this.logger.warn(`Dispatch of ${plan.id} cancelled before ${event.entryId}`)
      }

      if (halted) {
        outcomes.push({ eventId: event.id, entryId: event.entryId, status: 'skipped', attempts: 0 })
        continue
      }

      if (this.delivered.has(event.id)) {
        this.logger.debug(`Skipping ${event.id}: already delivered`)
        outcomes.push({ eventId: event.id, entryId: event.entryId, status: 'duplicate', attempts: 0 })
        continue
      }

      const outcome = await this.deliverOne(event)
      outcomes.push(outcome)
      if (outcome.status === 'failed') {
        halted = true
      }
    }

    const count = (status: DeliveryStatus): number => outcomes.filter(o => o.status === status).length

    return {
      planId: plan.id,
      outcomes,
      delivered: count('delivered'),
      duplicates: count('duplicate'),
      failed: count('failed'),
      skipped: count('skipped'),
      completed: outcomes.every(o => o.status === 'delivered' || o.status === 'duplicate'),
      cancelled
    }
  }

  /**
   * Deliver independent plans concurrently; each plan stays ordered.
   */
  async dispatchAll(
    plans: readonly CascadePlan[],
    options: { signal?: AbortSignal } = {}
  ): Promise<DispatchReport[]> {
    const limit = pLimit(this.concurrency)
    return Promise.all(plans.map(plan => limit(() => this.dispatch(plan, options))))
  }

  private async deliverOne(event: CascadeEvent): Promise<DeliveryOutcome> {
    let attempts = 0

    try {
      await withRetry(
        async () => {
          attempts++
          await this.attempt(event)
        },
        {
          maxAttempts: this.retries + 1,
          delayMs: this.retryDelayMs,
          shouldRetry: error => !(error instanceof OperationCancelledError),
          onRetry: (attempt, error) => {
            this.logger.warn(`Delivery of ${event.id} failed (attempt ${attempt}): ${error.message}, retrying`)
          }
        }
      )
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error))
      const failure = new DispatchFailedError(event.id, attempts, cause)
      this.logger.error(failure.message)
      return { eventId: event.id, entryId: event.entryId, status: 'failed', attempts, error: failure }
    }

    this.delivered.add(event.id)
    this.logger.debug(`Delivered ${event.id} (${event.kind})`)
    return { eventId: event.id, entryId: event.entryId, status: 'delivered', attempts }
  }

  /**
   * One delivery attempt. On timeout the attempt is aborted and awaited,
   * so a retry or the next event never overlaps it.
   */
  private async attempt(event: CascadeEvent): Promise<void> {
    const controller = new AbortController()
    const pending = this.deliver(event, { signal: controller.signal })

    try {
      await withTimeout(pending, this.timeoutMs, `deliver ${event.id}`)
    } catch (error) {
      if (!(error instanceof DeliveryTimeoutError)) throw error

      controller.abort(error)
      const landed = await pending.then(() => true, () => false)
      if (!landed) throw error
      this.logger.warn(`Delivery of ${event.id} completed after its ${this.timeoutMs}ms timeout`)
    }
  }
}
