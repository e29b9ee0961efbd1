/**
 * Presentation helpers for callers that surface results to an operator:
 * exit code mapping and one-line summaries.
 *
 * Exit codes:
 *   0  pass / allowed
 *   1  denied / violations found
 *   2  malformed input or config
 */

import type { AuditReport } from '../domain/audit.js'
import type { TransitionDecision } from '../domain/lifecycle.js'
import type { Approval } from '../domain/approval.js'
import { exitCodeForError, isGovernanceError } from './errors.js'

export type ExitCode = 0 | 1 | 2

export const EXIT_OK: ExitCode = 0
export const EXIT_DENIED: ExitCode = 1
export const EXIT_INVALID_INPUT: ExitCode = 2

export type Outcome<M = unknown> = AuditReport | TransitionDecision | Approval<M>

function isAuditReport<M>(result: Outcome<M>): result is AuditReport {
  return 'passed' in result
}

function isDecision<M>(result: Outcome<M>): result is TransitionDecision {
  return 'allowed' in result
}

/**
 * Exit code for a report, decision or approval
 */
export function exitCodeFor<M>(result: Outcome<M>): ExitCode {
  if (isAuditReport(result)) {
    return result.passed ? EXIT_OK : EXIT_DENIED
  }
  if (isDecision(result)) {
    return result.allowed ? EXIT_OK : exitCodeForError(result.reason)
  }
  return result.approved ? EXIT_OK : exitCodeForError(result.reason)
}

export function formatDecision(decision: TransitionDecision): string {
  const head = `${decision.entryId}: ${decision.from} -> ${decision.to}`
  if (!decision.allowed) {
    return `${head} DENIED [${decision.reason.code}] ${decision.reason.message}`
  }
  if (decision.forced) {
    return `${head} ALLOWED (forced over active dependents: ${decision.overriddenDependents.join(', ')})`
  }
  return `${head} ALLOWED`
}

/**
 * JSON for machine consumers. Errors serialize through their toJSON.
 */
export function toJsonOutput(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (item instanceof Error && !isGovernanceError(item)) {
      return { name: item.name, message: item.message }
    }
    return item
  }, 2)
}
