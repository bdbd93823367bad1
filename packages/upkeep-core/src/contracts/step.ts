import type { ExecutionContext } from './context.js'

/**
 * Terminal status of an update step.
 */
export type StepStatus = 'succeeded' | 'skipped' | 'failed' | 'ignored'

/**
 * Category of an error attached to an outcome.
 */
export type OutcomeErrorKind =
  | 'requirement_missing'
  | 'not_applicable'
  | 'spawn_failure'
  | 'non_zero_exit'
  | 'io_failure'
  | 'ignored'
  | 'unexpected'

/**
 * Serializable description of the error behind a non-success outcome.
 */
export interface OutcomeError {
  /** Error category. */
  readonly kind: OutcomeErrorKind
  /** Human-readable cause. */
  readonly message: string
  /** Exit code for non-zero exits. */
  readonly exitCode?: number
}

/**
 * Classified result of one step.
 */
export type StepOutcome =
  | { readonly status: 'succeeded' }
  | { readonly status: 'skipped'; readonly reason: string }
  | { readonly status: 'ignored'; readonly error: OutcomeError }
  | { readonly status: 'failed'; readonly error: OutcomeError }

/**
 * Value returned by a step body that completed without throwing.
 */
export type StepBodyResult =
  | { readonly kind: 'done' }
  | { readonly kind: 'skipped'; readonly reason: string }
  | { readonly kind: 'ignored'; readonly reason: string }

/**
 * One independently runnable update unit.
 */
export interface UpdateStep {
  /** Stable machine identifier used by config and CLI flags. */
  readonly id: string
  /** Human readable label used for the section separator and the report. */
  readonly name: string
  /** Exit codes that classify the step as ignored instead of failed. */
  readonly acceptedExitCodes?: readonly number[]

  /**
   * Runs the step body.
   *
   * Missing requirements may either be returned as a skip or thrown as
   * `RequirementMissingError`; both classify as skipped.
   *
   * @param context Shared execution context.
   * @returns Body result.
   */
  run(context: ExecutionContext): Promise<StepBodyResult>
}

/**
 * Report entry for one step.
 */
export interface StepReportEntry {
  /** Step identifier copied from the step definition. */
  readonly id: string
  /** Step display name copied from the step definition. */
  readonly name: string
  /** Classified outcome. */
  readonly outcome: StepOutcome
  /** Step start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Step finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total step duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Body result for a step that did its work.
 *
 * @returns Body result.
 */
export const done = (): StepBodyResult => ({ kind: 'done' })

/**
 * Body result for a step that does not apply to this machine.
 *
 * @param reason Why the step was skipped.
 * @returns Body result.
 */
export const skip = (reason: string): StepBodyResult => ({ kind: 'skipped', reason })

/**
 * Body result for a step whose failure should not affect the exit code.
 *
 * @param reason What went wrong.
 * @returns Body result.
 */
export const ignore = (reason: string): StepBodyResult => ({ kind: 'ignored', reason })
