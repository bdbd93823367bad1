import type { ExecutionContext } from './context.js'
import type { RunType } from './executor.js'
import type { StepReporter } from './reporter.js'
import type { StepReportEntry, UpdateStep } from './step.js'

/**
 * Summary counts for one run.
 */
export interface RunSummary {
  /** Total number of executed steps. */
  readonly total: number
  /** Number of succeeded steps. */
  readonly succeeded: number
  /** Number of skipped steps. */
  readonly skipped: number
  /** Number of failed steps. */
  readonly failed: number
  /** Number of steps whose failure was ignored. */
  readonly ignored: number
  /** Total run time in milliseconds. */
  readonly durationMs: number
}

/**
 * Final report of one run.
 */
export interface RunReport {
  /** Entries in the order the steps ran. */
  readonly entries: readonly StepReportEntry[]
  /** Aggregated counts. */
  readonly summary: RunSummary
  /** Process-style exit code: 1 when any step failed. */
  readonly exitCode: 0 | 1
  /** Mode the run used. */
  readonly runType: RunType
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
}

/**
 * Runtime options used by the step runner.
 */
export interface StepRunOptions {
  /** Enabled steps in declared order. */
  readonly steps: readonly UpdateStep[]
  /** Shared execution context. */
  readonly context: ExecutionContext
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly StepReporter[]
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}
