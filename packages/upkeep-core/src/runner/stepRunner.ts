import type { StepReporter } from '../contracts/reporter.js'
import type { RunReport, RunSummary, StepRunOptions } from '../contracts/run.js'
import type { StepOutcome, StepReportEntry, StepStatus, UpdateStep } from '../contracts/step.js'
import { describeCause } from '../errors.js'
import { classifyBodyResult, classifyStepError } from './classifyOutcome.js'

/**
 * Sequential step runner with per-step failure isolation.
 */
export class StepRunner {
  private readonly options: Required<Pick<StepRunOptions, 'now' | 'reporters'>> &
    Omit<StepRunOptions, 'now' | 'reporters'>

  /**
   * Creates a step runner.
   *
   * @param options Runtime options.
   */
  public constructor(options: StepRunOptions) {
    this.options = {
      ...options,
      reporters: options.reporters ?? [],
      now: options.now ?? Date.now,
    }
  }

  /**
   * Runs every step in declared order. A failing step never stops the run.
   *
   * @returns Final report.
   */
  public async run(): Promise<RunReport> {
    const { context, steps } = this.options
    const runStartedAt = this.options.now()
    const entries: StepReportEntry[] = []

    await this.notify('onRunStart', (reporter) => reporter.onRunStart?.(steps, context.runType))

    for (const [index, step] of steps.entries()) {
      await this.notify('onStepStart', (reporter) => reporter.onStepStart?.(step, index))

      const entry = await this.runStep(step)
      entries.push(entry)

      await this.notify('onStepComplete', (reporter) => reporter.onStepComplete?.(entry, index))
    }

    const runFinishedAt = this.options.now()
    const summary = buildSummary(entries, runFinishedAt - runStartedAt)

    const report: RunReport = {
      entries,
      summary,
      exitCode: summary.failed > 0 ? 1 : 0,
      runType: context.runType,
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
    }

    await this.notify('onRunComplete', (reporter) => reporter.onRunComplete?.(report))

    return report
  }

  // A throwing reporter is logged and never ends the run.
  private async notify(
    hook: keyof StepReporter,
    call: (reporter: StepReporter) => Promise<void> | void
  ): Promise<void> {
    for (const reporter of this.options.reporters) {
      try {
        await call(reporter)
      } catch (error: unknown) {
        this.options.context.logger.warn(`Reporter ${hook} failed: ${describeCause(error)}`)
      }
    }
  }

  private async runStep(step: UpdateStep): Promise<StepReportEntry> {
    const startedAt = this.options.now()

    let outcome: StepOutcome
    try {
      outcome = classifyBodyResult(await step.run(this.options.context))
    } catch (error: unknown) {
      outcome = classifyStepError(step, error)
    }

    const finishedAt = this.options.now()

    return {
      id: step.id,
      name: step.name,
      outcome,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
    }
  }
}

/**
 * Creates a step runner instance.
 *
 * @param options Runtime options.
 * @returns Step runner.
 */
export const createStepRunner = (options: StepRunOptions): StepRunner => {
  return new StepRunner(options)
}

/**
 * Counts entries per status.
 *
 * @param entries Report entries.
 * @param durationMs Total run time.
 * @returns Summary.
 */
export const buildSummary = (
  entries: readonly StepReportEntry[],
  durationMs: number
): RunSummary => {
  const count = (status: StepStatus): number =>
    entries.filter((entry) => entry.outcome.status === status).length

  return {
    total: entries.length,
    succeeded: count('succeeded'),
    skipped: count('skipped'),
    failed: count('failed'),
    ignored: count('ignored'),
    durationMs,
  }
}
