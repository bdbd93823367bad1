import type { RunReport, RunType, StepReportEntry, StepReporter, UpdateStep } from '@upkeep/core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Prints per-step durations when true. */
  readonly verbose: boolean
  /** Disables ANSI colours when false. */
  readonly color?: boolean
}

type ReporterColor = 'red' | 'green' | 'yellow' | 'blue'

/**
 * Compact console reporter with a failure-focused summary.
 */
export class PrettyReporter implements StepReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles run start.
   *
   * @param steps Steps about to run.
   * @param runType Run mode.
   */
  public onRunStart(steps: readonly UpdateStep[], runType: RunType): void {
    const mode = runType === 'dry_run' ? ' (dry run)' : ''
    this.write(`upkeep: updating ${steps.length} steps${mode}\n`, 'blue')
  }

  /**
   * Handles step start.
   *
   * @param step Current step.
   */
  public onStepStart(step: UpdateStep): void {
    process.stdout.write('\n')
    this.write(`${formatSeparator(step.name)}\n`, 'blue')
  }

  /**
   * Handles step completion.
   *
   * @param entry Step report entry.
   */
  public onStepComplete(entry: StepReportEntry): void {
    const duration = this.options.verbose ? ` ${entry.durationMs}ms` : ''
    const { outcome } = entry

    switch (outcome.status) {
      case 'succeeded':
        this.write(`✓ ${entry.name}${duration}\n`, 'green')
        return
      case 'skipped':
        this.write(`ℹ ${entry.name} skipped (${outcome.reason})\n`, 'yellow')
        return
      case 'ignored':
        this.write(`⚠ ${entry.name} ignored (${outcome.error.message})${duration}\n`, 'yellow')
        return
      case 'failed':
        this.write(`✗ ${entry.name} failed (${outcome.error.message})${duration}\n`, 'red')
        return
    }
  }

  /**
   * Handles run completion.
   *
   * @param report Run report.
   */
  public onRunComplete(report: RunReport): void {
    const { summary } = report
    process.stdout.write('\n')
    this.write(`${formatSeparator('Summary')}\n`, 'blue')
    process.stdout.write(
      `Summary: total=${summary.total} succeeded=${summary.succeeded} skipped=${summary.skipped} failed=${summary.failed} ignored=${summary.ignored} duration=${summary.durationMs}ms\n`
    )

    for (const entry of report.entries) {
      if (entry.outcome.status === 'failed') {
        this.write(`  ✗ ${entry.name}: ${entry.outcome.error.message}\n`, 'red')
      }
    }

    if (report.exitCode === 0) {
      this.write('Result: ✅ PASS\n', 'green')
      return
    }

    this.write('Result: FAIL\n', 'red')
  }

  private write(text: string, color: ReporterColor): void {
    process.stdout.write(this.options.color === false ? text : colorize(text, color))
  }
}

/**
 * Formats a section separator line.
 *
 * @param label Section label.
 * @param width Total line width.
 * @returns Separator line without trailing newline.
 */
export const formatSeparator = (label: string, width = 60): string => {
  const prefix = `── ${label} `
  return `${prefix}${'─'.repeat(Math.max(0, width - prefix.length))}`
}

const colorize = (text: string, color: ReporterColor): string => {
  const colors: Record<ReporterColor, string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
