import type { RunType } from './executor.js'
import type { RunReport } from './run.js'
import type { StepReportEntry, UpdateStep } from './step.js'

/**
 * Event hooks for run reporting.
 */
export interface StepReporter {
  /**
   * Called once before any step starts.
   *
   * @param steps Steps scheduled for execution.
   * @param runType Mode of the run.
   */
  onRunStart?(steps: readonly UpdateStep[], runType: RunType): Promise<void> | void

  /**
   * Called before a single step starts. Terminal reporters print the section separator here.
   *
   * @param step Step definition.
   * @param index Zero-based step index.
   */
  onStepStart?(step: UpdateStep, index: number): Promise<void> | void

  /**
   * Called after a step has been classified.
   *
   * @param entry Report entry.
   * @param index Zero-based step index.
   */
  onStepComplete?(entry: StepReportEntry, index: number): Promise<void> | void

  /**
   * Called once after every step ran.
   *
   * @param report Final report.
   */
  onRunComplete?(report: RunReport): Promise<void> | void
}
