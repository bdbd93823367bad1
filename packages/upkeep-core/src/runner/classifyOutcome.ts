import type { OutcomeError, StepBodyResult, StepOutcome, UpdateStep } from '../contracts/step.js'
import { NonZeroExitError, UpkeepError } from '../errors.js'

/**
 * Maps a completed step body to its outcome.
 *
 * @param result Value returned by the step body.
 * @returns Step outcome.
 */
export const classifyBodyResult = (result: StepBodyResult): StepOutcome => {
  switch (result.kind) {
    case 'done':
      return { status: 'succeeded' }
    case 'skipped':
      return { status: 'skipped', reason: result.reason }
    case 'ignored':
      return { status: 'ignored', error: { kind: 'ignored', message: result.reason } }
  }
}

/**
 * Maps an error thrown by a step body to its outcome.
 *
 * @param step Step that threw.
 * @param error Thrown value.
 * @returns Step outcome.
 */
export const classifyStepError = (
  step: Pick<UpdateStep, 'acceptedExitCodes'>,
  error: unknown
): StepOutcome => {
  const outcomeError = toOutcomeError(error)

  switch (outcomeError.kind) {
    case 'requirement_missing':
    case 'not_applicable':
      return { status: 'skipped', reason: outcomeError.message }
    case 'non_zero_exit':
      if (
        outcomeError.exitCode !== undefined &&
        (step.acceptedExitCodes ?? []).includes(outcomeError.exitCode)
      ) {
        return { status: 'ignored', error: outcomeError }
      }
      return { status: 'failed', error: outcomeError }
    case 'ignored':
      return { status: 'ignored', error: outcomeError }
    case 'spawn_failure':
    case 'io_failure':
    case 'unexpected':
      return { status: 'failed', error: outcomeError }
  }
}

/**
 * Converts any thrown value into a serializable outcome error.
 *
 * @param error Thrown value.
 * @returns Outcome error.
 */
export const toOutcomeError = (error: unknown): OutcomeError => {
  if (error instanceof NonZeroExitError) {
    return error.exitCode === null
      ? { kind: 'non_zero_exit', message: error.message }
      : { kind: 'non_zero_exit', message: error.message, exitCode: error.exitCode }
  }

  if (error instanceof UpkeepError) {
    return {
      kind: error.kind === 'context' ? 'unexpected' : error.kind,
      message: error.message,
    }
  }

  if (error instanceof Error) {
    return { kind: 'unexpected', message: `${error.name}: ${error.message}` }
  }

  return { kind: 'unexpected', message: String(error) }
}
