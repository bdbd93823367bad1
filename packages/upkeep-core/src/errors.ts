/**
 * Machine-readable error category used by outcome classification.
 */
export type UpkeepErrorKind =
  | 'requirement_missing'
  | 'not_applicable'
  | 'spawn_failure'
  | 'non_zero_exit'
  | 'io_failure'
  | 'context'

/**
 * Base class for all errors raised by the execution engine.
 */
export abstract class UpkeepError extends Error {
  /** Error category. */
  public abstract readonly kind: UpkeepErrorKind

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A program or path a step depends on is not present.
 */
export class RequirementMissingError extends UpkeepError {
  public readonly kind = 'requirement_missing'

  /**
   * @param requirement Program name or filesystem path that was not found.
   * @param requirementType Whether a program on the search path or a plain path was expected.
   */
  public constructor(
    public readonly requirement: string,
    public readonly requirementType: 'program' | 'path' = 'program'
  ) {
    super(
      requirementType === 'program'
        ? `Cannot find ${requirement} in PATH`
        : `Path ${requirement} does not exist`
    )
  }
}

/**
 * A step decided it has nothing to do on this machine.
 */
export class StepNotApplicableError extends UpkeepError {
  public readonly kind = 'not_applicable'
}

/**
 * A program could not be launched.
 */
export class SpawnFailureError extends UpkeepError {
  public readonly kind = 'spawn_failure'

  public constructor(
    public readonly commandLine: string,
    cause: unknown
  ) {
    super(`Failed to run ${commandLine}: ${describeCause(cause)}`, { cause })
  }
}

/**
 * A program ran but ended with a status that was not accepted.
 */
export class NonZeroExitError extends UpkeepError {
  public readonly kind = 'non_zero_exit'

  public constructor(
    public readonly commandLine: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null = null
  ) {
    super(
      exitCode === null
        ? `${commandLine} was terminated by signal ${signal ?? 'unknown'}`
        : `${commandLine} failed with exit code ${exitCode}`
    )
  }
}

/**
 * Filesystem or output-capture failure.
 */
export class IoFailureError extends UpkeepError {
  public readonly kind = 'io_failure'
}

/**
 * Output was required as text but was not valid UTF-8.
 */
export class OutputDecodeError extends IoFailureError {
  public constructor(
    public readonly commandLine: string,
    stream: 'stdout' | 'stderr'
  ) {
    super(`${commandLine} produced ${stream} that is not valid UTF-8`)
  }
}

/**
 * Repository discovery could not read a directory.
 */
export class DiscoveryError extends IoFailureError {
  public constructor(
    public readonly directory: string,
    cause: unknown
  ) {
    super(`Cannot read ${directory}: ${describeCause(cause)}`, { cause })
  }
}

/**
 * One or more repositories of a multi-pull failed to update.
 */
export class MultiPullError extends IoFailureError {
  public constructor(public readonly failedPaths: readonly string[]) {
    super(`Failed to pull ${failedPaths.length} repositories: ${failedPaths.join(', ')}`)
  }
}

/**
 * The execution context could not be built; fatal for the whole run.
 */
export class ExecutionContextError extends UpkeepError {
  public readonly kind = 'context'
}

/**
 * A read-only probe was requested during a dry run and was not spawned.
 */
export class ProbeSkippedError extends UpkeepError {
  public readonly kind = 'not_applicable'

  public constructor(commandLine: string) {
    super(`Skipped probe ${commandLine} in dry run`)
  }
}

/**
 * Renders an unknown thrown value as a one-line message.
 *
 * @param cause Thrown value.
 * @returns Human-readable message.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return 'code' in cause && typeof cause.code === 'string'
      ? `${cause.code}: ${cause.message}`
      : cause.message
  }

  return String(cause)
}
