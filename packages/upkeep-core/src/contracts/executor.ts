/**
 * Execution mode of a run. A dry run never spawns a process.
 */
export type RunType = 'dry_run' | 'execute'

/**
 * Input contract for one external program invocation.
 */
export interface CommandRequest {
  /** Program name or absolute path. */
  readonly program: string
  /** Arguments passed without shell interpretation. */
  readonly args?: readonly string[]
  /** Environment overrides merged over the process environment. */
  readonly env?: Readonly<Record<string, string>>
  /** Working directory for the process. */
  readonly cwd?: string
  /** Non-zero exit codes treated as success. */
  readonly acceptedExitCodes?: readonly number[]
}

/**
 * Raw request handed to a process spawner.
 */
export interface SpawnRequest {
  /** Program name or absolute path. */
  readonly program: string
  /** Argument list. */
  readonly args: readonly string[]
  /** Complete environment for the child process. */
  readonly env: NodeJS.ProcessEnv
  /** Working directory for the process. */
  readonly cwd?: string
}

/**
 * Raw outcome of one spawned process.
 */
export interface SpawnResult {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout bytes. */
  readonly stdout: Uint8Array
  /** Captured stderr bytes. */
  readonly stderr: Uint8Array
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Asynchronous abstraction over process creation.
 *
 * @param request Spawn input data.
 * @returns Spawn result; spawn-level failures are reported through `error`.
 */
export type ProcessSpawner = (request: SpawnRequest) => Promise<SpawnResult>

/**
 * Checked result of one command.
 */
export interface CommandResult {
  /** Exit code, `0` for dry runs. */
  readonly exitCode: number
  /** True when the exit code was non-zero but listed as accepted. */
  readonly accepted: boolean
  /** True when the command was only traced. */
  readonly dryRun: boolean
  /** Captured stdout decoded as UTF-8. */
  readonly stdout: string
  /** Captured stderr decoded as UTF-8. */
  readonly stderr: string
}
