import type {
  CommandRequest,
  CommandResult,
  ProcessSpawner,
  RunType,
  SpawnResult,
} from '../contracts/executor.js'
import {
  NonZeroExitError,
  OutputDecodeError,
  ProbeSkippedError,
  SpawnFailureError,
} from '../errors.js'
import type { Logger } from '../logging/logger.js'

/**
 * Runtime options for the command executor.
 */
export interface CommandExecutorOptions {
  /** Run mode shared by every step. */
  readonly runType: RunType
  /** Process creation backend. */
  readonly spawner: ProcessSpawner
  /** Logger used for dry-run traces and command echo. */
  readonly logger: Logger
  /** Base environment for spawned processes; defaults to the process environment. */
  readonly env?: NodeJS.ProcessEnv
}

/**
 * Dual-mode command executor. In dry-run mode commands are traced instead of spawned.
 */
export class CommandExecutor {
  private readonly options: CommandExecutorOptions

  /**
   * Creates a command executor.
   *
   * @param options Runtime options.
   */
  public constructor(options: CommandExecutorOptions) {
    this.options = options
  }

  /** Run mode of this executor. */
  public get runType(): RunType {
    return this.options.runType
  }

  /**
   * Runs a command and checks its exit status.
   *
   * @param request Command to run.
   * @returns Checked result; output is decoded leniently.
   * @throws SpawnFailureError when the program cannot be launched.
   * @throws NonZeroExitError when the exit code is neither zero nor accepted.
   */
  public async status(request: CommandRequest): Promise<CommandResult> {
    if (this.options.runType === 'dry_run') {
      return this.trace(request)
    }

    const spawned = await this.spawn(request)
    return this.check(request, spawned, false)
  }

  /**
   * Runs a command and requires its output to be valid UTF-8.
   *
   * @param request Command to run.
   * @returns Checked result with strictly decoded output.
   * @throws OutputDecodeError when stdout or stderr is not valid UTF-8.
   */
  public async output(request: CommandRequest): Promise<CommandResult> {
    if (this.options.runType === 'dry_run') {
      return this.trace(request)
    }

    const spawned = await this.spawn(request)
    return this.check(request, spawned, true)
  }

  /**
   * Runs a read-only probe and returns its trimmed stdout.
   *
   * Probes are not traced in dry-run mode: they are refused, so a dry run never spawns.
   *
   * @param request Command to run.
   * @returns Trimmed stdout.
   * @throws ProbeSkippedError in dry-run mode.
   */
  public async query(request: CommandRequest): Promise<string> {
    if (this.options.runType === 'dry_run') {
      throw new ProbeSkippedError(formatCommandLine(request))
    }

    const spawned = await this.spawn(request)
    const result = this.check(request, spawned, true)
    return result.stdout.trim()
  }

  private trace(request: CommandRequest): CommandResult {
    this.options.logger.info(`Dry running: ${formatCommandLine(request, true)}`)

    return {
      exitCode: 0,
      accepted: false,
      dryRun: true,
      stdout: '',
      stderr: '',
    }
  }

  private async spawn(request: CommandRequest): Promise<SpawnResult> {
    this.options.logger.debug(`Executing: ${formatCommandLine(request, true)}`)

    return await this.options.spawner({
      program: request.program,
      args: request.args ?? [],
      env: { ...(this.options.env ?? process.env), ...request.env },
      cwd: request.cwd,
    })
  }

  private check(request: CommandRequest, spawned: SpawnResult, strict: boolean): CommandResult {
    const commandLine = formatCommandLine(request)

    if (spawned.error !== undefined && spawned.exitCode === null) {
      throw new SpawnFailureError(commandLine, spawned.error)
    }

    const exitCode = spawned.exitCode
    if (exitCode === null) {
      throw new NonZeroExitError(commandLine, null, spawned.signal)
    }

    const accepted = exitCode !== 0 && (request.acceptedExitCodes ?? []).includes(exitCode)
    if (exitCode !== 0 && !accepted) {
      throw new NonZeroExitError(commandLine, exitCode)
    }

    return {
      exitCode,
      accepted,
      dryRun: false,
      stdout: decode(spawned.stdout, strict, commandLine, 'stdout'),
      stderr: decode(spawned.stderr, strict, commandLine, 'stderr'),
    }
  }
}

/**
 * Creates a command executor.
 *
 * @param options Runtime options.
 * @returns Command executor.
 */
export const createCommandExecutor = (options: CommandExecutorOptions): CommandExecutor => {
  return new CommandExecutor(options)
}

/**
 * Renders a request as a shell-like command line for logs and errors.
 *
 * @param request Command request.
 * @param includeEnv Prefixes environment overrides as `KEY=value` when true.
 * @returns Command line text.
 */
export const formatCommandLine = (request: CommandRequest, includeEnv = false): string => {
  const envPrefix = includeEnv
    ? Object.entries(request.env ?? {}).map(([key, value]) => `${key}=${quoteArgument(value)}`)
    : []
  const parts = [
    ...envPrefix,
    quoteArgument(request.program),
    ...(request.args ?? []).map(quoteArgument),
  ]
  return parts.join(' ')
}

const quoteArgument = (value: string): string => {
  if (value.length > 0 && /^[\w@%+=:,./-]+$/u.test(value)) {
    return value
  }

  return `'${value.replaceAll("'", `'\\''`)}'`
}

const decode = (
  bytes: Uint8Array,
  strict: boolean,
  commandLine: string,
  stream: 'stdout' | 'stderr'
): string => {
  if (!strict) {
    return Buffer.from(bytes).toString('utf8')
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes)
  } catch {
    throw new OutputDecodeError(commandLine, stream)
  }
}
