import type { CommandExecutor } from '../execution/commandExecutor.js'
import type { MultiPullOptions, MultiPullResult } from '../git/gitClient.js'
import type { RepositorySet } from '../git/repositorySet.js'
import type { Logger } from '../logging/logger.js'
import type { RequirementResolver } from '../requirements/requirementResolver.js'
import type { RunType } from './executor.js'

/**
 * Base directory locations resolved once by the driver.
 */
export interface BaseDirectories {
  /** User home directory. */
  readonly home: string
  /** User configuration directory. */
  readonly config: string
  /** User data directory. */
  readonly data: string
  /** User cache directory. */
  readonly cache: string
}

/**
 * Git collaborator used by steps that manage plugin directories.
 */
export interface GitClient {
  /**
   * Updates every repository of a set, continuing past individual failures.
   *
   * @param repositories Repositories to update.
   * @param options Pull options.
   * @returns Per-repository outcomes.
   */
  multiPull(repositories: RepositorySet, options?: MultiPullOptions): Promise<MultiPullResult>
}

/**
 * Privilege-escalation collaborator.
 */
export interface PrivilegeEscalation {
  /** Absolute path of `sudo`, `doas` or similar, or null when none is installed. */
  readonly program: string | null

  /**
   * Prefixes a command with the escalation program.
   *
   * @param program Program to run elevated.
   * @param args Program arguments.
   * @returns Program and arguments to run instead.
   * @throws RequirementMissingError when no escalation program is installed.
   */
  wrap(program: string, args: readonly string[]): { program: string; args: readonly string[] }
}

/**
 * Read-only configuration bundle shared by every step of one run.
 */
export interface ExecutionContext {
  /** Dry-run or execute mode. */
  readonly runType: RunType
  /** Memoized program lookup. */
  readonly requirements: RequirementResolver
  /** Dual-mode command executor. */
  readonly executor: CommandExecutor
  /** Base directories. */
  readonly baseDirs: BaseDirectories
  /** Git collaborator. */
  readonly git: GitClient
  /** Privilege-escalation collaborator. */
  readonly sudo: PrivilegeEscalation
  /** Environment snapshot taken when the context was created. */
  readonly env: Readonly<Record<string, string | undefined>>
  /** Shared logger. */
  readonly logger: Logger
}
