import { availableParallelism } from 'node:os'

import type { GitClient } from '../contracts/context.js'
import type { OutcomeError } from '../contracts/step.js'
import { MultiPullError, describeCause } from '../errors.js'
import type { CommandExecutor } from '../execution/commandExecutor.js'
import type { Logger } from '../logging/logger.js'
import type { RequirementResolver } from '../requirements/requirementResolver.js'
import { toOutcomeError } from '../runner/classifyOutcome.js'
import { mapWithConcurrency } from './pool.js'
import type { RepositorySet } from './repositorySet.js'

/**
 * Result status for one repository of a multi-pull.
 */
export type RepositoryStatus = 'updated' | 'up_to_date' | 'dry_run' | 'failed'

/**
 * Outcome of updating one repository.
 */
export interface RepositoryOutcome {
  /** Canonical repository path. */
  readonly path: string
  /** Final status. */
  readonly status: RepositoryStatus
  /** Failure cause for failed repositories. */
  readonly error?: OutcomeError
}

/**
 * Aggregate result of one multi-pull.
 */
export interface MultiPullResult {
  /** Outcomes sorted by path. */
  readonly outcomes: readonly RepositoryOutcome[]
  /** Number of repositories whose HEAD moved. */
  readonly updated: number
  /** Number of repositories already up to date, or traced in a dry run. */
  readonly upToDate: number
  /** Number of repositories that failed. */
  readonly failed: number
}

/**
 * Options for one multi-pull.
 */
export interface MultiPullOptions {
  /** Maximum number of repositories pulled in parallel. */
  readonly concurrency?: number
}

/**
 * Options for the git client.
 */
export interface GitClientOptions {
  /** Executor used for every git invocation. */
  readonly executor: CommandExecutor
  /** Resolver used to locate git. */
  readonly requirements: RequirementResolver
  /** Logger for progress and changelogs. */
  readonly logger: Logger
  /** Default pull concurrency. */
  readonly concurrency?: number
}

/**
 * Default number of repositories pulled in parallel.
 *
 * @returns Worker count.
 */
export const defaultPullConcurrency = (): number => {
  return Math.min(availableParallelism(), 8)
}

/**
 * Git client backed by the git command line.
 */
export class Git implements GitClient {
  private readonly options: GitClientOptions

  /**
   * Creates a git client.
   *
   * @param options Client options.
   */
  public constructor(options: GitClientOptions) {
    this.options = options
  }

  /**
   * Pulls every repository of a set with fast-forward-only updates.
   *
   * An empty set returns immediately without looking up git.
   *
   * @param repositories Repositories to update.
   * @param options Pull options.
   * @returns Aggregate result.
   * @throws RequirementMissingError when git is not installed and the set is not empty.
   */
  public async multiPull(
    repositories: RepositorySet,
    options: MultiPullOptions = {}
  ): Promise<MultiPullResult> {
    if (repositories.isEmpty()) {
      return summarizePulls([])
    }

    const git = await this.options.requirements.require('git')
    const concurrency =
      options.concurrency ?? this.options.concurrency ?? defaultPullConcurrency()

    const outcomes = await mapWithConcurrency(repositories.entries(), concurrency, (entry) =>
      this.pullRepository(git, entry.path)
    )

    return summarizePulls(outcomes)
  }

  private async pullRepository(git: string, path: string): Promise<RepositoryOutcome> {
    const { executor, logger } = this.options
    const pull = { program: git, args: ['-C', path, 'pull', '--ff-only'] }

    try {
      if (executor.runType === 'dry_run') {
        await executor.status(pull)
        return { path, status: 'dry_run' }
      }

      const before = await this.headRevision(git, path)
      await executor.status(pull)
      const after = await this.headRevision(git, path)

      if (before === after) {
        logger.debug(`${path}: up to date`)
        return { path, status: 'up_to_date' }
      }

      const changes = await executor.query({
        program: git,
        args: [
          '-C',
          path,
          '--no-pager',
          'log',
          '--no-decorate',
          '--oneline',
          `${before}..${after}`,
        ],
      })
      logger.info(`Changed ${path}:`)
      for (const line of changes.split('\n').filter((line) => line.length > 0)) {
        logger.info(`    ${line}`)
      }

      return { path, status: 'updated' }
    } catch (error: unknown) {
      logger.error(`Failed to pull ${path}: ${describeCause(error)}`)
      return { path, status: 'failed', error: toOutcomeError(error) }
    }
  }

  private async headRevision(git: string, path: string): Promise<string> {
    return await this.options.executor.query({
      program: git,
      args: ['-C', path, 'rev-parse', 'HEAD'],
    })
  }
}

/**
 * Creates a git client.
 *
 * @param options Client options.
 * @returns Git client.
 */
export const createGitClient = (options: GitClientOptions): Git => {
  return new Git(options)
}

/**
 * Throws when any repository of a multi-pull failed.
 *
 * @param result Multi-pull result.
 * @throws MultiPullError listing the failed repositories.
 */
export const assertMultiPullSucceeded = (result: MultiPullResult): void => {
  const failedPaths = result.outcomes
    .filter((outcome) => outcome.status === 'failed')
    .map((outcome) => outcome.path)

  if (failedPaths.length > 0) {
    throw new MultiPullError(failedPaths)
  }
}

const summarizePulls = (outcomes: readonly RepositoryOutcome[]): MultiPullResult => {
  const sorted = [...outcomes].sort((left, right) => left.path.localeCompare(right.path))

  return {
    outcomes: sorted,
    updated: sorted.filter((outcome) => outcome.status === 'updated').length,
    upToDate: sorted.filter(
      (outcome) => outcome.status === 'up_to_date' || outcome.status === 'dry_run'
    ).length,
    failed: sorted.filter((outcome) => outcome.status === 'failed').length,
  }
}
