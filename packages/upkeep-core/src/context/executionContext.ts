import { isAbsolute } from 'node:path'

import type {
  BaseDirectories,
  ExecutionContext,
  GitClient,
  PrivilegeEscalation,
} from '../contracts/context.js'
import type { ProcessSpawner, RunType } from '../contracts/executor.js'
import { ExecutionContextError } from '../errors.js'
import { createCommandExecutor } from '../execution/commandExecutor.js'
import { createNodeProcessSpawner } from '../execution/nodeProcessSpawner.js'
import { createGitClient } from '../git/gitClient.js'
import { createSilentLogger, type Logger } from '../logging/logger.js'
import {
  createRequirementResolver,
  type RequirementResolver,
} from '../requirements/requirementResolver.js'

/**
 * Inputs for building the execution context of one run.
 */
export interface ExecutionContextOptions {
  /** Dry-run or execute mode. */
  readonly runType: RunType
  /** Resolved base directories. */
  readonly baseDirs: BaseDirectories
  /** Privilege-escalation collaborator. */
  readonly sudo: PrivilegeEscalation
  /** Environment snapshot; defaults to the process environment. */
  readonly env?: NodeJS.ProcessEnv
  /** Extra environment passed to every spawned command. */
  readonly commandEnv?: Readonly<Record<string, string>>
  /** Logger; defaults to a silent logger. */
  readonly logger?: Logger
  /** Process spawner; defaults to the Node.js spawner. */
  readonly spawner?: ProcessSpawner
  /** Requirement resolver; defaults to one reading `PATH` from `env`. */
  readonly requirements?: RequirementResolver
  /** Git collaborator; defaults to the git command line client. */
  readonly git?: GitClient
  /** Default multi-pull concurrency for the default git client. */
  readonly gitConcurrency?: number
}

/**
 * Builds the immutable execution context shared by all steps of one run.
 *
 * @param options Context inputs.
 * @returns Frozen execution context.
 * @throws ExecutionContextError when the home directory is unusable.
 */
export const createExecutionContext = (options: ExecutionContextOptions): ExecutionContext => {
  const { baseDirs } = options
  if (baseDirs.home.length === 0 || !isAbsolute(baseDirs.home)) {
    throw new ExecutionContextError(
      `Cannot determine home directory (got ${JSON.stringify(baseDirs.home)})`
    )
  }

  const env = Object.freeze({ ...(options.env ?? process.env) })
  const logger = options.logger ?? createSilentLogger()
  const requirements =
    options.requirements ?? createRequirementResolver({ searchPath: env.PATH ?? '' })
  const executor = createCommandExecutor({
    runType: options.runType,
    spawner: options.spawner ?? createNodeProcessSpawner(),
    logger,
    env: { ...env, ...options.commandEnv },
  })
  const git =
    options.git ??
    createGitClient({ executor, requirements, logger, concurrency: options.gitConcurrency })

  return Object.freeze({
    runType: options.runType,
    requirements,
    executor,
    baseDirs: Object.freeze({ ...baseDirs }),
    git,
    sudo: options.sudo,
    env,
    logger,
  })
}
