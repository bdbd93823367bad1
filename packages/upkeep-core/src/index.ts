export type {
  BaseDirectories,
  ExecutionContext,
  GitClient,
  PrivilegeEscalation,
} from './contracts/context.js'
export type {
  CommandRequest,
  CommandResult,
  ProcessSpawner,
  RunType,
  SpawnRequest,
  SpawnResult,
} from './contracts/executor.js'
export type { StepReporter } from './contracts/reporter.js'
export type { RunReport, RunSummary, StepRunOptions } from './contracts/run.js'
export type {
  OutcomeError,
  OutcomeErrorKind,
  StepBodyResult,
  StepOutcome,
  StepReportEntry,
  StepStatus,
  UpdateStep,
} from './contracts/step.js'
export { done, ignore, skip } from './contracts/step.js'

export {
  DiscoveryError,
  ExecutionContextError,
  IoFailureError,
  MultiPullError,
  NonZeroExitError,
  OutputDecodeError,
  ProbeSkippedError,
  RequirementMissingError,
  SpawnFailureError,
  StepNotApplicableError,
  UpkeepError,
  describeCause,
  type UpkeepErrorKind,
} from './errors.js'

export type { ExecutionContextOptions } from './context/executionContext.js'
export { createExecutionContext } from './context/executionContext.js'
export type { ResolvePathInput } from './context/resolvePath.js'
export { resolvePath } from './context/resolvePath.js'

export type { CommandExecutorOptions } from './execution/commandExecutor.js'
export {
  CommandExecutor,
  createCommandExecutor,
  formatCommandLine,
} from './execution/commandExecutor.js'
export { createNodeProcessSpawner } from './execution/nodeProcessSpawner.js'

export type {
  GitClientOptions,
  MultiPullOptions,
  MultiPullResult,
  RepositoryOutcome,
  RepositoryStatus,
} from './git/gitClient.js'
export {
  Git,
  assertMultiPullSucceeded,
  createGitClient,
  defaultPullConcurrency,
} from './git/gitClient.js'
export { mapWithConcurrency } from './git/pool.js'
export type { DiscoverRepositoriesOptions, RepositoryEntry } from './git/repositorySet.js'
export {
  DEFAULT_DISCOVERY_DEPTH,
  RepositorySet,
  discoverRepositories,
} from './git/repositorySet.js'

export type { ConsoleLoggerOptions, LogStream, Logger } from './logging/logger.js'
export { createConsoleLogger, createSilentLogger } from './logging/logger.js'

export type { RequirementLookup, RequirementResolverOptions } from './requirements/requirementResolver.js'
export {
  RequirementResolver,
  createRequirementResolver,
} from './requirements/requirementResolver.js'

export { formatRunReportAsJson } from './reporters/jsonFormatter.js'
export { classifyBodyResult, classifyStepError, toOutcomeError } from './runner/classifyOutcome.js'
export { StepRunner, buildSummary, createStepRunner } from './runner/stepRunner.js'
