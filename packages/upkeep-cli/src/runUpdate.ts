import {
  createConsoleLogger,
  createExecutionContext,
  createRequirementResolver,
  createStepRunner,
  formatRunReportAsJson,
  type BaseDirectories,
  type ProcessSpawner,
  type RunType,
  type UpdateStep,
} from '@upkeep/core'

import { loadUpkeepConfig } from './config/loadConfig.js'
import { mapConfigToRun, type ExcludedUpdateStep } from './config/mapConfigToRun.js'
import type { CliOutputFormat } from './config/types.js'
import { resolveBaseDirectories } from './platform/baseDirs.js'
import { detectPrivilegeEscalation } from './platform/sudo.js'
import { PrettyReporter } from './reporters/prettyReporter.js'
import { createBuiltInSteps } from './steps/registry.js'

/**
 * Runtime options for a CLI execution.
 */
export interface RunUpdateOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit config path. */
  readonly configPath?: string
  /** Traces commands instead of running them when true. */
  readonly dryRun: boolean
  /** Step allow-list from the command line. */
  readonly only: readonly string[]
  /** Step deny-list from the command line. */
  readonly disable: readonly string[]
  /** Prints the selected steps and exits when true. */
  readonly listSteps: boolean
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Set when the format came from a CLI flag and overrides the config. */
  readonly formatProvided?: true
  /** Verbose output mode. */
  readonly verbose: boolean
  /** Multi-pull concurrency override. */
  readonly jobs?: number
  /** Environment; defaults to the process environment. */
  readonly env?: NodeJS.ProcessEnv
  /** Platform; defaults to the current one. */
  readonly platform?: NodeJS.Platform
  /** Base directories; resolved from `env` when omitted. */
  readonly baseDirs?: BaseDirectories
  /** Process spawner; defaults to the Node.js spawner. */
  readonly spawner?: ProcessSpawner
  /** Built-in steps; defaults to the registry. */
  readonly builtInSteps?: readonly UpdateStep[]
}

/**
 * Runs the selected update steps according to CLI options.
 *
 * @param options CLI runtime options.
 * @returns Final exit code.
 */
export const runUpdate = async (options: RunUpdateOptions): Promise<number> => {
  const env = options.env ?? process.env
  const platform = options.platform ?? process.platform
  const baseDirs = options.baseDirs ?? resolveBaseDirectories(env, platform)

  const { config } = await loadUpkeepConfig(options.cwd, baseDirs.config, options.configPath)
  const effectiveFormat = options.formatProvided
    ? options.format
    : (config.output?.format ?? options.format)
  const effectiveVerbose = options.verbose || config.output?.verbose === true
  const runEnv: NodeJS.ProcessEnv = { ...env, ...config.env }

  const mappedRun = mapConfigToRun(
    config,
    options.builtInSteps ?? createBuiltInSteps(),
    { only: options.only, disable: options.disable },
    runEnv,
    platform
  )

  if (options.listSteps) {
    printSelectedSteps(mappedRun.steps, effectiveFormat)
    return 0
  }

  printExcludedStepHints(mappedRun.excludedSteps, effectiveFormat)

  const runType: RunType = options.dryRun || config.dryRun === true ? 'dry_run' : 'execute'
  const logger = createConsoleLogger({
    verbose: effectiveVerbose,
    stdout: effectiveFormat === 'json' ? process.stderr : process.stdout,
  })
  const requirements = createRequirementResolver({ searchPath: runEnv.PATH ?? '', platform })
  const context = createExecutionContext({
    runType,
    baseDirs,
    sudo: await detectPrivilegeEscalation(requirements),
    env: runEnv,
    logger,
    spawner: options.spawner,
    requirements,
    gitConcurrency: options.jobs ?? config.git?.concurrency,
  })

  const runner = createStepRunner({
    steps: mappedRun.steps,
    context,
    reporters:
      effectiveFormat === 'pretty' ? [new PrettyReporter({ verbose: effectiveVerbose })] : [],
  })
  const report = await runner.run()

  if (effectiveFormat === 'json') {
    process.stdout.write(`${formatRunReportAsJson(report)}\n`)
  }

  return report.exitCode
}

const printSelectedSteps = (steps: readonly UpdateStep[], format: CliOutputFormat): void => {
  if (format === 'json') {
    const payload = {
      steps: steps.map((step) => ({ id: step.id, name: step.name })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  if (steps.length === 0) {
    process.stdout.write('No steps selected.\n')
    return
  }

  process.stdout.write('Selected steps:\n')
  for (const step of steps) {
    process.stdout.write(`- ${step.id}: ${step.name}\n`)
  }
}

const printExcludedStepHints = (
  excludedSteps: readonly ExcludedUpdateStep[],
  format: CliOutputFormat
): void => {
  if (format !== 'pretty') {
    return
  }

  for (const step of excludedSteps) {
    if (step.reason === 'disabled') {
      process.stdout.write(`ℹ️  Skipping ${step.name} (disabled)\n`)
      continue
    }

    if (step.reason === 'env_mismatch' && step.requiredEnv) {
      process.stdout.write(
        `ℹ️  Skipping ${step.name} (set ${formatRequiredEnv(step.requiredEnv)} to enable)\n`
      )
    }
  }
}

const formatRequiredEnv = (requiredEnv: Readonly<Record<string, string>>): string => {
  return Object.entries(requiredEnv)
    .sort(([leftKey], [rightKey]) => leftKey.localeCompare(rightKey))
    .map(([key, value]) => `${key}=${value}`)
    .join(' ')
}
