import { resolve } from 'node:path'

import type { CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for config lookup. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Traces commands instead of running them when true. */
  readonly dryRun: boolean
  /** Step ids to run; empty means all. */
  readonly only: readonly string[]
  /** Step ids to leave out. */
  readonly disable: readonly string[]
  /** Prints the selected steps and exits when true. */
  readonly listSteps: boolean
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Prints debug output when true. */
  readonly verbose: boolean
  /** Repositories pulled in parallel, when set. */
  readonly jobs?: number
  /** Prints usage and exits when true. */
  readonly help: boolean
}

type ValueFlag = '--config' | '--only' | '--disable' | '--format' | '--jobs' | '--cwd'

const VALUE_FLAGS: readonly ValueFlag[] = [
  '--config',
  '--only',
  '--disable',
  '--format',
  '--jobs',
  '--cwd',
]

/**
 * Parses process arguments for the upkeep CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let dryRun = false
  const only: string[] = []
  const disable: string[] = []
  let listSteps = false
  let format: CliOutputFormat = 'pretty'
  let formatProvided = false
  let verbose = false
  let jobs: number | undefined
  let help = false
  let cwd = baseCwd

  const applyValue = (flag: ValueFlag, value: string): void => {
    switch (flag) {
      case '--config':
        configPath = value
        return
      case '--only':
        only.push(...splitIds(value))
        return
      case '--disable':
        disable.push(...splitIds(value))
        return
      case '--format':
        if (value !== 'pretty' && value !== 'json') {
          throw new Error('--format must be "pretty" or "json"')
        }
        format = value
        formatProvided = true
        return
      case '--jobs':
        jobs = parseJobs(value)
        return
      case '--cwd':
        cwd = resolve(baseCwd, value)
        return
    }
  }

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--dry-run' || argument === '-n') {
      dryRun = true
      continue
    }

    if (argument === '--verbose' || argument === '-v') {
      verbose = true
      continue
    }

    if (argument === '--list-steps') {
      listSteps = true
      continue
    }

    const flag = VALUE_FLAGS.find((candidate) => candidate === argument)
    if (flag) {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new Error(`${flag} requires a value`)
      }
      applyValue(flag, nextValue)
      index += 1
      continue
    }

    const equalsFlag = VALUE_FLAGS.find((candidate) => argument.startsWith(`${candidate}=`))
    if (equalsFlag) {
      applyValue(equalsFlag, argument.slice(equalsFlag.length + 1))
      continue
    }

    throw new Error(`Unknown argument: ${argument}`)
  }

  return {
    cwd,
    configPath,
    dryRun,
    only,
    disable,
    listSteps,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    jobs,
    help,
  }
}

const splitIds = (value: string): string[] => {
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
}

const parseJobs = (value: string): number => {
  const jobs = Number(value)
  if (!/^\d+$/u.test(value) || jobs < 1) {
    throw new Error('--jobs must be a positive integer')
  }

  return jobs
}

/**
 * Returns help text for the upkeep CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: upkeep [options]',
    '',
    'Options:',
    '  -n, --dry-run       Print the commands that would run without running them',
    '  --config <path>     Config file path (default: upkeep.config.ts or upkeep.config.json)',
    '  --only <id>         Run only the given steps (repeatable, comma separated)',
    '  --disable <id>      Skip the given steps (repeatable, comma separated)',
    '  --list-steps        Print the selected steps and exit',
    '  --format <type>     Output format: pretty | json (default: pretty)',
    '  -v, --verbose       Show debug output',
    '  --jobs <n>          Repositories pulled in parallel',
    '  --cwd <path>        Base working directory',
    '  -h, --help          Show this help',
  ].join('\n')
}
