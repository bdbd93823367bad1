/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Environment-based condition for one custom command.
 */
export interface CustomCommandCondition {
  /**
   * Exact environment variable matches required to run the command.
   */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * User-defined shell command run as an update step.
 */
export interface CustomCommandConfig {
  /** Stable step id. */
  readonly id: string
  /** Display name shown in output. */
  readonly name: string
  /** Shell command to execute. */
  readonly command: string
  /** Runs the command when true or omitted. */
  readonly enabled?: boolean
  /** Exit codes reported as ignored instead of failed. */
  readonly acceptedExitCodes?: readonly number[]
  /** Optional execution condition. */
  readonly when?: CustomCommandCondition
}

/**
 * Git behavior for steps that update plugin checkouts.
 */
export interface UpkeepGitConfig {
  /** Maximum number of repositories pulled in parallel. */
  readonly concurrency?: number
}

/**
 * Top-level config model.
 */
export interface UpkeepConfig {
  /** Traces commands instead of running them when true. */
  readonly dryRun?: boolean
  /** Step id allow-list. */
  readonly only?: readonly string[]
  /** Step id deny-list applied after `only`. */
  readonly disable?: readonly string[]
  /** Environment additions for every spawned command. */
  readonly env?: Readonly<Record<string, string>>
  /** Git options. */
  readonly git?: UpkeepGitConfig
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: CliOutputFormat
    /** Prints debug output when true. */
    readonly verbose?: boolean
  }
  /** Custom commands, run after the built-in steps in this order. */
  readonly commands?: readonly CustomCommandConfig[]
}
