export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliOutputFormat,
  CustomCommandCondition,
  CustomCommandConfig,
  UpkeepConfig,
  UpkeepGitConfig,
} from './config/types.js'
export type { LoadedUpkeepConfig } from './config/loadConfig.js'
export { loadUpkeepConfig } from './config/loadConfig.js'
export type {
  ExcludedUpdateStep,
  MappedUpdateRun,
  StepSelection,
} from './config/mapConfigToRun.js'
export { mapConfigToRun } from './config/mapConfigToRun.js'

export { resolveBaseDirectories } from './platform/baseDirs.js'
export {
  PRIVILEGE_ESCALATION_PROGRAMS,
  createPrivilegeEscalation,
  detectPrivilegeEscalation,
} from './platform/sudo.js'

export type { PrettyReporterOptions } from './reporters/prettyReporter.js'
export { PrettyReporter, formatSeparator } from './reporters/prettyReporter.js'

export { createCustomCommandStep } from './steps/customCommand.js'
export { createBuiltInSteps } from './steps/registry.js'
export {
  OH_MY_ZSH_RESTART_EXIT_CODE,
  createZshSteps,
  quoteForShell,
  zdotdir,
  zshrc,
} from './steps/zsh.js'

export type { RunUpdateOptions } from './runUpdate.js'
export { runUpdate } from './runUpdate.js'
