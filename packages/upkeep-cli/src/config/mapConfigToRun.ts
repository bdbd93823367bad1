import type { UpdateStep } from '@upkeep/core'

import { createCustomCommandStep } from '../steps/customCommand.js'
import type { CustomCommandConfig, UpkeepConfig } from './types.js'

/**
 * Step selection from the command line.
 */
export interface StepSelection {
  /** Allow-list replacing the config `only` list when non-empty. */
  readonly only?: readonly string[]
  /** Deny-list added to the config `disable` list. */
  readonly disable?: readonly string[]
}

/**
 * Exclusion metadata for one known step.
 */
export interface ExcludedUpdateStep {
  /** Stable step id. */
  readonly id: string
  /** Display name shown in output. */
  readonly name: string
  /** Machine-readable exclusion reason. */
  readonly reason: 'disabled' | 'env_mismatch' | 'not_selected'
  /** Required environment values when excluded by env mismatch. */
  readonly requiredEnv?: Readonly<Record<string, string>>
}

/**
 * Steps to run plus the ones filtered out.
 */
export interface MappedUpdateRun {
  /** Ordered steps to run. */
  readonly steps: readonly UpdateStep[]
  /** Steps excluded from execution with reason metadata. */
  readonly excludedSteps: readonly ExcludedUpdateStep[]
}

interface StepExclusion {
  readonly reason: ExcludedUpdateStep['reason']
  readonly requiredEnv?: Readonly<Record<string, string>>
}

interface CandidateStep {
  readonly step: UpdateStep
  readonly command?: CustomCommandConfig
}

/**
 * Maps loaded config and CLI selection to the ordered step list.
 *
 * Built-in steps run first, custom commands after them in config order.
 *
 * @param config Parsed config.
 * @param builtInSteps Built-in steps in run order.
 * @param selection CLI step selection.
 * @param env Environment used for `when.env` conditions.
 * @param platform Platform deciding the custom command shell.
 * @returns Steps to run and excluded steps.
 * @throws Error for unknown step ids or custom ids shadowing a built-in step.
 */
export const mapConfigToRun = (
  config: UpkeepConfig,
  builtInSteps: readonly UpdateStep[],
  selection: StepSelection = {},
  env: Readonly<Record<string, string | undefined>> = process.env,
  platform: NodeJS.Platform = process.platform
): MappedUpdateRun => {
  const builtInIds = new Set(builtInSteps.map((step) => step.id))
  for (const command of config.commands ?? []) {
    if (builtInIds.has(command.id)) {
      throw new Error(`Custom command id collides with built-in step: ${command.id}`)
    }
  }

  const candidates: CandidateStep[] = [
    ...builtInSteps.map((step) => ({ step })),
    ...(config.commands ?? []).map((command) => ({
      step: createCustomCommandStep(command, platform),
      command,
    })),
  ]

  const knownIds = new Set(candidates.map((candidate) => candidate.step.id))
  const only = selection.only && selection.only.length > 0 ? selection.only : config.only
  const disable = [...(config.disable ?? []), ...(selection.disable ?? [])]
  for (const id of [...(only ?? []), ...disable]) {
    if (!knownIds.has(id)) {
      throw new Error(`Unknown step id: ${id}`)
    }
  }

  const selected = only && only.length > 0 ? new Set(only) : null
  const disabled = new Set(disable)
  const steps: UpdateStep[] = []
  const excludedSteps: ExcludedUpdateStep[] = []

  for (const candidate of candidates) {
    const exclusion = getExclusion(candidate, selected, disabled, env)
    if (exclusion) {
      excludedSteps.push({
        id: candidate.step.id,
        name: candidate.step.name,
        reason: exclusion.reason,
        requiredEnv: exclusion.requiredEnv,
      })
      continue
    }

    steps.push(candidate.step)
  }

  return {
    steps,
    excludedSteps,
  }
}

const getExclusion = (
  candidate: CandidateStep,
  selected: ReadonlySet<string> | null,
  disabled: ReadonlySet<string>,
  env: Readonly<Record<string, string | undefined>>
): StepExclusion | null => {
  if (selected && !selected.has(candidate.step.id)) {
    return { reason: 'not_selected' }
  }

  if (disabled.has(candidate.step.id) || candidate.command?.enabled === false) {
    return { reason: 'disabled' }
  }

  const envConditions = candidate.command?.when?.env
  if (!envConditions) {
    return null
  }

  const missingConditions: Record<string, string> = {}

  for (const [key, expectedValue] of Object.entries(envConditions)) {
    if (env[key] !== expectedValue) {
      missingConditions[key] = expectedValue
    }
  }

  if (Object.keys(missingConditions).length > 0) {
    return {
      reason: 'env_mismatch',
      requiredEnv: missingConditions,
    }
  }

  return null
}
