import { done, type UpdateStep } from '@upkeep/core'
import { describe, expect, it } from 'vitest'

import { mapConfigToRun } from '../src/config/mapConfigToRun.js'
import type { UpkeepConfig } from '../src/config/types.js'

const builtIn = (id: string): UpdateStep => ({
  id,
  name: id,
  run: async () => done(),
})

const builtInSteps = [builtIn('zr'), builtIn('zinit'), builtIn('oh-my-zsh')]

describe('mapConfigToRun', () => {
  it('runs built-in steps first and filters conditional commands', () => {
    const config: UpkeepConfig = {
      commands: [
        { id: 'always', name: 'Always', command: 'echo ok' },
        {
          id: 'work',
          name: 'Work tools',
          command: 'update-work-tools',
          when: { env: { UPKEEP_PROFILE: 'work' } },
        },
        { id: 'off', name: 'Off', command: 'echo off', enabled: false },
      ],
    }

    const mapped = mapConfigToRun(config, builtInSteps, {}, { UPKEEP_PROFILE: 'home' }, 'linux')

    expect(mapped.steps.map((step) => step.id)).toEqual(['zr', 'zinit', 'oh-my-zsh', 'always'])
    expect(mapped.excludedSteps).toEqual([
      {
        id: 'work',
        name: 'Work tools',
        reason: 'env_mismatch',
        requiredEnv: { UPKEEP_PROFILE: 'work' },
      },
      { id: 'off', name: 'Off', reason: 'disabled' },
    ])
  })

  it('lets the command line allow-list replace the config one', () => {
    const config: UpkeepConfig = { only: ['zr'] }

    const mapped = mapConfigToRun(config, builtInSteps, { only: ['zinit'] }, {}, 'linux')

    expect(mapped.steps.map((step) => step.id)).toEqual(['zinit'])
    expect(mapped.excludedSteps.map((step) => [step.id, step.reason])).toEqual([
      ['zr', 'not_selected'],
      ['oh-my-zsh', 'not_selected'],
    ])
  })

  it('merges disable lists from config and command line', () => {
    const mapped = mapConfigToRun(
      { disable: ['zr'] },
      builtInSteps,
      { disable: ['oh-my-zsh'] },
      {},
      'linux'
    )

    expect(mapped.steps.map((step) => step.id)).toEqual(['zinit'])
  })

  it('throws for unknown step ids', () => {
    expect(() => mapConfigToRun({}, builtInSteps, { only: ['antigen2'] }, {}, 'linux')).toThrow(
      'Unknown step id: antigen2'
    )
  })

  it('throws when a command shadows a built-in step', () => {
    const config: UpkeepConfig = {
      commands: [{ id: 'zinit', name: 'My zinit', command: 'zinit update' }],
    }

    expect(() => mapConfigToRun(config, builtInSteps, {}, {}, 'linux')).toThrow(
      'Custom command id collides with built-in step: zinit'
    )
  })
})
