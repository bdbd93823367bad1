import type { RunReport, StepOutcome, StepReportEntry } from '@upkeep/core'
import { describe, expect, it } from 'vitest'

import { formatSeparator, PrettyReporter } from '../src/reporters/prettyReporter.js'
import { captureStdout } from './helpers.js'

const entry = (name: string, outcome: StepOutcome, durationMs = 5): StepReportEntry => {
  return {
    id: name,
    name,
    outcome,
    startedAt: 0,
    finishedAt: durationMs,
    durationMs,
  }
}

describe('PrettyReporter', () => {
  it('prints one line per step outcome', async () => {
    const reporter = new PrettyReporter({ verbose: false })

    const output = await captureStdout(() => {
      reporter.onStepComplete(entry('zim', { status: 'succeeded' }))
      reporter.onStepComplete(entry('zr', { status: 'skipped', reason: 'Cannot find zr in PATH' }))
      reporter.onStepComplete(
        entry('oh-my-zsh', {
          status: 'ignored',
          error: {
            kind: 'non_zero_exit',
            message: 'upgrade.sh failed with exit code 80',
            exitCode: 80,
          },
        })
      )
      reporter.onStepComplete(
        entry('zinit', {
          status: 'failed',
          error: { kind: 'spawn_failure', message: 'Failed to run zsh: ENOENT: not found' },
        })
      )
    })

    expect(output.split('\n')).toEqual([
      '✓ zim',
      'ℹ zr skipped (Cannot find zr in PATH)',
      '⚠ oh-my-zsh ignored (upgrade.sh failed with exit code 80)',
      '✗ zinit failed (Failed to run zsh: ENOENT: not found)',
      '',
    ])
  })

  it('prints durations in verbose mode', async () => {
    const reporter = new PrettyReporter({ verbose: true })

    const output = await captureStdout(() => {
      reporter.onStepComplete(entry('zim', { status: 'succeeded' }, 42))
    })

    expect(output).toBe('✓ zim 42ms\n')
  })

  it('prints the dry-run banner without colours', async () => {
    const reporter = new PrettyReporter({ verbose: false, color: false })

    const output = await captureStdout(() => {
      reporter.onRunStart([], 'dry_run')
    })

    expect(output).toBe('upkeep: updating 0 steps (dry run)\n')
  })

  it('lists failures in the summary', async () => {
    const reporter = new PrettyReporter({ verbose: false })
    const report: RunReport = {
      entries: [
        entry('zim', { status: 'succeeded' }),
        entry('zinit', {
          status: 'failed',
          error: { kind: 'non_zero_exit', message: 'zsh failed with exit code 1', exitCode: 1 },
        }),
      ],
      summary: { total: 2, succeeded: 1, skipped: 0, failed: 1, ignored: 0, durationMs: 12 },
      exitCode: 1,
      runType: 'execute',
      startedAt: 0,
      finishedAt: 12,
    }

    const output = await captureStdout(() => {
      reporter.onRunComplete(report)
    })

    expect(output.split('\n')).toEqual([
      '',
      formatSeparator('Summary'),
      'Summary: total=2 succeeded=1 skipped=0 failed=1 ignored=0 duration=12ms',
      '  ✗ zinit: zsh failed with exit code 1',
      'Result: FAIL',
      '',
    ])
  })
})

describe('formatSeparator', () => {
  it('pads the label to the requested width', () => {
    expect(formatSeparator('zr', 10)).toBe('── zr ────')
    expect(formatSeparator('Summary')).toHaveLength(60)
  })

  it('keeps labels longer than the width intact', () => {
    expect(formatSeparator('antidote', 5)).toBe('── antidote ')
  })
})
