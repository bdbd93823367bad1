import { writeFile } from 'node:fs/promises'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import type { CustomCommandConfig, UpkeepConfig } from '../src/config/types.js'
import { runUpdate, type RunUpdateOptions } from '../src/runUpdate.js'
import {
  captureStdout,
  createBaseDirectories,
  createBinDirectory,
  createRecordingSpawner,
  createTempDirectory,
  removeDirectories,
  spawnResult,
} from './helpers.js'

const createdDirectories: string[] = []

afterEach(async () => {
  await removeDirectories(createdDirectories)
})

const setup = async (config: UpkeepConfig, exitCode = 0) => {
  const home = await createTempDirectory(createdDirectories, 'upkeep-run-')
  const binDirectory = await createBinDirectory(home, ['sh'])
  await writeFile(resolve(home, 'upkeep.config.json'), JSON.stringify(config), 'utf8')
  const recording = createRecordingSpawner(() => spawnResult(exitCode))

  const options: RunUpdateOptions = {
    cwd: home,
    dryRun: false,
    only: [],
    disable: [],
    listSteps: false,
    format: 'pretty',
    verbose: false,
    env: { PATH: binDirectory },
    platform: 'linux',
    baseDirs: createBaseDirectories(home),
    spawner: recording.spawner,
    builtInSteps: [],
  }

  return { options, binDirectory, calls: recording.calls }
}

const hello: CustomCommandConfig = {
  id: 'hello',
  name: 'Hello',
  command: 'echo hello',
}

describe('runUpdate', () => {
  it('prints a JSON report when the config asks for it', async () => {
    const { options, binDirectory, calls } = await setup({
      commands: [hello],
      output: { format: 'json' },
    })

    let exitCode = -1
    const output = await captureStdout(async () => {
      exitCode = await runUpdate(options)
    })

    expect(exitCode).toBe(0)
    expect(calls.map((call) => [call.program, ...call.args])).toEqual([
      [`${binDirectory}/sh`, '-c', 'echo hello'],
    ])
    const report: unknown = JSON.parse(output)
    expect(report).toMatchObject({
      runType: 'execute',
      exitCode: 0,
      entries: [{ id: 'hello', name: 'Hello', outcome: { status: 'succeeded' } }],
      summary: { total: 1, succeeded: 1, skipped: 0, failed: 0, ignored: 0 },
    })
  })

  it('lets the format flag override the config', async () => {
    const { options } = await setup({ commands: [hello], output: { format: 'json' } })

    const output = await captureStdout(async () => {
      await runUpdate({ ...options, format: 'pretty', formatProvided: true })
    })

    expect(output.split('\n')).toContain('Result: ✅ PASS')
  })

  it('traces commands and never spawns in dry-run mode', async () => {
    const { options, binDirectory, calls } = await setup({ commands: [hello] })

    const output = await captureStdout(async () => {
      await runUpdate({ ...options, dryRun: true })
    })

    expect(calls).toHaveLength(0)
    const lines = output.split('\n')
    expect(lines[0]).toBe('upkeep: updating 1 steps (dry run)')
    expect(lines).toContain(`Dry running: ${binDirectory}/sh -c 'echo hello'`)
    expect(lines).toContain('✓ Hello')
  })

  it('returns 1 when a command fails', async () => {
    const { options } = await setup({ commands: [hello], output: { format: 'json' } }, 3)

    let exitCode = -1
    await captureStdout(async () => {
      exitCode = await runUpdate(options)
    })

    expect(exitCode).toBe(1)
  })

  it('prints hints for commands excluded by their conditions', async () => {
    const { options } = await setup({
      commands: [
        hello,
        { id: 'work', name: 'Work', command: 'true', when: { env: { UPKEEP_PROFILE: 'work' } } },
        { id: 'off', name: 'Off', command: 'true', enabled: false },
      ],
    })

    const output = await captureStdout(async () => {
      await runUpdate({ ...options, dryRun: true })
    })

    const lines = output.split('\n')
    expect(lines[0]).toBe('ℹ️  Skipping Work (set UPKEEP_PROFILE=work to enable)')
    expect(lines[1]).toBe('ℹ️  Skipping Off (disabled)')
  })

  it('lists the selected steps without running them', async () => {
    const { options, calls } = await setup({ commands: [hello] })

    const output = await captureStdout(async () => {
      await runUpdate({ ...options, listSteps: true, format: 'json', formatProvided: true })
    })

    expect(calls).toHaveLength(0)
    expect(JSON.parse(output)).toEqual({ steps: [{ id: 'hello', name: 'Hello' }] })
  })
})
