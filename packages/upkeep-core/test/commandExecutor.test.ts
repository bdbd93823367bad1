import { describe, expect, it } from 'vitest'

import {
  createCommandExecutor,
  NonZeroExitError,
  OutputDecodeError,
  ProbeSkippedError,
  SpawnFailureError,
  type RunType,
  type SpawnRequest,
  type SpawnResult,
} from '../src/index.js'
import { createCapturingLogger, createRecordingSpawner, spawnResult } from './fakes.js'

const createExecutor = (
  runType: RunType,
  respond?: (request: SpawnRequest) => SpawnResult
) => {
  const recording = createRecordingSpawner(respond)
  const { logger, lines } = createCapturingLogger()
  const executor = createCommandExecutor({
    runType,
    spawner: recording.spawner,
    logger,
    env: { PATH: '/usr/bin', LANG: 'C' },
  })

  return { executor, calls: recording.calls, lines }
}

describe('CommandExecutor', () => {
  it('traces commands in dry-run mode without spawning', async () => {
    const { executor, calls, lines } = createExecutor('dry_run')

    const result = await executor.status({
      program: 'zsh',
      args: ['/home/test/.oh-my-zsh/tools/upgrade.sh'],
      env: { ZSH: '/home/test/.oh-my-zsh' },
    })

    expect(calls).toHaveLength(0)
    expect(result).toEqual({ exitCode: 0, accepted: false, dryRun: true, stdout: '', stderr: '' })
    expect(lines).toEqual([
      'Dry running: ZSH=/home/test/.oh-my-zsh zsh /home/test/.oh-my-zsh/tools/upgrade.sh',
    ])
  })

  it('quotes arguments with spaces in traces', async () => {
    const { executor, lines } = createExecutor('dry_run')

    await executor.output({ program: 'zsh', args: ['-c', 'zplug update'] })

    expect(lines).toEqual(["Dry running: zsh -c 'zplug update'"])
  })

  it('refuses probes in dry-run mode', async () => {
    const { executor, calls } = createExecutor('dry_run')

    await expect(executor.query({ program: 'zsh', args: ['-c', 'echo'] })).rejects.toBeInstanceOf(
      ProbeSkippedError
    )
    expect(calls).toHaveLength(0)
  })

  it('returns the result of a successful command', async () => {
    const { executor, calls } = createExecutor('execute', () => spawnResult(0, 'done\n'))

    const result = await executor.output({ program: 'antibody', args: ['update'] })

    expect(result).toEqual({
      exitCode: 0,
      accepted: false,
      dryRun: false,
      stdout: 'done\n',
      stderr: '',
    })
    expect(calls[0]?.program).toBe('antibody')
    expect(calls[0]?.args).toEqual(['update'])
  })

  it('merges request environment over the base environment', async () => {
    const { executor, calls } = createExecutor('execute')

    await executor.status({ program: 'env', env: { LANG: 'en_US.UTF-8', ZSH: '/opt/zsh' } })

    expect(calls[0]?.env).toEqual({ PATH: '/usr/bin', LANG: 'en_US.UTF-8', ZSH: '/opt/zsh' })
  })

  it('accepts listed non-zero exit codes', async () => {
    const { executor } = createExecutor('execute', () => spawnResult(80))

    const result = await executor.status({ program: 'zsh', acceptedExitCodes: [80] })

    expect(result.exitCode).toBe(80)
    expect(result.accepted).toBe(true)
  })

  it('throws for unaccepted exit codes', async () => {
    const { executor } = createExecutor('execute', () => spawnResult(1))

    const failure = executor.status({
      program: 'zsh',
      args: ['-c', 'echo hi'],
      acceptedExitCodes: [80],
    })

    await expect(failure).rejects.toBeInstanceOf(NonZeroExitError)
    await expect(failure).rejects.toThrow("zsh -c 'echo hi' failed with exit code 1")
  })

  it('reports termination by signal', async () => {
    const { executor } = createExecutor('execute', () => ({
      ...spawnResult(null),
      signal: 'SIGTERM',
    }))

    await expect(executor.status({ program: 'zinit' })).rejects.toThrow(
      'zinit was terminated by signal SIGTERM'
    )
  })

  it('reports programs that cannot be launched', async () => {
    const spawnError = Object.assign(new Error('spawn missing-tool ENOENT'), { code: 'ENOENT' })
    const { executor } = createExecutor('execute', () => ({
      ...spawnResult(null),
      error: spawnError,
    }))

    const failure = executor.status({ program: 'missing-tool' })

    await expect(failure).rejects.toBeInstanceOf(SpawnFailureError)
    await expect(failure).rejects.toThrow(
      'Failed to run missing-tool: ENOENT: spawn missing-tool ENOENT'
    )
  })

  it('requires valid UTF-8 for checked output', async () => {
    const invalid = (): SpawnResult => ({
      exitCode: 0,
      signal: null,
      stdout: new Uint8Array([0x6f, 0x6b, 0xff]),
      stderr: new Uint8Array(),
    })
    const { executor } = createExecutor('execute', invalid)

    await expect(executor.output({ program: 'zsh' })).rejects.toBeInstanceOf(OutputDecodeError)
    await expect(executor.status({ program: 'zsh' })).resolves.toMatchObject({ exitCode: 0 })
  })

  it('returns trimmed stdout for probes', async () => {
    const { executor } = createExecutor('execute', () => spawnResult(0, '/home/test/.zim\n'))

    await expect(
      executor.query({ program: 'zsh', args: ['-c', 'print -n ${ZIM_HOME}'] })
    ).resolves.toBe('/home/test/.zim')
  })
})
