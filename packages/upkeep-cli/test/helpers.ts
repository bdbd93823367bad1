import { chmod, mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import {
  createConsoleLogger,
  createExecutionContext,
  createRequirementResolver,
  type BaseDirectories,
  type ExecutionContext,
  type Logger,
  type ProcessSpawner,
  type RunType,
  type SpawnRequest,
  type SpawnResult,
} from '@upkeep/core'
import { vi } from 'vitest'

import { createPrivilegeEscalation } from '../src/platform/sudo.js'

const ANSI_ESCAPE_PATTERN = new RegExp(String.raw`\u001B\[[0-?]*[ -/]*[@-~]`, 'gu')

export const spawnResult = (exitCode: number | null, stdout = '', stderr = ''): SpawnResult => {
  return {
    exitCode,
    signal: null,
    stdout: Buffer.from(stdout, 'utf8'),
    stderr: Buffer.from(stderr, 'utf8'),
  }
}

/**
 * Spawner double that records every request.
 */
export const createRecordingSpawner = (
  respond: (request: SpawnRequest) => SpawnResult = () => spawnResult(0)
): { spawner: ProcessSpawner; calls: SpawnRequest[] } => {
  const calls: SpawnRequest[] = []

  return {
    calls,
    spawner: async (request: SpawnRequest): Promise<SpawnResult> => {
      calls.push(request)
      return respond(request)
    },
  }
}

export const createCapturingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = []
  const stream = {
    write: (chunk: string): boolean => {
      lines.push(chunk.replace(/\n$/u, ''))
      return true
    },
  }

  return {
    lines,
    logger: createConsoleLogger({ verbose: true, stdout: stream, stderr: stream, color: false }),
  }
}

/**
 * Creates `<parent>/bin` holding one executable stub per program name.
 */
export const createBinDirectory = async (
  parent: string,
  programs: readonly string[]
): Promise<string> => {
  const binDirectory = resolve(parent, 'bin')
  await mkdir(binDirectory, { recursive: true })

  for (const program of programs) {
    const programPath = resolve(binDirectory, program)
    await writeFile(programPath, '#!/bin/sh\nexit 0\n', 'utf8')
    await chmod(programPath, 0o755)
  }

  return binDirectory
}

/**
 * Creates a temp directory, resolved through symlinks so paths compare exactly.
 */
export const createTempDirectory = async (
  createdDirectories: string[],
  prefix: string
): Promise<string> => {
  const directory = await realpath(await mkdtemp(resolve(tmpdir(), prefix)))
  createdDirectories.push(directory)
  return directory
}

export const removeDirectories = async (createdDirectories: string[]): Promise<void> => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
}

export const createBaseDirectories = (home: string): BaseDirectories => {
  return {
    home,
    config: resolve(home, '.config'),
    data: resolve(home, '.local/share'),
    cache: resolve(home, '.cache'),
  }
}

export const createTestContext = (input: {
  readonly runType?: RunType
  readonly binDirectory: string
  readonly home: string
  readonly spawner: ProcessSpawner
  readonly logger?: Logger
  readonly env?: NodeJS.ProcessEnv
}): ExecutionContext => {
  return createExecutionContext({
    runType: input.runType ?? 'execute',
    baseDirs: createBaseDirectories(input.home),
    sudo: createPrivilegeEscalation(null),
    env: { PATH: input.binDirectory, ...input.env },
    logger: input.logger,
    spawner: input.spawner,
    requirements: createRequirementResolver({ searchPath: input.binDirectory, platform: 'linux' }),
  })
}

/**
 * Captures everything written to `process.stdout` while the callback runs.
 */
export const captureStdout = async (callback: () => Promise<void> | void): Promise<string> => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    await callback()
  } finally {
    writeSpy.mockRestore()
  }

  return stripAnsi(chunks.join(''))
}

export const stripAnsi = (text: string): string => {
  return text.replaceAll(ANSI_ESCAPE_PATTERN, '')
}
