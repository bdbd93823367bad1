import { spawn } from 'node:child_process'

import type { ProcessSpawner, SpawnRequest, SpawnResult } from '../contracts/executor.js'

/**
 * Creates a Node.js process spawner that runs programs without a shell.
 *
 * @returns Process spawner implementation.
 */
export const createNodeProcessSpawner = (): ProcessSpawner => {
  return async (request: SpawnRequest): Promise<SpawnResult> => {
    return await new Promise<SpawnResult>((resolve) => {
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let error: unknown
      let closed = false

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
        if (closed) {
          return
        }

        closed = true
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(stdoutChunks),
          stderr: Buffer.concat(stderrChunks),
          error,
        })
      }

      const child = spawn(request.program, [...request.args], {
        cwd: request.cwd,
        env: request.env,
        stdio: ['inherit', 'pipe', 'pipe'],
      })

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })

      child.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      child.on('error', (spawnError: Error) => {
        error = spawnError
        // A child that never started emits no close event.
        if (child.pid === undefined) {
          finish(null, null)
        }
      })

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        finish(exitCode, signal)
      })
    })
  }
}
