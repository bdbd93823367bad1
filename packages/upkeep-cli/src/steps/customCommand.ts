import { done, type UpdateStep } from '@upkeep/core'

import type { CustomCommandConfig } from '../config/types.js'

/**
 * Creates an update step running a configured shell command.
 *
 * @param command Custom command config.
 * @param platform Platform deciding the shell.
 * @returns Update step.
 */
export const createCustomCommandStep = (
  command: CustomCommandConfig,
  platform: NodeJS.Platform = process.platform
): UpdateStep => {
  const [shell, flag]: readonly [string, string] =
    platform === 'win32' ? ['cmd', '/C'] : ['sh', '-c']

  return {
    id: command.id,
    name: command.name,
    acceptedExitCodes: command.acceptedExitCodes,
    run: async (context) => {
      const program = await context.requirements.require(shell)
      await context.executor.status({ program, args: [flag, command.command] })
      return done()
    },
  }
}
