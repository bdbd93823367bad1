import type { UpdateStep } from '@upkeep/core'

import { createZshSteps } from './zsh.js'

/**
 * Creates every built-in step in run order.
 *
 * @returns Built-in steps.
 */
export const createBuiltInSteps = (): readonly UpdateStep[] => {
  return [...createZshSteps()]
}
