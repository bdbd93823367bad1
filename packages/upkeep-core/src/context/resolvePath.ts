import { describeCause } from '../errors.js'
import type { Logger } from '../logging/logger.js'

/**
 * Inputs for resolving a configurable directory.
 */
export interface ResolvePathInput {
  /** Explicit value, usually an environment variable. Empty strings count as unset. */
  readonly explicit?: string
  /** Optional fallback probe, for example asking the shell to expand a variable. */
  readonly probe?: () => Promise<string>
  /** Path used when neither the explicit value nor the probe yields one. */
  readonly fallback: string
  /** Receives a debug line when the probe fails or is empty. */
  readonly logger?: Logger
}

/**
 * Resolves a path from an explicit value, then a probe, then a default.
 *
 * @param input Resolution inputs.
 * @returns Resolved path.
 */
export const resolvePath = async (input: ResolvePathInput): Promise<string> => {
  if (input.explicit !== undefined && input.explicit.length > 0) {
    return input.explicit
  }

  if (input.probe) {
    try {
      const probed = (await input.probe()).trim()
      if (probed.length > 0) {
        return probed
      }
      input.logger?.debug(`Probe returned nothing. Using default path: ${input.fallback}`)
    } catch (error: unknown) {
      input.logger?.debug(
        `Probe failed (${describeCause(error)}). Using default path: ${input.fallback}`
      )
    }
  }

  return input.fallback
}
