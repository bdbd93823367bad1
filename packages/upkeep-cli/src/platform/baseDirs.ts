import { homedir } from 'node:os'
import { posix, win32 } from 'node:path'

import type { BaseDirectories } from '@upkeep/core'

/**
 * Resolves the user base directories following the XDG conventions on Unix
 * and the profile folders on Windows.
 *
 * @param env Environment to read overrides from.
 * @param platform Target platform.
 * @param home Home directory; defaults to `os.homedir()`.
 * @returns Base directories.
 */
export const resolveBaseDirectories = (
  env: Readonly<Record<string, string | undefined>> = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): BaseDirectories => {
  if (platform === 'win32') {
    const roaming = absoluteOr(win32, env.APPDATA, win32.join(home, 'AppData', 'Roaming'))
    const local = absoluteOr(win32, env.LOCALAPPDATA, win32.join(home, 'AppData', 'Local'))
    return { home, config: roaming, data: roaming, cache: local }
  }

  if (platform === 'darwin') {
    const support = posix.join(home, 'Library', 'Application Support')
    return {
      home,
      config: absoluteOr(posix, env.XDG_CONFIG_HOME, support),
      data: absoluteOr(posix, env.XDG_DATA_HOME, support),
      cache: absoluteOr(posix, env.XDG_CACHE_HOME, posix.join(home, 'Library', 'Caches')),
    }
  }

  return {
    home,
    config: absoluteOr(posix, env.XDG_CONFIG_HOME, posix.join(home, '.config')),
    data: absoluteOr(posix, env.XDG_DATA_HOME, posix.join(home, '.local', 'share')),
    cache: absoluteOr(posix, env.XDG_CACHE_HOME, posix.join(home, '.cache')),
  }
}

// Relative XDG values are invalid and ignored.
const absoluteOr = (
  paths: typeof posix,
  value: string | undefined,
  fallback: string
): string => {
  return value && paths.isAbsolute(value) ? value : fallback
}
