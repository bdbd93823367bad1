import { constants } from 'node:fs'
import { access, stat } from 'node:fs/promises'
import { delimiter, isAbsolute, join, resolve, sep } from 'node:path'

import { RequirementMissingError } from '../errors.js'

/**
 * Result of looking up a program on the search path.
 */
export type RequirementLookup =
  | { readonly found: true; readonly name: string; readonly path: string }
  | { readonly found: false; readonly name: string }

/**
 * Options for the requirement resolver.
 */
export interface RequirementResolverOptions {
  /** Search path, read once. Defaults to `PATH` of the current process. */
  readonly searchPath?: string
  /** Executable extensions tried on Windows. Defaults to `PATHEXT`. */
  readonly pathExtensions?: string
  /** Platform override for tests. */
  readonly platform?: NodeJS.Platform
}

/**
 * Memoized lookup of external programs on the search path.
 *
 * One instance lives for one run. Concurrent lookups of the same name share a single probe.
 */
export class RequirementResolver {
  private readonly directories: readonly string[]
  private readonly extensions: readonly string[]
  private readonly cache = new Map<string, Promise<RequirementLookup>>()

  /**
   * Creates a resolver and snapshots the search path.
   *
   * @param options Resolver options.
   */
  public constructor(options: RequirementResolverOptions = {}) {
    const platform = options.platform ?? process.platform
    const searchPath = options.searchPath ?? process.env.PATH ?? ''

    this.directories = searchPath.split(delimiter).filter((directory) => directory.length > 0)
    const pathExtensions = options.pathExtensions ?? process.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM'
    this.extensions = platform === 'win32' ? ['', ...pathExtensions.split(';')] : ['']
  }

  /**
   * Looks up a program without throwing when it is absent.
   *
   * @param name Program name.
   * @returns Lookup result.
   * @throws TypeError when name is empty.
   */
  public async lookup(name: string): Promise<RequirementLookup> {
    if (name.length === 0) {
      throw new TypeError('Requirement name must be a non-empty string')
    }

    const cached = this.cache.get(name)
    if (cached) {
      return await cached
    }

    const pending = this.probe(name)
    this.cache.set(name, pending)
    return await pending
  }

  /**
   * Resolves a program to its absolute path.
   *
   * @param name Program name.
   * @returns Absolute path of the program.
   * @throws RequirementMissingError when the program is not installed.
   */
  public async require(name: string): Promise<string> {
    const lookup = await this.lookup(name)
    if (!lookup.found) {
      throw new RequirementMissingError(name)
    }

    return lookup.path
  }

  /**
   * Requires a file or directory to exist.
   *
   * @param path Filesystem path.
   * @returns The same path.
   * @throws RequirementMissingError when nothing exists at the path.
   */
  public async requirePath(path: string): Promise<string> {
    try {
      await stat(path)
      return path
    } catch {
      throw new RequirementMissingError(path, 'path')
    }
  }

  private async probe(name: string): Promise<RequirementLookup> {
    const candidates =
      name.includes(sep) || name.includes('/') || isAbsolute(name)
        ? [resolve(name)]
        : this.directories.map((directory) => join(directory, name))

    for (const candidate of candidates) {
      for (const extension of this.extensions) {
        const path = `${candidate}${extension}`
        if (await isExecutableFile(path)) {
          return { found: true, name, path }
        }
      }
    }

    return { found: false, name }
  }
}

/**
 * Creates a requirement resolver.
 *
 * @param options Resolver options.
 * @returns Requirement resolver.
 */
export const createRequirementResolver = (
  options?: RequirementResolverOptions
): RequirementResolver => {
  return new RequirementResolver(options)
}

const isExecutableFile = async (path: string): Promise<boolean> => {
  try {
    const stats = await stat(path)
    if (!stats.isFile()) {
      return false
    }

    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}
