import type { Dirent } from 'node:fs'
import { readdir, realpath, stat } from 'node:fs/promises'
import { join, resolve } from 'node:path'

import { DiscoveryError } from '../errors.js'

/**
 * Root of one git working tree.
 */
export interface RepositoryEntry {
  /** Canonical path of the working tree. */
  readonly path: string
}

/**
 * Deduplicated collection of git working-tree roots, keyed by canonical path.
 */
export class RepositorySet {
  private readonly repositories = new Map<string, RepositoryEntry>()

  /** Number of repositories in the set. */
  public get size(): number {
    return this.repositories.size
  }

  /**
   * Checks whether the set has no repositories.
   *
   * @returns True when empty.
   */
  public isEmpty(): boolean {
    return this.repositories.size === 0
  }

  /**
   * Inserts a path when it is the root of a git working tree.
   *
   * @param path Candidate directory.
   * @returns True when the path is a repository (newly inserted or already present).
   */
  public async insertIfRepository(path: string): Promise<boolean> {
    if (!(await hasRepositoryMarker(path))) {
      return false
    }

    const canonicalPath = await canonicalize(path)
    if (!this.repositories.has(canonicalPath)) {
      this.repositories.set(canonicalPath, { path: canonicalPath })
    }

    return true
  }

  /**
   * Removes a repository by raw or canonical path.
   *
   * @param path Path to remove.
   * @returns True when an entry was removed.
   */
  public async remove(path: string): Promise<boolean> {
    const removedRaw = this.repositories.delete(resolve(path))
    const removedCanonical = this.repositories.delete(await canonicalize(path))
    return removedRaw || removedCanonical
  }

  /**
   * Checks whether a canonical path is in the set.
   *
   * @param path Canonical path.
   * @returns True when present.
   */
  public has(path: string): boolean {
    return this.repositories.has(path)
  }

  /**
   * Lists entries sorted by path.
   *
   * @returns Repository entries.
   */
  public entries(): readonly RepositoryEntry[] {
    return [...this.repositories.values()].sort((left, right) =>
      left.path.localeCompare(right.path)
    )
  }
}

/**
 * Options for repository discovery.
 */
export interface DiscoverRepositoriesOptions {
  /** Deepest level visited; the root itself is level 0. */
  readonly maxDepth?: number
  /** Existing set to add to. */
  readonly into?: RepositorySet
}

/**
 * Default discovery depth for plugin directories.
 */
export const DEFAULT_DISCOVERY_DEPTH = 2

/**
 * Walks a directory tree and collects every git working-tree root.
 *
 * A symbolic link is checked as a repository root but never descended into.
 *
 * @param root Directory to walk.
 * @param options Discovery options.
 * @returns Repository set.
 * @throws DiscoveryError when a directory cannot be read.
 */
export const discoverRepositories = async (
  root: string,
  options: DiscoverRepositoriesOptions = {}
): Promise<RepositorySet> => {
  const maxDepth = options.maxDepth ?? DEFAULT_DISCOVERY_DEPTH
  const repositories = options.into ?? new RepositorySet()

  const visit = async (directory: string, depth: number): Promise<void> => {
    await repositories.insertIfRepository(directory)
    if (depth >= maxDepth) {
      return
    }

    let children: Dirent[]
    try {
      children = await readdir(directory, { withFileTypes: true })
    } catch (error: unknown) {
      throw new DiscoveryError(directory, error)
    }

    for (const child of children) {
      if (child.isDirectory()) {
        await visit(join(directory, child.name), depth + 1)
      } else if (child.isSymbolicLink()) {
        await repositories.insertIfRepository(join(directory, child.name))
      }
    }
  }

  await visit(resolve(root), 0)
  return repositories
}

const hasRepositoryMarker = async (path: string): Promise<boolean> => {
  try {
    // `.git` is a directory in a regular clone and a file in worktrees and submodules.
    await stat(join(path, '.git'))
    return true
  } catch {
    return false
  }
}

const canonicalize = async (path: string): Promise<string> => {
  try {
    return await realpath(path)
  } catch {
    return resolve(path)
  }
}
