import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import ts from 'typescript'

import type { CustomCommandConfig, UpkeepConfig } from './types.js'

/**
 * Loaded config with the file it came from.
 */
export interface LoadedUpkeepConfig {
  /** Parsed config; empty when no file exists. */
  readonly config: UpkeepConfig
  /** Absolute config file path, or null when defaults are used. */
  readonly configFilePath: string | null
}

const CONFIG_FILE_NAMES = ['upkeep.config.ts', 'upkeep.config.json'] as const

/**
 * Loads and validates an upkeep config file.
 *
 * Without an explicit path, the working directory and then `<configDir>/upkeep` are searched.
 * A missing file yields an empty config.
 *
 * @param cwd Base working directory.
 * @param configDir User configuration directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws Error when an explicit config is missing or any config is invalid.
 */
export const loadUpkeepConfig = async (
  cwd: string,
  configDir: string,
  configPath?: string
): Promise<LoadedUpkeepConfig> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configDir, configPath)
  if (!resolvedConfigPath) {
    return { config: {}, configFilePath: null }
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseUpkeepConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (
  cwd: string,
  configDir: string,
  configPath?: string
): Promise<string | null> => {
  if (configPath) {
    const explicitPath = resolve(cwd, configPath)
    if (!(await fileExists(explicitPath))) {
      throw new Error(`Config file not found: ${explicitPath}`)
    }
    return explicitPath
  }

  const candidates = [
    ...CONFIG_FILE_NAMES.map((fileName) => resolve(cwd, fileName)),
    ...CONFIG_FILE_NAMES.map((fileName) => resolve(configDir, 'upkeep', fileName)),
  ]

  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate
    }
  }

  return null
}

const fileExists = async (path: string): Promise<boolean> => {
  try {
    await readFile(path, 'utf8')
    return true
  } catch {
    return false
  }
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    return JSON.parse(content) as unknown
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new Error(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'upkeep-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule = (await import(moduleUrl)) as {
      readonly default?: unknown
      readonly config?: unknown
    }

    if (loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new Error(`Config module ${configFilePath} must export default or named "config"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

const parseUpkeepConfig = (value: unknown): UpkeepConfig => {
  if (!isRecord(value)) {
    throw new Error('Config must be an object')
  }

  const dryRun = parseOptionalBoolean(value.dryRun, 'dryRun')
  const only = parseOptionalStringArray(value.only, 'only')
  const disable = parseOptionalStringArray(value.disable, 'disable')
  const env = parseOptionalStringRecord(value.env, 'env')
  const git = parseGitConfig(value.git)
  const output = parseOutputConfig(value.output)
  const commands = parseCommands(value.commands)

  return {
    dryRun,
    only,
    disable,
    env,
    git,
    output,
    commands,
  }
}

const parseCommands = (value: unknown): readonly CustomCommandConfig[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error('commands must be an array')
  }

  const commands = value.map(parseCommand)
  assertUniqueCommandIds(commands)
  return commands
}

const parseCommand = (value: unknown, index: number): CustomCommandConfig => {
  if (!isRecord(value)) {
    throw new Error(`commands[${index}] must be an object`)
  }

  const id = parseRequiredString(value.id, `commands[${index}].id`)
  const name = parseRequiredString(value.name, `commands[${index}].name`)
  const command = parseRequiredString(value.command, `commands[${index}].command`)
  const enabled = parseOptionalBoolean(value.enabled, `commands[${index}].enabled`)
  const acceptedExitCodes = parseOptionalExitCodes(
    value.acceptedExitCodes,
    `commands[${index}].acceptedExitCodes`
  )
  const when = parseOptionalCondition(value.when, `commands[${index}].when`)

  return {
    id,
    name,
    command,
    enabled,
    acceptedExitCodes,
    when,
  }
}

const assertUniqueCommandIds = (commands: readonly CustomCommandConfig[]): void => {
  const seenById = new Set<string>()

  for (const command of commands) {
    if (seenById.has(command.id)) {
      throw new Error(`commands must use unique ids (duplicate: ${command.id})`)
    }

    seenById.add(command.id)
  }
}

const parseGitConfig = (value: unknown): UpkeepConfig['git'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('git must be an object')
  }

  const concurrency = parseOptionalNumber(value.concurrency, 'git.concurrency')
  if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency < 1)) {
    throw new Error('git.concurrency must be a positive integer')
  }

  return {
    concurrency,
  }
}

const parseOutputConfig = (value: unknown): UpkeepConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('output must be an object')
  }

  const format = value.format
  if (format !== undefined && format !== 'pretty' && format !== 'json') {
    throw new Error('output.format must be "pretty" or "json"')
  }

  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const parseOptionalCondition = (
  value: unknown,
  path: string
): CustomCommandConfig['when'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const env = parseOptionalStringRecord(value.env, `${path}.env`)

  return {
    env,
  }
}

const parseOptionalExitCodes = (value: unknown, path: string): readonly number[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  const result: number[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'number' || !Number.isInteger(entry)) {
      throw new Error(`${path}[${index}] must be an integer`)
    }
    result.push(entry)
  }

  return result
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`${path} must be a valid number`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new Error(`${path} must be a boolean`)
  }

  return value
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new Error(`${path}[${index}] must be a non-empty string`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const entries = Object.entries(value)
  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of entries) {
    if (typeof entryValue !== 'string') {
      throw new Error(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
