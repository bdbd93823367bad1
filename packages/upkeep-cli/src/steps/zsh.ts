import { stat } from 'node:fs/promises'
import { join } from 'node:path'

import {
  assertMultiPullSucceeded,
  discoverRepositories,
  done,
  resolvePath,
  type ExecutionContext,
  type UpdateStep,
} from '@upkeep/core'

/**
 * Exit code of the oh-my-zsh upgrade script when the framework asks for a shell restart.
 */
export const OH_MY_ZSH_RESTART_EXIT_CODE = 80

/**
 * Resolves `$ZDOTDIR`, defaulting to the home directory.
 *
 * @param context Execution context.
 * @returns Directory holding `.zshrc`.
 */
export const zdotdir = async (context: ExecutionContext): Promise<string> => {
  return await resolvePath({ explicit: context.env.ZDOTDIR, fallback: context.baseDirs.home })
}

/**
 * Resolves the user's `.zshrc` path.
 *
 * @param context Execution context.
 * @returns Path of `.zshrc`; it may not exist.
 */
export const zshrc = async (context: ExecutionContext): Promise<string> => {
  return join(await zdotdir(context), '.zshrc')
}

/**
 * Quotes a value for interpolation into a zsh command string.
 *
 * @param value Raw value.
 * @returns Quoted value.
 */
export const quoteForShell = (value: string): string => {
  if (/^[\w@%+=:,./-]+$/u.test(value)) {
    return value
  }

  return `'${value.replaceAll("'", `'\\''`)}'`
}

/**
 * Resolves a plugin manager home from its environment variable or a default under home.
 */
const managerHome = async (
  context: ExecutionContext,
  variable: string,
  defaultName: string
): Promise<string> => {
  return await resolvePath({
    explicit: context.env[variable],
    fallback: join(context.baseDirs.home, defaultName),
  })
}

/**
 * Sources `.zshrc` in a shell and runs plugin manager commands.
 */
const runInZsh = async (
  context: ExecutionContext,
  zsh: string,
  flag: '-l' | '-i',
  rcFile: string,
  command: string
): Promise<void> => {
  await context.executor.status({
    program: zsh,
    args: [flag, '-c', `source ${quoteForShell(rcFile)} && ${command}`],
  })
}

const zr: UpdateStep = {
  id: 'zr',
  name: 'zr',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    await context.requirements.require('zr')

    await runInZsh(context, zsh, '-l', await zshrc(context), 'zr --update')
    return done()
  },
}

const antibody: UpdateStep = {
  id: 'antibody',
  name: 'antibody',
  run: async (context) => {
    await context.requirements.require('zsh')
    const program = await context.requirements.require('antibody')

    await context.executor.status({ program, args: ['update'] })
    return done()
  },
}

const antidote: UpdateStep = {
  id: 'antidote',
  name: 'antidote',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const home = await context.requirements.requirePath(join(await zdotdir(context), '.antidote'))
    const script = join(home, 'antidote.zsh')

    await context.executor.status({
      program: zsh,
      args: ['-c', `source ${quoteForShell(script)} && antidote update`],
    })
    return done()
  },
}

const antigen: UpdateStep = {
  id: 'antigen',
  name: 'antigen',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const rcFile = await context.requirements.requirePath(await zshrc(context))
    await context.requirements.requirePath(await managerHome(context, 'ADOTDIR', 'antigen.zsh'))

    await runInZsh(context, zsh, '-l', rcFile, '(antigen selfupdate ; antigen update)')
    return done()
  },
}

const zgenom: UpdateStep = {
  id: 'zgenom',
  name: 'zgenom',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const rcFile = await context.requirements.requirePath(await zshrc(context))
    await context.requirements.requirePath(await managerHome(context, 'ZGEN_SOURCE', '.zgenom'))

    await runInZsh(context, zsh, '-l', rcFile, 'zgenom selfupdate && zgenom update')
    return done()
  },
}

const zplug: UpdateStep = {
  id: 'zplug',
  name: 'zplug',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    await context.requirements.requirePath(await zshrc(context))
    await context.requirements.requirePath(await managerHome(context, 'ZPLUG_HOME', '.zplug'))

    await context.executor.status({ program: zsh, args: ['-i', '-c', 'zplug update'] })
    return done()
  },
}

const zinit: UpdateStep = {
  id: 'zinit',
  name: 'zinit',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const rcFile = await context.requirements.requirePath(await zshrc(context))
    await context.requirements.requirePath(await managerHome(context, 'ZINIT_HOME', '.zinit'))

    await runInZsh(context, zsh, '-i', rcFile, 'zinit self-update && zinit update --all')
    return done()
  },
}

const zi: UpdateStep = {
  id: 'zi',
  name: 'zi',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const rcFile = await context.requirements.requirePath(await zshrc(context))
    await context.requirements.requirePath(join(context.baseDirs.home, '.zi'))

    await runInZsh(context, zsh, '-i', rcFile, 'zi self-update && zi update --all')
    return done()
  },
}

const zim: UpdateStep = {
  id: 'zim',
  name: 'zim',
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const home = await resolvePath({
      explicit: context.env.ZIM_HOME,
      probe: async () =>
        await context.executor.query({
          program: zsh,
          args: ['-c', '[[ -n ${ZIM_HOME} ]] && print -n ${ZIM_HOME}'],
        }),
      fallback: join(context.baseDirs.home, '.zim'),
      logger: context.logger,
    })
    await context.requirements.requirePath(home)

    await context.executor.status({
      program: zsh,
      args: ['-i', '-c', 'zimfw upgrade && zimfw update'],
    })
    return done()
  },
}

const ohMyZsh: UpdateStep = {
  id: 'oh-my-zsh',
  name: 'oh-my-zsh',
  acceptedExitCodes: [OH_MY_ZSH_RESTART_EXIT_CODE],
  run: async (context) => {
    const zsh = await context.requirements.require('zsh')
    const framework = await context.requirements.requirePath(
      join(context.baseDirs.home, '.oh-my-zsh')
    )

    const customDir = await resolvePath({
      explicit: context.env.ZSH_CUSTOM,
      probe: async () =>
        await context.executor.query({
          program: zsh,
          args: ['-c', 'test $ZSH_CUSTOM && echo -n $ZSH_CUSTOM'],
        }),
      fallback: join(framework, 'custom'),
      logger: context.logger,
    })
    context.logger.debug(`oh-my-zsh custom dir: ${customDir}`)

    if (await isDirectory(customDir)) {
      const customRepositories = await discoverRepositories(customDir)
      await customRepositories.remove(framework)
      if (!customRepositories.isEmpty()) {
        context.logger.info('Pulling custom plugins and themes')
        assertMultiPullSucceeded(await context.git.multiPull(customRepositories))
      }
    }

    await context.executor.status({
      program: zsh,
      args: [join(framework, 'tools/upgrade.sh')],
      env: { ZSH: framework },
    })
    return done()
  },
}

const isDirectory = async (path: string): Promise<boolean> => {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Creates the zsh plugin manager steps in run order.
 *
 * @returns Step list.
 */
export const createZshSteps = (): readonly UpdateStep[] => {
  return [zr, antibody, antidote, antigen, zgenom, zplug, zinit, zi, zim, ohMyZsh]
}
