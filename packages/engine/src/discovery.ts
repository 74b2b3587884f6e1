/**
 * Discovery of the interpreter and Jupyter executables.
 *
 * WHY: A project must stay buildable on machines without the interpreter
 * toolchain. Discovery tells the setup whether to generate a kernel at all
 * and whether it can be registered with Jupyter.
 */

import { constants } from 'node:fs'
import { access } from 'node:fs/promises'
import { delimiter, dirname, join, resolve } from 'node:path'

/** Environment variable names for tool overrides */
export const SETUP_ENV_VARS = {
  XCPP_PATH: 'CKS_XCPP_PATH',
  JUPYTER_PATH: 'CKS_JUPYTER_PATH',
  XEUS_CLING_PREFIX: 'CKS_XEUS_CLING_PREFIX',
} as const

/** Interpreter executable name */
export const INTERPRETER_PROGRAM = 'xcpp'

/** Jupyter executable name */
export const JUPYTER_PROGRAM = 'jupyter'

export type Environment = Record<string, string | undefined>

export interface DiscoveredTools {
  interpreterPath?: string | undefined
  jupyterPath?: string | undefined
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}

function candidateNames(name: string, env: Environment): string[] {
  if (process.platform !== 'win32') {
    return [name]
  }
  const extensions = (env['PATHEXT'] ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)]
}

/**
 * Find an executable, like `which`.
 *
 * @param name - Program name
 * @param env - Environment to read PATH and the override from
 * @param overrideVar - Environment variable that, when set, names the executable directly
 */
export async function findProgram(
  name: string,
  env: Environment = process.env,
  overrideVar?: string
): Promise<string | undefined> {
  const override = overrideVar ? env[overrideVar] : undefined
  if (override) {
    const path = resolve(override)
    return (await isExecutable(path)) ? path : undefined
  }

  const dirs = (env['PATH'] ?? '').split(delimiter).filter(Boolean)
  for (const dir of dirs) {
    for (const candidate of candidateNames(name, env)) {
      const path = join(dir, candidate)
      if (await isExecutable(path)) {
        return path
      }
    }
  }
  return undefined
}

export async function discoverTools(env: Environment = process.env): Promise<DiscoveredTools> {
  return {
    interpreterPath: await findProgram(INTERPRETER_PROGRAM, env, SETUP_ENV_VARS.XCPP_PATH),
    jupyterPath: await findProgram(JUPYTER_PROGRAM, env, SETUP_ENV_VARS.JUPYTER_PATH),
  }
}

/**
 * Installation prefix of xeus-cling.
 *
 * Explicit value, then the environment override, then two levels above
 * the interpreter (`<prefix>/bin/xcpp`).
 */
export function resolveXeusClingPrefix(
  interpreterPath: string,
  env: Environment = process.env,
  explicit?: string
): string {
  const configured = explicit ?? env[SETUP_ENV_VARS.XEUS_CLING_PREFIX]
  if (configured) {
    return resolve(configured)
  }
  return dirname(dirname(interpreterPath))
}
