/**
 * Kernel installation (install command).
 *
 * WHY: Orchestrates registering a generated kernel:
 * - Copy documentation fragments and tag files into the xeus-cling prefix
 * - Register the output directory as a kernelspec with Jupyter
 *
 * Every step overwrites what a previous install left, so installing twice
 * is the same as installing once.
 */

import { execFile } from 'node:child_process'

import {
  RegistrationError,
  type SetupLogger,
  WARNING_CODES,
  consoleLogger,
  copyFilesInto,
  getTagConfigPath,
  getTagFilesPath,
} from '@cling-kernel-setup/core'

import type { GeneratedKernel } from './setup.js'
import type { DocumentationBundle } from './tagfiles.js'

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Runs external commands. Substituted with a fake in tests.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<CommandResult>
}

/** Runner backed by `child_process.execFile` */
export const processRunner: CommandRunner = {
  run(command, args) {
    return new Promise((resolve, reject) => {
      execFile(command, [...args], { encoding: 'utf-8' }, (error, stdout, stderr) => {
        if (error && typeof error.code !== 'number') {
          reject(error)
          return
        }
        resolve({ exitCode: error ? Number(error.code) : 0, stdout, stderr })
      })
    })
  },
}

/**
 * Options for install operation.
 */
export interface InstallOptions {
  /** Jupyter executable; registration is skipped with a warning when absent */
  jupyterPath?: string | undefined
  /** xeus-cling prefix override (default: the one recorded at generation) */
  prefix?: string | undefined
  /** Command runner (default: processRunner) */
  runner?: CommandRunner | undefined
  logger?: SetupLogger | undefined
  /** Install even when the kernel was configured with noInstall */
  force?: boolean | undefined
  /** Install documentation (default: true) */
  documentation?: boolean | undefined
  /** Register the kernelspec (default: true) */
  registration?: boolean | undefined
}

export interface DocumentationInstallResult {
  /** Installed fragment paths */
  fragments: string[]
  /** Installed tag file paths */
  tagFiles: string[]
}

export interface RegistrationResult {
  registered: boolean
  /** Command that was run, if any */
  command?: string[] | undefined
}

/**
 * Result of install operation.
 */
export interface InstallResult {
  /** True when nothing was done because of noInstall */
  skipped: boolean
  documentation?: DocumentationInstallResult | undefined
  registration?: RegistrationResult | undefined
}

/**
 * Arguments for `jupyter kernelspec install`.
 */
export function getKernelspecArgs(kernel: Pick<GeneratedKernel, 'outputDir' | 'kernelId'>): string[] {
  return ['kernelspec', 'install', kernel.outputDir, '--sys-prefix', `--name=${kernel.kernelId}`]
}

/**
 * Copy fragments into `<prefix>/etc/xeus-cling/tags.d` and tag files into
 * `<prefix>/share/xeus-cling/tagfiles`.
 */
export async function installDocumentation(
  documentation: DocumentationBundle,
  prefix: string
): Promise<DocumentationInstallResult> {
  const fragments = await copyFilesInto(documentation.fragmentFiles, getTagConfigPath(prefix))
  const tagFiles = await copyFilesInto(documentation.tagFiles, getTagFilesPath(prefix))
  return { fragments, tagFiles }
}

/**
 * Register the kernel output directory with Jupyter.
 */
export async function registerKernelspec(
  kernel: Pick<GeneratedKernel, 'outputDir' | 'kernelId'>,
  options: Pick<InstallOptions, 'jupyterPath' | 'runner' | 'logger'>
): Promise<RegistrationResult> {
  const logger = options.logger ?? consoleLogger

  if (!options.jupyterPath) {
    logger.warn({
      code: WARNING_CODES.JUPYTER_NOT_FOUND,
      message: 'The jupyter executable was not found, not installing kernel spec',
    })
    return { registered: false }
  }

  const args = getKernelspecArgs(kernel)
  const command = [options.jupyterPath, ...args]
  const runner = options.runner ?? processRunner
  logger.info('Install kernelspec into the jupyter environment...')

  const result = await runner.run(options.jupyterPath, args)
  if (result.exitCode !== 0) {
    throw new RegistrationError(command, result.exitCode, result.stderr)
  }

  return { registered: true, command }
}

/**
 * Install a generated kernel.
 *
 * Documentation is installed before the kernelspec is registered.
 */
export async function installKernel(
  kernel: GeneratedKernel,
  options: InstallOptions = {}
): Promise<InstallResult> {
  const logger = options.logger ?? consoleLogger

  if (kernel.noInstall && !options.force) {
    logger.info('Kernel is configured with no_install, skipping installation')
    return { skipped: true }
  }

  let documentation: DocumentationInstallResult | undefined
  if (options.documentation !== false && kernel.documentation.entries.length > 0) {
    logger.info('Installing Doxygen information for Jupyter inline documentation...')
    documentation = await installDocumentation(kernel.documentation, options.prefix ?? kernel.prefix)
  }

  let registration: RegistrationResult | undefined
  if (options.registration !== false) {
    registration = await registerKernelspec(kernel, options)
  }

  return { skipped: false, documentation, registration }
}
