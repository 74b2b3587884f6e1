/**
 * Install command - Generate the kernel and register it with Jupyter.
 *
 * WHY: Registration is a separate step from generation so that builds
 * never touch the Jupyter environment unless asked to. This command runs
 * generation, installs documentation into the xeus-cling prefix and then
 * registers the kernelspec.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'
import type { Command } from 'commander'

import { discoverTools, installKernel } from '@cling-kernel-setup/engine'

import { createCliLogger, reportError } from '../output.js'
import type { ProjectOptions } from '../project.js'
import { generateProject } from '../project.js'

interface InstallCommandOptions extends ProjectOptions {
  prefix?: string | undefined
  force?: boolean | undefined
}

/**
 * Register the install command.
 */
export function registerInstallCommand(program: Command): void {
  program
    .command('install')
    .description('Generate the kernel, install its documentation and register the kernelspec')
    .option('--config <path>', 'Path to kernel-setup.toml (default: search upward)')
    .option('--graph <path>', 'Build graph export (default: from kernel-setup.toml)')
    .option('--build-dir <path>', 'Output directory (default: from kernel-setup.toml)')
    .option('--prefix <path>', 'xeus-cling installation prefix (default: derived from xcpp)')
    .option('--force', 'Install even when the kernel is configured with no_install')
    .action(async (options: InstallCommandOptions) => {
      const logger = createCliLogger()

      try {
        const result = await generateProject(options, logger)
        if (result.status !== 'generated') {
          return
        }

        const tools = await discoverTools()
        const installed = await installKernel(result.kernel, {
          jupyterPath: tools.jupyterPath,
          prefix: options.prefix ? resolve(options.prefix) : undefined,
          force: options.force,
          logger,
        })

        if (installed.skipped) {
          return
        }
        for (const file of [
          ...(installed.documentation?.fragments ?? []),
          ...(installed.documentation?.tagFiles ?? []),
        ]) {
          console.log(chalk.gray(`  ${file}`))
        }
        if (installed.registration?.registered) {
          console.log(chalk.green(`✓ Kernel "${result.kernel.displayName}" installed`))
        }
      } catch (error) {
        reportError(error)
        process.exit(1)
      }
    })
}
