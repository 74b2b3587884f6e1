/**
 * Docs commands - Documentation tag file management.
 *
 * WHY: Inline documentation can be refreshed in the xeus-cling prefix
 * without re-registering the kernelspec.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'
import type { Command } from 'commander'

import { installDocumentation } from '@cling-kernel-setup/engine'

import { createCliLogger, reportError } from '../../output.js'
import type { ProjectOptions } from '../../project.js'
import { generateProject } from '../../project.js'

interface DocsInstallOptions extends ProjectOptions {
  prefix?: string | undefined
}

function registerDocsInstallCommand(docs: Command): void {
  docs
    .command('install')
    .description('Generate the kernel and install its documentation fragments and tag files')
    .option('--config <path>', 'Path to kernel-setup.toml (default: search upward)')
    .option('--graph <path>', 'Build graph export (default: from kernel-setup.toml)')
    .option('--build-dir <path>', 'Output directory (default: from kernel-setup.toml)')
    .option('--prefix <path>', 'xeus-cling installation prefix (default: derived from xcpp)')
    .action(async (options: DocsInstallOptions) => {
      const logger = createCliLogger()

      try {
        const result = await generateProject(options, logger)
        if (result.status !== 'generated') {
          return
        }

        const { documentation } = result.kernel
        if (documentation.entries.length === 0) {
          console.log(chalk.yellow('No documentation configured (doxygen_urls / doxygen_tagfiles)'))
          return
        }

        const prefix = options.prefix ? resolve(options.prefix) : result.kernel.prefix
        logger.info(`Installing Doxygen information into ${prefix}...`)
        const installed = await installDocumentation(documentation, prefix)
        for (const file of [...installed.fragments, ...installed.tagFiles]) {
          console.log(chalk.gray(`  ${file}`))
        }
      } catch (error) {
        reportError(error)
        process.exit(1)
      }
    })
}

/**
 * Register all docs subcommands.
 */
export function registerDocsCommands(program: Command): void {
  const docs = program.command('docs').description('Documentation commands')

  registerDocsInstallCommand(docs)
}
