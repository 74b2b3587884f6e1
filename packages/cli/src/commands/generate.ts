/**
 * Generate command - Write the kernel header and manifest.
 *
 * WHY: This is the build-time entrypoint. It turns kernel-setup.toml and
 * the build graph export into xeus_cling.hh, kernel.json and the
 * documentation fragments in the build directory. With --dry-run it
 * prints the unresolved templates instead.
 */

import chalk from 'chalk'
import type { Command } from 'commander'

import {
  formatHeaderTemplate,
  formatManifestTemplate,
  serializeManifest,
} from '@cling-kernel-setup/engine'

import { createCliLogger, reportError } from '../output.js'
import type { ProjectOptions } from '../project.js'
import { generateProject } from '../project.js'

interface GenerateCommandOptions extends ProjectOptions {
  dryRun?: boolean | undefined
}

/**
 * Register the generate command.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate the kernel header, manifest and documentation fragments')
    .option('--config <path>', 'Path to kernel-setup.toml (default: search upward)')
    .option('--graph <path>', 'Build graph export (default: from kernel-setup.toml)')
    .option('--build-dir <path>', 'Output directory (default: from kernel-setup.toml)')
    .option('--dry-run', 'Print the templates without writing anything')
    .action(async (options: GenerateCommandOptions) => {
      const logger = createCliLogger()

      try {
        const result = await generateProject(options, logger)

        switch (result.status) {
          case 'skipped':
            return
          case 'planned': {
            const { artifacts } = result
            console.log(chalk.bold(`Kernel: ${artifacts.displayName}`))
            console.log(chalk.gray(`Id: ${artifacts.kernelId}`))
            console.log('')
            console.log(chalk.bold(artifacts.header.path))
            process.stdout.write(formatHeaderTemplate(artifacts.header))
            console.log('')
            console.log(chalk.bold(artifacts.manifest.path))
            process.stdout.write(serializeManifest(formatManifestTemplate(artifacts.manifest)))
            return
          }
          case 'generated': {
            const { kernel } = result
            console.log(chalk.green(`✓ Kernel "${kernel.displayName}" generated`))
            console.log(chalk.gray(`  Id: ${kernel.kernelId}`))
            for (const file of kernel.files) {
              console.log(chalk.gray(`  ${file}`))
            }
            return
          }
        }
      } catch (error) {
        reportError(error)
        process.exit(1)
      }
    })
}
