/**
 * @cling-kernel-setup/cli - Command line for kernel generation.
 *
 * Commands:
 * - generate: write xeus_cling.hh, kernel.json and documentation fragments
 * - install: generate, install documentation and register the kernelspec
 * - docs install: generate and install documentation only
 * - id: print the kernel id for a display name
 */

import { Command } from 'commander'

import { registerDocsCommands } from './commands/docs/index.js'
import { registerGenerateCommand } from './commands/generate.js'
import { registerIdCommand } from './commands/id.js'
import { registerInstallCommand } from './commands/install.js'

export { createCliLogger, reportError } from './output.js'
export {
  findSetupFile,
  generateProject,
  loadProject,
  type GenerateOptions,
  type LoadedProject,
  type ProjectOptions,
} from './project.js'

export const VERSION = '0.1.0'

/**
 * Build the command tree.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('cling-kernel-setup')
    .description('Generate and register xeus-cling Jupyter kernels for shared-library targets')
    .version(VERSION)

  registerGenerateCommand(program)
  registerInstallCommand(program)
  registerDocsCommands(program)
  registerIdCommand(program)

  return program
}
