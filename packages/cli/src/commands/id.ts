/**
 * Id command - Print the kernel id for a display name.
 */

import type { Command } from 'commander'

import { deriveKernelId } from '@cling-kernel-setup/core'

/**
 * Register the id command.
 */
export function registerIdCommand(program: Command): void {
  program
    .command('id')
    .description('Print the kernelspec name derived from a display name')
    .argument('<display-name>', 'Kernel display name, e.g. "C++17 (adder)"')
    .action((displayName: string) => {
      console.log(deriveKernelId(displayName))
    })
}
