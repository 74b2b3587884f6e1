/**
 * Terminal output helpers shared by all commands.
 */

import chalk from 'chalk'

import { type SetupLogger, isSetupError } from '@cling-kernel-setup/core'

/**
 * Logger that colours progress blue and warnings yellow.
 */
export function createCliLogger(): SetupLogger {
  return {
    info: (message) => {
      console.log(chalk.blue(message))
    },
    warn: (warning) => {
      console.warn(chalk.yellow(`[${warning.code}] ${warning.message}`))
    },
  }
}

/**
 * Print an error the way every command reports failures.
 */
export function reportError(error: unknown): void {
  if (error instanceof Error) {
    console.error(chalk.red(`Error: ${error.message}`))
  } else {
    console.error(chalk.red(`Error: ${String(error)}`))
  }
  if (isSetupError(error)) {
    console.error(chalk.gray(`  code: ${error.code}`))
  }
}
