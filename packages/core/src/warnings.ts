/**
 * Non-fatal diagnostics and the logger they are reported through.
 *
 * WHY: Typos in configuration keys, or a missing `jupyter` executable, must
 * not break a build. They are reported and the pass continues.
 */

export const WARNING_CODES = {
  UNKNOWN_OPTION: 'W101',
  JUPYTER_NOT_FOUND: 'W102',
} as const

export type WarningCode = (typeof WARNING_CODES)[keyof typeof WARNING_CODES]

export interface SetupWarning {
  code: WarningCode
  message: string
  details?: Record<string, unknown> | undefined
}

/**
 * Sink for progress messages and warnings.
 */
export interface SetupLogger {
  info(message: string): void
  warn(warning: SetupWarning): void
}

export const consoleLogger: SetupLogger = {
  info: (message) => console.log(message),
  warn: (warning) => console.warn(`[${warning.code}] ${warning.message}`),
}

export const silentLogger: SetupLogger = {
  info: () => {},
  warn: () => {},
}

/**
 * Logger that keeps everything it receives, for callers that report later.
 */
export function createRecordingLogger(): SetupLogger & {
  messages: string[]
  warnings: SetupWarning[]
} {
  const messages: string[] = []
  const warnings: SetupWarning[] = []
  return {
    messages,
    warnings,
    info: (message) => {
      messages.push(message)
    },
    warn: (warning) => {
      warnings.push(warning)
    },
  }
}
