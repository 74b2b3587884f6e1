/**
 * Kernel option normalization.
 *
 * WHY: Options arrive as loosely typed records (a TOML table, a JSON blob
 * from a build integration). Keys are matched case-insensitively so both
 * `include_directories` and `INCLUDE_DIRECTORIES` work. Unknown keys are
 * reported, not rejected, so a typo never breaks a build.
 */

import { InvalidConfigError } from '../errors.js'
import type { KernelSetupOptions } from '../types/session.js'
import { type SetupWarning, WARNING_CODES } from '../warnings.js'

type OptionKind = 'list' | 'string' | 'standard' | 'flag'

interface OptionDefinition {
  field: keyof KernelSetupOptions
  kind: OptionKind
}

/** Recognized option keys (lower snake_case) */
export const OPTION_KEYS: Readonly<Record<string, OptionDefinition>> = {
  targets: { field: 'targets', kind: 'list' },
  include_directories: { field: 'includeDirectories', kind: 'list' },
  link_libraries: { field: 'linkLibraries', kind: 'list' },
  library_directories: { field: 'libraryDirectories', kind: 'list' },
  compile_flags: { field: 'compileFlags', kind: 'list' },
  compile_definitions: { field: 'compileDefinitions', kind: 'list' },
  setup_headers: { field: 'setupHeaders', kind: 'list' },
  doxygen_urls: { field: 'doxygenUrls', kind: 'list' },
  doxygen_tagfiles: { field: 'doxygenTagfiles', kind: 'list' },
  kernel_logo_files: { field: 'kernelLogoFiles', kind: 'list' },
  kernel_name: { field: 'kernelName', kind: 'string' },
  cxx_standard: { field: 'cxxStandard', kind: 'standard' },
  required: { field: 'required', kind: 'flag' },
  no_install: { field: 'noInstall', kind: 'flag' },
}

export interface NormalizedOptions {
  options: KernelSetupOptions
  warnings: SetupWarning[]
}

function toList(value: unknown, path: string): string[] {
  if (typeof value === 'string') {
    return [value]
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return [...value]
  }
  throw new InvalidConfigError('expected a string or a list of strings', path)
}

function toFlag(value: unknown, path: string): boolean {
  if (typeof value === 'boolean') {
    return value
  }
  throw new InvalidConfigError('expected true or false', path)
}

/**
 * Map a loosely typed record onto kernel setup options.
 *
 * @param record - Raw option table
 * @param scope - Name of the table, used in messages (e.g. `kernel`)
 */
export function normalizeSetupOptions(
  record: Record<string, unknown>,
  scope = 'kernel'
): NormalizedOptions {
  const options: KernelSetupOptions = {}
  const warnings: SetupWarning[] = []

  for (const [key, value] of Object.entries(record)) {
    const normalized = key.toLowerCase()
    const definition = Object.hasOwn(OPTION_KEYS, normalized) ? OPTION_KEYS[normalized] : undefined
    const path = `${scope}.${key}`

    if (!definition) {
      warnings.push({
        code: WARNING_CODES.UNKNOWN_OPTION,
        message: `Unrecognized option "${path}": this often indicates a typo`,
        details: { key, scope },
      })
      continue
    }

    switch (definition.kind) {
      case 'list':
        Object.assign(options, { [definition.field]: toList(value, path) })
        break
      case 'string':
        if (typeof value !== 'string') {
          throw new InvalidConfigError('expected a string', path)
        }
        Object.assign(options, { [definition.field]: value })
        break
      case 'standard':
        if (typeof value !== 'string' && typeof value !== 'number') {
          throw new InvalidConfigError('expected a number such as 17', path)
        }
        options.cxxStandard = value
        break
      case 'flag':
        Object.assign(options, { [definition.field]: toFlag(value, path) })
        break
    }
  }

  return { options, warnings }
}
