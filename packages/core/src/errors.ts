/**
 * Error taxonomy for kernel setup.
 *
 * WHY: Callers (the CLI, build integrations) need to tell a missing
 * interpreter apart from a misconfigured target or a failed download
 * without parsing messages. Every error carries a stable snake_case code.
 */

import type { CxxStandard, ClingStandard } from './types/standard.js'
import { type TargetKind, formatTargetKind } from './types/target.js'

export type SetupErrorCode =
  | 'prerequisite_missing'
  | 'unknown_target'
  | 'target_kind'
  | 'standard_mismatch'
  | 'unsupported_standard'
  | 'pairing_length'
  | 'insecure_url'
  | 'illegal_asset_name'
  | 'missing_asset'
  | 'tag_fetch_failed'
  | 'unresolvable_expression'
  | 'invalid_config'
  | 'registration_failed'

export class SetupError extends Error {
  readonly code: SetupErrorCode

  constructor(code: SetupErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SetupError'
    this.code = code
  }
}

export function isSetupError(value: unknown): value is SetupError {
  return value instanceof SetupError
}

/** The interpreter is not installed but the kernel was marked as required */
export class PrerequisiteMissingError extends SetupError {
  constructor(readonly program: string) {
    super(
      'prerequisite_missing',
      `Kernel setup was marked as required, but the interpreter "${program}" was not found`
    )
    this.name = 'PrerequisiteMissingError'
  }
}

export class UnknownTargetError extends SetupError {
  constructor(readonly target: string) {
    super('unknown_target', `Kernel setup was passed a target ${target}, but it does not exist`)
    this.name = 'UnknownTargetError'
  }
}

/** Only shared libraries can be loaded into an interpreter session */
export class TargetKindError extends SetupError {
  constructor(
    readonly target: string,
    readonly kind: TargetKind
  ) {
    super(
      'target_kind',
      `Kernel setup expected target ${target} to be a shared library, but it is a ${formatTargetKind(kind)}`
    )
    this.name = 'TargetKindError'
  }
}

export class StandardMismatchError extends SetupError {
  constructor(
    readonly target: string,
    readonly targetStandard: CxxStandard,
    readonly sessionStandard: ClingStandard
  ) {
    super(
      'standard_mismatch',
      `Target ${target} requires C++${targetStandard}, although the kernel is set up for C++${sessionStandard}`
    )
    this.name = 'StandardMismatchError'
  }
}

export class UnsupportedStandardError extends SetupError {
  constructor(
    readonly requested: string,
    readonly reason: 'unknown' | 'unsupported'
  ) {
    super(
      'unsupported_standard',
      reason === 'unknown'
        ? `Expected a C++ standard from {11, 14, 17}, got "${requested}"`
        : `C++${requested} is not supported by the interpreter (supported: 11, 14, 17)`
    )
    this.name = 'UnsupportedStandardError'
  }
}

export class PairingLengthError extends SetupError {
  constructor(
    readonly urlCount: number,
    readonly tagfileCount: number
  ) {
    super(
      'pairing_length',
      `Got ${urlCount} documentation URL(s) but ${tagfileCount} tag file(s); the lists must have the same length`
    )
    this.name = 'PairingLengthError'
  }
}

export class InsecureURLError extends SetupError {
  constructor(readonly url: string) {
    super('insecure_url', `Expected an https:// URL for documentation, got ${url}`)
    this.name = 'InsecureURLError'
  }
}

export class IllegalAssetNameError extends SetupError {
  constructor(
    readonly file: string,
    readonly detail: string
  ) {
    super('illegal_asset_name', `Illegal asset name ${file}: ${detail}`)
    this.name = 'IllegalAssetNameError'
  }
}

export class MissingAssetError extends SetupError {
  constructor(
    readonly file: string,
    options?: { cause?: unknown }
  ) {
    super('missing_asset', `Asset file ${file} could not be read`, options)
    this.name = 'MissingAssetError'
  }
}

/** A tag file could not be downloaded; the transport error is the cause */
export class TagFetchError extends SetupError {
  constructor(
    readonly url: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause)
    super('tag_fetch_failed', `Error downloading tag file from ${url}: ${detail}`, { cause })
    this.name = 'TagFetchError'
  }
}

export class UnresolvableExpressionError extends SetupError {
  constructor(
    readonly expression: string,
    detail: string
  ) {
    super('unresolvable_expression', `Cannot resolve ${expression}: ${detail}`)
    this.name = 'UnresolvableExpressionError'
  }
}

export class InvalidConfigError extends SetupError {
  constructor(
    message: string,
    readonly path?: string | undefined,
    options?: { cause?: unknown }
  ) {
    super('invalid_config', path ? `${path}: ${message}` : message, options)
    this.name = 'InvalidConfigError'
  }
}

export class RegistrationError extends SetupError {
  constructor(
    readonly command: readonly string[],
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(
      'registration_failed',
      `Kernel registration failed (exit code ${exitCode}): ${command.join(' ')}${stderr ? `\n${stderr.trim()}` : ''}`
    )
    this.name = 'RegistrationError'
  }
}
