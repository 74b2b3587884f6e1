/**
 * Build target types.
 *
 * A target is owned by the host build graph. The kernel setup only holds
 * a reference to it and queries its properties.
 */

import type { CxxStandard } from './standard.js'
import type { PropertyResolver } from './property.js'

/** Name of a target in the host build graph */
export type TargetRef = string & { readonly __brand: 'TargetRef' }

/** Target classification, mirroring the host's TYPE property */
export type TargetKind =
  | 'shared-library'
  | 'static-library'
  | 'module-library'
  | 'object-library'
  | 'interface-library'
  | 'executable'
  | 'utility'

/** What the kernel setup needs to know about a target up front */
export interface TargetInfo {
  /** Target name */
  name: TargetRef
  /** Target classification */
  kind: TargetKind
  /** Standard the target declares, if any */
  cxxStandard?: CxxStandard | undefined
}

/**
 * The host build graph as seen by the kernel setup.
 */
export interface BuildGraph extends PropertyResolver {
  /** Look up a target, or undefined when the graph has no such target */
  getTarget(ref: TargetRef): TargetInfo | undefined
}

/** Properties requested from every target, transitively */
export const TARGET_PROPERTIES = {
  INCLUDE_DIRECTORIES: 'INTERFACE_INCLUDE_DIRECTORIES',
  COMPILE_OPTIONS: 'INTERFACE_COMPILE_OPTIONS',
  COMPILE_DEFINITIONS: 'INTERFACE_COMPILE_DEFINITIONS',
  LINK_LIBRARIES: 'INTERFACE_LINK_LIBRARIES',
} as const

// ============================================================================
// Type guards and constructors
// ============================================================================

const TARGET_REF_PATTERN = /^[^\s;$<>,]+$/

const TARGET_TYPES: Record<string, TargetKind> = {
  SHARED_LIBRARY: 'shared-library',
  STATIC_LIBRARY: 'static-library',
  MODULE_LIBRARY: 'module-library',
  OBJECT_LIBRARY: 'object-library',
  INTERFACE_LIBRARY: 'interface-library',
  EXECUTABLE: 'executable',
  UTILITY: 'utility',
}

export function isTargetRef(value: string): value is TargetRef {
  return TARGET_REF_PATTERN.test(value)
}

export function asTargetRef(value: string): TargetRef {
  if (!isTargetRef(value)) {
    throw new Error(`Invalid target name: "${value}"`)
  }
  return value
}

/**
 * Parse a host TYPE string (e.g. `SHARED_LIBRARY`) into a target kind.
 */
export function parseTargetKind(value: string): TargetKind | undefined {
  return TARGET_TYPES[value.toUpperCase()]
}

export function formatTargetKind(kind: TargetKind): string {
  switch (kind) {
    case 'shared-library':
      return 'SHARED_LIBRARY'
    case 'static-library':
      return 'STATIC_LIBRARY'
    case 'module-library':
      return 'MODULE_LIBRARY'
    case 'object-library':
      return 'OBJECT_LIBRARY'
    case 'interface-library':
      return 'INTERFACE_LIBRARY'
    case 'executable':
      return 'EXECUTABLE'
    case 'utility':
      return 'UTILITY'
  }
}
