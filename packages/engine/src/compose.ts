/**
 * Artifact composition.
 *
 * WHY: The bootstrap header and the kernel manifest depend on values only
 * the host build graph knows once it has been generated (artifact paths,
 * exported include directories). Composition therefore produces templates
 * that still hold those values as deferred expressions; rendering resolves
 * them later (see render.ts).
 */

import {
  type ClingStandard,
  type ResolvedProperty,
  type SessionRequest,
  deriveKernelId,
  getHeaderPath,
  getManifestPath,
} from '@cling-kernel-setup/core'

/** Placeholder Jupyter substitutes with the connection file path */
export const CONNECTION_FILE_PLACEHOLDER = '{connection_file}'

/** One line (or group of lines, for deferred lists) of the bootstrap header */
export type HeaderDirective =
  | { kind: 'include-path'; value: ResolvedProperty }
  | { kind: 'library-path'; value: ResolvedProperty }
  | { kind: 'load'; value: ResolvedProperty }
  | { kind: 'setup-header'; path: string }

export interface DeferredHeader {
  /** Final path of the header */
  path: string
  /** Include paths, library paths, loads, then setup headers */
  directives: HeaderDirective[]
}

/** One interpreter argument, or a group of them for deferred lists */
export type ArgvEntry =
  | { kind: 'fixed'; value: string }
  | { kind: 'flag'; value: ResolvedProperty; prefix: string }

export interface DeferredManifest {
  /** Final path of the manifest */
  path: string
  displayName: string
  argv: ArgvEntry[]
  language: string
}

export interface ComposedArtifacts {
  /** Stable identifier derived from the display name */
  kernelId: string
  displayName: string
  header: DeferredHeader
  manifest: DeferredManifest
}

export interface ComposeOptions {
  /** Absolute path of the interpreter binary */
  interpreterPath: string
}

export function defaultDisplayName(standard: ClingStandard, projectName: string): string {
  return `C++${standard} (${projectName})`
}

export function languageTag(standard: ClingStandard): string {
  return `C++${standard}`
}

export function composeHeader(request: SessionRequest): DeferredHeader {
  const directives: HeaderDirective[] = [
    ...request.includeDirectories.map((value): HeaderDirective => ({ kind: 'include-path', value })),
    ...request.libraryDirectories.map((value): HeaderDirective => ({ kind: 'library-path', value })),
    ...request.linkLibraries.map((value): HeaderDirective => ({ kind: 'load', value })),
    ...request.setupHeaders.map((path): HeaderDirective => ({ kind: 'setup-header', path })),
  ]
  return { path: getHeaderPath(request.binaryDir), directives }
}

export function composeManifest(
  request: SessionRequest,
  displayName: string,
  options: ComposeOptions
): DeferredManifest {
  const fixed = (value: string): ArgvEntry => ({ kind: 'fixed', value })

  const argv: ArgvEntry[] = [
    fixed(options.interpreterPath),
    fixed('-f'),
    fixed(CONNECTION_FILE_PLACEHOLDER),
    fixed(`-std=c++${request.cxxStandard}`),
    ...request.compileFlags.map((value): ArgvEntry => ({ kind: 'flag', value, prefix: '' })),
    ...request.compileDefinitions.map((value): ArgvEntry => ({ kind: 'flag', value, prefix: '-D' })),
    fixed('-include'),
    fixed(getHeaderPath(request.binaryDir)),
  ]

  return {
    path: getManifestPath(request.binaryDir),
    displayName,
    argv,
    language: languageTag(request.cxxStandard),
  }
}

/**
 * Compose both artifacts for a validated request.
 */
export function composeArtifacts(request: SessionRequest, options: ComposeOptions): ComposedArtifacts {
  // An empty kernel name counts as unset
  const displayName =
    request.kernelName || defaultDisplayName(request.cxxStandard, request.projectName)

  return {
    kernelId: deriveKernelId(displayName),
    displayName,
    header: composeHeader(request),
    manifest: composeManifest(request, displayName, options),
  }
}
