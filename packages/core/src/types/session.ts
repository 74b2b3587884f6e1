/**
 * Kernel session types.
 *
 * A session is one generation pass: one bootstrap header and one kernel
 * manifest, plus the documentation fragments that belong to them.
 */

import type { ResolvedProperty } from './property.js'
import type { ClingStandard } from './standard.js'
import type { TargetInfo, TargetRef } from './target.js'

/**
 * Caller-supplied options for one kernel (the configuration surface).
 */
export interface KernelSetupOptions {
  /** Shared-library targets the kernel links against */
  targets?: string[] | undefined
  /** Extra include directories (may be deferred expressions) */
  includeDirectories?: string[] | undefined
  /** Extra shared libraries to load (may be deferred expressions) */
  linkLibraries?: string[] | undefined
  /** Directories to search for shared libraries */
  libraryDirectories?: string[] | undefined
  /** Compiler flags passed to the interpreter */
  compileFlags?: string[] | undefined
  /** Preprocessor definitions passed to the interpreter */
  compileDefinitions?: string[] | undefined
  /** Headers included into every session on start-up */
  setupHeaders?: string[] | undefined
  /** Documentation base URLs, paired by index with doxygenTagfiles */
  doxygenUrls?: string[] | undefined
  /** Doxygen tag files, paired by index with doxygenUrls */
  doxygenTagfiles?: string[] | undefined
  /** Kernel logo images (logo-32x32.png, logo-64x64.png) */
  kernelLogoFiles?: string[] | undefined
  /** Display name (default: `C++<standard> (<project>)`) */
  kernelName?: string | undefined
  /** Session standard: 11, 14 or 17 (default: 17) */
  cxxStandard?: number | string | undefined
  /** Fail when the interpreter is not installed (default: false) */
  required?: boolean | undefined
  /** Do not register the kernel on install (default: false) */
  noInstall?: boolean | undefined
}

/**
 * Aggregated configuration for one session.
 *
 * Immutable: every stage returns a new request.
 */
export interface SessionRequest {
  /** Enclosing project name, used for the default display name */
  readonly projectName: string
  /** Directory relative paths in the configuration are resolved against */
  readonly sourceDir: string
  /** Directory generated artifacts are written to */
  readonly binaryDir: string
  /** Targets, in configured order */
  readonly targets: readonly TargetRef[]
  /** Information collected from the build graph for each target */
  readonly targetInfos: readonly TargetInfo[]
  readonly includeDirectories: readonly ResolvedProperty[]
  readonly libraryDirectories: readonly ResolvedProperty[]
  readonly linkLibraries: readonly ResolvedProperty[]
  readonly compileFlags: readonly ResolvedProperty[]
  readonly compileDefinitions: readonly ResolvedProperty[]
  readonly setupHeaders: readonly string[]
  readonly kernelName?: string | undefined
  readonly cxxStandard: ClingStandard
  readonly required: boolean
  readonly noInstall: boolean
  readonly logoFiles: readonly string[]
  readonly doxygenUrls: readonly string[]
  readonly doxygenTagfiles: readonly string[]
}

/** A documentation URL and the tag file describing it */
export interface TagPair {
  /** Base URL, always ending in `/` */
  url: string
  /** Tag file identifier as configured */
  tag: string
}
