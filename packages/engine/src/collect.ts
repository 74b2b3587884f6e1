/**
 * Session request assembly and target property collection.
 *
 * WHY: Manually configured values and values exported by targets end up in
 * the same ordered lists. Manual entries come first; later directives may
 * shadow earlier ones inside the interpreter, so order is kept as given and
 * duplicates are not removed.
 */

import {
  type BuildGraph,
  InvalidConfigError,
  type KernelSetupOptions,
  type SessionRequest,
  TARGET_PROPERTIES,
  type TargetInfo,
  type TargetRef,
  UnknownTargetError,
  isTargetRef,
  parsePropertyValue,
  targetFile,
  targetProperty,
} from '@cling-kernel-setup/core'

import { assertTargetCompatible, parseSessionStandard } from './validate.js'

/** Where a request lives */
export interface SessionLocation {
  /** Enclosing project name */
  projectName: string
  /** Directory relative inputs resolve against */
  sourceDir: string
  /** Directory artifacts are generated into */
  binaryDir: string
}

function toTargetRefs(names: readonly string[]): TargetRef[] {
  return names.map((name) => {
    if (!isTargetRef(name)) {
      throw new InvalidConfigError(`invalid target name "${name}"`, 'kernel.targets')
    }
    return name
  })
}

/**
 * Build the initial request from caller options.
 * The session standard is checked here, before anything else is looked at.
 */
export function createSessionRequest(
  options: KernelSetupOptions,
  location: SessionLocation
): SessionRequest {
  const cxxStandard = parseSessionStandard(options.cxxStandard)

  return {
    projectName: location.projectName,
    sourceDir: location.sourceDir,
    binaryDir: location.binaryDir,
    targets: toTargetRefs(options.targets ?? []),
    targetInfos: [],
    includeDirectories: (options.includeDirectories ?? []).map(parsePropertyValue),
    libraryDirectories: (options.libraryDirectories ?? []).map(parsePropertyValue),
    linkLibraries: (options.linkLibraries ?? []).map(parsePropertyValue),
    compileFlags: (options.compileFlags ?? []).map(parsePropertyValue),
    compileDefinitions: (options.compileDefinitions ?? []).map(parsePropertyValue),
    setupHeaders: [...(options.setupHeaders ?? [])],
    kernelName: options.kernelName,
    cxxStandard,
    required: options.required ?? false,
    noInstall: options.noInstall ?? false,
    logoFiles: [...(options.kernelLogoFiles ?? [])],
    doxygenUrls: [...(options.doxygenUrls ?? [])],
    doxygenTagfiles: [...(options.doxygenTagfiles ?? [])],
  }
}

/**
 * Look up every target, check it can be loaded, and append its exported
 * properties and artifact to the request.
 *
 * Interface properties and the artifact path stay deferred: they are
 * resolved by the graph when the artifacts are rendered.
 */
export function collectTargetProperties(request: SessionRequest, graph: BuildGraph): SessionRequest {
  const targetInfos: TargetInfo[] = []
  const includeDirectories = [...request.includeDirectories]
  const compileFlags = [...request.compileFlags]
  const compileDefinitions = [...request.compileDefinitions]
  const linkLibraries = [...request.linkLibraries]

  for (const ref of request.targets) {
    const info = graph.getTarget(ref)
    if (!info) {
      throw new UnknownTargetError(ref)
    }
    assertTargetCompatible(info, request.cxxStandard)
    targetInfos.push(info)

    includeDirectories.push(targetProperty(ref, TARGET_PROPERTIES.INCLUDE_DIRECTORIES))
    compileFlags.push(targetProperty(ref, TARGET_PROPERTIES.COMPILE_OPTIONS))
    compileDefinitions.push(targetProperty(ref, TARGET_PROPERTIES.COMPILE_DEFINITIONS))
    linkLibraries.push(targetFile(ref))
  }

  return {
    ...request,
    targetInfos,
    includeDirectories,
    compileFlags,
    compileDefinitions,
    linkLibraries,
  }
}
