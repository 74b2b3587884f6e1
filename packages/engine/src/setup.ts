/**
 * Kernel setup orchestration (generate command).
 *
 * WHY: Orchestrates one generation pass:
 * - Discover the interpreter (skip or fail early when it is missing)
 * - Build and collect the session request
 * - Validate it
 * - Compose the deferred artifacts
 * - Resolve logos and documentation
 * - Render and write everything
 *
 * Every failure before the final write step leaves the output directory
 * untouched.
 */

import { readFile } from 'node:fs/promises'
import { basename, isAbsolute, join, resolve } from 'node:path'

import {
  type BuildGraph,
  type KernelSetupOptions,
  MissingAssetError,
  PrerequisiteMissingError,
  type SessionRequest,
  type SetupLogger,
  atomicWriteFile,
  consoleLogger,
} from '@cling-kernel-setup/core'

import { type SessionLocation, collectTargetProperties, createSessionRequest } from './collect.js'
import { type ComposedArtifacts, composeArtifacts } from './compose.js'
import { type Environment, INTERPRETER_PROGRAM, discoverTools, resolveXeusClingPrefix } from './discovery.js'
import {
  type GeneratedArtifact,
  type KernelManifest,
  renderHeader,
  renderManifest,
  serializeManifest,
} from './render.js'
import {
  type DocumentationBundle,
  type TagFileFetcher,
  httpTagFileFetcher,
  pairDocumentation,
  resolveDocumentation,
} from './tagfiles.js'
import { validateSession } from './validate.js'

/**
 * Everything setupKernel needs besides the kernel options.
 */
export interface SetupContext extends SessionLocation {
  /** Host build graph */
  graph: BuildGraph
  /** Environment for tool discovery (default: process.env) */
  env?: Environment | undefined
  /** Tag file transport (default: global fetch) */
  fetcher?: TagFileFetcher | undefined
  logger?: SetupLogger | undefined
  /** Compose only: no downloads, no writes */
  dryRun?: boolean | undefined
}

/**
 * A kernel whose artifacts have been written.
 */
export interface GeneratedKernel {
  kernelId: string
  displayName: string
  /** Kernelspec directory (the build output directory) */
  outputDir: string
  headerPath: string
  manifestPath: string
  manifest: KernelManifest
  interpreterPath: string
  /** xeus-cling installation prefix documentation is installed into */
  prefix: string
  /** Copied logo files */
  logoFiles: string[]
  documentation: DocumentationBundle
  noInstall: boolean
  /** Every file written, in write order */
  files: string[]
}

/**
 * Result of setup operation.
 */
export type SetupResult =
  | { status: 'skipped'; reason: string }
  | { status: 'planned'; request: SessionRequest; artifacts: ComposedArtifacts }
  | { status: 'generated'; request: SessionRequest; kernel: GeneratedKernel }

/**
 * Build the request, collect target properties and validate.
 * Throws on the first violated constraint.
 */
export function prepareSession(
  options: KernelSetupOptions,
  location: SessionLocation,
  graph: BuildGraph
): SessionRequest {
  const request = collectTargetProperties(createSessionRequest(options, location), graph)
  validateSession(request)
  return request
}

async function readLogos(request: SessionRequest): Promise<GeneratedArtifact[]> {
  const artifacts: GeneratedArtifact[] = []
  for (const file of request.logoFiles) {
    const sourcePath = isAbsolute(file) ? file : resolve(request.sourceDir, file)
    let content: Uint8Array
    try {
      content = await readFile(sourcePath)
    } catch (error) {
      throw new MissingAssetError(sourcePath, { cause: error })
    }
    artifacts.push({ path: join(request.binaryDir, basename(file)), content })
  }
  return artifacts
}

async function commitArtifacts(artifacts: readonly GeneratedArtifact[]): Promise<string[]> {
  for (const artifact of artifacts) {
    await atomicWriteFile(artifact.path, artifact.content)
  }
  return artifacts.map((artifact) => artifact.path)
}

/**
 * Run one generation pass.
 */
export async function setupKernel(
  options: KernelSetupOptions,
  context: SetupContext
): Promise<SetupResult> {
  const logger = context.logger ?? consoleLogger
  const env = context.env ?? process.env

  // The interpreter check comes first: without it nothing else matters
  const tools = await discoverTools(env)
  if (!tools.interpreterPath) {
    if (options.required) {
      throw new PrerequisiteMissingError(INTERPRETER_PROGRAM)
    }
    const reason = `The interpreter ${INTERPRETER_PROGRAM} was not found, skipping kernel setup`
    logger.info(reason)
    return { status: 'skipped', reason }
  }

  const location: SessionLocation = {
    projectName: context.projectName,
    sourceDir: resolve(context.sourceDir),
    binaryDir: resolve(context.binaryDir),
  }
  const request = prepareSession(options, location, context.graph)
  const artifacts = composeArtifacts(request, { interpreterPath: tools.interpreterPath })

  if (context.dryRun) {
    return { status: 'planned', request, artifacts }
  }

  const logos = await readLogos(request)
  const documentation = await resolveDocumentation(
    pairDocumentation(request.doxygenUrls, request.doxygenTagfiles),
    {
      sourceDir: request.sourceDir,
      binaryDir: request.binaryDir,
      fetcher: context.fetcher ?? httpTagFileFetcher,
      logger,
    }
  )

  const manifest = renderManifest(artifacts.manifest, context.graph)
  const outputs: GeneratedArtifact[] = [
    { path: artifacts.header.path, content: renderHeader(artifacts.header, context.graph) },
    { path: artifacts.manifest.path, content: serializeManifest(manifest) },
    ...documentation.artifacts,
    ...logos,
  ]

  const files = await commitArtifacts(outputs)
  logger.info(`Generated kernel "${artifacts.displayName}" in ${request.binaryDir}`)

  return {
    status: 'generated',
    request,
    kernel: {
      kernelId: artifacts.kernelId,
      displayName: artifacts.displayName,
      outputDir: request.binaryDir,
      headerPath: artifacts.header.path,
      manifestPath: artifacts.manifest.path,
      manifest,
      interpreterPath: tools.interpreterPath,
      prefix: resolveXeusClingPrefix(tools.interpreterPath, env),
      logoFiles: logos.map((logo) => logo.path),
      documentation,
      noInstall: request.noInstall,
      files,
    },
  }
}
