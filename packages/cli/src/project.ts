/**
 * Project loading for CLI commands.
 *
 * WHY: Every command starts the same way: find kernel-setup.toml, report
 * its warnings, load the build graph and run the generation pass.
 */

import { dirname, join, resolve } from 'node:path'

import {
  SETUP_FILENAME,
  type SetupFile,
  type SetupLogger,
  isFile,
  readSetupToml,
} from '@cling-kernel-setup/core'
import {
  type Environment,
  type SetupResult,
  type TagFileFetcher,
  StaticBuildGraph,
  setupKernel,
} from '@cling-kernel-setup/engine'

/** Options shared by commands that load a project */
export interface ProjectOptions {
  /** Path to kernel-setup.toml (default: searched upward from cwd) */
  config?: string | undefined
  /** Build graph export override */
  graph?: string | undefined
  /** Output directory override */
  buildDir?: string | undefined
}

export interface LoadedProject {
  setup: SetupFile
  graph: StaticBuildGraph
  binaryDir: string
}

export interface GenerateOptions extends ProjectOptions {
  dryRun?: boolean | undefined
  env?: Environment | undefined
  fetcher?: TagFileFetcher | undefined
  cwd?: string | undefined
}

/**
 * Find kernel-setup.toml in `startDir` or any parent directory.
 */
export async function findSetupFile(startDir: string = process.cwd()): Promise<string | undefined> {
  let dir = resolve(startDir)
  for (;;) {
    const candidate = join(dir, SETUP_FILENAME)
    if (await isFile(candidate)) {
      return candidate
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return undefined
    }
    dir = parent
  }
}

/**
 * Read the setup file and the build graph it points to.
 */
export async function loadProject(
  options: ProjectOptions,
  logger: SetupLogger,
  cwd: string = process.cwd()
): Promise<LoadedProject> {
  const configPath = options.config ? resolve(cwd, options.config) : await findSetupFile(cwd)
  if (!configPath) {
    throw new Error(`No ${SETUP_FILENAME} found in ${cwd} or any parent directory`)
  }

  const setup = await readSetupToml(configPath)
  for (const warning of setup.warnings) {
    logger.warn(warning)
  }

  const graphPath = options.graph ? resolve(cwd, options.graph) : setup.project.graphPath
  const graph = await StaticBuildGraph.load(graphPath)
  const binaryDir = options.buildDir ? resolve(cwd, options.buildDir) : setup.project.buildDir

  return { setup, graph, binaryDir }
}

/**
 * Load the project and run one generation pass.
 */
export async function generateProject(
  options: GenerateOptions,
  logger: SetupLogger
): Promise<SetupResult> {
  const project = await loadProject(options, logger, options.cwd)
  return setupKernel(project.setup.kernel, {
    projectName: project.setup.project.name,
    sourceDir: project.setup.project.sourceDir,
    binaryDir: project.binaryDir,
    graph: project.graph,
    env: options.env,
    fetcher: options.fetcher,
    logger,
    dryRun: options.dryRun,
  })
}
