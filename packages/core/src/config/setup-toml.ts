/**
 * kernel-setup.toml parser.
 *
 * Layout:
 * ```toml
 * [project]
 * name = "adder"
 * build_dir = "build"
 * graph = "build/build-graph.toml"
 *
 * [kernel]
 * targets = ["adder"]
 * cxx_standard = 17
 * ```
 */

import { readFile } from 'node:fs/promises'
import { basename, dirname, isAbsolute, resolve } from 'node:path'

import { parse as parseToml } from '@iarna/toml'

import { InvalidConfigError } from '../errors.js'
import type { KernelSetupOptions } from '../types/session.js'
import { type SetupWarning, WARNING_CODES } from '../warnings.js'
import { normalizeSetupOptions } from './options.js'
import { DEFAULT_BUILD_DIR, GRAPH_FILENAME } from './output-layout.js'

/** Project-level settings */
export interface ProjectConfig {
  /** Project name (default: name of the directory holding the config file) */
  name: string
  /** Directory holding the config file; relative inputs resolve against it */
  sourceDir: string
  /** Absolute output directory */
  buildDir: string
  /** Absolute path of the build graph export */
  graphPath: string
}

export interface SetupFile {
  /** Absolute path of the parsed file */
  path: string
  project: ProjectConfig
  kernel: KernelSetupOptions
  /** Non-fatal findings (unknown keys) */
  warnings: SetupWarning[]
}

const PROJECT_KEYS = new Set(['name', 'build_dir', 'graph'])
const TOP_LEVEL_KEYS = new Set(['project', 'kernel'])

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse TOML text into a plain table, wrapping syntax errors.
 */
export function parseTomlTable(content: string, filePath: string): Record<string, unknown> {
  let data: unknown
  try {
    data = parseToml(content)
  } catch (error) {
    throw new InvalidConfigError(
      `invalid TOML: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      { cause: error }
    )
  }
  if (!isRecord(data)) {
    throw new InvalidConfigError('expected a TOML table', filePath)
  }
  return data
}

function optionalString(table: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = table[key]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidConfigError('expected a non-empty string', `${path}.${key}`)
  }
  return value
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path)
}

/**
 * Parse kernel-setup.toml content.
 *
 * @param content - File content
 * @param filePath - Path the content was read from (relative paths resolve against its directory)
 */
export function parseSetupToml(content: string, filePath: string): SetupFile {
  const path = resolve(filePath)
  const sourceDir = dirname(path)
  const data = parseTomlTable(content, path)
  const warnings: SetupWarning[] = []

  for (const key of Object.keys(data)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      warnings.push({
        code: WARNING_CODES.UNKNOWN_OPTION,
        message: `Unrecognized table "${key}": this often indicates a typo`,
        details: { key, scope: '' },
      })
    }
  }

  const projectTable = data['project'] ?? {}
  if (!isRecord(projectTable)) {
    throw new InvalidConfigError('expected a table', 'project')
  }
  for (const key of Object.keys(projectTable)) {
    if (!PROJECT_KEYS.has(key)) {
      warnings.push({
        code: WARNING_CODES.UNKNOWN_OPTION,
        message: `Unrecognized option "project.${key}": this often indicates a typo`,
        details: { key, scope: 'project' },
      })
    }
  }

  const buildDir = resolveFrom(
    sourceDir,
    optionalString(projectTable, 'build_dir', 'project') ?? DEFAULT_BUILD_DIR
  )
  const graph = optionalString(projectTable, 'graph', 'project')

  const project: ProjectConfig = {
    name: optionalString(projectTable, 'name', 'project') ?? basename(sourceDir),
    sourceDir,
    buildDir,
    graphPath: graph ? resolveFrom(sourceDir, graph) : resolve(buildDir, GRAPH_FILENAME),
  }

  const kernelTable = data['kernel'] ?? {}
  if (!isRecord(kernelTable)) {
    throw new InvalidConfigError('expected a table', 'kernel')
  }
  const normalized = normalizeSetupOptions(kernelTable, 'kernel')

  return {
    path,
    project,
    kernel: normalized.options,
    warnings: [...warnings, ...normalized.warnings],
  }
}

/**
 * Read and parse a kernel-setup.toml file.
 */
export async function readSetupToml(filePath: string): Promise<SetupFile> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new InvalidConfigError('cannot read configuration file', filePath, { cause: error })
  }
  return parseSetupToml(content, filePath)
}
