/**
 * build-graph.toml parser.
 *
 * WHY: The host build system owns target information. It exports what the
 * kernel setup needs (type, artifact path, declared standard, interface
 * properties) into a small TOML file, one table per target:
 *
 * ```toml
 * [targets.adder]
 * type = "SHARED_LIBRARY"
 * file = "/abs/build/libadder.so"
 * cxx_standard = 17
 * interface_include_directories = ["/abs/include"]
 * interface_link_libraries = ["m"]
 * ```
 *
 * Keys other than `type`, `file` and `cxx_standard` are target properties;
 * their names are upper-cased (`interface_include_directories` becomes
 * `INTERFACE_INCLUDE_DIRECTORIES`).
 */

import { readFile } from 'node:fs/promises'
import { dirname, isAbsolute, resolve } from 'node:path'

import { InvalidConfigError } from '../errors.js'
import { type CxxStandard, parseCxxStandard } from '../types/standard.js'
import { type TargetKind, type TargetRef, isTargetRef, parseTargetKind } from '../types/target.js'
import { isRecord, parseTomlTable } from './setup-toml.js'

/** One target as exported by the host */
export interface GraphTargetDefinition {
  name: TargetRef
  kind: TargetKind
  /** Absolute path of the built artifact */
  file?: string | undefined
  cxxStandard?: CxxStandard | undefined
  /** Upper-cased property name → list value */
  properties: Record<string, string[]>
}

export interface BuildGraphFile {
  path: string
  targets: GraphTargetDefinition[]
}

const RESERVED_KEYS = new Set(['type', 'file', 'cxx_standard'])

function parseTarget(
  name: string,
  table: Record<string, unknown>,
  baseDir: string
): GraphTargetDefinition {
  const path = `targets.${name}`
  if (!isTargetRef(name)) {
    throw new InvalidConfigError('invalid target name', path)
  }

  const type = table['type']
  if (typeof type !== 'string') {
    throw new InvalidConfigError('missing target type', `${path}.type`)
  }
  const kind = parseTargetKind(type)
  if (!kind) {
    throw new InvalidConfigError(`unknown target type "${type}"`, `${path}.type`)
  }

  const target: GraphTargetDefinition = { name, kind, properties: {} }

  const file = table['file']
  if (file !== undefined) {
    if (typeof file !== 'string' || file.length === 0) {
      throw new InvalidConfigError('expected a non-empty string', `${path}.file`)
    }
    target.file = isAbsolute(file) ? file : resolve(baseDir, file)
  }

  const standard = table['cxx_standard']
  if (standard !== undefined) {
    const parsed =
      typeof standard === 'number' || typeof standard === 'string'
        ? parseCxxStandard(standard)
        : undefined
    if (parsed === undefined) {
      throw new InvalidConfigError('expected a C++ standard level', `${path}.cxx_standard`)
    }
    target.cxxStandard = parsed
  }

  for (const [key, value] of Object.entries(table)) {
    if (RESERVED_KEYS.has(key)) continue

    if (typeof value === 'string') {
      target.properties[key.toUpperCase()] = [value]
    } else if (
      Array.isArray(value) &&
      value.every((item): item is string => typeof item === 'string')
    ) {
      target.properties[key.toUpperCase()] = [...value]
    } else {
      throw new InvalidConfigError('expected a string or a list of strings', `${path}.${key}`)
    }
  }

  return target
}

/**
 * Parse build-graph.toml content.
 */
export function parseGraphToml(content: string, filePath: string): BuildGraphFile {
  const path = resolve(filePath)
  const data = parseTomlTable(content, path)

  const targetsTable = data['targets'] ?? {}
  if (!isRecord(targetsTable)) {
    throw new InvalidConfigError('expected a table', 'targets')
  }

  const targets: GraphTargetDefinition[] = []
  for (const [name, table] of Object.entries(targetsTable)) {
    if (!isRecord(table)) {
      throw new InvalidConfigError('expected a table', `targets.${name}`)
    }
    targets.push(parseTarget(name, table, dirname(path)))
  }

  return { path, targets }
}

/**
 * Read and parse a build-graph.toml file.
 */
export async function readGraphToml(filePath: string): Promise<BuildGraphFile> {
  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new InvalidConfigError('cannot read build graph', filePath, { cause: error })
  }
  return parseGraphToml(content, filePath)
}
