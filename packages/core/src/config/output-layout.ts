/**
 * Output directory constants and helpers.
 *
 * WHY: The build output directory doubles as the kernelspec directory that
 * is handed to `jupyter kernelspec install`, so file names here are the
 * names Jupyter and xeus-cling expect.
 */

import { basename, join } from 'node:path'

/** Default configuration file name, looked up from the working directory upwards */
export const SETUP_FILENAME = 'kernel-setup.toml'

/** Default build graph export file name, inside the build directory */
export const GRAPH_FILENAME = 'build-graph.toml'

/** Default build directory name, relative to the configuration file */
export const DEFAULT_BUILD_DIR = 'build'

/** Filename for the generated bootstrap header */
export const HEADER_FILENAME = 'xeus_cling.hh'

/** Filename for the generated kernel manifest */
export const MANIFEST_FILENAME = 'kernel.json'

/** The only logo file names Jupyter picks up */
export const ALLOWED_LOGO_NAMES = ['logo-32x32.png', 'logo-64x64.png'] as const

/** Documentation fragment directory, relative to the xeus-cling prefix */
export const TAG_CONFIG_DIR = join('etc', 'xeus-cling', 'tags.d')

/** Tag file directory, relative to the xeus-cling prefix */
export const TAG_FILES_DIR = join('share', 'xeus-cling', 'tagfiles')

export function getHeaderPath(binaryDir: string): string {
  return join(binaryDir, HEADER_FILENAME)
}

export function getManifestPath(binaryDir: string): string {
  return join(binaryDir, MANIFEST_FILENAME)
}

/**
 * Path of the documentation fragment generated for a tag file.
 */
export function getFragmentPath(binaryDir: string, tag: string): string {
  return join(binaryDir, `${basename(tag)}.json`)
}

export function getTagConfigPath(prefix: string): string {
  return join(prefix, TAG_CONFIG_DIR)
}

export function getTagFilesPath(prefix: string): string {
  return join(prefix, TAG_FILES_DIR)
}
