/**
 * Documentation tag file registry.
 *
 * WHY: xeus-cling shows inline documentation for symbols listed in Doxygen
 * tag files. Each configured documentation URL is paired (by index) with a
 * tag file that is given as an absolute path, a path relative to the
 * project, or just a file name to download from the URL.
 *
 * Downloads are single attempts without retry or integrity check. Nothing
 * is written here: fragments and downloaded tag files are returned as
 * artifacts so the caller can commit them together with the kernel files.
 */

import { basename, isAbsolute, join } from 'node:path'

import {
  type SetupLogger,
  type TagPair,
  TagFetchError,
  getFragmentPath,
  isFile,
} from '@cling-kernel-setup/core'

import type { GeneratedArtifact } from './render.js'
import { assertPairedLengths } from './validate.js'

/**
 * Transport used to download tag files.
 */
export interface TagFileFetcher {
  fetch(url: string): Promise<Uint8Array>
}

/** Fetcher backed by the global `fetch` */
export const httpTagFileFetcher: TagFileFetcher = {
  async fetch(url) {
    const response = await fetch(url)
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim())
    }
    return new Uint8Array(await response.arrayBuffer())
  },
}

/** Where a tag file was found */
export type TagFileSource = 'absolute' | 'source' | 'download'

export interface ResolvedTagFile extends TagPair {
  /** Location the tag file is installed from */
  tagFilePath: string
  /** Generated fragment location */
  fragmentPath: string
  source: TagFileSource
}

/** xeus-cling documentation fragment (`<tag>.json`) */
export interface DocumentationFragment {
  url: string
  tagfile: string
}

export interface DocumentationBundle {
  entries: ResolvedTagFile[]
  /** Fragment files, in pair order */
  fragmentFiles: string[]
  /** Tag files, in pair order */
  tagFiles: string[]
  /** Fragments and downloaded tag files still to be written */
  artifacts: GeneratedArtifact[]
}

export interface ResolveDocumentationOptions {
  /** Directory relative tag files are looked up in */
  sourceDir: string
  /** Directory fragments and downloads are placed in */
  binaryDir: string
  fetcher: TagFileFetcher
  logger: SetupLogger
}

/**
 * Make sure a documentation URL ends with a path separator.
 */
export function normalizeDocUrl(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

/**
 * Zip URLs and tag files into pairs.
 */
export function pairDocumentation(urls: readonly string[], tagfiles: readonly string[]): TagPair[] {
  assertPairedLengths(urls, tagfiles)
  return urls.map((url, index) => ({
    url: normalizeDocUrl(url),
    tag: tagfiles[index] ?? '',
  }))
}

export function serializeFragment(fragment: DocumentationFragment): string {
  return `${JSON.stringify(fragment, null, 2)}\n`
}

/**
 * Resolve every pair's tag file and build its fragment.
 *
 * Resolution order: absolute path, path under sourceDir, download from
 * `url + tag` into binaryDir. A failed download aborts the whole step.
 */
export async function resolveDocumentation(
  pairs: readonly TagPair[],
  options: ResolveDocumentationOptions
): Promise<DocumentationBundle> {
  const entries: ResolvedTagFile[] = []
  const artifacts: GeneratedArtifact[] = []

  for (const pair of pairs) {
    let tagFilePath: string
    let source: TagFileSource

    if (isAbsolute(pair.tag)) {
      tagFilePath = pair.tag
      source = 'absolute'
    } else if (await isFile(join(options.sourceDir, pair.tag))) {
      tagFilePath = join(options.sourceDir, pair.tag)
      source = 'source'
    } else {
      const url = `${pair.url}${pair.tag}`
      tagFilePath = join(options.binaryDir, basename(pair.tag))
      source = 'download'

      options.logger.info(`-- Attempting to fetch tag file from ${url}`)
      let content: Uint8Array
      try {
        content = await options.fetcher.fetch(url)
      } catch (error) {
        throw new TagFetchError(url, error)
      }
      artifacts.push({ path: tagFilePath, content })
    }

    const fragmentPath = getFragmentPath(options.binaryDir, pair.tag)
    artifacts.push({
      path: fragmentPath,
      content: serializeFragment({ url: pair.url, tagfile: basename(pair.tag) }),
    })

    entries.push({ ...pair, tagFilePath, fragmentPath, source })
  }

  return {
    entries,
    fragmentFiles: entries.map((entry) => entry.fragmentPath),
    tagFiles: entries.map((entry) => entry.tagFilePath),
    artifacts,
  }
}
