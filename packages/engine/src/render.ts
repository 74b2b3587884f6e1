/**
 * Artifact rendering.
 *
 * Resolves the deferred values of composed artifacts through the build
 * graph and produces the final file contents. A value that resolves to
 * nothing produces no header line and no argument.
 */

import {
  type PropertyResolver,
  type ResolvedProperty,
  formatProperty,
  resolveProperty,
} from '@cling-kernel-setup/core'

import type { ArgvEntry, DeferredHeader, DeferredManifest, HeaderDirective } from './compose.js'

/** kernel.json as read by Jupyter */
export interface KernelManifest {
  display_name: string
  argv: string[]
  language: string
}

/** A file ready to be written */
export interface GeneratedArtifact {
  path: string
  content: string | Uint8Array
}

function directiveLine(kind: Exclude<HeaderDirective['kind'], 'setup-header'>, value: string): string {
  switch (kind) {
    case 'include-path':
      return `#pragma cling add_include_path("${value}")`
    case 'library-path':
      return `#pragma cling add_library_path("${value}")`
    case 'load':
      return `#pragma cling load("${value}")`
  }
}

function setupHeaderLine(path: string): string {
  return `#include<${path}>`
}

function directiveLines(
  directive: HeaderDirective,
  expand: (value: ResolvedProperty) => string[]
): string[] {
  if (directive.kind === 'setup-header') {
    return [setupHeaderLine(directive.path)]
  }
  const { kind } = directive
  return expand(directive.value).map((value) => directiveLine(kind, value))
}

function joinLines(lines: string[]): string {
  return lines.map((line) => `${line}\n`).join('')
}

export function renderHeader(header: DeferredHeader, resolver: PropertyResolver): string {
  return joinLines(
    header.directives.flatMap((directive) =>
      directiveLines(directive, (value) => resolveProperty(value, resolver))
    )
  )
}

/**
 * Header with deferred values left in placeholder form.
 */
export function formatHeaderTemplate(header: DeferredHeader): string {
  return joinLines(
    header.directives.flatMap((directive) =>
      directiveLines(directive, (value) => [formatProperty(value)])
    )
  )
}

function expandArgv(entries: ArgvEntry[], expand: (value: ResolvedProperty) => string[]): string[] {
  return entries.flatMap((entry) => {
    switch (entry.kind) {
      case 'fixed':
        return [entry.value]
      case 'flag': {
        const { prefix } = entry
        return expand(entry.value).map((value) => `${prefix}${value}`)
      }
    }
  })
}

export function renderManifest(manifest: DeferredManifest, resolver: PropertyResolver): KernelManifest {
  return {
    display_name: manifest.displayName,
    argv: expandArgv(manifest.argv, (value) => resolveProperty(value, resolver)),
    language: manifest.language,
  }
}

/**
 * Manifest with deferred values left in placeholder form.
 */
export function formatManifestTemplate(manifest: DeferredManifest): KernelManifest {
  return {
    display_name: manifest.displayName,
    argv: expandArgv(manifest.argv, (value) => [formatProperty(value)]),
    language: manifest.language,
  }
}

export function serializeManifest(manifest: KernelManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`
}
