/**
 * Constraint validation.
 *
 * WHY: Every check here runs before any artifact is generated. A failing
 * check throws, so a misconfigured kernel never leaves half-written files
 * in the build directory.
 */

import { basename } from 'node:path'

import {
  ALLOWED_LOGO_NAMES,
  type ClingStandard,
  DEFAULT_CXX_STANDARD,
  HEADER_FILENAME,
  IllegalAssetNameError,
  InsecureURLError,
  MANIFEST_FILENAME,
  PairingLengthError,
  type SessionRequest,
  StandardMismatchError,
  TargetKindError,
  type TargetInfo,
  UnsupportedStandardError,
  isClingStandard,
  isNewerStandard,
  parseCxxStandard,
} from '@cling-kernel-setup/core'

const SECURE_URL_PATTERN = /^https:\/\/.+/

/**
 * Resolve the configured session standard.
 *
 * Missing → 17. Values that are not a C++ standard, and standards the
 * interpreter cannot run, both throw UnsupportedStandardError.
 */
export function parseSessionStandard(raw: number | string | undefined): ClingStandard {
  if (raw === undefined) {
    return DEFAULT_CXX_STANDARD
  }

  const standard = parseCxxStandard(raw)
  if (standard === undefined) {
    throw new UnsupportedStandardError(String(raw), 'unknown')
  }
  if (!isClingStandard(standard)) {
    throw new UnsupportedStandardError(String(standard), 'unsupported')
  }
  return standard
}

/**
 * A target can be loaded into a session only if it is a shared library
 * that does not require a newer standard than the session runs with.
 */
export function assertTargetCompatible(target: TargetInfo, standard: ClingStandard): void {
  switch (target.kind) {
    case 'shared-library':
      break
    case 'static-library':
    case 'module-library':
    case 'object-library':
    case 'interface-library':
    case 'executable':
    case 'utility':
      throw new TargetKindError(target.name, target.kind)
  }

  if (target.cxxStandard !== undefined && isNewerStandard(target.cxxStandard, standard)) {
    throw new StandardMismatchError(target.name, target.cxxStandard, standard)
  }
}

export function assertPairedLengths(urls: readonly string[], tagfiles: readonly string[]): void {
  if (urls.length !== tagfiles.length) {
    throw new PairingLengthError(urls.length, tagfiles.length)
  }
}

export function assertSecureUrls(urls: readonly string[]): void {
  for (const url of urls) {
    if (!SECURE_URL_PATTERN.test(url)) {
      throw new InsecureURLError(url)
    }
  }
}

export function assertLogoNames(files: readonly string[]): void {
  const allowed: readonly string[] = ALLOWED_LOGO_NAMES
  for (const file of files) {
    if (!allowed.includes(basename(file))) {
      throw new IllegalAssetNameError(file, `expected one of ${allowed.join(', ')}`)
    }
  }
}

/**
 * Tag files are downloaded next to the kernel files under their basename
 * and get a `<basename>.json` fragment there, so neither may land on a
 * generated file or on another tag's files.
 */
export function assertTagNames(tagfiles: readonly string[]): void {
  const reserved: readonly string[] = [HEADER_FILENAME, MANIFEST_FILENAME, ...ALLOWED_LOGO_NAMES]
  const seen = new Set<string>()
  for (const tag of tagfiles) {
    const name = basename(tag)
    if (reserved.includes(name) || reserved.includes(`${name}.json`)) {
      throw new IllegalAssetNameError(tag, 'its files would replace a generated kernel file')
    }
    if (seen.has(name)) {
      throw new IllegalAssetNameError(tag, `another tag file is also named ${name}`)
    }
    seen.add(name)
  }
}

/**
 * Gate a collected request. Throws on the first violated constraint.
 */
export function validateSession(request: SessionRequest): void {
  for (const target of request.targetInfos) {
    assertTargetCompatible(target, request.cxxStandard)
  }
  assertPairedLengths(request.doxygenUrls, request.doxygenTagfiles)
  assertSecureUrls(request.doxygenUrls)
  assertTagNames(request.doxygenTagfiles)
  assertLogoNames(request.logoFiles)
}
