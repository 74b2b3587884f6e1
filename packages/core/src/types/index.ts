/**
 * Core types for cling-kernel-setup
 */

// Standard levels
export type { ClingStandard, CxxStandard } from './standard.js'

export {
  CLING_STANDARDS,
  CXX_STANDARDS,
  DEFAULT_CXX_STANDARD,
  isClingStandard,
  isCxxStandard,
  isNewerStandard,
  parseCxxStandard,
  standardRank,
} from './standard.js'

// Property values
export type { DeferredExpression, PropertyResolver, ResolvedProperty } from './property.js'

export {
  deferred,
  formatExpression,
  formatProperty,
  literal,
  parsePropertyValue,
  resolveProperty,
  targetFile,
  targetProperty,
} from './property.js'

// Targets
export type { BuildGraph, TargetInfo, TargetKind, TargetRef } from './target.js'

export {
  TARGET_PROPERTIES,
  asTargetRef,
  formatTargetKind,
  isTargetRef,
  parseTargetKind,
} from './target.js'

// Sessions
export type { KernelSetupOptions, SessionRequest, TagPair } from './session.js'
