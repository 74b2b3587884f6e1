/**
 * @cling-kernel-setup/engine - Kernel generation and installation.
 *
 * WHY: This package coordinates the stages between a project's
 * configuration and a registered interpreter kernel.
 *
 * The engine is the primary interface for:
 * - Collecting target properties from a build graph
 * - Validating the session
 * - Composing and rendering the header and manifest
 * - Resolving documentation tag files
 * - Installing documentation and registering the kernelspec
 */

// Build graph
export { StaticBuildGraph } from './graph.js'

// Discovery
export {
  INTERPRETER_PROGRAM,
  JUPYTER_PROGRAM,
  SETUP_ENV_VARS,
  discoverTools,
  findProgram,
  resolveXeusClingPrefix,
  type DiscoveredTools,
  type Environment,
} from './discovery.js'

// Collection
export {
  collectTargetProperties,
  createSessionRequest,
  type SessionLocation,
} from './collect.js'

// Validation
export {
  assertLogoNames,
  assertPairedLengths,
  assertSecureUrls,
  assertTagNames,
  assertTargetCompatible,
  parseSessionStandard,
  validateSession,
} from './validate.js'

// Composition
export {
  CONNECTION_FILE_PLACEHOLDER,
  composeArtifacts,
  composeHeader,
  composeManifest,
  defaultDisplayName,
  languageTag,
  type ArgvEntry,
  type ComposeOptions,
  type ComposedArtifacts,
  type DeferredHeader,
  type DeferredManifest,
  type HeaderDirective,
} from './compose.js'

// Rendering
export {
  formatHeaderTemplate,
  formatManifestTemplate,
  renderHeader,
  renderManifest,
  serializeManifest,
  type GeneratedArtifact,
  type KernelManifest,
} from './render.js'

// Documentation
export {
  httpTagFileFetcher,
  normalizeDocUrl,
  pairDocumentation,
  resolveDocumentation,
  serializeFragment,
  type DocumentationBundle,
  type DocumentationFragment,
  type ResolveDocumentationOptions,
  type ResolvedTagFile,
  type TagFileFetcher,
  type TagFileSource,
} from './tagfiles.js'

// Generation
export {
  prepareSession,
  setupKernel,
  type GeneratedKernel,
  type SetupContext,
  type SetupResult,
} from './setup.js'

// Installation
export {
  getKernelspecArgs,
  installDocumentation,
  installKernel,
  processRunner,
  registerKernelspec,
  type CommandResult,
  type CommandRunner,
  type DocumentationInstallResult,
  type InstallOptions,
  type InstallResult,
  type RegistrationResult,
} from './install.js'
