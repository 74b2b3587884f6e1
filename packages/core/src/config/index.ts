/**
 * Config file parsers and layout constants for cling-kernel-setup
 */

// Option normalization
export { OPTION_KEYS, normalizeSetupOptions, type NormalizedOptions } from './options.js'

// kernel-setup.toml
export {
  isRecord,
  parseSetupToml,
  parseTomlTable,
  readSetupToml,
  type ProjectConfig,
  type SetupFile,
} from './setup-toml.js'

// build-graph.toml
export {
  parseGraphToml,
  readGraphToml,
  type BuildGraphFile,
  type GraphTargetDefinition,
} from './graph-toml.js'

// Output layout
export {
  ALLOWED_LOGO_NAMES,
  DEFAULT_BUILD_DIR,
  GRAPH_FILENAME,
  HEADER_FILENAME,
  MANIFEST_FILENAME,
  SETUP_FILENAME,
  TAG_CONFIG_DIR,
  TAG_FILES_DIR,
  getFragmentPath,
  getHeaderPath,
  getManifestPath,
  getTagConfigPath,
  getTagFilesPath,
} from './output-layout.js'
