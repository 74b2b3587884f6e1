/**
 * @cling-kernel-setup/core - Shared types, errors and config parsing.
 */

export * from './types/index.js'
export * from './config/index.js'
export * from './errors.js'
export * from './warnings.js'
export { KERNEL_ID_NAMESPACE, deriveKernelId, uuidV5 } from './identity.js'
export { atomicWriteFile, copyFilesInto, isFile } from './fs.js'
