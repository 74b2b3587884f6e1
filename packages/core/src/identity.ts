/**
 * Kernel identity.
 *
 * Jupyter identifies a kernelspec by its directory name. The name is a
 * name-based (SHA-1, version 5) UUID of the display name, so re-running the
 * setup with the same display name replaces the same kernel.
 */

import { createHash } from 'node:crypto'

/** Namespace kernel ids are derived under */
export const KERNEL_ID_NAMESPACE = '00000000-0000-0000-0000-000000000000'

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

function uuidToBytes(uuid: string): Buffer {
  if (!UUID_PATTERN.test(uuid)) {
    throw new Error(`Invalid UUID: "${uuid}"`)
  }
  return Buffer.from(uuid.replace(/-/g, ''), 'hex')
}

/**
 * Name-based SHA-1 UUID (RFC 4122 version 5), lowercase.
 */
export function uuidV5(name: string, namespace: string): string {
  const digest = createHash('sha1').update(uuidToBytes(namespace)).update(name, 'utf8').digest()
  const bytes = digest.subarray(0, 16)

  // version 5, RFC 4122 variant
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x50
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80

  const hex = bytes.toString('hex')
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-')
}

export function deriveKernelId(displayName: string): string {
  return uuidV5(displayName, KERNEL_ID_NAMESPACE)
}
