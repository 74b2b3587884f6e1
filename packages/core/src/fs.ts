/**
 * Filesystem helpers.
 *
 * WHY: Generated files are read by Jupyter and the interpreter while a
 * build may be rewriting them. Writes go to a temporary sibling first and
 * are renamed into place, so a reader sees either the old or the new file.
 */

import { randomBytes } from 'node:crypto'
import { copyFile, mkdir, rename, rm, stat, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Write a file atomically (temp file + rename), creating parent directories.
 */
export async function atomicWriteFile(path: string, content: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  )
  try {
    await writeFile(tempPath, content)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * Check if a path exists and is a file.
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    return stats.isFile()
  } catch {
    return false
  }
}

/**
 * Copy files into a directory under their basenames, overwriting.
 * Returns the destination paths in input order.
 */
export async function copyFilesInto(files: readonly string[], destDir: string): Promise<string[]> {
  await mkdir(destDir, { recursive: true })
  const copied: string[] = []
  for (const file of files) {
    const dest = join(destDir, basename(file))
    await copyFile(file, dest)
    copied.push(dest)
  }
  return copied
}
