/**
 * CLI File I/O
 *
 * File writing utilities for the CLI.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, isAbsolute, join } from 'node:path'

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write text output, creating the parent directory first.
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  await ensureDir(dirname(path))
  await writeFile(path, content)
}

/**
 * Relative output paths are placed under the configured output directory.
 */
export function resolveOutputPath(path: string, outputDir: string | undefined): string {
  if (!outputDir || isAbsolute(path)) {
    return path
  }
  return join(outputDir, path)
}
