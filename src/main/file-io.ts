// SPDX-License-Identifier: GPL-2.0-or-later
// File I/O for layout conversion

import { readFile, writeFile } from 'node:fs/promises'

const JSON_EXT = /\.json$/

/**
 * Derive the output file name by inserting the suffix before ".json".
 * Paths without a .json extension get "<suffix>.json" appended so the
 * input is never overwritten.
 */
export function deriveOutputPath(inputPath: string, suffix: string): string {
  if (JSON_EXT.test(inputPath)) {
    return inputPath.replace(JSON_EXT, () => `${suffix}.json`)
  }
  return `${inputPath}${suffix}.json`
}

export async function readLayoutFile(filePath: string): Promise<string> {
  return readFile(filePath, 'utf-8')
}

export async function writeLayoutFile(filePath: string, content: string): Promise<void> {
  await writeFile(filePath, content, 'utf-8')
}
