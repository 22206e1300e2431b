// SPDX-License-Identifier: GPL-2.0-or-later
// Read a relaxed KLE file, re-encode it and write the canonical form

import { repairRelaxedJson, toRawFormat, tryParseKeyboard, type RowStrategy } from '../shared/kle'
import { deriveOutputPath, readLayoutFile, writeLayoutFile } from './file-io'
import { isDebugEnabled, log, logDebug } from './logger'

export interface ConvertOptions {
  /** Explicit output path; derived from the input name when omitted */
  outputPath?: string
  outputSuffix: string
  rowStrategy: RowStrategy
}

export type ConvertStage = 'read' | 'parse' | 'write'

export type ConvertResult =
  | { success: true; filePath: string; keyCount: number }
  | { success: false; stage: ConvertStage; error: string }

function fail(stage: ConvertStage, error: string): ConvertResult {
  log('error', `${stage} failed: ${error}`)
  return { success: false, stage, error }
}

export async function convertFile(inputPath: string, options: ConvertOptions): Promise<ConvertResult> {
  let raw: string
  try {
    raw = await readLayoutFile(inputPath)
  } catch (err) {
    return fail('read', `Error reading file ${inputPath}: ${String(err)}`)
  }

  if (isDebugEnabled()) {
    logDebug(`Repaired input: ${repairRelaxedJson(raw)}`)
  }

  const parsed = tryParseKeyboard(raw)
  if (!parsed.success) {
    return fail('parse', parsed.error.message)
  }
  const { keyboard } = parsed
  logDebug(`Parsed ${keyboard.keys.length} keys from ${inputPath}`)

  const filePath = options.outputPath ?? deriveOutputPath(inputPath, options.outputSuffix)
  try {
    await writeLayoutFile(filePath, toRawFormat(keyboard, { rowStrategy: options.rowStrategy }))
  } catch (err) {
    return fail('write', `Error writing file ${filePath}: ${String(err)}`)
  }

  log('info', `Converted ${inputPath} -> ${filePath} (${keyboard.keys.length} keys)`)
  return { success: true, filePath, keyCount: keyboard.keys.length }
}
