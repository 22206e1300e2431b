// SPDX-License-Identifier: GPL-2.0-or-later
// Command-line handling: argument parsing and command dispatch

import type { RowStrategy } from '../shared/kle'
import { SETTABLE_APP_CONFIG_KEYS } from '../shared/types/app-config'
import { AppConfigError, isRowStrategy, loadAppConfig, setAppConfigValue } from './app-config'
import { convertFile } from './convert'
import { configureLogger } from './logger'

export const USAGE = `Usage:
  relaxed-kle <layout.json> [--out <path>] [--rows offset|recorded]
  relaxed-kle config list
  relaxed-kle config set <key> <value>`

export type CliCommand =
  | { kind: 'convert'; input: string; out?: string; rows?: RowStrategy }
  | { kind: 'config-list' }
  | { kind: 'config-set'; key: string; value: string }

export class UsageError extends Error {
  override name = 'UsageError'
}

function parseConfigCommand(args: readonly string[]): CliCommand {
  const [action, key, value, ...extra] = args
  if (action === 'list' && key === undefined) {
    return { kind: 'config-list' }
  }
  if (action === 'set' && key !== undefined && value !== undefined && extra.length === 0) {
    return { kind: 'config-set', key, value }
  }
  throw new UsageError(`Invalid config command: ${args.join(' ') || '(none)'}`)
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  if (argv[0] === 'config') {
    return parseConfigCommand(argv.slice(1))
  }

  let input: string | undefined
  let out: string | undefined
  let rows: RowStrategy | undefined

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--out' || arg === '--rows') {
      const value = argv[++i]
      if (value === undefined) throw new UsageError(`Missing value for ${arg}`)
      if (arg === '--out') {
        out = value
      } else if (isRowStrategy(value)) {
        rows = value
      } else {
        throw new UsageError(`Invalid row strategy: ${value}`)
      }
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`)
    } else if (input === undefined) {
      input = arg
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`)
    }
  }

  if (input === undefined) throw new UsageError('No file name provided')
  return { kind: 'convert', input, out, rows }
}

/** Run one CLI invocation and return the process exit code */
export async function runCli(argv: readonly string[]): Promise<number> {
  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    console.error(err.message)
    console.error(USAGE)
    return 2
  }

  const config = loadAppConfig()
  configureLogger({ enabled: config.logToFile })

  switch (command.kind) {
    case 'config-list':
      for (const key of SETTABLE_APP_CONFIG_KEYS) {
        console.log(`${key}=${String(config[key])}`)
      }
      return 0

    case 'config-set':
      try {
        setAppConfigValue(command.key, command.value)
      } catch (err) {
        if (!(err instanceof AppConfigError)) throw err
        console.error(err.message)
        return 2
      }
      console.log(`${command.key}=${command.value}`)
      return 0

    case 'convert': {
      const result = await convertFile(command.input, {
        outputPath: command.out,
        outputSuffix: config.outputSuffix,
        rowStrategy: command.rows ?? config.rowStrategy,
      })
      if (!result.success) {
        console.error(result.stage === 'parse' ? `Error parsing keyboard: ${result.error}` : result.error)
        return 1
      }
      console.log('Successfully parsed keyboard')
      console.log(`Written to ${result.filePath}`)
      return 0
    }
  }
}
