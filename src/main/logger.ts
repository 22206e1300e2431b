// SPDX-License-Identifier: GPL-2.0-or-later
// Rotation logger for the CLI, writes to <config dir>/logs/

import { dirname, join } from 'node:path'
import {
  existsSync,
  mkdirSync,
  statSync,
  renameSync,
  unlinkSync,
  appendFileSync,
} from 'node:fs'
import { getAppConfigStore } from './app-config'

const LOG_FILE_PREFIX = 'relaxed-kle-'
const LOG_FILE_EXT = '.log'
const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // relaxed-kle-0.log through relaxed-kle-4.log

export interface LoggerOptions {
  dir?: string
  enabled?: boolean
}

let logDir = ''
let enabled = true
let initialized = false

/** Override the log directory or switch file logging off */
export function configureLogger(options: LoggerOptions): void {
  if (options.dir !== undefined && options.dir !== logDir) {
    logDir = options.dir
    initialized = false
  }
  if (options.enabled !== undefined) {
    enabled = options.enabled
  }
}

function getLogDir(): string {
  if (!logDir) {
    logDir = join(dirname(getAppConfigStore().path), 'logs')
  }
  return logDir
}

function logFilePath(generation: number): string {
  return join(getLogDir(), `${LOG_FILE_PREFIX}${generation}${LOG_FILE_EXT}`)
}

function ensureLogDir(): void {
  const dir = getLogDir()
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
}

function rotate(): void {
  const oldest = logFilePath(MAX_GENERATIONS - 1)
  if (existsSync(oldest)) {
    unlinkSync(oldest)
  }
  for (let i = MAX_GENERATIONS - 2; i >= 0; i--) {
    const src = logFilePath(i)
    if (existsSync(src)) {
      renameSync(src, logFilePath(i + 1))
    }
  }
}

function shouldRotate(): boolean {
  const current = logFilePath(0)
  if (!existsSync(current)) return false
  try {
    const stats = statSync(current)
    return stats.size >= MAX_FILE_SIZE
  } catch {
    return false
  }
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export function formatLogLine(level: LogLevel, message: string, date: Date = new Date()): string {
  return `[${date.toISOString()}] [${level.toUpperCase()}] ${message}\n`
}

export function log(level: LogLevel, message: string): void {
  if (!enabled) return
  if (!initialized) {
    ensureLogDir()
    initialized = true
  }
  if (shouldRotate()) {
    rotate()
  }
  appendFileSync(logFilePath(0), formatLogLine(level, message), 'utf-8')
}

export function isDebugEnabled(): boolean {
  return !!process.env.RELAXED_KLE_DEBUG
}

export function logDebug(message: string): void {
  if (!isDebugEnabled()) return
  log('debug', message)
}

export function getLogPath(): string {
  return getLogDir()
}
