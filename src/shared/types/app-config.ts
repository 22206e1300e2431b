// SPDX-License-Identifier: GPL-2.0-or-later

import type { RowStrategy } from '../kle/types'

export interface AppConfig {
  outputSuffix: string
  rowStrategy: RowStrategy
  logToFile: boolean
}

export const SETTABLE_APP_CONFIG_KEYS: ReadonlySet<keyof AppConfig> = new Set([
  'outputSuffix',
  'rowStrategy',
  'logToFile',
])

export const ROW_STRATEGIES: readonly RowStrategy[] = ['offset', 'recorded']

export const DEFAULT_APP_CONFIG: AppConfig = {
  outputSuffix: '_output',
  rowStrategy: 'offset',
  logToFile: true,
}
