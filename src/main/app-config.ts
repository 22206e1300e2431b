// SPDX-License-Identifier: GPL-2.0-or-later
// CLI configuration backed by conf

import Conf from 'conf'
import {
  DEFAULT_APP_CONFIG,
  ROW_STRATEGIES,
  SETTABLE_APP_CONFIG_KEYS,
  type AppConfig,
} from '../shared/types/app-config'
import type { RowStrategy } from '../shared/kle'

const PROJECT_NAME = 'relaxed-kle'

export class AppConfigError extends Error {
  override name = 'AppConfigError'
}

let store: Conf<AppConfig> | null = null

/** Lazily open the store; RELAXED_KLE_CONFIG_DIR overrides its directory */
export function getAppConfigStore(): Conf<AppConfig> {
  if (!store) {
    const cwd = process.env.RELAXED_KLE_CONFIG_DIR
    store = new Conf<AppConfig>({
      projectName: PROJECT_NAME,
      configName: 'config',
      defaults: DEFAULT_APP_CONFIG,
      ...(cwd ? { cwd } : {}),
    })
  }
  return store
}

export function loadAppConfig(): AppConfig {
  return getAppConfigStore().store
}

export function isRowStrategy(value: string): value is RowStrategy {
  return ROW_STRATEGIES.some((s) => s === value)
}

function parseBoolean(key: string, raw: string): boolean {
  if (raw === 'true') return true
  if (raw === 'false') return false
  throw new AppConfigError(`Invalid value for ${key}: expected true or false, got "${raw}"`)
}

/** Validate a value given as CLI text and persist it */
export function setAppConfigValue(key: string, raw: string): void {
  const config = getAppConfigStore()
  switch (key) {
    case 'outputSuffix':
      if (raw === '') {
        throw new AppConfigError('Invalid value for outputSuffix: must not be empty')
      }
      config.set('outputSuffix', raw)
      break
    case 'rowStrategy':
      if (!isRowStrategy(raw)) {
        throw new AppConfigError(
          `Invalid value for rowStrategy: expected ${ROW_STRATEGIES.join(' or ')}, got "${raw}"`,
        )
      }
      config.set('rowStrategy', raw)
      break
    case 'logToFile':
      config.set('logToFile', parseBoolean(key, raw))
      break
    default:
      throw new AppConfigError(
        `Unknown config key "${key}" (expected one of ${[...SETTABLE_APP_CONFIG_KEYS].join(', ')})`,
      )
  }
}
