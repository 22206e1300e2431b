// SPDX-License-Identifier: GPL-2.0-or-later
// Serializes a parsed Keyboard back into relaxed KLE raw data.
// Only position and rotation deltas are written; style properties are not.

import { isRotated } from './kle-parser'
import {
  LEGEND_SEPARATOR,
  type Key,
  type Keyboard,
  type KeyboardMetadata,
  type KeyProperties,
  type RowStrategy,
  type SerializeOptions,
} from './types'

/** Metadata as a strict JSON object with fields in canonical order */
export function formatMetadata(metadata: KeyboardMetadata): string {
  const { background } = metadata
  const ordered: KeyboardMetadata = {
    author: metadata.author,
    backcolor: metadata.backcolor,
    background: background && { name: background.name, style: background.style },
    name: metadata.name,
    notes: metadata.notes,
    radii: metadata.radii,
    switchBrand: metadata.switchBrand,
    switchMount: metadata.switchMount,
    switchType: metadata.switchType,
  }
  // JSON.stringify drops the undefined fields
  return JSON.stringify(ordered)
}

/**
 * Build the property object to emit before a key, or null when nothing
 * qualifies. Rotated keys use the order r, rx, ry, y, x and always carry
 * every field they have, since rotation does not outlive its key. Other
 * keys emit y, x only when they changed, except that a negative y is
 * always kept as it marks the start of a row.
 */
export function formatDelta(
  props: Readonly<KeyProperties>,
  last: Readonly<KeyProperties>,
): string | null {
  const parts: string[] = []
  const push = (name: string, value: number | undefined): void => {
    if (value !== undefined) parts.push(`${name}:${value}`)
  }

  if (isRotated(props)) {
    push('r', props.r)
    push('rx', props.rx)
    push('ry', props.ry)
    push('y', props.y)
    push('x', props.x)
  } else {
    if (props.y !== last.y || (props.y !== undefined && props.y < 0)) push('y', props.y)
    if (props.x !== last.x) push('x', props.x)
  }

  return parts.length === 0 ? null : `{${parts.join(',')}}`
}

export function formatLegends(legends: readonly string[]): string {
  return JSON.stringify(legends.join(LEGEND_SEPARATOR))
}

/** Regroup keys into rows, ordered by row number then encounter order */
export function groupRows(keys: readonly Key[], strategy: RowStrategy): Key[][] {
  const rows = new Map<number, Key[]>()
  let current = 0

  for (const key of keys) {
    if (strategy === 'recorded') {
      current = key.row
    } else if (key.properties.y !== undefined && key.properties.y < 0) {
      // A negative y offset marks the first key of a new visual row
      current++
    }
    const row = rows.get(current)
    if (row) {
      row.push(key)
    } else {
      rows.set(current, [key])
    }
  }

  return [...rows.entries()].sort(([a], [b]) => a - b).map(([, row]) => row)
}

export function toRawFormat(keyboard: Keyboard, options: SerializeOptions = {}): string {
  const { rowStrategy = 'offset' } = options
  const header = keyboard.metadata ? `${formatMetadata(keyboard.metadata)},\n` : ''

  let last: Readonly<KeyProperties> = {}
  const rows = groupRows(keyboard.keys, rowStrategy).map((row) => {
    const items: string[] = []
    for (const key of row) {
      const delta = formatDelta(key.properties, last)
      if (delta !== null) items.push(delta)
      items.push(formatLegends(key.legends))
      last = key.properties
    }
    return `[${items.join(',')}]`
  })

  return header + rows.join(',\n')
}
