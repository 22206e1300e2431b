// SPDX-License-Identifier: GPL-2.0-or-later
// Relaxed KLE (Keyboard Layout Editor) parser
// Walks rows of property patches and legends, placing one key per legend.

import { decodeKeyProperties, decodeLayout, isPlainObject, KleDecodeError } from './decode'
import { repairRelaxedJson } from './relaxed-json'
import {
  LEGEND_SEPARATOR,
  type Key,
  type Keyboard,
  type KeyProperties,
  type PersistentKeyProperties,
  type TransientKeyProperties,
} from './types'

/** Accumulator carried from one row item to the next */
export interface InterpreterState {
  readonly currentX: number
  readonly currentY: number
  readonly row: number
  readonly properties: KeyProperties
}

export interface StepResult {
  state: InterpreterState
  key?: Key
}

export interface InterpretResult {
  keys: Key[]
  state: InterpreterState
}

export type ParseResult =
  | { success: true; keyboard: Keyboard }
  | { success: false; error: KleDecodeError }

export const INITIAL_STATE: InterpreterState = {
  currentX: 0,
  currentY: 0,
  row: 0,
  properties: {},
}

function persistentOf(props: KeyProperties): PersistentKeyProperties {
  const { c, t, g, a, f, f2, p } = props
  return { c, t, g, a, f, f2, p }
}

function transientOf(props: KeyProperties): TransientKeyProperties {
  const { x, y, w, h, x2, y2, w2, h2, l, n, d, r, rx, ry } = props
  return { x, y, w, h, x2, y2, w2, h2, l, n, d, r, rx, ry }
}

export function isRotated(props: KeyProperties): boolean {
  return props.r !== undefined || props.rx !== undefined || props.ry !== undefined
}

/**
 * Merge a patch into the accumulator. Persistent fields are only replaced
 * when the patch sets them; transient fields always take the patch's value,
 * so an earlier patch's offsets never leak past a later one.
 */
export function applyPatch(current: KeyProperties, patch: KeyProperties): KeyProperties {
  return {
    c: patch.c ?? current.c,
    t: patch.t ?? current.t,
    g: patch.g ?? current.g,
    a: patch.a ?? current.a,
    f: patch.f ?? current.f,
    f2: patch.f2 ?? current.f2,
    p: patch.p ?? current.p,
    ...transientOf(patch),
  }
}

function placeKey(state: InterpreterState, label: string): StepResult {
  const { properties } = state
  const offsetX = properties.x ?? 0
  const offsetY = properties.y ?? 0

  // Rotated keys are positioned absolutely, not relative to the row flow
  const rotated = isRotated(properties)
  const x = rotated ? offsetX : state.currentX + offsetX
  const y = rotated ? offsetY : state.currentY + offsetY

  const key: Key = {
    legends: label.split(LEGEND_SEPARATOR),
    properties: { ...properties },
    x,
    y,
    row: state.row,
  }

  return {
    key,
    state: {
      ...state,
      currentX: x + (properties.w ?? 1),
      properties: persistentOf(properties),
    },
  }
}

/** Interpret one row item: objects patch the accumulator, strings place a key */
export function interpretItem(state: InterpreterState, item: unknown): StepResult {
  if (isPlainObject(item)) {
    const patch = decodeKeyProperties(item)
    return { state: { ...state, properties: applyPatch(state.properties, patch) } }
  }
  if (typeof item === 'string') {
    return placeKey(state, item)
  }
  return { state }
}

/** Interpret decoded rows into placed keys */
export function interpretRows(rows: readonly (readonly unknown[])[]): InterpretResult {
  const keys: Key[] = []
  let state = INITIAL_STATE

  for (const row of rows) {
    state = { ...state, currentX: 0 }
    for (const item of row) {
      const result = interpretItem(state, item)
      state = result.state
      if (result.key) keys.push(result.key)
    }
    state = { ...state, currentY: state.currentY + 1, row: state.row + 1 }
  }

  return { keys, state }
}

/** Parse relaxed KLE raw data. Throws KleDecodeError on malformed input. */
export function parseKeyboard(raw: string): Keyboard {
  const { metadata, rows } = decodeLayout(repairRelaxedJson(raw))
  const { keys } = interpretRows(rows)
  return metadata === undefined ? { keys } : { metadata, keys }
}

export function tryParseKeyboard(raw: string): ParseResult {
  try {
    return { success: true, keyboard: parseKeyboard(raw) }
  } catch (err) {
    if (err instanceof KleDecodeError) return { success: false, error: err }
    throw err
  }
}
