// SPDX-License-Identifier: GPL-2.0-or-later
// Relaxed KLE (Keyboard Layout Editor) model definitions

/** Keyboard background as stored in layout metadata */
export interface Background {
  name: string
  style: string
}

/** Optional leading metadata object of a layout */
export interface KeyboardMetadata {
  author?: string
  backcolor?: string
  background?: Background
  name?: string
  notes?: string
  radii?: string
  switchBrand?: string
  switchMount?: string
  switchType?: string
}

/** Properties that apply to the next placed key only */
export interface TransientKeyProperties {
  x?: number
  y?: number
  w?: number
  h?: number
  x2?: number
  y2?: number
  w2?: number
  h2?: number
  l?: boolean // stepped
  n?: boolean // homing
  d?: boolean // decal
  r?: number // rotation angle
  rx?: number // rotation center x
  ry?: number // rotation center y
}

/** Properties that stay in effect until overridden */
export interface PersistentKeyProperties {
  c?: string // keycap color
  t?: string // text color
  g?: boolean // ghosted
  a?: number // text alignment
  f?: number // primary font size
  f2?: number // secondary font size
  p?: string // profile & row
}

export interface KeyProperties extends TransientKeyProperties, PersistentKeyProperties {}

/** A single placed key */
export interface Key {
  readonly legends: readonly string[] // never empty
  readonly properties: Readonly<KeyProperties>
  readonly x: number
  readonly y: number
  readonly row: number // 0-based source row
}

/** Parsed keyboard: metadata plus keys in encounter order */
export interface Keyboard {
  metadata?: KeyboardMetadata
  keys: Key[]
}

export type RowStrategy = 'offset' | 'recorded'

export interface SerializeOptions {
  /** 'offset' starts a new row at each negative y offset; 'recorded' uses Key.row */
  rowStrategy?: RowStrategy
}

/** Line-break marker separating legends inside a key label */
export const LEGEND_SEPARATOR = '\n'
