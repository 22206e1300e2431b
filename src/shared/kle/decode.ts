// SPDX-License-Identifier: GPL-2.0-or-later
// Schema decoding for repaired KLE JSON: metadata, property patches and rows

import type { Background, KeyboardMetadata, KeyProperties } from './types'

export class KleDecodeError extends Error {
  override name = 'KleDecodeError'
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
  }
}

export interface DecodedLayout {
  metadata?: KeyboardMetadata
  rows: unknown[][]
}

const NUMBER_FIELDS = ['x', 'y', 'w', 'h', 'x2', 'y2', 'w2', 'h2', 'r', 'rx', 'ry'] as const
const BOOLEAN_FIELDS = ['l', 'n', 'd', 'g'] as const
const STRING_FIELDS = ['c', 't', 'p'] as const
const BYTE_FIELDS = ['a', 'f', 'f2'] as const

const METADATA_STRING_FIELDS = [
  'author',
  'backcolor',
  'name',
  'notes',
  'radii',
  'switchBrand',
  'switchMount',
  'switchType',
] as const

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function mismatch(context: string, field: string, expected: string, value: unknown): KleDecodeError {
  return new KleDecodeError(
    `Invalid ${context} field "${field}": expected ${expected}, got ${describe(value)}`,
  )
}

// null is treated the same as an absent field

function readNumber(obj: Record<string, unknown>, field: string, context: string): number | undefined {
  const value = obj[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw mismatch(context, field, 'number', value)
  }
  return value
}

function readByte(obj: Record<string, unknown>, field: string, context: string): number | undefined {
  const value = readNumber(obj, field, context)
  if (value === undefined) return undefined
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new KleDecodeError(
      `Invalid ${context} field "${field}": expected integer 0-255, got ${value}`,
    )
  }
  return value
}

function readBoolean(obj: Record<string, unknown>, field: string, context: string): boolean | undefined {
  const value = obj[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'boolean') throw mismatch(context, field, 'boolean', value)
  return value
}

function readString(obj: Record<string, unknown>, field: string, context: string): string | undefined {
  const value = obj[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') throw mismatch(context, field, 'string', value)
  return value
}

/**
 * Decode a property patch. Every field is optional and unknown fields are
 * ignored; a recognized field holding the wrong type fails the decode.
 */
export function decodeKeyProperties(value: unknown): KeyProperties {
  if (!isPlainObject(value)) {
    throw new KleDecodeError(`Invalid key properties: expected object, got ${describe(value)}`)
  }
  const context = 'key properties'
  const props: KeyProperties = {}
  for (const field of NUMBER_FIELDS) {
    const v = readNumber(value, field, context)
    if (v !== undefined) props[field] = v
  }
  for (const field of BYTE_FIELDS) {
    const v = readByte(value, field, context)
    if (v !== undefined) props[field] = v
  }
  for (const field of BOOLEAN_FIELDS) {
    const v = readBoolean(value, field, context)
    if (v !== undefined) props[field] = v
  }
  for (const field of STRING_FIELDS) {
    const v = readString(value, field, context)
    if (v !== undefined) props[field] = v
  }
  return props
}

function decodeBackground(value: unknown): Background {
  if (!isPlainObject(value)) throw mismatch('metadata', 'background', 'object', value)
  const context = 'background'
  const name = readString(value, 'name', context)
  const style = readString(value, 'style', context)
  if (name === undefined) throw mismatch(context, 'name', 'string', value.name)
  if (style === undefined) throw mismatch(context, 'style', 'string', value.style)
  return { name, style }
}

/** Decode the optional leading metadata object */
export function decodeMetadata(value: unknown): KeyboardMetadata {
  if (!isPlainObject(value)) {
    throw new KleDecodeError(`Invalid metadata: expected object, got ${describe(value)}`)
  }
  const metadata: KeyboardMetadata = {}
  for (const field of METADATA_STRING_FIELDS) {
    const v = readString(value, field, 'metadata')
    if (v !== undefined) metadata[field] = v
  }
  if (value.background !== undefined && value.background !== null) {
    metadata.background = decodeBackground(value.background)
  }
  return metadata
}

// A downloaded layout is already wrapped in one array; after repair it shows
// up as a single element holding only rows (and maybe the metadata object).
function unwrapBracketedLayout(items: unknown[]): unknown[] {
  if (items.length !== 1) return items
  const inner: unknown = items[0]
  if (!Array.isArray(inner)) return items
  const rows: unknown[] = isPlainObject(inner[0]) ? inner.slice(1) : inner
  if (rows.length === 0 || !rows.every((row) => Array.isArray(row))) return items
  return inner
}

/** Parse repaired JSON text, split off metadata and check every row is an array */
export function decodeLayout(json: string): DecodedLayout {
  let data: unknown
  try {
    data = JSON.parse(json)
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err)
    throw new KleDecodeError(`Invalid layout JSON: ${detail}`, { cause: err })
  }
  if (!Array.isArray(data)) {
    throw new KleDecodeError(`Invalid layout: expected array, got ${describe(data)}`)
  }

  let items = unwrapBracketedLayout(data)
  let metadata: KeyboardMetadata | undefined
  if (items.length > 0 && isPlainObject(items[0])) {
    metadata = decodeMetadata(items[0])
    items = items.slice(1)
  }

  const rows = items.map((row, i): unknown[] => {
    if (!Array.isArray(row)) {
      throw new KleDecodeError(`Row ${i + 1} is not an array (got ${describe(row)})`)
    }
    return row
  })

  return metadata === undefined ? { rows } : { metadata, rows }
}
