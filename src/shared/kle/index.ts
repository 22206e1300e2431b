// SPDX-License-Identifier: GPL-2.0-or-later

export { KleDecodeError, decodeKeyProperties, decodeLayout, decodeMetadata } from './decode'
export {
  applyPatch,
  interpretItem,
  interpretRows,
  isRotated,
  parseKeyboard,
  tryParseKeyboard,
  type InterpreterState,
  type ParseResult,
} from './kle-parser'
export { formatDelta, toRawFormat } from './kle-serializer'
export { repairRelaxedJson } from './relaxed-json'
export type * from './types'
export { LEGEND_SEPARATOR } from './types'
